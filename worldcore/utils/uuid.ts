// worldcore/utils/uuid.ts

import { randomUUID } from "crypto";

/** Short prefixed ids for instances, e.g. "cr_3f2a9c1b". Easier to read in logs than a full uuid. */
export function instanceId(prefix: string): string {
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 12)}`;
}
