// worldcore/mud/MudContext.ts

/**
 * What every command handler gets: the runtime it acts through and the
 * session that typed the command.
 */

import type { MudRuntime, SessionRef } from "./MudRuntime";

export interface MudContext {
  runtime: MudRuntime;
  session: SessionRef;
}
