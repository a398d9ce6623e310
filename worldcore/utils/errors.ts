// worldcore/utils/errors.ts

/** Bad or inconsistent content (unknown template, overlapping schedule blocks, malformed data file). */
export class ContentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContentError";
  }
}

/** The character store (or another external collaborator) failed a read or write. */
export class PersistenceError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PersistenceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
