// worldcore/shared/IntentResult.ts

/**
 * Outcome of a player intent. Gameplay failures are values, never thrown:
 * - invalid_target: missing, dead, elsewhere, out of reach or slipping away
 * - resource: not enough stamina (the action is not swapped for another)
 * - invalid_action: the intent makes no sense in the current state
 * - blocked: the world forbids it (safe room, pinned, must disengage first)
 * - noop: already doing exactly that
 */
export type IntentCode = "ok" | "invalid_target" | "resource" | "invalid_action" | "blocked" | "noop";

export interface IntentResult {
  ok: boolean;
  code: IntentCode;
  message: string;
}

export function succeed(message: string): IntentResult {
  return { ok: true, code: "ok", message };
}

export function fail(code: Exclude<IntentCode, "ok">, message: string): IntentResult {
  return { ok: false, code, message };
}
