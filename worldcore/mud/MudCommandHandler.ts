// worldcore/mud/MudCommandHandler.ts

import { IntentResult, fail } from "../shared/IntentResult";
import { COMMANDS } from "./commands/registry";
import type { MudContext } from "./MudContext";

// Commands that are NOT allowed while dead.
// Everything else is allowed (help, time, inventory).
const DEAD_BLOCKED_COMMANDS = new Set<string>([
  "look",
  "l",
  "attack",
  "kill",
  "k",
  "use",
  "disengage",
  "flee",
  "join",
  "assist",
  "advance",
  "retreat",
  "get",
  "take",
  "move",
  "go",
  "walk",
  "n",
  "s",
  "e",
  "w",
  "u",
  "d",
  "north",
  "south",
  "east",
  "west",
  "up",
  "down",
]);

/** null for blank input; everything else gets an answer. */
export async function handleMudCommand(ctx: MudContext, input: string): Promise<IntentResult | null> {
  const trimmed = input.trim();
  if (!trimmed) return null;

  const parts = trimmed.split(/\s+/);
  const verb = parts[0].toLowerCase();
  const args = parts.slice(1);

  const handler = COMMANDS[verb];
  if (!handler) {
    return fail("invalid_action", `Unknown command: ${verb}. Type 'help' for a list.`);
  }

  const actor = ctx.runtime.playerForSession(ctx.session.id);
  if (!actor) return fail("invalid_action", "You are not in the world yet.");

  // Global dead-state gate: the body is out of the registry until respawn.
  const dead = ctx.runtime.entities.get(actor.id) === undefined;
  if (dead && DEAD_BLOCKED_COMMANDS.has(verb)) {
    return fail("blocked", "You are dead and cannot do that. The tide will carry you back shortly.");
  }

  return handler(ctx, actor, { cmd: verb, args, parts });
}
