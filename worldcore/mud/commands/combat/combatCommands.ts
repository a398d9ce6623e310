// worldcore/mud/commands/combat/combatCommands.ts

import { fail } from "../../../shared/IntentResult";
import type { MudCommandHandlerFn } from "../types";

export const handleAttackCommand: MudCommandHandlerFn = async (ctx, actor, input) => {
  const target = input.args.join(" ").trim();
  if (!target) return fail("invalid_target", "Attack what?");
  return ctx.runtime.attack(actor.id, target);
};

/** Maneuver ids are snake_case; "power strike" and "power_strike" both work. */
export function maneuverIdFromWords(words: string[]): string {
  return words.join("_").toLowerCase();
}

// use <maneuver> [on <target>] | use <maneuver> [target]
export const handleUseCommand: MudCommandHandlerFn = async (ctx, actor, input) => {
  if (!input.args.length) return fail("invalid_action", "Use which maneuver?");

  const onAt = input.args.findIndex((a) => a.toLowerCase() === "on");
  if (onAt > 0) {
    const maneuverId = maneuverIdFromWords(input.args.slice(0, onAt));
    const target = input.args.slice(onAt + 1).join(" ");
    if (!target) return fail("invalid_target", "Use it on whom?");
    return ctx.runtime.useManeuver(actor.id, maneuverId, target);
  }

  // Single-word maneuver names first, then everything as one multi-word name.
  const [head, ...rest] = input.args;
  if (ctx.runtime.content.getManeuver(head.toLowerCase())) {
    return ctx.runtime.useManeuver(actor.id, head.toLowerCase(), rest.length ? rest.join(" ") : undefined);
  }
  return ctx.runtime.useManeuver(actor.id, maneuverIdFromWords(input.args));
};

export const handleDisengageCommand: MudCommandHandlerFn = async (ctx, actor) => ctx.runtime.disengage(actor.id);

export const handleJoinCommand: MudCommandHandlerFn = async (ctx, actor) => ctx.runtime.joinCombat(actor.id);

export const handleAdvanceCommand: MudCommandHandlerFn = async (ctx, actor) => ctx.runtime.advance(actor.id);

export const handleRetreatCommand: MudCommandHandlerFn = async (ctx, actor) => ctx.runtime.retreat(actor.id);
