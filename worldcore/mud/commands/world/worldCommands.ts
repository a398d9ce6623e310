// worldcore/mud/commands/world/worldCommands.ts

import { fail, succeed } from "../../../shared/IntentResult";
import type { MudCommandHandlerFn } from "../types";

export const handleLookCommand: MudCommandHandlerFn = async (ctx, actor) => ctx.runtime.look(actor.id);

// move <dir> / go <dir> / walk <dir>
export const handleMoveCommand: MudCommandHandlerFn = async (ctx, actor, input) => {
  const dir = input.args[0];
  if (!dir) return fail("invalid_action", "Go where?");
  return ctx.runtime.move(actor.id, dir);
};

/** Bare direction words ("n", "north") route here with the verb as the direction. */
export const handleDirectionCommand: MudCommandHandlerFn = async (ctx, actor, input) =>
  ctx.runtime.move(actor.id, input.cmd);

export const handleTakeCommand: MudCommandHandlerFn = async (ctx, actor, input) => {
  const what = input.args.join(" ").trim();
  if (!what) return fail("invalid_target", "Take what?");
  return ctx.runtime.pickUp(actor.id, what);
};

export const handleTimeCommand: MudCommandHandlerFn = async (ctx) => succeed(ctx.runtime.clock.describe(true));

export const handleInventoryCommand: MudCommandHandlerFn = async (ctx, actor) => {
  const sheet = ctx.runtime.sheetOf(actor.characterId);
  if (!sheet || !sheet.inventory.length) return succeed("You are carrying nothing.");
  const lines = ["You are carrying:"];
  for (const e of sheet.inventory) {
    lines.push(e.quantity > 1 ? `  ${e.name} (x${e.quantity})` : `  ${e.name}`);
  }
  return succeed(lines.join("\n"));
};
