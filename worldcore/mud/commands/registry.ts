// worldcore/mud/commands/registry.ts

import {
  handleAdvanceCommand,
  handleAttackCommand,
  handleDisengageCommand,
  handleJoinCommand,
  handleRetreatCommand,
  handleUseCommand,
} from "./combat/combatCommands";
import { handleHelpCommand } from "./meta/helpCommand";
import {
  handleDirectionCommand,
  handleInventoryCommand,
  handleLookCommand,
  handleMoveCommand,
  handleTakeCommand,
  handleTimeCommand,
} from "./world/worldCommands";

import type { MudCommandHandlerFn } from "./types";

export const COMMANDS: Record<string, MudCommandHandlerFn> = {
  help: handleHelpCommand,
  "?": handleHelpCommand,
  time: handleTimeCommand,

  look: handleLookCommand,
  l: handleLookCommand,
  inv: handleInventoryCommand,
  inventory: handleInventoryCommand,
  get: handleTakeCommand,
  take: handleTakeCommand,

  move: handleMoveCommand,
  go: handleMoveCommand,
  walk: handleMoveCommand,
  n: handleDirectionCommand,
  s: handleDirectionCommand,
  e: handleDirectionCommand,
  w: handleDirectionCommand,
  u: handleDirectionCommand,
  d: handleDirectionCommand,
  north: handleDirectionCommand,
  south: handleDirectionCommand,
  east: handleDirectionCommand,
  west: handleDirectionCommand,
  up: handleDirectionCommand,
  down: handleDirectionCommand,

  attack: handleAttackCommand,
  kill: handleAttackCommand,
  k: handleAttackCommand,
  use: handleUseCommand,
  disengage: handleDisengageCommand,
  flee: handleDisengageCommand,
  join: handleJoinCommand,
  assist: handleJoinCommand,
  advance: handleAdvanceCommand,
  retreat: handleRetreatCommand,
};
