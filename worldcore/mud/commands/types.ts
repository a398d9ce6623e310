// worldcore/mud/commands/types.ts

import type { PlayerInstance } from "../../shared/Entity";
import type { IntentResult } from "../../shared/IntentResult";
import type { MudContext } from "../MudContext";

export type MudCommandInput = {
  cmd: string;
  args: string[];
  parts: string[];
};

export type MudCommandHandlerFn = (
  ctx: MudContext,
  actor: PlayerInstance,
  input: MudCommandInput
) => Promise<IntentResult>;
