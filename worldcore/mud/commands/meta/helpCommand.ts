// worldcore/mud/commands/meta/helpCommand.ts

import { succeed } from "../../../shared/IntentResult";
import { HELP_ENTRIES } from "../../MudHelpMenu";
import type { MudCommandHandlerFn } from "../types";

export const handleHelpCommand: MudCommandHandlerFn = async () => {
  const lines: string[] = [];
  lines.push("Available commands:");

  for (const entry of HELP_ENTRIES) {
    lines.push(`  ${entry.cmd.padEnd(24, " ")} - ${entry.desc}`);
  }

  return succeed(lines.join("\n"));
};
