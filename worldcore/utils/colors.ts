// worldcore/utils/colors.ts
//
// ANSI escapes for console log tags. Off when NO_COLOR is set or when log
// lines go out as JSON.

import type { LogLevel } from "../config/logconfig";

const ESC = "\x1b[";

export const Ansi = {
  reset: `${ESC}0m`,
  dim: `${ESC}2m`,
  red: `${ESC}31m`,
  green: `${ESC}32m`,
  yellow: `${ESC}33m`,
  cyan: `${ESC}96m`,
  brightGreen: `${ESC}92m`,
} as const;

export type AnsiCode = (typeof Ansi)[keyof typeof Ansi];

export const LEVEL_COLORS: Record<LogLevel, AnsiCode> = {
  debug: Ansi.cyan,
  info: Ansi.green,
  warn: Ansi.yellow,
  error: Ansi.red,
};

export function colorEnabled(): boolean {
  return process.env.NO_COLOR === undefined;
}

export function paint(text: string, code: AnsiCode | undefined): string {
  if (!code || !colorEnabled()) return text;
  return `${code}${text}${Ansi.reset}`;
}
