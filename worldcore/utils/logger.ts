// worldcore/utils/logger.ts
//
// Scoped console logger. Lines look like
//   08:14:03.117 [COMBAT:DEBUG] Round timed out { roomId: 'yard', round: 3 }
// or, with LOG_FORMAT=json, one JSON object per line.

import { Ansi, AnsiCode, LEVEL_COLORS, paint } from "./colors";
import { LogLevel, logEnabled, logFormat } from "../config/logconfig";

export type LogFields = Record<string, unknown>;

function clockStamp(d: Date): string {
  const two = (n: number) => String(n).padStart(2, "0");
  return `${two(d.getHours())}:${two(d.getMinutes())}:${two(d.getSeconds())}.${String(d.getMilliseconds()).padStart(3, "0")}`;
}

function isFields(value: unknown): value is LogFields {
  return typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Error);
}

/** Errors become { error, name, stack }, at the top level or one level down in a meta object. */
export function renderError(value: unknown): unknown {
  if (value instanceof Error) {
    return { error: value.message, name: value.name, stack: value.stack };
  }
  if (isFields(value)) {
    const out: LogFields = {};
    for (const [k, v] of Object.entries(value)) out[k] = v instanceof Error ? renderError(v) : v;
    return out;
  }
  return value;
}

export class Logger {
  private constructor(
    private readonly scopeName: string,
    private readonly bound: LogFields,
  ) {}

  static scope(scope: string): Logger {
    return new Logger(scope.toUpperCase(), {});
  }

  /** Same scope, with fields merged into every line's meta. */
  child(fields: LogFields): Logger {
    return new Logger(this.scopeName, { ...this.bound, ...fields });
  }

  debug(...args: unknown[]): void {
    this.write("debug", LEVEL_COLORS.debug, args);
  }

  info(...args: unknown[]): void {
    this.write("info", LEVEL_COLORS.info, args);
  }

  warn(...args: unknown[]): void {
    this.write("warn", LEVEL_COLORS.warn, args);
  }

  error(...args: unknown[]): void {
    this.write("error", LEVEL_COLORS.error, args);
  }

  // info level, brighter tag
  success(...args: unknown[]): void {
    this.write("info", Ansi.brightGreen, args);
  }

  private write(level: LogLevel, color: AnsiCode, args: unknown[]): void {
    if (!logEnabled(this.scopeName, level)) return;

    const message = typeof args[0] === "string" ? args[0] : undefined;
    const rest = (message === undefined ? args : args.slice(1)).map(renderError);
    const hasBound = Object.keys(this.bound).length > 0;
    if (hasBound) {
      // Bound fields fold into a leading meta object, or stand alone before the rest.
      if (isFields(rest[0])) rest[0] = { ...this.bound, ...rest[0] };
      else rest.unshift({ ...this.bound });
    }

    const now = new Date();
    if (logFormat() === "json") {
      const line: LogFields = { t: now.toISOString(), scope: this.scopeName, level };
      if (message !== undefined) line.msg = message;
      const extra: unknown[] = [];
      for (const part of rest) {
        if (isFields(part)) Object.assign(line, part);
        else extra.push(part);
      }
      if (extra.length > 0) line.extra = extra;
      console.log(JSON.stringify(line));
      return;
    }

    const tag = paint(`[${this.scopeName}:${level.toUpperCase()}]`, color);
    const head = message === undefined ? `${clockStamp(now)} ${tag}` : `${clockStamp(now)} ${tag} ${message}`;
    console.log(head, ...rest);
  }
}
