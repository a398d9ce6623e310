// worldcore/config/logconfig.ts
//
// Log levels per scope. Resolution order for a scope:
//   LOG_SCOPE_<SCOPE>, then quiet-under-test, then the table below, then LOG_LEVEL, then "info".

import { isNodeTestRuntime } from "../utils/runtimeEnv";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFormat = "text" | "json";

export function parseLevel(raw: string | undefined | null): LogLevel | null {
  if (!raw) return null;
  const v = raw.trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === v) ?? null;
}

// Scopes that run louder or quieter than LOG_LEVEL by default.
const SCOPE_DEFAULTS: Record<string, LogLevel> = {
  SERVER: "debug",
  TICKER: "info",
  SCHEDULER: "info",
  ENTITY: "info",
};

export function scopeLevel(scope: string, env: NodeJS.ProcessEnv = process.env): LogLevel {
  const key = scope.toUpperCase();
  const explicit = parseLevel(env[`LOG_SCOPE_${key}`]);
  if (explicit) return explicit;

  if (isNodeTestRuntime() && !env.LOG_LEVEL) return "error";

  return SCOPE_DEFAULTS[key] ?? parseLevel(env.LOG_LEVEL) ?? "info";
}

export function logEnabled(scope: string, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(scopeLevel(scope));
}

export function logFormat(env: NodeJS.ProcessEnv = process.env): LogFormat {
  return env.LOG_FORMAT?.trim().toLowerCase() === "json" ? "json" : "text";
}
