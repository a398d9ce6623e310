// mmo-backend/FileLogTap.ts
//
// Mirrors console output (and so every Logger line) into an append-only
// file named by MUD_FILELOG, with timestamps and ANSI colors stripped.

import fs from "fs";
import util from "util";

type ConsoleMethod = (...args: unknown[]) => void;

// Matches ANSI color codes like \u001b[32m, \u001b[0m, etc.
const ANSI_REGEX = /\u001b\[[0-9;]*m/g;

export function stripAnsi(input: string): string {
  return input.replace(ANSI_REGEX, "");
}

function serializeArg(arg: unknown): string {
  if (typeof arg === "string") {
    return stripAnsi(arg);
  }
  if (arg instanceof Error) {
    const msg = arg.stack ?? arg.message;
    return stripAnsi(msg);
  }
  // util.inspect copes with cycles and BigInt, which JSON.stringify throws on.
  return stripAnsi(util.inspect(arg, { depth: 4, breakLength: Infinity }));
}

export function formatLogLine(level: string, args: unknown[], at = new Date()): string {
  return `[${at.toISOString()}] [${level}] ${args.map(serializeArg).join(" ")}\n`;
}

function wrapMethod(
  level: string,
  original: ConsoleMethod,
  writer: (level: string, args: unknown[]) => void,
): ConsoleMethod {
  return (...args: unknown[]): void => {
    writer(level, args);
    original.apply(console, args);
  };
}

export function installFileLogTap(): void {
  const filePath = process.env.MUD_FILELOG;
  if (!filePath) return;

  const stream = fs.createWriteStream(filePath, { flags: "a" });
  const original = { log: console.log, info: console.info, warn: console.warn, error: console.error };

  let broken = false;
  stream.on("error", (err) => {
    // Stop mirroring; the console itself keeps working.
    broken = true;
    original.error(`[FileLogTap] disabled: ${err.message}`);
  });

  const writeLine = (level: string, args: unknown[]): void => {
    if (broken) return;
    stream.write(formatLogLine(level, args));
  };

  console.log = wrapMethod("log", original.log, writeLine);
  console.info = wrapMethod("info", original.info, writeLine);
  console.warn = wrapMethod("warn", original.warn, writeLine);
  console.error = wrapMethod("error", original.error, writeLine);
}
