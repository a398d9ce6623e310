// mmo-backend/config.ts

import dotenv from "dotenv";

dotenv.config();

export interface NetworkConfig {
  host: string;
  port: number;
  path: string;
  heartbeatIntervalMs: number;
  idleTimeoutMs: number;
  tickIntervalMs: number;
  sweepEveryTicks: number;
  writeDrainIntervalMs: number;
  /** "postgres" or "memory"; memory keeps characters for the life of the process. */
  characterStore: "postgres" | "memory";
}

// Defaults (human readable)
const DEFAULT_HEARTBEAT_INTERVAL_MS = 5_000;      // 5 seconds
const DEFAULT_IDLE_TIMEOUT_MS       = 10 * 60_000; // 10 minutes
const DEFAULT_TICK_INTERVAL_MS      = 100;        // 10 TPS
const DEFAULT_SWEEP_EVERY_TICKS     = 10;         // once a second
const DEFAULT_WRITE_DRAIN_MS        = 1_000;

function numberEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export const netConfig: NetworkConfig = {
  host: process.env.MUD_MMO_HOST || "0.0.0.0",
  port: numberEnv("MUD_MMO_PORT", 7777),
  path: "/ws",

  // How often the Heartbeat sweeps sessions for idleness
  heartbeatIntervalMs: numberEnv("MUD_HEARTBEAT_INTERVAL", DEFAULT_HEARTBEAT_INTERVAL_MS),

  // How long a session can be idle (no messages) before we drop it
  idleTimeoutMs: numberEnv("MUD_IDLE_TIMEOUT", DEFAULT_IDLE_TIMEOUT_MS),

  // Main gameplay TickEngine interval
  tickIntervalMs: numberEnv("MUD_TICK_INTERVAL", DEFAULT_TICK_INTERVAL_MS),
  sweepEveryTicks: numberEnv("MUD_SWEEP_EVERY_TICKS", DEFAULT_SWEEP_EVERY_TICKS),

  writeDrainIntervalMs: numberEnv("MUD_WRITE_DRAIN_INTERVAL", DEFAULT_WRITE_DRAIN_MS),
  characterStore: process.env.MUD_CHARACTER_STORE === "memory" ? "memory" : "postgres",
};
