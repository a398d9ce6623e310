// worldcore/config/RuntimeConfig.ts
//
// Gameplay tunables for the shard runtime. Every value is read from a MUD_*
// environment variable (dotenv is loaded by the server entrypoint) and parsed
// through zod so a typo fails at boot instead of mid-fight.
//
// All durations are in world seconds unless the name says otherwise.

import { z } from "zod";
import { Logger } from "../utils/logger";

const log = Logger.scope("CONFIG");

function numberVar(name: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER) {
  return z
    .string()
    .optional()
    .transform((v) => (v !== undefined && v.trim() !== "" ? Number(v) : fallback))
    .refine((n) => Number.isFinite(n) && n >= min && n <= max, {
      message: `${name} must be a number between ${min} and ${max}`,
    });
}

function boolVar(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((v) => (v !== undefined && v.trim() !== "" ? v.trim().toLowerCase() === "true" : fallback));
}

const ConfigSchema = z.object({
  MUD_TIME_RATIO: numberVar("MUD_TIME_RATIO", 3, 0.01, 1000),
  MUD_WORLD_START_SECONDS: numberVar("MUD_WORLD_START_SECONDS", 8 * 3600, 0),

  MUD_BASE_ATTACK_INTERVAL_SEC: numberVar("MUD_BASE_ATTACK_INTERVAL_SEC", 3, 0.1, 600),
  MUD_MIN_ATTACK_INTERVAL_SEC: numberVar("MUD_MIN_ATTACK_INTERVAL_SEC", 0.6, 0.05, 600),
  MUD_ROUND_TIMEOUT_SEC: numberVar("MUD_ROUND_TIMEOUT_SEC", 9, 1, 3600),
  MUD_MAX_REACTIONS_PER_ROUND: numberVar("MUD_MAX_REACTIONS_PER_ROUND", 2, 0, 50),
  MUD_CRIT_MULTIPLIER: numberVar("MUD_CRIT_MULTIPLIER", 2, 1, 10),
  MUD_GLANCE_MULTIPLIER: numberVar("MUD_GLANCE_MULTIPLIER", 0.5, 0, 1),
  MUD_SECONDARY_ARMOR_RATE: numberVar("MUD_SECONDARY_ARMOR_RATE", 0.5, 0, 1),
  MUD_STAMINA_REGEN_PER_ROUND: numberVar("MUD_STAMINA_REGEN_PER_ROUND", 2, 0, 1000),

  MUD_FLEE_WINDOW_SEC: numberVar("MUD_FLEE_WINDOW_SEC", 9, 1, 600),
  MUD_DISENGAGE_TIMEOUT_SEC: numberVar("MUD_DISENGAGE_TIMEOUT_SEC", 12, 1, 600),
  MUD_DISENGAGE_DIFFICULTY: numberVar("MUD_DISENGAGE_DIFFICULTY", 50, 0, 100),
  MUD_LEAVE_ENDS_COMBAT: boolVar(false),

  MUD_ROOM_IDLE_HORIZON_SEC: numberVar("MUD_ROOM_IDLE_HORIZON_SEC", 1800, 1),
  MUD_ROOM_RESET_SEC: numberVar("MUD_ROOM_RESET_SEC", 3600, 1),
  MUD_ENCOUNTER_CHANCE: numberVar("MUD_ENCOUNTER_CHANCE", 0.35, 0, 1),
  MUD_ENCOUNTER_COOLDOWN_SEC: numberVar("MUD_ENCOUNTER_COOLDOWN_SEC", 120, 0),
  MUD_ENCOUNTER_EXPIRY_SEC: numberVar("MUD_ENCOUNTER_EXPIRY_SEC", 900, 1),

  MUD_DISCONNECT_GRACE_SEC: numberVar("MUD_DISCONNECT_GRACE_SEC", 180, 0),
  MUD_RESPAWN_ROOM_ID: z.string().optional().default("harbor_square"),
});

export interface RuntimeConfig {
  timeRatio: number;
  worldStartSeconds: number;

  baseAttackIntervalSec: number;
  minAttackIntervalSec: number;
  roundTimeoutSec: number;
  maxReactionsPerRound: number;
  critMultiplier: number;
  glanceMultiplier: number;
  secondaryArmorRate: number;
  staminaRegenPerRound: number;

  fleeWindowSec: number;
  disengageTimeoutSec: number;
  disengageDifficulty: number;
  /** When true, walking out of a fight ends participation: no disengage check, no pursuit. */
  leaveEndsCombat: boolean;

  roomIdleHorizonSec: number;
  roomResetSec: number;
  encounterChance: number;
  encounterCooldownSec: number;
  encounterExpirySec: number;

  disconnectGraceSec: number;
  respawnRoomId: string;
}

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = parseRuntimeConfig({});

export function parseRuntimeConfig(env: NodeJS.ProcessEnv): RuntimeConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => ({ path: i.path.join("."), msg: i.message }));
    log.error("Invalid runtime configuration", { issues });
    throw new Error(`Invalid runtime configuration: ${issues.map((i) => i.msg).join("; ")}`);
  }

  const vars = parsed.data;
  return {
    timeRatio: vars.MUD_TIME_RATIO,
    worldStartSeconds: vars.MUD_WORLD_START_SECONDS,

    baseAttackIntervalSec: vars.MUD_BASE_ATTACK_INTERVAL_SEC,
    minAttackIntervalSec: vars.MUD_MIN_ATTACK_INTERVAL_SEC,
    roundTimeoutSec: vars.MUD_ROUND_TIMEOUT_SEC,
    maxReactionsPerRound: Math.floor(vars.MUD_MAX_REACTIONS_PER_ROUND),
    critMultiplier: vars.MUD_CRIT_MULTIPLIER,
    glanceMultiplier: vars.MUD_GLANCE_MULTIPLIER,
    secondaryArmorRate: vars.MUD_SECONDARY_ARMOR_RATE,
    staminaRegenPerRound: vars.MUD_STAMINA_REGEN_PER_ROUND,

    fleeWindowSec: vars.MUD_FLEE_WINDOW_SEC,
    disengageTimeoutSec: vars.MUD_DISENGAGE_TIMEOUT_SEC,
    disengageDifficulty: vars.MUD_DISENGAGE_DIFFICULTY,
    leaveEndsCombat: vars.MUD_LEAVE_ENDS_COMBAT,

    roomIdleHorizonSec: vars.MUD_ROOM_IDLE_HORIZON_SEC,
    roomResetSec: vars.MUD_ROOM_RESET_SEC,
    encounterChance: vars.MUD_ENCOUNTER_CHANCE,
    encounterCooldownSec: vars.MUD_ENCOUNTER_COOLDOWN_SEC,
    encounterExpirySec: vars.MUD_ENCOUNTER_EXPIRY_SEC,

    disconnectGraceSec: vars.MUD_DISCONNECT_GRACE_SEC,
    respawnRoomId: vars.MUD_RESPAWN_ROOM_ID,
  };
}

export function loadRuntimeConfig(): RuntimeConfig {
  return parseRuntimeConfig(process.env);
}

/** Defaults plus overrides; used by tests and tools that never read the environment. */
export function makeRuntimeConfig(overrides: Partial<RuntimeConfig> = {}): RuntimeConfig {
  return { ...DEFAULT_RUNTIME_CONFIG, ...overrides };
}
