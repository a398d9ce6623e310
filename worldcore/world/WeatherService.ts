// worldcore/world/WeatherService.ts
//
// Regional weather. One state per region; every room in the region reads the
// same state. A region only rolls its next weather when something looks at it
// on or after next-change time, so an empty region costs nothing.

import { z } from "zod";

import weatherData from "../data/weather.json";
import type { WeatherExposure } from "../shared/ContentTypes";
import { ContentError } from "../utils/errors";
import { Logger } from "../utils/logger";
import { Rng, weightedPick } from "../utils/Rng";

const log = Logger.scope("WEATHER");

export const WEATHER_TYPES = ["clear", "fog", "wind", "squall", "cold_snap", "salt_rain"] as const;
export type WeatherType = (typeof WEATHER_TYPES)[number];

type OutsideExposure = Exclude<WeatherExposure, "indoor">;

export type WeatherEffect = "ranged_accuracy_far" | "disengage_failure" | "stamina_drain";

export interface RegionWeatherState {
  regionId: string;
  type: WeatherType;
  intensity: number; // 0–3
  startedAt: number; // world seconds
  nextChangeAt: number; // world seconds
  seed: number;
  changeCount: number;
}

export interface WeatherTables {
  transitions: Partial<Record<WeatherType, Partial<Record<WeatherType, number>>>>;
  overlays: Partial<Record<WeatherType, Partial<Record<OutsideExposure, string>>>>;
  changeMessages: Partial<Record<WeatherType, string>>;
}

export interface WeatherChange {
  regionId: string;
  from: WeatherType;
  to: WeatherType;
  message: string;
}

export interface WeatherServiceOptions {
  /** Seed for a region seen for the first time. Defaults to a random 31-bit int. */
  seedFor?: (regionId: string) => number;
  firstChangeAfterSec?: number;
  minDurationSec?: number;
  maxDurationSec?: number;
}

const weatherTypeSchema = z.enum(WEATHER_TYPES);
const exposureSchema = z.enum(["sheltered", "outdoor", "coastal"]);

const WeatherTablesSchema = z.object({
  transitions: z.record(weatherTypeSchema, z.record(weatherTypeSchema, z.number().nonnegative())),
  overlays: z.record(weatherTypeSchema, z.record(exposureSchema, z.string())),
  changeMessages: z.record(weatherTypeSchema, z.string()),
});

export function parseWeatherTables(raw: unknown): WeatherTables {
  const parsed = WeatherTablesSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ContentError(`Invalid weather tables: ${issues.join("; ")}`);
  }
  return parsed.data;
}

export function loadDefaultWeatherTables(): WeatherTables {
  return parseWeatherTables(weatherData);
}

export class WeatherService {
  private readonly regions = new Map<string, RegionWeatherState>();
  private readonly seedFor: (regionId: string) => number;
  private readonly firstChangeAfterSec: number;
  private readonly minDurationSec: number;
  private readonly maxDurationSec: number;

  constructor(
    private readonly tables: WeatherTables,
    opts: WeatherServiceOptions = {},
  ) {
    this.seedFor = opts.seedFor ?? (() => 1 + Math.floor(Math.random() * 0x7ffffffe));
    this.firstChangeAfterSec = opts.firstChangeAfterSec ?? 900;
    this.minDurationSec = opts.minDurationSec ?? 600;
    this.maxDurationSec = opts.maxDurationSec ?? 1800;
  }

  /** Current state; a new region starts clear. */
  get(regionId: string, nowSec: number): RegionWeatherState {
    let state = this.regions.get(regionId);
    if (!state) {
      state = {
        regionId,
        type: "clear",
        intensity: 0,
        startedAt: nowSec,
        nextChangeAt: nowSec + this.firstChangeAfterSec,
        seed: this.seedFor(regionId),
        changeCount: 0,
      };
      this.regions.set(regionId, state);
    }
    return state;
  }

  listRegionIds(): string[] {
    return [...this.regions.keys()];
  }

  /**
   * Roll the next weather if the region is due. Returns the change when the
   * type actually changed (a roll that lands on the same type is silent).
   */
  maybeAdvance(regionId: string, nowSec: number): WeatherChange | null {
    const state = this.get(regionId, nowSec);
    if (nowSec < state.nextChangeAt) return null;

    const from = state.type;
    this.roll(state, nowSec);
    if (state.type === from) return null;

    const message = this.tables.changeMessages[state.type] ?? "The weather changes.";
    log.debug("Weather changed", { regionId, from, to: state.type, intensity: state.intensity });
    return { regionId, from, to: state.type, message };
  }

  /** Deterministic for a given (seed, changeCount). */
  roll(state: RegionWeatherState, nowSec: number): void {
    const rng = new Rng(`${state.seed}:${state.changeCount}`);
    const row = this.tables.transitions[state.type] ?? { clear: 100 };
    const entries = WEATHER_TYPES.map((t): [WeatherType, number] => [t, row[t] ?? 0]);
    const next = weightedPick(entries, rng.next()) ?? "clear";
    const duration = rng.int(this.minDurationSec, this.maxDurationSec);

    state.type = next;
    state.intensity = Math.max(0, Math.min(3, state.intensity + (next === "clear" ? -1 : 1)));
    state.startedAt = nowSec;
    state.nextChangeAt = nowSec + duration;
    state.changeCount++;
  }

  /** One line for the room description; null indoors. */
  overlay(regionId: string, exposure: WeatherExposure, nowSec: number): string | null {
    if (exposure === "indoor") return null;
    const state = this.get(regionId, nowSec);
    const row = this.tables.overlays[state.type];
    if (!row) return null;
    return row[exposure] ?? row.outdoor ?? null;
  }

  /**
   * Mechanical weather effect for a room. Indoor rooms are never affected.
   * Scale grows with intensity: (intensity + 1) / 4.
   */
  modifier(regionId: string, exposure: WeatherExposure, effect: WeatherEffect, nowSec: number): number {
    if (exposure === "indoor") return 0;
    const state = this.get(regionId, nowSec);
    const scale = (Math.max(0, Math.min(3, state.intensity)) + 1) / 4;

    switch (effect) {
      case "ranged_accuracy_far":
        return state.type === "fog" ? Math.trunc(-15 * scale) : 0;
      case "disengage_failure":
        return state.type === "squall" ? Math.trunc(20 * scale) : 0;
      case "stamina_drain":
        return state.type === "cold_snap" && (exposure === "outdoor" || exposure === "coastal")
          ? Math.trunc(2 * scale)
          : 0;
    }
  }
}
