// worldcore/time/WorldClock.ts
//
// Game time derived from real time by a fixed ratio (3 world seconds per real
// second by default). Nothing here ticks: every reading is computed from the
// time source, so the clock can never drift or be "behind".

import { ContentError } from "../utils/errors";
import { TimeSource } from "./TimeSource";

export const SECONDS_PER_DAY = 86_400;
export const MINUTES_PER_DAY = 1_440;

export type DayPart = "Dawn" | "Morning" | "Afternoon" | "Dusk" | "Night";

export interface CalendarTime {
  worldSeconds: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  dayPart: DayPart;
  /** Minutes since midnight, the unit schedules and store hours compare in. */
  minuteOfDay: number;
}

export interface WorldClockOptions {
  ratio: number;
  startWorldSeconds: number;
}

export class WorldClock {
  private realStartMs: number;
  private startWorldMs: number;
  readonly ratio: number;

  constructor(
    private readonly source: TimeSource,
    opts: WorldClockOptions,
  ) {
    if (!(opts.ratio > 0)) {
      throw new Error(`WorldClock ratio must be positive (got ${opts.ratio})`);
    }
    this.ratio = opts.ratio;
    this.realStartMs = source.nowMs();
    this.startWorldMs = opts.startWorldSeconds * 1000;
  }

  /** Fractional world time in ms. Timers and tickers schedule against this. */
  worldMs(): number {
    return this.startWorldMs + (this.source.nowMs() - this.realStartMs) * this.ratio;
  }

  worldSeconds(): number {
    return Math.floor(this.worldMs() / 1000);
  }

  calendar(): CalendarTime {
    return calendarAt(this.worldSeconds());
  }

  describe(includeExact = false): string {
    return describeTime(this.calendar(), includeExact);
  }

  /** Admin: jump the clock. Readings continue from here at the same ratio. */
  setWorldSeconds(worldSeconds: number): void {
    this.startWorldMs = worldSeconds * 1000;
    this.realStartMs = this.source.nowMs();
  }

  /** Real milliseconds that cover `worldMs` of game time. */
  realMsFor(worldMs: number): number {
    return worldMs / this.ratio;
  }
}

export function dayPartForHour(hour: number): DayPart {
  if (hour >= 5 && hour < 8) return "Dawn";
  if (hour >= 8 && hour < 12) return "Morning";
  if (hour >= 12 && hour < 17) return "Afternoon";
  if (hour >= 17 && hour < 20) return "Dusk";
  return "Night";
}

export function calendarAt(worldSeconds: number): CalendarTime {
  const s = Math.max(0, Math.floor(worldSeconds));
  const secOfDay = s % SECONDS_PER_DAY;
  const hour = Math.floor(secOfDay / 3600);
  const minute = Math.floor((secOfDay % 3600) / 60);
  return {
    worldSeconds: s,
    day: Math.floor(s / SECONDS_PER_DAY),
    hour,
    minute,
    second: s % 60,
    dayPart: dayPartForHour(hour),
    minuteOfDay: hour * 60 + minute,
  };
}

const DAY_PART_FLAVOR: Record<DayPart, string> = {
  Dawn: "The sky lightens in the east.",
  Morning: "The town stirs to life.",
  Afternoon: "The day is in full swing.",
  Dusk: "Shadows lengthen as daylight fades.",
  Night: "The docks are lit by lanterns.",
};

function bellsPhrase(bells: number, zero: string, suffix: string): string {
  if (bells === 0) return zero;
  return `${bells} bell${bells > 1 ? "s" : ""} ${suffix}`;
}

function timePhrase(t: CalendarTime): string {
  switch (t.dayPart) {
    case "Dawn":
      return bellsPhrase(t.hour - 5, "sunrise", "past sunrise");
    case "Morning":
      return bellsPhrase(t.hour - 8, "early morning", "past dawn");
    case "Afternoon":
      return bellsPhrase(t.hour - 12, "midday", "past noon");
    case "Dusk":
      return bellsPhrase(t.hour - 17, "sunset", "past sunset");
    case "Night":
      return bellsPhrase(t.hour >= 20 ? t.hour - 20 : t.hour + 4, "deep night", "into the night");
  }
}

/** "It is Morning, 2 bells past dawn. (Day 3)" plus a flavour line. */
export function describeTime(t: CalendarTime, includeExact = false): string {
  let out = `It is ${t.dayPart}, ${timePhrase(t)}. (Day ${t.day})`;
  if (includeExact) out += ` (${formatClockTime(t.minuteOfDay)})`;
  return `${out}\n${DAY_PART_FLAVOR[t.dayPart]}`;
}

/** "HH:MM" or "H:MM" to minutes since midnight. Throws on anything else. */
export function parseClockTime(raw: string): number {
  const m = /^(\d{1,2}):(\d{2})$/.exec(raw.trim());
  if (!m) throw new ContentError(`Invalid clock time "${raw}" (expected HH:MM)`);
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) {
    throw new ContentError(`Invalid clock time "${raw}" (expected HH:MM)`);
  }
  return hour * 60 + minute;
}

export function formatClockTime(minuteOfDay: number): string {
  const m = ((Math.floor(minuteOfDay) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return `${String(Math.floor(m / 60)).padStart(2, "0")}:${String(m % 60).padStart(2, "0")}`;
}

/** Half-open [start, end). A start later than the end wraps past midnight. */
export function isTimeInRange(minuteOfDay: number, start: number, end: number): boolean {
  if (start > end) return minuteOfDay >= start || minuteOfDay < end;
  return minuteOfDay >= start && minuteOfDay < end;
}
