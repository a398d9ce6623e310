// worldcore/time/NpcScheduler.ts
//
// Lazy NPC presence. Nobody walks the town on a timer: when a room is looked
// at (or the tick loop sweeps occupied rooms) each candidate NPC's schedule is
// resolved against the world clock. An NPC that is busy when its block ends
// keeps its current room until it is free, then the change applies.

import { ContentError } from "../utils/errors";
import { Logger } from "../utils/logger";
import { MINUTES_PER_DAY, isTimeInRange, parseClockTime } from "./WorldClock";

const log = Logger.scope("SCHEDULE");

export interface ScheduleBlock {
  start: string; // "HH:MM"
  end: string; // "HH:MM", earlier than start means the block runs past midnight
  roomId: string;
}

export type DeferralReason = "combat" | "transaction" | "dialogue";

/** Answers "is this NPC tied up right now, and why". null = free to move. */
export type NpcBusyCheck = (npcId: string) => DeferralReason | null;

interface CompiledBlock {
  start: number;
  end: number;
  roomId: string;
}

function spans(b: CompiledBlock): Array<[number, number]> {
  if (b.start > b.end) {
    return [
      [b.start, MINUTES_PER_DAY],
      [0, b.end],
    ];
  }
  return [[b.start, b.end]];
}

function overlaps(a: CompiledBlock, b: CompiledBlock): boolean {
  for (const [s1, e1] of spans(a)) {
    for (const [s2, e2] of spans(b)) {
      if (s1 < e2 && s2 < e1) return true;
    }
  }
  return false;
}

export class NpcScheduler {
  private readonly schedules = new Map<string, CompiledBlock[]>();
  private readonly roomIndex = new Map<string, Set<string>>();
  private readonly placed = new Map<string, string | null>();
  private readonly deferred = new Map<string, DeferralReason>();

  addSchedule(npcId: string, blocks: readonly ScheduleBlock[]): void {
    const compiled = blocks.map((b) => ({
      start: parseClockTime(b.start),
      end: parseClockTime(b.end),
      roomId: b.roomId,
    }));

    for (let i = 0; i < compiled.length; i++) {
      for (let j = i + 1; j < compiled.length; j++) {
        if (overlaps(compiled[i], compiled[j])) {
          throw new ContentError(
            `Schedule for ${npcId} has overlapping blocks (${blocks[i].start}-${blocks[i].end} and ${blocks[j].start}-${blocks[j].end})`,
          );
        }
      }
    }

    this.schedules.set(npcId, compiled);
    for (const b of compiled) {
      let set = this.roomIndex.get(b.roomId);
      if (!set) {
        set = new Set();
        this.roomIndex.set(b.roomId, set);
      }
      set.add(npcId);
    }
  }

  listNpcIds(): string[] {
    return [...this.schedules.keys()];
  }

  /** Where the schedule says the NPC should be, ignoring deferral. */
  scheduledRoom(npcId: string, minuteOfDay: number): string | null {
    const blocks = this.schedules.get(npcId);
    if (!blocks) return null;
    for (const b of blocks) {
      if (isTimeInRange(minuteOfDay, b.start, b.end)) return b.roomId;
    }
    return null;
  }

  /**
   * Where the NPC actually is now. Applies a pending schedule change unless
   * `busy` reports a reason, in which case the change is deferred and the
   * previous room is kept.
   */
  resolve(npcId: string, minuteOfDay: number, busy?: NpcBusyCheck): string | null {
    const desired = this.scheduledRoom(npcId, minuteOfDay);
    if (!this.placed.has(npcId)) {
      this.placed.set(npcId, desired);
      return desired;
    }

    const current = this.placed.get(npcId) ?? null;
    if (desired === current) {
      this.deferred.delete(npcId);
      return current;
    }

    const reason = busy ? busy(npcId) : null;
    if (reason) {
      if (!this.deferred.has(npcId)) {
        log.debug("Schedule change deferred", { npcId, reason, from: current, to: desired });
      }
      this.deferred.set(npcId, reason);
      return current;
    }

    this.deferred.delete(npcId);
    this.placed.set(npcId, desired);
    return desired;
  }

  presentNpcs(roomId: string, minuteOfDay: number, busy?: NpcBusyCheck): string[] {
    const candidates = new Set(this.roomIndex.get(roomId) ?? []);
    for (const [npcId, placedRoom] of this.placed) {
      if (placedRoom === roomId) candidates.add(npcId);
    }

    const present: string[] = [];
    for (const npcId of candidates) {
      if (this.resolve(npcId, minuteOfDay, busy) === roomId) present.push(npcId);
    }
    return present.sort();
  }

  isDeferred(npcId: string): boolean {
    return this.deferred.has(npcId);
  }

  deferralReason(npcId: string): DeferralReason | null {
    return this.deferred.get(npcId) ?? null;
  }

  /** Drop a pending deferral; the next resolve applies the schedule as written. */
  clearDeferral(npcId: string): void {
    this.deferred.delete(npcId);
  }
}
