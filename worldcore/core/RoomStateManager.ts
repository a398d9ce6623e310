// worldcore/core/RoomStateManager.ts
//
// Mutable per-room runtime state: the room's random seed, spawn/loot rule
// timers and active encounters. Created lazily on first access, reseeded on
// the reset horizon, dropped after sitting idle.

import { Logger } from "../utils/logger";
import { Rng } from "../utils/Rng";

const log = Logger.scope("ROOMSTATE");

export interface RuleTimer {
  lastFiredAt: number | null; // world ms
  nextEligibleAt: number; // world ms
  aliveCount: number;
  fireCount: number;
}

export interface RoomState {
  roomId: string;
  seed: string;
  createdAt: number;
  lastActiveAt: number;
  lastResetAt: number;
  nextResetAt: number;
  version: number;
  spawnTimers: Map<string, RuleTimer>;
  lootTimers: Map<string, RuleTimer>;
  activeEncounterIds: Set<string>;
  lastEncounterRollAt: number | null;
}

/** The parts of a spawn or loot rule the gate cares about. */
export interface GatedRule {
  id: string;
  maxAlive: number;
  cooldownSec: number;
}

export interface RuleGrant {
  ruleId: string;
  /** How many instances the caller may create. Never takes alive past the ceiling. */
  count: number;
  /** 1 for the first firing of this rule in this room, then 2, 3... */
  fireCount: number;
  /** Seeded from room seed, rule id and fire count; the caller keeps rolling with it. */
  rng: Rng;
}

/** Picks how many instances a firing wants, from the firing's own rng. */
export type WantedRoll = (rng: Rng) => number;

export interface RoomStateOptions {
  resetSec: number;
  idleHorizonSec: number;
  seedFor?: (roomId: string, nowMs: number) => string;
}

type TimerKind = "spawn" | "loot";

export class RoomStateManager {
  private readonly rooms = new Map<string, RoomState>();
  private readonly seedFor: (roomId: string, nowMs: number) => string;

  constructor(private readonly opts: RoomStateOptions) {
    this.seedFor = opts.seedFor ?? ((roomId, nowMs) => `${roomId}:${Math.floor(nowMs)}`);
  }

  /** Lazily create, reseed if the reset horizon passed, and mark active. */
  access(roomId: string, nowMs: number): RoomState {
    let state = this.rooms.get(roomId);
    if (!state) {
      state = {
        roomId,
        seed: this.seedFor(roomId, nowMs),
        createdAt: nowMs,
        lastActiveAt: nowMs,
        lastResetAt: nowMs,
        nextResetAt: nowMs + this.opts.resetSec * 1000,
        version: 1,
        spawnTimers: new Map(),
        lootTimers: new Map(),
        activeEncounterIds: new Set(),
        lastEncounterRollAt: null,
      };
      this.rooms.set(roomId, state);
      log.debug("Room state created", { roomId, seed: state.seed });
    } else if (nowMs >= state.nextResetAt) {
      state.seed = this.seedFor(roomId, nowMs);
      state.lastResetAt = nowMs;
      state.nextResetAt = nowMs + this.opts.resetSec * 1000;
      state.version++;
      log.debug("Room state reseeded", { roomId, version: state.version });
    }

    state.lastActiveAt = Math.max(state.lastActiveAt, nowMs);
    return state;
  }

  peek(roomId: string): RoomState | undefined {
    return this.rooms.get(roomId);
  }

  listRoomIds(): string[] {
    return [...this.rooms.keys()];
  }

  /**
   * Atomic check-and-update for a spawn rule: succeeds only while the rule is
   * below its ceiling and past its cooldown, and in the same step reserves
   * `count` alive slots and pushes the cooldown forward. A caller that gets
   * null simply does nothing.
   */
  tryConsumeSpawn(roomId: string, rule: GatedRule, nowMs: number, wanted: WantedRoll): RuleGrant | null {
    return this.tryConsume("spawn", roomId, rule, nowMs, wanted);
  }

  tryConsumeLoot(roomId: string, rule: GatedRule, nowMs: number, wanted: WantedRoll): RuleGrant | null {
    return this.tryConsume("loot", roomId, rule, nowMs, wanted);
  }

  /** A rule-spawned instance died, expired or despawned. */
  releaseSpawn(roomId: string, ruleId: string, n = 1): void {
    this.release("spawn", roomId, ruleId, n);
  }

  /** A rule-placed item was picked up or expired. */
  releaseLoot(roomId: string, ruleId: string, n = 1): void {
    this.release("loot", roomId, ruleId, n);
  }

  timer(kind: TimerKind, roomId: string, ruleId: string): RuleTimer | undefined {
    const state = this.rooms.get(roomId);
    if (!state) return undefined;
    return (kind === "spawn" ? state.spawnTimers : state.lootTimers).get(ruleId);
  }

  /** Encounter roll gate: at most one roll per cooldown window. */
  tryConsumeEncounterRoll(roomId: string, nowMs: number, cooldownSec: number): boolean {
    const state = this.access(roomId, nowMs);
    if (state.lastEncounterRollAt !== null && nowMs - state.lastEncounterRollAt < cooldownSec * 1000) {
      return false;
    }
    state.lastEncounterRollAt = nowMs;
    return true;
  }

  addEncounter(roomId: string, encounterId: string, nowMs: number): void {
    this.access(roomId, nowMs).activeEncounterIds.add(encounterId);
  }

  removeEncounter(roomId: string, encounterId: string): void {
    this.rooms.get(roomId)?.activeEncounterIds.delete(encounterId);
  }

  /**
   * Drop state for rooms that have been idle past the horizon and hold nothing
   * alive. Returns the ids removed.
   */
  cleanup(nowMs: number, isOccupied: (roomId: string) => boolean): string[] {
    const removed: string[] = [];
    const horizonMs = this.opts.idleHorizonSec * 1000;
    for (const [roomId, state] of this.rooms) {
      if (nowMs - state.lastActiveAt < horizonMs) continue;
      if (isOccupied(roomId)) continue;
      this.rooms.delete(roomId);
      removed.push(roomId);
    }
    if (removed.length) log.debug("Idle room state dropped", { rooms: removed });
    return removed;
  }

  private tryConsume(
    kind: TimerKind,
    roomId: string,
    rule: GatedRule,
    nowMs: number,
    wanted: WantedRoll,
  ): RuleGrant | null {
    const state = this.access(roomId, nowMs);
    const timers = kind === "spawn" ? state.spawnTimers : state.lootTimers;

    let t = timers.get(rule.id);
    if (!t) {
      t = { lastFiredAt: null, nextEligibleAt: nowMs, aliveCount: 0, fireCount: 0 };
      timers.set(rule.id, t);
    }

    if (t.aliveCount >= rule.maxAlive || nowMs < t.nextEligibleAt) return null;

    const fireCount = t.fireCount + 1;
    const rng = new Rng(`${state.seed}:${rule.id}:${fireCount}`);
    const count = Math.max(1, Math.min(Math.floor(wanted(rng)), rule.maxAlive - t.aliveCount));

    t.aliveCount += count;
    t.lastFiredAt = nowMs;
    t.nextEligibleAt = nowMs + rule.cooldownSec * 1000;
    t.fireCount = fireCount;

    return { ruleId: rule.id, count, fireCount, rng };
  }

  private release(kind: TimerKind, roomId: string, ruleId: string, n: number): void {
    const t = this.timer(kind, roomId, ruleId);
    if (!t) return;
    t.aliveCount = Math.max(0, t.aliveCount - n);
  }
}
