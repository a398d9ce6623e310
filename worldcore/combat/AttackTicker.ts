// worldcore/combat/AttackTicker.ts
//
// Per-combatant autoattack cadence. One ticker per combatant at most; each
// fire hands the combatant id to the engine and the ticker reschedules itself
// off its previous due time, so cadence never drifts with tick jitter.

import type { AttackProfile } from "../shared/ContentTypes";
import { ScheduledTask, TaskScheduler } from "../core/TaskScheduler";
import { Logger } from "../utils/logger";

const log = Logger.scope("TICKER");

export interface TickerState {
  combatantId: string;
  targetId: string;
  intervalMs: number; // world ms
  nextFireAt: number; // world ms
  task: ScheduledTask;
}

export type TickerStartResult = "started" | "same_target" | "switched";

/** Called for every fire; `dueAt` is the world time the fire was scheduled for. */
export type TickerFireHandler = (combatantId: string, dueAt: number) => void | Promise<void>;

/** World ms between swings: base interval x weapon speed, never below the floor. */
export function attackIntervalMs(profile: AttackProfile, baseIntervalSec: number, minIntervalSec: number): number {
  const speed = profile.speedMultiplier > 0 ? profile.speedMultiplier : 1;
  return Math.max(Math.round(minIntervalSec * 1000), Math.round(baseIntervalSec * speed * 1000));
}

export class AttackTicker {
  private readonly tickers = new Map<string, TickerState>();

  constructor(
    private readonly scheduler: TaskScheduler,
    private readonly onFire: TickerFireHandler,
  ) {}

  get(combatantId: string): TickerState | undefined {
    return this.tickers.get(combatantId);
  }

  isActive(combatantId: string): boolean {
    return this.tickers.has(combatantId);
  }

  count(): number {
    return this.tickers.size;
  }

  /**
   * Start attacking `targetId`.
   * - same target as the running ticker: nothing changes
   * - different target: retargets and keeps the current phase
   * - no ticker: first fire one interval from now
   */
  start(combatantId: string, targetId: string, intervalMs: number): TickerStartResult {
    const existing = this.tickers.get(combatantId);
    if (existing) {
      if (existing.targetId === targetId) return "same_target";
      existing.targetId = targetId;
      log.debug("Ticker retargeted", { combatantId, targetId });
      return "switched";
    }

    const nextFireAt = this.scheduler.now() + intervalMs;
    const state: TickerState = {
      combatantId,
      targetId,
      intervalMs,
      nextFireAt,
      task: this.scheduleFire(combatantId, nextFireAt),
    };
    this.tickers.set(combatantId, state);
    log.debug("Ticker started", { combatantId, targetId, intervalMs });
    return "started";
  }

  cancel(combatantId: string, reason = "cancelled"): boolean {
    const state = this.tickers.get(combatantId);
    if (!state) return false;
    this.scheduler.cancel(state.task);
    this.tickers.delete(combatantId);
    log.debug("Ticker cancelled", { combatantId, reason });
    return true;
  }

  /** Ids of combatants whose ticker points at `targetId`. */
  listAttackersOf(targetId: string): string[] {
    const out: string[] = [];
    for (const t of this.tickers.values()) {
      if (t.targetId === targetId) out.push(t.combatantId);
    }
    return out;
  }

  /** Push the next fire back (maneuver action cost). */
  addDelay(combatantId: string, delayMs: number): void {
    const state = this.tickers.get(combatantId);
    if (!state || delayMs <= 0) return;
    this.scheduler.cancel(state.task);
    state.nextFireAt += delayMs;
    state.task = this.scheduleFire(combatantId, state.nextFireAt);
  }

  private scheduleFire(combatantId: string, dueAt: number): ScheduledTask {
    return this.scheduler.schedule(dueAt, `ticker:${combatantId}`, () => this.fire(combatantId, dueAt));
  }

  private async fire(combatantId: string, dueAt: number): Promise<void> {
    const state = this.tickers.get(combatantId);
    if (!state || state.nextFireAt !== dueAt) return;

    // Reschedule before handing off, so a handler that cancels also kills the next fire.
    state.nextFireAt = dueAt + state.intervalMs;
    state.task = this.scheduleFire(combatantId, state.nextFireAt);

    await this.onFire(combatantId, dueAt);
  }
}
