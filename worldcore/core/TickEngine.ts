// worldcore/core/TickEngine.ts

import { Logger } from "../utils/logger";
import type { TaskScheduler } from "./TaskScheduler";

export interface TickEngineConfig {
  intervalMs: number; // tick interval in real ms (e.g. 100ms for 10 TPS)

  /** Run the maintenance sweep every N ticks; timed tasks run every tick. */
  sweepEveryTicks?: number;

  /**
   * Optional hook invoked once per tick with:
   *  - nowMs: Date.now() for this tick
   *  - tick: current tick count (starting at 1)
   */
  onTick?: (nowMs: number, tick: number) => void;
}

/** The part of MudRuntime the tick loop drives. */
export interface TickTarget {
  readonly scheduler: TaskScheduler;
  sweep(): Promise<void>;
}

/**
 * TickEngine
 *
 * Each tick:
 *  - runs every scheduled task that is due (attack tickers, disengage
 *    timeouts, flee windows, respawns, linkdead removal)
 *  - every sweepEveryTicks ticks, runs the runtime's maintenance sweep
 *  - calls an onTick hook
 *
 * A tick that is still running when the next one is due is not doubled up;
 * the late tick is skipped.
 */
export class TickEngine {
  private readonly log = Logger.scope("TICK");
  private readonly intervalMs: number;
  private readonly sweepEvery: number;

  private running = false;
  private handle: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;
  private tickCount = 0;

  constructor(
    private readonly target: TickTarget,
    private readonly cfg: TickEngineConfig,
  ) {
    this.intervalMs = Math.max(cfg.intervalMs, 10);
    this.sweepEvery = Math.max(1, Math.floor(cfg.sweepEveryTicks ?? 10));
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    this.log.info("Starting TickEngine", {
      intervalMs: this.intervalMs,
      sweepEveryTicks: this.sweepEvery,
    });

    this.handle = setInterval(() => {
      if (this.inFlight) return;
      this.inFlight = this.tick().finally(() => {
        this.inFlight = null;
      });
    }, this.intervalMs);
    this.handle.unref?.();
  }

  /** Stops the timer and waits for a tick that is already running. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    if (this.handle) {
      clearInterval(this.handle);
      this.handle = null;
    }
    if (this.inFlight) await this.inFlight;

    this.log.info("TickEngine stopped", {
      lastTick: this.tickCount,
    });
  }

  /** One tick. Public so tests and tools can step the loop by hand. */
  async tick(): Promise<void> {
    this.tickCount++;
    const now = Date.now();

    try {
      const ran = await this.target.scheduler.runDue();
      if (ran > 0) this.log.debug("Scheduled tasks ran", { tick: this.tickCount, ran });
    } catch (err) {
      this.log.warn("Error running scheduled tasks", { err });
    }

    if (this.tickCount % this.sweepEvery === 0) {
      try {
        await this.target.sweep();
      } catch (err) {
        this.log.warn("Error during runtime sweep", { err });
      }
    }

    // Global hook for systems that want a heartbeat
    try {
      this.cfg.onTick?.(now, this.tickCount);
    } catch (err) {
      this.log.warn("Error in TickEngine onTick hook", { err });
    }

    if (this.tickCount % 100 === 0) {
      this.log.debug("Tick summary", {
        tick: this.tickCount,
        pendingTasks: this.target.scheduler.pending(),
      });
    }
  }

  ticks(): number {
    return this.tickCount;
  }
}
