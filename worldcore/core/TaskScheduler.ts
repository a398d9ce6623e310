// worldcore/core/TaskScheduler.ts

import { Logger } from "../utils/logger";

const log = Logger.scope("SCHEDULER");

export interface WorldTimeReader {
  worldMs(): number;
}

export class CancellationToken {
  private _cancelled = false;

  get cancelled(): boolean {
    return this._cancelled;
  }

  cancel(): void {
    this._cancelled = true;
  }
}

export type TaskFn = () => void | Promise<void>;

export interface ScheduledTask {
  readonly id: number;
  readonly label: string;
  readonly dueAt: number; // world ms
  readonly token: CancellationToken;
}

interface Entry extends ScheduledTask {
  fn: TaskFn;
}

// A task that keeps rescheduling itself into the past would spin forever.
const MAX_RUNS_PER_PASS = 10_000;

/**
 * Timed work keyed by world time. Nothing here owns a timer: the TickEngine
 * calls runDue() every tick, tests call it after advancing a ManualTimeSource.
 * Tasks run one at a time in (dueAt, id) order; a task scheduled while the
 * pass runs is picked up in the same pass if it is already due.
 */
export class TaskScheduler {
  private readonly tasks = new Map<number, Entry>();
  private seq = 0;
  private running: Promise<number> | null = null;

  constructor(private readonly clock: WorldTimeReader) {}

  now(): number {
    return this.clock.worldMs();
  }

  schedule(dueAt: number, label: string, fn: TaskFn, token = new CancellationToken()): ScheduledTask {
    const entry: Entry = { id: ++this.seq, label, dueAt, token, fn };
    this.tasks.set(entry.id, entry);
    return entry;
  }

  after(delayMs: number, label: string, fn: TaskFn): ScheduledTask {
    return this.schedule(this.clock.worldMs() + Math.max(0, delayMs), label, fn);
  }

  cancel(task: ScheduledTask | null | undefined): void {
    if (!task) return;
    task.token.cancel();
    this.tasks.delete(task.id);
  }

  pending(): number {
    return this.tasks.size;
  }

  /**
   * Run everything due at `now`. Overlapping calls share one pass, so a slow
   * tick can never run the same task twice.
   */
  runDue(now = this.clock.worldMs()): Promise<number> {
    if (this.running) return this.running;
    const pass = this.drain(now).finally(() => {
      this.running = null;
    });
    this.running = pass;
    return pass;
  }

  private nextDue(now: number): Entry | null {
    let best: Entry | null = null;
    for (const t of this.tasks.values()) {
      if (t.dueAt > now) continue;
      if (!best || t.dueAt < best.dueAt || (t.dueAt === best.dueAt && t.id < best.id)) best = t;
    }
    return best;
  }

  private async drain(now: number): Promise<number> {
    let ran = 0;
    for (let guard = 0; guard < MAX_RUNS_PER_PASS; guard++) {
      const task = this.nextDue(now);
      if (!task) return ran;
      this.tasks.delete(task.id);
      if (task.token.cancelled) continue;

      try {
        await task.fn();
        ran++;
      } catch (err) {
        log.error("Scheduled task failed", { label: task.label, err });
      }
    }
    log.warn("runDue stopped after hitting the per-pass limit", { limit: MAX_RUNS_PER_PASS });
    return ran;
  }
}
