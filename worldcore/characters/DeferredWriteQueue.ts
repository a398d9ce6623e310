// worldcore/characters/DeferredWriteQueue.ts
//
// Character saves never run under a room lock and never make gameplay wait.
// Callers enqueue a snapshot and move on; the queue writes it later, keeps
// only the newest snapshot per character, and retries failures with
// exponential backoff until maxAttempts.

import { TimeSource, systemTimeSource } from "../time/TimeSource";
import { Logger } from "../utils/logger";
import type { CharacterStore } from "./CharacterStore";
import type { CharacterSheet } from "./CharacterTypes";

const log = Logger.scope("PERSIST");

export interface DeferredWriteOptions {
  clock?: TimeSource;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
}

interface PendingWrite {
  sheet: CharacterSheet;
  attempts: number;
  nextAttemptAt: number; // real ms
}

export class DeferredWriteQueue {
  private readonly writes = new Map<string, PendingWrite>();
  private readonly clock: TimeSource;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;

  private draining: Promise<number> | null = null;
  private handle: NodeJS.Timeout | null = null;
  private dropped = 0;

  constructor(
    private readonly store: CharacterStore,
    opts: DeferredWriteOptions = {},
  ) {
    this.clock = opts.clock ?? systemTimeSource;
    this.maxAttempts = opts.maxAttempts ?? 8;
    this.baseDelayMs = opts.baseDelayMs ?? 500;
    this.maxDelayMs = opts.maxDelayMs ?? 60_000;
  }

  /** Replaces any snapshot already waiting for the same character. */
  enqueue(sheet: CharacterSheet): void {
    this.writes.set(sheet.id, { sheet, attempts: 0, nextAttemptAt: this.clock.nowMs() });
  }

  pending(): number {
    return this.writes.size;
  }

  droppedCount(): number {
    return this.dropped;
  }

  backoffMs(attempts: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * 2 ** Math.max(0, attempts - 1));
  }

  /** Writes everything that is due. Resolves to the number of successful writes. */
  drain(): Promise<number> {
    return this.run(false);
  }

  /** Shutdown path: one attempt for every pending write, backoff ignored. */
  async flush(): Promise<void> {
    if (this.draining) await this.draining;
    await this.run(true);
    if (this.writes.size) log.warn("Writes still pending after flush", { pending: this.writes.size });
  }

  start(intervalMs: number): void {
    if (this.handle) return;
    this.handle = setInterval(() => {
      this.drain().catch((err: unknown) => log.error("Write queue drain failed", { err }));
    }, Math.max(50, intervalMs));
    this.handle.unref?.();
  }

  stop(): void {
    if (this.handle) clearInterval(this.handle);
    this.handle = null;
  }

  private run(force: boolean): Promise<number> {
    if (this.draining) return this.draining;
    const pass = this.writeDue(force).finally(() => {
      this.draining = null;
    });
    this.draining = pass;
    return pass;
  }

  private async writeDue(force: boolean): Promise<number> {
    const now = this.clock.nowMs();
    const due = [...this.writes.values()].filter((w) => force || w.nextAttemptAt <= now);
    let written = 0;

    for (const w of due) {
      const id = w.sheet.id;
      if (this.writes.get(id) !== w) continue;
      this.writes.delete(id);

      try {
        await this.store.saveCharacter(w.sheet);
        written++;
      } catch (err) {
        w.attempts++;
        if (this.writes.has(id)) {
          // A newer snapshot arrived while this one was in flight; it wins.
          log.warn("Character save failed; newer snapshot queued", { id, attempts: w.attempts, err });
          continue;
        }
        if (w.attempts >= this.maxAttempts) {
          this.dropped++;
          log.error("Character save abandoned", { id, attempts: w.attempts, err });
          continue;
        }
        w.nextAttemptAt = this.clock.nowMs() + this.backoffMs(w.attempts);
        this.writes.set(id, w);
        log.warn("Character save failed; will retry", { id, attempts: w.attempts, retryAt: w.nextAttemptAt, err });
      }
    }
    return written;
  }
}
