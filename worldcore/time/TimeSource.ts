// worldcore/time/TimeSource.ts

/** Real (wall) time in epoch milliseconds. The only place the runtime reads the host clock. */
export interface TimeSource {
  nowMs(): number;
}

export const systemTimeSource: TimeSource = {
  nowMs: () => Date.now(),
};

/** Hand-cranked clock for tests and offline tools. */
export class ManualTimeSource implements TimeSource {
  constructor(private current = 0) {}

  nowMs(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
