// worldcore/core/RoomLocks.ts

/**
 * Per-room mutual exclusion.
 *
 * Every intent and every scheduled task that touches a room's combat or spawn
 * state runs inside withRoom(). Waiters queue FIFO per room. Locks are not
 * re-entrant: code already holding a room must call the unlocked engine
 * methods directly.
 */
export class RoomLocks {
  private readonly tails = new Map<string, Promise<void>>();

  withRoom<T>(roomId: string, fn: () => T | Promise<T>): Promise<T> {
    return this.withRooms([roomId], fn);
  }

  /** Takes several rooms at once (e.g. both ends of a move). */
  async withRooms<T>(roomIds: readonly string[], fn: () => T | Promise<T>): Promise<T> {
    const keys = [...new Set(roomIds)].sort();

    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    // Claim every key in one synchronous step so two multi-room callers can
    // never hold one room each while waiting on the other.
    const previous = keys.map((k) => this.tails.get(k) ?? Promise.resolve());
    for (const k of keys) this.tails.set(k, gate);

    await Promise.all(previous);
    try {
      return await fn();
    } finally {
      release();
      for (const k of keys) {
        if (this.tails.get(k) === gate) this.tails.delete(k);
      }
    }
  }

  isLocked(roomId: string): boolean {
    return this.tails.has(roomId);
  }
}
