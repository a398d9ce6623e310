// worldcore/utils/Rng.ts

/** A plain [0, 1) source, the shape Math.random has. Combat code takes one of these. */
export type RandomFn = () => number;

export class Rng {
  private _state: number;

  constructor(seed: string | number) {
    if (typeof seed === "number") {
      this._state = seed >>> 0 || 1;
    } else {
      this._state = Rng.hashString(seed);
    }
  }

  private static hashString(str: string): number {
    let h = 1779033703 ^ str.length;
    for (let i = 0; i < str.length; i++) {
      h = Math.imul(h ^ str.charCodeAt(i), 3432918353);
      h = (h << 13) | (h >>> 19);
    }
    return h >>> 0 || 1;
  }

  // mulberry32-style
  next(): number {
    let t = (this._state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  range(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  int(min: number, maxInclusive: number): number {
    const n = this.next();
    return min + Math.floor(n * (maxInclusive - min + 1));
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  pick<T>(list: readonly T[]): T {
    if (!list.length) {
      throw new Error("Rng.pick called with empty list");
    }
    return list[this.int(0, list.length - 1)];
  }

  /** Bound `next` for code that takes a RandomFn. */
  asRandomFn(): RandomFn {
    return () => this.next();
  }
}

/** Integer in [min, max] from any RandomFn. */
export function rollInt(rng: RandomFn, min: number, maxInclusive: number): number {
  if (maxInclusive <= min) return min;
  return min + Math.floor(rng() * (maxInclusive - min + 1));
}

/**
 * Weighted choice over `[key, weight]` pairs, walked in order so a given roll
 * always lands on the same entry. Returns null when every weight is <= 0.
 */
export function weightedPick<K>(entries: ReadonlyArray<readonly [K, number]>, roll: number): K | null {
  const live = entries.filter(([, w]) => w > 0);
  const total = live.reduce((sum, [, w]) => sum + w, 0);
  if (total <= 0) return null;

  let cursor = roll * total;
  for (const [key, w] of live) {
    if (cursor < w) return key;
    cursor -= w;
  }
  return live[live.length - 1][0];
}
