// ─────────────────────────────────────────────
//  Mulberry32 seeded PRNG
//  Every random draw in the engine goes through one of these.
//  The internal state is a single uint32, so it can live inside GameState.
// ─────────────────────────────────────────────

export interface Prng {
  /** Float in [0, 1) */
  next(): number;
  /** Integer in [min, max] inclusive */
  nextInt(min: number, max: number): number;
  /** Fisher–Yates shuffle in place; returns the same array */
  shuffle<T>(items: T[]): T[];
  /** Independent generator starting from the current state */
  fork(): Prng;
  readonly state: number;
}

function mulberry32Step(state: number): [number, number] {
  const nextState = (state + 0x6d2b79f5) >>> 0;
  let s = nextState;
  s = Math.imul(s ^ (s >>> 15), s | 1) >>> 0;
  s ^= s + Math.imul(s ^ (s >>> 7), s | 61);
  s = (s ^ (s >>> 14)) >>> 0;
  return [s / 0x100000000, nextState];
}

export function createPrng(seed: number): Prng {
  let current = seed >>> 0;

  const prng: Prng = {
    next(): number {
      const [value, nextState] = mulberry32Step(current);
      current = nextState;
      return value;
    },

    nextInt(min: number, max: number): number {
      return min + Math.floor(prng.next() * (max - min + 1));
    },

    shuffle<T>(items: T[]): T[] {
      for (let i = items.length - 1; i > 0; i--) {
        const j = prng.nextInt(0, i);
        const tmp = items[i];
        const other = items[j];
        if (tmp === undefined || other === undefined) continue;
        items[i] = other;
        items[j] = tmp;
      }
      return items;
    },

    fork(): Prng {
      return createPrng(prng.next() * 0x100000000);
    },

    get state(): number {
      return current;
    },
  };

  return prng;
}

/** Seed drawn from the host's entropy, for games started without a seed. */
export function entropySeed(): number {
  return Math.floor(Math.random() * 0x100000000) >>> 0;
}
