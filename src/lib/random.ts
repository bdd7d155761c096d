export interface RandomSource {
  /** Uniform in [0, 1). */
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/** Folds any finite number into an unsigned 32-bit seed. */
export function normalizeSeed(rawSeed: number): number {
  return Math.abs(Math.trunc(rawSeed)) >>> 0;
}

/** mulberry32: small, fast and good enough for shuffling a deck. */
export function seededRandom(seed: number): RandomSource {
  let state = normalizeSeed(seed);
  return {
    next: () => {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Seeded when a seed is given, otherwise backed by Math.random. */
export function createRandom(seed?: number | null): RandomSource {
  return seed === undefined || seed === null ? mathRandom : seededRandom(seed);
}

/** Fisher-Yates on a copy. */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i -= 1) {
    const j = Math.min(i, Math.floor(random.next() * (i + 1)));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
