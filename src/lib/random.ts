/**
 * Seeded random source for synthetic data. Every draw comes from one mulberry32
 * stream, so the same seed always replays the same sequence.
 */

export type Rng = {
  /** Uniform in [0, 1). */
  next(): number;
  normal(mean: number, sd: number): number;
  lognormal(mu: number, sigma: number): number;
  exponential(mean: number): number;
  poisson(lambda: number): number;
  pick<T>(items: readonly T[]): T;
};

/** mulberry32 keeps 32 bits of state, so seeds are limited to the uint32 range. */
export const MAX_SEED = 0xffffffff;

export function isValidSeed(seed: number): boolean {
  return Number.isInteger(seed) && seed >= 0 && seed <= MAX_SEED;
}

/** Seeded PRNG (mulberry32). Returns 0–1. */
export function seededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return function next() {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** FNV-1a; folds a string key into a seed so sub-streams stay stable per key. */
export function hashSeed(seed: number, key: string): number {
  let h = (0x811c9dc5 ^ (seed >>> 0)) >>> 0;
  for (let i = 0; i < key.length; i++) {
    h ^= key.charCodeAt(i);
    h = Math.imul(h, 0x01000193) >>> 0;
  }
  return h;
}

export function createRng(seed: number): Rng {
  const next = seededRandom(seed);

  // Box–Muller; 1 - u keeps the log argument in (0, 1].
  const normal = (mean: number, sd: number): number => {
    const u1 = 1 - next();
    const u2 = next();
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
    return mean + z * sd;
  };

  return {
    next,
    normal,
    lognormal: (mu, sigma) => Math.exp(normal(mu, sigma)),
    exponential: (mean) => -Math.log(1 - next()) * mean,
    poisson: (lambda) => {
      // Knuth; fine for the small rates used here.
      const limit = Math.exp(-lambda);
      let k = 0;
      let p = next();
      while (p > limit) {
        k++;
        p *= next();
      }
      return k;
    },
    pick: <T,>(items: readonly T[]): T => {
      if (items.length === 0) throw new Error("Cannot pick from an empty list");
      const idx = Math.min(items.length - 1, Math.floor(next() * items.length));
      return items[idx];
    },
  };
}
