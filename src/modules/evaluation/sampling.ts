export type RandomSource = () => number;

/**
 * mulberry32: small deterministic PRNG, uniform in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Picks `count` distinct items in random order (partial Fisher-Yates).
 * Returns a copy of `items` when `count` covers them all.
 */
export function sampleWithoutReplacement<T>(items: T[], count: number, random: RandomSource): T[] {
  const pool = [...items];
  if (count >= pool.length) return pool;

  const take = Math.max(0, count);
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}
