/**
 * Source of uniformly distributed numbers in [0, 1).
 * Injected wherever allocation draws at random so runs can be replayed.
 */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Deterministic generator (mulberry32) for `--seed` runs and tests.
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
 * Integer in [min, max], both inclusive.
 */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}
