// packages/game-core/src/random.ts
//
// Random sources for word sampling.
//
// The engine never reaches for Math.random on its own: callers inject a
// RandomSource, so tests and seeded CLI runs can replay the exact same
// start/target pairs.

/** Returns a float in [0, 1), like Math.random. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

/** FNV-1a over the characters of `seed`. */
function hashSeed(seed: string): number {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * seededRandom builds a deterministic RandomSource (mulberry32) from a string.
 *
 * Example:
 *   const a = seededRandom('daily-2024'), b = seededRandom('daily-2024');
 *   a() === b()  // true, and so on for every later draw
 */
export function seededRandom(seed: string): RandomSource {
  let state = hashSeed(seed);
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Maps a draw onto an index in [0, size). Out-of-range draws are clamped. */
export function randomIndex(random: RandomSource, size: number): number {
  const i = Math.floor(random() * size);
  return Math.min(Math.max(i, 0), size - 1);
}
