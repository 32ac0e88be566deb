/**
 * Seedable random number generation.
 *
 * Shuffles take an explicit `Rng` instead of reaching for the
 * process-wide Math.random, so a board can be reproduced from its
 * seed. Production code seeds once from Math.random.
 */

/** A generator returning values in [0, 1), like Math.random. */
export type Rng = () => number;

const MODULUS = 4294967296; // 2^32

/**
 * Create a linear congruential generator from a 32-bit seed.
 *
 * Non-integer or out-of-range seeds are truncated to 32 bits.
 */
export function createRng(seed: number): Rng {
  let s = Math.trunc(seed) >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) % MODULUS;
    return s / MODULUS;
  };
}

/**
 * Pick a fresh, non-deterministic 32-bit seed.
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * MODULUS);
}
