import type { Rng } from './types.js'

/**
 * Linear congruential generator for reproducible populations.
 *
 * Numerical Recipes constants.
 */
export function seededRandom(seed: number): Rng {
  let s = seed >>> 0
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0
    return s / 0x100000000
  }
}

/** Uniform integer in [min, maxExclusive). Callers guarantee min < maxExclusive. */
export function randomInt(rng: Rng, min: number, maxExclusive: number): number {
  return min + Math.floor(rng() * (maxExclusive - min))
}
