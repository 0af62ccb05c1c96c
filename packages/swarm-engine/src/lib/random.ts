/**
 * Randomness
 *
 * Every stochastic decision in the engine (spawn jitter, migration noise,
 * drift, modulator phase) draws from an injected RandomSource, so tests and
 * recordings can replay a run from a seed.
 */

/** Uniform in [0, 1), same contract as Math.random */
export type RandomSource = () => number

export const defaultRandom: RandomSource = () => Math.random()

/**
 * mulberry32: small, fast, good enough for visuals
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0
  return () => {
    state = (state + 0x6d2b79f5) >>> 0
    let t = state
    t = Math.imul(t ^ (t >>> 15), t | 1)
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296
  }
}

/** Uniform in [min, max) */
export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min)
}

/** Uniform in [-0.5, 0.5) */
export function centered(random: RandomSource): number {
  return random() - 0.5
}

/** Uniformly pick one element of a non-empty list */
export function pick<T>(random: RandomSource, items: ReadonlyArray<T>): T | undefined {
  return items[Math.min(items.length - 1, Math.floor(random() * items.length))]
}
