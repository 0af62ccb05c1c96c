/**
 * Resonance Cache
 *
 * Pairs of particles that are both close and similar in hue. Recomputed on a
 * fixed frame cadence; renderers read the last result in between, so index
 * references may be stale by up to one interval and must be resolved against
 * the current particle list before use.
 */

import { hueSimilarity } from '../color/colorMath'
import type { Particle } from '../particles/particleStore'

export const RESONANCE_INTERVAL = 10

export type ResonancePair = {
  indexA: number
  indexB: number
  distance: number
  similarity: number
}

/**
 * Every pair (i < j) with distance <= maxDistance and similarity >= threshold
 */
export function findResonancePairs(
  particles: ReadonlyArray<Particle>,
  maxDistance: number,
  similarityThreshold: number,
): Array<ResonancePair> {
  const pairs: Array<ResonancePair> = []
  const maxDistanceSquared = maxDistance * maxDistance

  for (let i = 0; i < particles.length - 1; i++) {
    const a = particles[i]
    for (let j = i + 1; j < particles.length; j++) {
      const b = particles[j]
      const dx = b.x - a.x
      const dy = b.y - a.y
      const dz = b.z - a.z
      const distanceSquared = dx * dx + dy * dy + dz * dz
      if (distanceSquared > maxDistanceSquared) continue

      const similarity = hueSimilarity(a.hue, b.hue)
      if (similarity < similarityThreshold) continue

      pairs.push({ indexA: i, indexB: j, distance: Math.sqrt(distanceSquared), similarity })
    }
  }

  return pairs
}

export type ResonanceCache = {
  /** Recompute when `frame` falls on the cadence. Returns true when it did. */
  recomputeIfDue: (
    frame: number,
    particles: ReadonlyArray<Particle>,
    maxDistance: number,
    similarityThreshold: number,
  ) => boolean
  pairs: () => ReadonlyArray<ResonancePair>
  /** Frame of the last recompute, -1 before the first */
  computedAt: () => number
  clear: () => void
}

export function createResonanceCache(interval: number = RESONANCE_INTERVAL): ResonanceCache {
  const cadence = Math.max(1, Math.floor(interval))
  let pairs: ReadonlyArray<ResonancePair> = []
  let computedAt = -1

  return {
    recomputeIfDue: (frame, particles, maxDistance, similarityThreshold) => {
      if (frame % cadence !== 0) return false
      pairs = findResonancePairs(particles, maxDistance, similarityThreshold)
      computedAt = frame
      return true
    },
    pairs: () => pairs,
    computedAt: () => computedAt,
    clear: () => {
      pairs = []
      computedAt = -1
    },
  }
}

/**
 * Look up both particles of a cached pair; null when either index has gone stale
 */
export function resolvePair(
  particles: ReadonlyArray<Particle>,
  pair: ResonancePair,
): { a: Particle; b: Particle } | null {
  if (pair.indexA >= particles.length || pair.indexB >= particles.length) {
    return null
  }
  return { a: particles[pair.indexA], b: particles[pair.indexB] }
}
