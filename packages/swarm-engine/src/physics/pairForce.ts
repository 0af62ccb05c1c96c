/**
 * Pairwise Force Model
 *
 * For a pair (i, j) with delta = p_j - p_i the force on i is c * delta and
 * the force on j is -c * delta, where c is the sum of a personal-space term
 * and a hue-affinity term. Both strategies call this, so symmetry holds by
 * construction.
 *
 * Philosophy: Simple rules compose. Inverse square affinity, linear personal space.
 */

import { hueSimilarity } from '../color/colorMath'
import type { Vec3 } from '../lib/vector'
import type { Particle } from '../particles/particleStore'
import type { ForceParams } from './types'

/** Pairs closer than this (squared) exert no force on each other */
export const MIN_DISTANCE_SQUARED = 1e-6

export type PairCoefficients = {
  /** <= 0: pushes the pair apart inside personalSpaceRadius */
  personalSpace: number
  /** > 0 attracts similar hues, < 0 repels dissimilar ones */
  affinity: number
}

export const createPairCoefficients = (): PairCoefficients => ({
  personalSpace: 0,
  affinity: 0,
})

/**
 * Fill `out` with the force coefficients of a pair.
 * Returns false (and zeroes `out`) for coincident particles.
 */
export function computePairCoefficients(
  distanceSquared: number,
  hueI: number,
  hueJ: number,
  params: ForceParams,
  out: PairCoefficients,
): boolean {
  if (distanceSquared < MIN_DISTANCE_SQUARED) {
    out.personalSpace = 0
    out.affinity = 0
    return false
  }

  const distance = Math.sqrt(distanceSquared)
  const radius = params.personalSpaceRadius

  out.personalSpace =
    distance < radius
      ? -params.personalSpaceRepulsion * (radius - distance) / distance
      : 0

  const similarity = hueSimilarity(hueI, hueJ)
  out.affinity =
    similarity > params.attractionSimilarityThreshold
      ? params.attractionStrength * similarity / distanceSquared
      : -params.repulsionStrength * (1 - similarity) / distanceSquared

  return true
}

export type PairForce = {
  personalSpace: Vec3
  affinity: Vec3
  total: Vec3
}

/**
 * Force exerted on `target` by `source`, split into its two terms.
 * Allocates; meant for inspection and tests, not for the hot loop.
 */
export function pairForceOn(
  target: Particle,
  source: Particle,
  params: ForceParams,
): PairForce {
  const dx = source.x - target.x
  const dy = source.y - target.y
  const dz = source.z - target.z
  const coefficients = createPairCoefficients()
  computePairCoefficients(dx * dx + dy * dy + dz * dz, target.hue, source.hue, params, coefficients)

  const scale = (c: number): Vec3 => ({ x: dx * c, y: dy * c, z: dz * c })
  return {
    personalSpace: scale(coefficients.personalSpace),
    affinity: scale(coefficients.affinity),
    total: scale(coefficients.personalSpace + coefficients.affinity),
  }
}
