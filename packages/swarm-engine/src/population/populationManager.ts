/**
 * Population Manager
 *
 * Keeps the live particle count inside [minLikCount, maxLikCount]:
 * 1. Cull particles whose age reached their lifespan
 * 2. Below the minimum, spawn up to it in one call
 * 3. Between minimum and maximum, spawn one with a small per-frame probability
 * 4. Above the maximum, drop the newest particles
 *
 * When the minimum exceeds the maximum the maximum wins.
 */

import { centered, uniform } from '../lib/random'
import type { RandomSource } from '../lib/random'
import type { Vec3 } from '../lib/vector'
import { isAlive, refreshParticleColor } from '../particles/particleStore'
import type { PaletteParams, Particle, ParticleStore } from '../particles/particleStore'
import type { SwarmParams } from '../vocabulary'

// ============================================================================
// Constants
// ============================================================================

/** Per-frame chance of one extra spawn while between min and max */
export const SPAWN_PROBABILITY = 0.05

/** Spawn offset from the origin per axis, drawn from [-SPAWN_JITTER/2, SPAWN_JITTER/2) */
export const SPAWN_JITTER = 50

// ============================================================================
// Types
// ============================================================================

export type PopulationParams = PaletteParams &
  Pick<SwarmParams, 'minLikCount' | 'maxLikCount' | 'maxLikLifespan'>

export type PopulationReport = {
  culled: number
  spawned: number
  truncated: number
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Create a particle near `origin` and append it to the store
 */
export function spawnParticle(
  store: ParticleStore,
  frame: number,
  params: PopulationParams,
  origin: Readonly<Vec3>,
  random: RandomSource,
): Particle {
  const initialHue = uniform(random, 0, 360)
  const particle: Particle = {
    id: store.nextId++,
    x: origin.x + centered(random) * SPAWN_JITTER,
    y: origin.y + centered(random) * SPAWN_JITTER,
    z: origin.z + centered(random) * SPAWN_JITTER,
    vx: 0,
    vy: 0,
    vz: 0,
    birthFrame: frame,
    lifespan: params.maxLikLifespan * uniform(random, 0.5, 1),
    initialHue,
    hue: initialHue,
    rgb: [0, 0, 0],
  }
  refreshParticleColor(particle, frame, params)
  store.particles.push(particle)
  return particle
}

/**
 * Remove expired particles in place, preserving order. Returns the number removed.
 */
export function cullExpired(store: ParticleStore, frame: number): number {
  const { particles } = store
  let kept = 0
  for (let i = 0; i < particles.length; i++) {
    const particle = particles[i]
    if (isAlive(particle, frame)) {
      particles[kept++] = particle
    }
  }
  const culled = particles.length - kept
  particles.length = kept
  return culled
}

export function ensurePopulation(
  store: ParticleStore,
  frame: number,
  params: PopulationParams,
  origin: Readonly<Vec3>,
  random: RandomSource,
): PopulationReport {
  const report: PopulationReport = { culled: 0, spawned: 0, truncated: 0 }
  const maxCount = Math.max(0, params.maxLikCount)
  const minCount = Math.min(Math.max(0, params.minLikCount), maxCount)

  report.culled = cullExpired(store, frame)

  const count = store.particles.length
  if (count < minCount) {
    for (let i = count; i < minCount; i++) {
      spawnParticle(store, frame, params, origin, random)
    }
    report.spawned = minCount - count
  } else if (count < maxCount) {
    if (random() < SPAWN_PROBABILITY) {
      spawnParticle(store, frame, params, origin, random)
      report.spawned = 1
    }
  } else if (count > maxCount) {
    // Particles are appended, so the tail holds the newest
    store.particles.length = maxCount
    report.truncated = count - maxCount
  }

  return report
}
