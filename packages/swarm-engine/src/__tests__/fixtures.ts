/**
 * Shared builders for swarm-engine tests
 */

import type { RandomSource } from '../lib/random'
import type { Particle } from '../particles'
import type { ForceParams } from '../physics'

export const makeParticle = (overrides: Partial<Particle> = {}): Particle => ({
  id: 0,
  x: 0,
  y: 0,
  z: 0,
  vx: 0,
  vy: 0,
  vz: 0,
  birthFrame: 0,
  lifespan: 100,
  initialHue: 0,
  hue: 0,
  rgb: [0, 0, 0],
  ...overrides,
})

export const forceParams = (overrides: Partial<ForceParams> = {}): ForceParams => ({
  personalSpaceRadius: 50,
  personalSpaceRepulsion: 0.5,
  attractionStrength: 0.005,
  attractionSimilarityThreshold: 0.7,
  repulsionStrength: 0.005,
  baseMigrationSpeed: 0,
  dampingMomentum: 0.98,
  universeRadius: 1000,
  ...overrides,
})

/** Always returns the same value */
export const constantRandom = (value: number): RandomSource => () => value
