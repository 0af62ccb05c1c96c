/**
 * Batched Integrator
 *
 * Copies positions and hues into flat typed arrays, then computes each
 * particle's net force as the row sum over all other particles (every pair
 * is evaluated from both sides). Same model as the scalar strategy; results
 * differ only by summation order.
 */

import { defaultRandom } from '../lib/random'
import type { RandomSource } from '../lib/random'
import type { Vec3 } from '../lib/vector'
import type { Particle } from '../particles/particleStore'
import { computePairCoefficients, createPairCoefficients } from './pairForce'
import {
  createForceBuffers,
  growCapacity,
  integrateParticles,
  seedForces,
} from './integration'
import type { ForceBuffers } from './integration'
import type { ForceIntegrator, ForceParams } from './types'

type PositionBuffers = {
  px: Float64Array
  py: Float64Array
  pz: Float64Array
  hue: Float64Array
}

const createPositionBuffers = (capacity: number): PositionBuffers => ({
  px: new Float64Array(capacity),
  py: new Float64Array(capacity),
  pz: new Float64Array(capacity),
  hue: new Float64Array(capacity),
})

export function createBatchedIntegrator(random: RandomSource = defaultRandom): ForceIntegrator {
  let capacity = 0
  let positions = createPositionBuffers(0)
  let forces: ForceBuffers = createForceBuffers(0)
  const coefficients = createPairCoefficients()

  const advance = (
    particles: Array<Particle>,
    dt: number,
    drift: Readonly<Vec3>,
    params: ForceParams,
  ) => {
    const count = particles.length
    if (count === 0) return

    const nextCapacity = growCapacity(capacity, count)
    if (nextCapacity !== capacity) {
      capacity = nextCapacity
      positions = createPositionBuffers(capacity)
      forces = createForceBuffers(capacity)
    }

    const { px, py, pz, hue } = positions
    for (let i = 0; i < count; i++) {
      const particle = particles[i]
      px[i] = particle.x
      py[i] = particle.y
      pz[i] = particle.z
      hue[i] = particle.hue
    }

    seedForces(forces, count, drift, params.baseMigrationSpeed, random)
    const { fx, fy, fz } = forces

    for (let i = 0; i < count; i++) {
      let sumX = 0
      let sumY = 0
      let sumZ = 0
      for (let j = 0; j < count; j++) {
        if (j === i) continue
        const dx = px[j] - px[i]
        const dy = py[j] - py[i]
        const dz = pz[j] - pz[i]

        if (!computePairCoefficients(dx * dx + dy * dy + dz * dz, hue[i], hue[j], params, coefficients)) {
          continue
        }

        const c = coefficients.personalSpace + coefficients.affinity
        sumX += dx * c
        sumY += dy * c
        sumZ += dz * c
      }
      fx[i] += sumX
      fy[i] += sumY
      fz[i] += sumZ
    }

    integrateParticles(particles, forces, dt, params)
  }

  return { strategy: 'batched', advance }
}
