/**
 * Scalar Integrator
 *
 * Visits each unordered pair once and applies equal and opposite forces.
 * Force buffers are reused across frames.
 */

import { defaultRandom } from '../lib/random'
import type { RandomSource } from '../lib/random'
import type { Particle } from '../particles/particleStore'
import { computePairCoefficients, createPairCoefficients } from './pairForce'
import {
  createForceBuffers,
  growCapacity,
  integrateParticles,
  seedForces,
} from './integration'
import type { ForceIntegrator, ForceParams } from './types'
import type { Vec3 } from '../lib/vector'

export function createScalarIntegrator(random: RandomSource = defaultRandom): ForceIntegrator {
  let capacity = 0
  let forces = createForceBuffers(0)
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
      forces = createForceBuffers(capacity)
    }

    seedForces(forces, count, drift, params.baseMigrationSpeed, random)
    const { fx, fy, fz } = forces

    for (let i = 0; i < count - 1; i++) {
      const a = particles[i]
      for (let j = i + 1; j < count; j++) {
        const b = particles[j]
        const dx = b.x - a.x
        const dy = b.y - a.y
        const dz = b.z - a.z

        if (!computePairCoefficients(dx * dx + dy * dy + dz * dz, a.hue, b.hue, params, coefficients)) {
          continue
        }

        const c = coefficients.personalSpace + coefficients.affinity
        fx[i] += dx * c
        fy[i] += dy * c
        fz[i] += dz * c
        fx[j] -= dx * c
        fy[j] -= dy * c
        fz[j] -= dz * c
      }
    }

    integrateParticles(particles, forces, dt, params)
  }

  return { strategy: 'scalar', advance }
}
