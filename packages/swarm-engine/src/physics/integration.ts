/**
 * Shared integration tail for both strategies: net force to velocity,
 * velocity to position, then spherical containment.
 */

import { centered } from '../lib/random'
import type { RandomSource } from '../lib/random'
import type { Vec3 } from '../lib/vector'
import type { Particle } from '../particles/particleStore'
import type { ForceParams } from './types'

export type ForceBuffers = {
  fx: Float64Array
  fy: Float64Array
  fz: Float64Array
}

/** Next buffer capacity for `count` particles, doubling to keep reallocations rare */
export const growCapacity = (current: number, count: number): number =>
  count <= current ? current : Math.max(count, current * 2, 64)

export const createForceBuffers = (capacity: number): ForceBuffers => ({
  fx: new Float64Array(capacity),
  fy: new Float64Array(capacity),
  fz: new Float64Array(capacity),
})

/**
 * Initialise each particle's force with its own migration noise plus the
 * shared drift. Draws x, y, z per particle in particle order.
 */
export function seedForces(
  forces: ForceBuffers,
  count: number,
  drift: Readonly<Vec3>,
  migrationSpeed: number,
  random: RandomSource,
): void {
  for (let i = 0; i < count; i++) {
    forces.fx[i] = drift.x + centered(random) * migrationSpeed
    forces.fy[i] = drift.y + centered(random) * migrationSpeed
    forces.fz[i] = drift.z + centered(random) * migrationSpeed
  }
}

/**
 * Rescale the position onto the sphere when it lies outside.
 * Direction is preserved; velocity is left alone.
 */
export function containWithinSphere(particle: Particle, radius: number): void {
  const distanceSquared =
    particle.x * particle.x + particle.y * particle.y + particle.z * particle.z
  if (distanceSquared <= radius * radius) return

  const factor = radius / Math.sqrt(distanceSquared)
  particle.x *= factor
  particle.y *= factor
  particle.z *= factor
}

/**
 * velocity = (velocity + force * dt) * damping^dt; position += velocity * dt.
 * At dt = 1 this is the plain per-frame update.
 */
export function integrateParticles(
  particles: Array<Particle>,
  forces: ForceBuffers,
  dt: number,
  params: ForceParams,
): void {
  const damping = Math.pow(params.dampingMomentum, dt)

  for (let i = 0; i < particles.length; i++) {
    const particle = particles[i]

    particle.vx = (particle.vx + forces.fx[i] * dt) * damping
    particle.vy = (particle.vy + forces.fy[i] * dt) * damping
    particle.vz = (particle.vz + forces.fz[i] * dt) * damping

    particle.x += particle.vx * dt
    particle.y += particle.vy * dt
    particle.z += particle.vz * dt

    containWithinSphere(particle, params.universeRadius)
  }
}
