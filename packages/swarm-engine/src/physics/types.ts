/**
 * Force Integrator contract
 *
 * Scalar and batched strategies implement the same physical model; they may
 * differ only in floating-point summation order.
 */

import type { Vec3 } from '../lib/vector'
import type { Particle } from '../particles/particleStore'
import type { SwarmParams } from '../vocabulary'

export type ForceParams = Pick<
  SwarmParams,
  | 'personalSpaceRadius'
  | 'personalSpaceRepulsion'
  | 'attractionStrength'
  | 'attractionSimilarityThreshold'
  | 'repulsionStrength'
  | 'baseMigrationSpeed'
  | 'dampingMomentum'
  | 'universeRadius'
>

export type IntegratorStrategy = 'scalar' | 'batched'

export interface ForceIntegrator {
  readonly strategy: IntegratorStrategy

  /**
   * Advance every particle one step, in place.
   *
   * @param dt - step length in reference frames (1 = one 60 FPS frame)
   * @param drift - shared drift vector, added to every particle's force
   */
  advance: (
    particles: Array<Particle>,
    dt: number,
    drift: Readonly<Vec3>,
    params: ForceParams,
  ) => void
}
