/**
 * Physics
 *
 * Pair forces, shared drift, containment and the two integration strategies.
 */

export type { ForceIntegrator, ForceParams, IntegratorStrategy } from './types'

export {
  MIN_DISTANCE_SQUARED,
  computePairCoefficients,
  createPairCoefficients,
  pairForceOn,
} from './pairForce'
export type { PairCoefficients, PairForce } from './pairForce'

export { updateGlobalDrift } from './globalDrift'
export { containWithinSphere, integrateParticles } from './integration'

export { createScalarIntegrator } from './scalarIntegrator'
export { createBatchedIntegrator } from './batchedIntegrator'
export { createIntegrator } from './createIntegrator'
