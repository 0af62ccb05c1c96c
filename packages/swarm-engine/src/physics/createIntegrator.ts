import { createBatchedIntegrator } from './batchedIntegrator'
import { createScalarIntegrator } from './scalarIntegrator'
import type { RandomSource } from '../lib/random'
import type { ForceIntegrator, IntegratorStrategy } from './types'

export function createIntegrator(
  strategy: IntegratorStrategy,
  random?: RandomSource,
): ForceIntegrator {
  return strategy === 'batched'
    ? createBatchedIntegrator(random)
    : createScalarIntegrator(random)
}
