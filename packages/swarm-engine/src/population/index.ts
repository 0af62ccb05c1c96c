export {
  SPAWN_JITTER,
  SPAWN_PROBABILITY,
  cullExpired,
  ensurePopulation,
  spawnParticle,
} from './populationManager'
export type { PopulationParams, PopulationReport } from './populationManager'
