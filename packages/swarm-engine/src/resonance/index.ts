export {
  RESONANCE_INTERVAL,
  createResonanceCache,
  findResonancePairs,
  resolvePair,
} from './resonanceCache'
export type { ResonanceCache, ResonancePair } from './resonanceCache'
