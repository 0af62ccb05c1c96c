export {
  COLOR_REFRESH_INTERVAL,
  HUE_SHIFT_OVER_LIFETIME,
  createParticleStore,
  isAlive,
  particleAge,
  refreshColorsIfDue,
  refreshParticleColor,
} from './particleStore'
export type { PaletteParams, Particle, ParticleStore } from './particleStore'
