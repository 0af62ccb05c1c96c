/**
 * Particle Store
 *
 * Owns the live LIK collection. Storage only: the population manager creates
 * and removes particles, the integrator moves them.
 */

import { hslToRgb, wrapHue } from '../color/colorMath'
import type { Rgb } from '../color/colorMath'

// ============================================================================
// Types
// ============================================================================

export type Particle = {
  id: number
  x: number
  y: number
  z: number
  vx: number
  vy: number
  vz: number
  birthFrame: number
  /** Frames, > 0 */
  lifespan: number
  /** [0, 360) */
  initialHue: number
  /** Derived from initialHue and age, refreshed every COLOR_REFRESH_INTERVAL frames */
  hue: number
  /** Derived from hue and the palette */
  rgb: Rgb
}

export type ParticleStore = {
  /** Live particles in creation order (oldest first) */
  particles: Array<Particle>
  nextId: number
}

export type PaletteParams = {
  paletteSaturation: number
  paletteLightness: number
}

// ============================================================================
// Constants
// ============================================================================

/** Hue/RGB are recomputed on frames divisible by this */
export const COLOR_REFRESH_INTERVAL = 15

/** Degrees of hue a particle travels over its whole life */
export const HUE_SHIFT_OVER_LIFETIME = 36

// ============================================================================
// Store
// ============================================================================

export function createParticleStore(): ParticleStore {
  return { particles: [], nextId: 0 }
}

// ============================================================================
// Particle Helpers
// ============================================================================

export function particleAge(particle: Particle, frame: number): number {
  return frame - particle.birthFrame
}

export function isAlive(particle: Particle, frame: number): boolean {
  return particleAge(particle, frame) < particle.lifespan
}

/**
 * Recompute hue and RGB for the particle's current age
 */
export function refreshParticleColor(
  particle: Particle,
  frame: number,
  palette: PaletteParams,
): void {
  const lifeFraction = particleAge(particle, frame) / particle.lifespan
  particle.hue = wrapHue(particle.initialHue + lifeFraction * HUE_SHIFT_OVER_LIFETIME)
  particle.rgb = hslToRgb(particle.hue, palette.paletteSaturation, palette.paletteLightness)
}

/**
 * Refresh every particle's colour on the throttled cadence.
 * Returns true when a refresh happened.
 */
export function refreshColorsIfDue(
  store: ParticleStore,
  frame: number,
  palette: PaletteParams,
  interval = COLOR_REFRESH_INTERVAL,
): boolean {
  if (frame % interval !== 0) return false
  for (const particle of store.particles) {
    refreshParticleColor(particle, frame, palette)
  }
  return true
}
