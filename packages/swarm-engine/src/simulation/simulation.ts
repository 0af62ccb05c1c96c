/**
 * Simulation
 *
 * Owns the particle store, global drift, resonance cache and modulator, and
 * advances them in a fixed order on every step:
 *
 *   modulator → snapshot → population → drift → colour refresh
 *   → integrator → resonance (on cadence) → frame + 1 → step$ notify
 *
 * Everything after the snapshot reads that one immutable parameter object,
 * so modulator writes never tear a frame.
 */

import { createEventBus, createSubscription } from '@liks/system'
import type { Subscription } from '@liks/system'
import { hexToRgb } from '../color/colorMath'
import type { ConfigStore } from '../config'
import { defaultRandom, pick, uniform } from '../lib/random'
import type { RandomSource } from '../lib/random'
import { zero } from '../lib/vector'
import type { Vec3 } from '../lib/vector'
import { createParameterModulator } from '../modulator'
import type { ParameterModulator } from '../modulator'
import { COLOR_REFRESH_INTERVAL, createParticleStore, refreshColorsIfDue } from '../particles'
import type { Particle } from '../particles'
import { createScalarIntegrator, updateGlobalDrift } from '../physics'
import type { ForceIntegrator } from '../physics'
import { ensurePopulation } from '../population'
import { RESONANCE_INTERVAL, createResonanceCache, resolvePair } from '../resonance'
import type { ResonancePair } from '../resonance'
import { swarmKeywords } from '../vocabulary'
import type { SwarmEventBus, SwarmEvents } from './events'

// ============================================================================
// Constants
// ============================================================================

/** Rate the per-frame force constants are tuned for */
export const REFERENCE_FPS = 60

/** Largest step handed to the integrator, in reference frames */
export const MAX_FRAME_STEP = 4

const ORIGIN: Readonly<Vec3> = { x: 0, y: 0, z: 0 }

// ============================================================================
// Types
// ============================================================================

export type StepInfo = {
  /** Frame counter after the step */
  frame: number
  particleCount: number
  pairCount: number
}

export type SimulationOptions = {
  config: ConfigStore
  random?: RandomSource
  /** Defaults to the scalar integrator drawing from `random` */
  integrator?: ForceIntegrator
  resonanceInterval?: number
  /** Frames between particle colour refreshes */
  colorRefreshInterval?: number
  events?: SwarmEventBus
}

export type Simulation = {
  /** Advance one frame; `dt` is seconds of simulated time */
  step: (dt: number) => void

  pause: () => void
  resume: () => void
  togglePause: () => boolean
  isPaused: () => boolean

  /** Randomize every parameter that declares a randomize range or flag */
  randomizeAll: () => Array<string>
  randomizeModulatorTargets: () => void

  /** Trail fill colour: background RGB plus trailAlpha */
  backgroundRgba: () => [number, number, number, number]

  getParticles: () => ReadonlyArray<Particle>
  getResonancePairs: () => ReadonlyArray<ResonancePair>
  resolvePair: (pair: ResonancePair) => { a: Particle; b: Particle } | null
  getFrame: () => number
  getGlobalDrift: () => Readonly<Vec3>

  readonly config: ConfigStore
  readonly modulator: ParameterModulator
  readonly events: SwarmEventBus
  readonly step$: Subscription<StepInfo>
}

/**
 * Convert simulated seconds to reference frames for the integrator
 */
export function toReferenceFrames(dt: number): number {
  if (!Number.isFinite(dt) || dt <= 0) return 0
  return Math.min(MAX_FRAME_STEP, dt * REFERENCE_FPS)
}

// ============================================================================
// Factory
// ============================================================================

export function createSimulation({
  config,
  random = defaultRandom,
  integrator = createScalarIntegrator(random),
  resonanceInterval = RESONANCE_INTERVAL,
  colorRefreshInterval = COLOR_REFRESH_INTERVAL,
  events = createEventBus<SwarmEvents>({
    onError: (error, type) => console.error(`[Simulation] Subscriber for ${type} failed:`, error),
  }),
}: SimulationOptions): Simulation {
  const { events: eventNames } = swarmKeywords
  const store = createParticleStore()
  const drift = zero()
  const resonance = createResonanceCache(resonanceInterval)
  const modulator = createParameterModulator({ config, random })
  const step$ = createSubscription<StepInfo>()
  const colorInterval = Math.max(1, Math.floor(colorRefreshInterval))

  let frame = 0
  let paused = false

  const step = (dt: number) => {
    if (paused) return

    // same cap as the integrator, so a stalled tab cannot jump a sweep to its bound
    modulator.update(toReferenceFrames(dt) / REFERENCE_FPS, frame)
    const params = config.snapshot()

    const report = ensurePopulation(store, frame, params, ORIGIN, random)
    const total = store.particles.length
    if (report.culled > 0) {
      events.emit(eventNames.culled, { frame, count: report.culled, total })
    }
    if (report.spawned > 0) {
      events.emit(eventNames.spawned, { frame, count: report.spawned, total })
    }
    if (report.truncated > 0) {
      events.emit(eventNames.truncated, { frame, count: report.truncated, total })
    }

    updateGlobalDrift(drift, params.globalDriftStrength, params.globalDriftMomentum, random)
    refreshColorsIfDue(store, frame, params, colorInterval)
    integrator.advance(store.particles, toReferenceFrames(dt), drift, params)
    resonance.recomputeIfDue(frame, store.particles, params.maxResonanceDist, params.resonanceThreshold)

    frame += 1
    step$.notify({ frame, particleCount: store.particles.length, pairCount: resonance.pairs().length })
  }

  const pause = () => {
    if (paused) return
    paused = true
    console.log(`[Simulation] Paused at frame ${frame}`)
    events.emit(eventNames.paused, { frame })
  }

  const resume = () => {
    if (!paused) return
    paused = false
    console.log(`[Simulation] Resumed at frame ${frame}`)
    events.emit(eventNames.resumed, { frame })
  }

  const randomizeAll = () => {
    const values: Record<string, unknown> = {}
    for (const definition of config.definitions()) {
      if (definition.controlType === swarmKeywords.controlTypes.select) {
        if (definition.randomize) {
          values[definition.key] = pick(random, definition.options)?.value
        }
      } else if (
        definition.controlType === swarmKeywords.controlTypes.slider ||
        definition.controlType === swarmKeywords.controlTypes.hidden
      ) {
        if (definition.randomize) {
          values[definition.key] = uniform(random, definition.randomize.min, definition.randomize.max)
        }
      }
    }

    config.update(values)
    const keys = Object.keys(values)
    console.log(`[Simulation] Randomized ${keys.length} parameters`)
    events.emit(eventNames.randomized, { frame, keys })
    return keys
  }

  return {
    step,
    pause,
    resume,
    togglePause: () => {
      if (paused) resume()
      else pause()
      return paused
    },
    isPaused: () => paused,
    randomizeAll,
    randomizeModulatorTargets: () => modulator.randomizeTargets(),
    backgroundRgba: () => {
      const [r, g, b] = hexToRgb(config.get('backgroundColor'))
      return [r, g, b, config.get('trailAlpha')]
    },
    getParticles: () => store.particles,
    getResonancePairs: () => resonance.pairs(),
    resolvePair: (pair) => resolvePair(store.particles, pair),
    getFrame: () => frame,
    getGlobalDrift: () => drift,
    config,
    modulator,
    events,
    step$,
  }
}
