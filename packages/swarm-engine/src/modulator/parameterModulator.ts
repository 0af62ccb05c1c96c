/**
 * Parameter Modulator (auto loop)
 *
 * Animates enabled parameters over time by writing into the config store:
 * - Range entries sweep numeric parameters back and forth inside bounds
 *   inset from the UI range by `autoLoopLimes` (rounded inwards to the
 *   parameter's step), with additive jitter
 * - Choice entries switch select parameters to another option at a
 *   speed-dependent frame interval
 *
 * The modulator reads `autoLoopEnabled`, `autoLoopSpeed` and `autoLoopJitter`
 * at every update; `autoLoopLimes` is read when an entry is created.
 */

import { snapToStep } from '../config'
import { centered, defaultRandom, pick, uniform } from '../lib/random'
import type { RandomSource } from '../lib/random'
import { LOOPABLE_KEYS, isLoopableKey, swarmKeywords } from '../vocabulary'
import type { LoopableKey, ParameterDefinition, ParameterValue, SwarmParams } from '../vocabulary'

// ============================================================================
// Constants
// ============================================================================

/** Choice entries never switch more often than this many frames */
export const MIN_CHOICE_INTERVAL = 10

/** Frames between switches at unit speed */
export const CHOICE_INTERVAL_BASE = 120

export const SPEED_MULTIPLIER_RANGE = { min: 0.5, max: 2 } as const

// ============================================================================
// Types
// ============================================================================

export type RangeEntry = {
  kind: typeof swarmKeywords.modulator.range
  key: LoopableKey
  /** Inset bounds */
  min: number
  max: number
  /** Width of the UI range, scales the jitter */
  span: number
  position: number
  direction: 1 | -1
  speedMultiplier: number
}

export type ChoiceEntry = {
  kind: typeof swarmKeywords.modulator.choice
  key: LoopableKey
  options: ReadonlyArray<string>
  lastSwitchFrame: number
  speedMultiplier: number
}

export type ModulatorEntry = RangeEntry | ChoiceEntry

/**
 * The slice of the config store the modulator needs
 */
export type ModulatedConfig = {
  getValue: (key: string) => ParameterValue
  setValue: (key: string, value: unknown) => void
  getDefinition: (key: string) => ParameterDefinition
  snapshot: () => Readonly<
    Pick<SwarmParams, 'autoLoopEnabled' | 'autoLoopSpeed' | 'autoLoopLimes' | 'autoLoopJitter'>
  >
}

export type EnableOptions = {
  /** Frame the entry starts counting from (defaults to the last updated frame) */
  frame?: number
  /** Fixed speed multiplier instead of a random one */
  speedMultiplier?: number
}

export type ParameterModulator = {
  enable: (key: string, options?: EnableOptions) => ModulatorEntry
  disable: (key: string) => void
  /** Returns the new enabled state */
  toggle: (key: string) => boolean
  isEnabled: (key: string) => boolean
  getEntry: (key: string) => ModulatorEntry | undefined
  /** Enabled flag for every loopable key */
  stateSnapshot: () => Map<LoopableKey, boolean>
  /** Re-create every enabled entry with a new phase and speed */
  randomizeTargets: () => void
  /** Advance all entries. `dt` is seconds of simulated time. */
  update: (dt: number, frame: number) => void
}

export type ModulatorOptions = {
  config: ModulatedConfig
  random?: RandomSource
}

// ============================================================================
// Entry Construction
// ============================================================================

const requireLoopable = (key: string): LoopableKey => {
  if (!isLoopableKey(key)) {
    throw new Error(`[Modulator] Parameter is not loopable: ${key}`)
  }
  return key
}

function createEntry(
  key: LoopableKey,
  definition: ParameterDefinition,
  limes: number,
  frame: number,
  random: RandomSource,
  speedMultiplier: number | undefined,
): ModulatorEntry {
  const { controlTypes } = swarmKeywords
  if (definition.controlType === controlTypes.select) {
    return {
      kind: swarmKeywords.modulator.choice,
      key,
      options: definition.options.map((option) => option.value),
      lastSwitchFrame: frame,
      speedMultiplier:
        speedMultiplier ?? uniform(random, SPEED_MULTIPLIER_RANGE.min, SPEED_MULTIPLIER_RANGE.max),
    }
  }

  if (definition.controlType === controlTypes.slider || definition.controlType === controlTypes.hidden) {
    // bounds sit on the step grid so every written value survives normalisation
    const span = definition.max - definition.min
    let min = snapToStep(definition, definition.min + span * limes, 'up')
    let max = snapToStep(definition, definition.max - span * limes, 'down')
    if (max < min) {
      min = snapToStep(definition, (min + max) / 2)
      max = min
    }
    return {
      kind: swarmKeywords.modulator.range,
      key,
      min,
      max,
      span,
      position: uniform(random, min, max),
      direction: random() < 0.5 ? -1 : 1,
      speedMultiplier:
        speedMultiplier ?? uniform(random, SPEED_MULTIPLIER_RANGE.min, SPEED_MULTIPLIER_RANGE.max),
    }
  }

  throw new Error(`[Modulator] Parameter is not loopable: ${key}`)
}

// ============================================================================
// Entry Stepping
// ============================================================================

function stepRange(entry: RangeEntry, dt: number, speed: number, jitter: number, random: RandomSource): number {
  if (entry.max - entry.min <= 0) {
    entry.position = entry.min
    return entry.min
  }

  entry.position += entry.direction * speed * entry.speedMultiplier * dt
  if (entry.position > entry.max) {
    entry.position = entry.max
    entry.direction = -1
  } else if (entry.position < entry.min) {
    entry.position = entry.min
    entry.direction = 1
  }

  const value = entry.position + centered(random) * entry.span * jitter
  return Math.min(entry.max, Math.max(entry.min, value))
}

/** Frames between switches; Infinity when the speed is zero */
export function choiceInterval(speed: number, speedMultiplier: number): number {
  return Math.max(MIN_CHOICE_INTERVAL, CHOICE_INTERVAL_BASE / (speed * speedMultiplier))
}

function nextChoice(entry: ChoiceEntry, current: ParameterValue, random: RandomSource): string | undefined {
  const others = entry.options.filter((option) => option !== current)
  return pick(random, others.length > 0 ? others : entry.options)
}

// ============================================================================
// Factory
// ============================================================================

export function createParameterModulator({
  config,
  random = defaultRandom,
}: ModulatorOptions): ParameterModulator {
  const entries = new Map<LoopableKey, ModulatorEntry>()
  let lastFrame = 0

  const build = (key: LoopableKey, frame: number, speedMultiplier?: number) =>
    createEntry(
      key,
      config.getDefinition(key),
      config.snapshot().autoLoopLimes,
      frame,
      random,
      speedMultiplier,
    )

  const enable = (key: string, options: EnableOptions = {}): ModulatorEntry => {
    const loopable = requireLoopable(key)
    const existing = entries.get(loopable)
    if (existing) return existing

    const entry = build(loopable, options.frame ?? lastFrame, options.speedMultiplier)
    entries.set(loopable, entry)
    return entry
  }

  const disable = (key: string) => {
    entries.delete(requireLoopable(key))
  }

  const isEnabled = (key: string) => isLoopableKey(key) && entries.has(key)

  const update = (dt: number, frame: number) => {
    lastFrame = frame
    const settings = config.snapshot()
    if (!settings.autoLoopEnabled) return

    for (const entry of entries.values()) {
      if (entry.kind === swarmKeywords.modulator.choice) {
        const interval = choiceInterval(settings.autoLoopSpeed, entry.speedMultiplier)
        if (frame - entry.lastSwitchFrame <= interval) continue

        const next = nextChoice(entry, config.getValue(entry.key), random)
        if (next !== undefined) {
          config.setValue(entry.key, next)
        }
        entry.lastSwitchFrame = frame
        continue
      }

      config.setValue(
        entry.key,
        stepRange(entry, dt, settings.autoLoopSpeed, settings.autoLoopJitter, random),
      )
    }
  }

  return {
    enable,
    disable,
    toggle: (key) => {
      if (isEnabled(key)) {
        disable(key)
        return false
      }
      enable(key)
      return true
    },
    isEnabled,
    getEntry: (key) => (isLoopableKey(key) ? entries.get(key) : undefined),
    stateSnapshot: () => new Map(LOOPABLE_KEYS.map((key): [LoopableKey, boolean] => [key, entries.has(key)])),
    randomizeTargets: () => {
      for (const key of [...entries.keys()]) {
        entries.set(key, build(key, lastFrame))
      }
    },
    update,
  }
}

