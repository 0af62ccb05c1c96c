/**
 * Value normalisation at the config boundary.
 *
 * Whatever the UI or the modulator writes is coerced into the parameter's
 * domain here, so the simulation core only ever sees valid values.
 */

import { swarmKeywords } from '../vocabulary'
import type { NumericDefinition, ParameterDefinition, ParameterValue } from '../vocabulary'

const { controlTypes } = swarmKeywords

function decimalsOf(step: number): number {
  const fraction = String(step).split('.')[1]
  return fraction ? fraction.length : 0
}

export type SnapMode = 'nearest' | 'up' | 'down'

// tolerance for quotients like 24.999999999 that should read as 25
const GRID_EPSILON = 1e-9

const roundings: Record<SnapMode, (steps: number) => number> = {
  nearest: Math.round,
  up: (steps) => Math.ceil(steps - GRID_EPSILON),
  down: (steps) => Math.floor(steps + GRID_EPSILON),
}

/**
 * Snap onto the min + k * step grid of a numeric parameter, in the given
 * direction. The result is not clamped.
 */
export function snapToStep(definition: NumericDefinition, value: number, mode: SnapMode = 'nearest'): number {
  const { min, step, precision } = definition
  const snapped = min + roundings[mode]((value - min) / step) * step
  const decimals = Math.max(precision, decimalsOf(step))

  // toFixed drops the float noise that snapping leaves behind
  return Number(snapped.toFixed(decimals))
}

/**
 * Clamp to [min, max], then snap to the nearest min + k * step.
 * Non-numeric input falls back to the default.
 */
export function normalizeNumber(definition: NumericDefinition, value: unknown): number {
  const numeric = typeof value === 'number' ? value : Number(value)
  if (!Number.isFinite(numeric)) return definition.default

  const { min, max } = definition
  const clamped = Math.min(max, Math.max(min, numeric))
  return Math.min(max, snapToStep(definition, clamped))
}

export function normalizeValue(definition: ParameterDefinition, value: unknown): ParameterValue {
  switch (definition.controlType) {
    case controlTypes.checkbox:
      return Boolean(value)
    case controlTypes.color:
      return typeof value === 'string' ? value : definition.default
    case controlTypes.select: {
      const text = String(value)
      const known = definition.options.some((option) => option.value === text)
      return known ? text : definition.options[0].value
    }
    default:
      return normalizeNumber(definition, value)
  }
}
