/**
 * Swarm Schemas
 *
 * Zod schemas for the parameter table and for the typed parameter snapshot
 * the simulation reads on its hot path.
 *
 * Architecture:
 * 1. Parameter definitions - UI metadata per key (bounds, step, options), loaded from JSON
 * 2. SwarmParams - one typed field per key, the only shape the core ever reads
 */

import { z } from 'zod'
import { swarmKeywords } from './keywords'

const { controlTypes, compositeOperations, rgbShiftModes } = swarmKeywords

// ============================================================================
// Parameter Definitions
// ============================================================================

const definitionBase = {
  key: z.string(),
  label: z.string(),
  section: z.string(),
}

export const numericRangeSchema = z
  .object({ min: z.number(), max: z.number() })
  .refine((range) => range.min <= range.max, { message: 'min must not exceed max' })

export const numericDefinitionSchema = z.object({
  ...definitionBase,
  controlType: z.enum([controlTypes.slider, controlTypes.hidden]),
  min: z.number(),
  max: z.number(),
  step: z.number().positive(),
  precision: z.number().int().min(0),
  default: z.number(),
  randomize: numericRangeSchema.optional(),
})

export const selectOptionSchema = z.object({
  value: z.string(),
  label: z.string(),
})

export const selectDefinitionSchema = z.object({
  ...definitionBase,
  controlType: z.literal(controlTypes.select),
  options: z.array(selectOptionSchema).min(1),
  default: z.string(),
  randomize: z.boolean().optional(),
})

export const checkboxDefinitionSchema = z.object({
  ...definitionBase,
  controlType: z.literal(controlTypes.checkbox),
  default: z.boolean(),
})

export const colorDefinitionSchema = z.object({
  ...definitionBase,
  controlType: z.literal(controlTypes.color),
  default: z.string().regex(/^#([0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/),
})

export const parameterDefinitionSchema = z.discriminatedUnion('controlType', [
  numericDefinitionSchema,
  selectDefinitionSchema,
  checkboxDefinitionSchema,
  colorDefinitionSchema,
])

export const parameterTableSchema = z.object({
  definitions: z.array(parameterDefinitionSchema),
})

export type NumericDefinition = z.infer<typeof numericDefinitionSchema>
export type SelectDefinition = z.infer<typeof selectDefinitionSchema>
export type CheckboxDefinition = z.infer<typeof checkboxDefinitionSchema>
export type ColorDefinition = z.infer<typeof colorDefinitionSchema>
export type ParameterDefinition = z.infer<typeof parameterDefinitionSchema>
export type ParameterValue = ParameterDefinition['default']

// ============================================================================
// Typed Parameter Snapshot
// ============================================================================

export const compositeOperationSchema = z.enum([
  compositeOperations.sourceOver,
  compositeOperations.lighter,
  compositeOperations.difference,
  compositeOperations.multiply,
  compositeOperations.screen,
  compositeOperations.overlay,
  compositeOperations.hardLight,
])

export const rgbShiftModeSchema = z.enum([rgbShiftModes.add, rgbShiftModes.subtract])

/**
 * Every key of the parameter table with its value type.
 * Count parameters are integers; the rest are plain numbers.
 */
export const swarmParamsSchema = z.object({
  backgroundColor: z.string(),
  compositeOperation: compositeOperationSchema,

  maxLikCount: z.number().int().nonnegative(),
  minLikCount: z.number().int().nonnegative(),
  maxLikLifespan: z.number().positive(),
  universeRadius: z.number().positive(),

  attractionStrength: z.number(),
  attractionSimilarityThreshold: z.number(),
  repulsionStrength: z.number(),
  baseMigrationSpeed: z.number(),
  personalSpaceRadius: z.number(),
  personalSpaceRepulsion: z.number(),
  dampingMomentum: z.number(),

  globalDriftStrength: z.number(),
  globalDriftMomentum: z.number(),
  animationSpeed: z.number(),
  cameraMovementSpeed: z.number(),

  lineDrawSampleCount: z.number().int(),
  resonanceThickness: z.number(),
  maxLineThicknessChaos: z.number(),
  resonanceAlpha: z.number(),
  maxResonanceDist: z.number(),
  resonanceThreshold: z.number(),

  curveWiggleFactor: z.number(),
  pulsationSpeed: z.number(),
  lineTargetPull: z.number(),

  paletteSaturation: z.number(),
  paletteLightness: z.number(),

  renderLiks: z.boolean(),
  likBaseSize: z.number(),
  minLikRenderSize: z.number(),
  trailAlpha: z.number(),

  rgbShiftLiks: z.boolean(),
  rgbShiftLines: z.boolean(),
  rgbShiftAmount: z.number(),
  rgbShiftAngleDeg: z.number(),
  rgbShiftJitter: z.number(),
  rgbShiftMode: rgbShiftModeSchema,

  autoLoopEnabled: z.boolean(),
  autoLoopSpeed: z.number(),
  autoLoopLimes: z.number().min(0).max(0.5),
  autoLoopJitter: z.number(),
})

export type SwarmParams = z.infer<typeof swarmParamsSchema>
