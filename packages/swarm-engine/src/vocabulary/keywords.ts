/**
 * Swarm Keywords
 *
 * Single source of truth for parameter keys, control types and event names.
 *
 * Philosophy:
 * - No magic strings anywhere in the codebase
 * - The parameter table (parameters.json) and the typed snapshot both use these keys
 */

export const swarmKeywords = {
  /**
   * Parameter keys, grouped the way the control panel groups them
   */
  parameters: {
    // Canvas
    backgroundColor: 'backgroundColor',
    compositeOperation: 'compositeOperation',
    // Field geometry
    maxLikCount: 'maxLikCount',
    minLikCount: 'minLikCount',
    maxLikLifespan: 'maxLikLifespan',
    universeRadius: 'universeRadius',
    // Swarm behaviour
    attractionStrength: 'attractionStrength',
    attractionSimilarityThreshold: 'attractionSimilarityThreshold',
    repulsionStrength: 'repulsionStrength',
    baseMigrationSpeed: 'baseMigrationSpeed',
    personalSpaceRadius: 'personalSpaceRadius',
    personalSpaceRepulsion: 'personalSpaceRepulsion',
    dampingMomentum: 'dampingMomentum',
    // Interaction
    globalDriftStrength: 'globalDriftStrength',
    globalDriftMomentum: 'globalDriftMomentum',
    animationSpeed: 'animationSpeed',
    cameraMovementSpeed: 'cameraMovementSpeed',
    // Resonance lines
    lineDrawSampleCount: 'lineDrawSampleCount',
    resonanceThickness: 'resonanceThickness',
    maxLineThicknessChaos: 'maxLineThicknessChaos',
    resonanceAlpha: 'resonanceAlpha',
    maxResonanceDist: 'maxResonanceDist',
    resonanceThreshold: 'resonanceThreshold',
    // Line distortion
    curveWiggleFactor: 'curveWiggleFactor',
    pulsationSpeed: 'pulsationSpeed',
    lineTargetPull: 'lineTargetPull',
    // Field colour
    paletteSaturation: 'paletteSaturation',
    paletteLightness: 'paletteLightness',
    // LIK rendering
    renderLiks: 'renderLiks',
    likBaseSize: 'likBaseSize',
    minLikRenderSize: 'minLikRenderSize',
    trailAlpha: 'trailAlpha',
    // RGB shift
    rgbShiftLiks: 'rgbShiftLiks',
    rgbShiftLines: 'rgbShiftLines',
    rgbShiftAmount: 'rgbShiftAmount',
    rgbShiftAngleDeg: 'rgbShiftAngleDeg',
    rgbShiftJitter: 'rgbShiftJitter',
    rgbShiftMode: 'rgbShiftMode',
    // Auto loop
    autoLoopEnabled: 'autoLoopEnabled',
    autoLoopSpeed: 'autoLoopSpeed',
    autoLoopLimes: 'autoLoopLimes',
    autoLoopJitter: 'autoLoopJitter',
  },

  /**
   * Control types of the parameter table
   */
  controlTypes: {
    slider: 'slider',
    hidden: 'hidden',
    select: 'select',
    checkbox: 'checkbox',
    color: 'color',
  },

  compositeOperations: {
    sourceOver: 'source-over',
    lighter: 'lighter',
    difference: 'difference',
    multiply: 'multiply',
    screen: 'screen',
    overlay: 'overlay',
    hardLight: 'hard-light',
  },

  rgbShiftModes: {
    add: 'add',
    subtract: 'subtract',
  },

  /**
   * Modulator entry variants
   */
  modulator: {
    range: 'range',
    choice: 'choice',
  },

  /**
   * Simulation events published on the swarm event bus
   */
  events: {
    spawned: 'particles:spawned',
    culled: 'particles:culled',
    truncated: 'particles:truncated',
    paused: 'simulation:paused',
    resumed: 'simulation:resumed',
    randomized: 'simulation:randomized',
  },
} as const

export type ParameterKey = (typeof swarmKeywords.parameters)[keyof typeof swarmKeywords.parameters]
export type ControlType = (typeof swarmKeywords.controlTypes)[keyof typeof swarmKeywords.controlTypes]
export type CompositeOperation =
  (typeof swarmKeywords.compositeOperations)[keyof typeof swarmKeywords.compositeOperations]
export type RgbShiftMode = (typeof swarmKeywords.rgbShiftModes)[keyof typeof swarmKeywords.rgbShiftModes]

const p = swarmKeywords.parameters

/**
 * Parameters the modulator may animate
 */
export const LOOPABLE_KEYS = [
  p.maxLikCount,
  p.minLikCount,
  p.maxLikLifespan,
  p.attractionStrength,
  p.attractionSimilarityThreshold,
  p.repulsionStrength,
  p.baseMigrationSpeed,
  p.cameraMovementSpeed,
  p.universeRadius,
  p.personalSpaceRadius,
  p.personalSpaceRepulsion,
  p.globalDriftStrength,
  p.globalDriftMomentum,
  p.lineDrawSampleCount,
  p.resonanceThickness,
  p.maxLineThicknessChaos,
  p.resonanceAlpha,
  p.maxResonanceDist,
  p.curveWiggleFactor,
  p.pulsationSpeed,
  p.lineTargetPull,
  p.likBaseSize,
  p.minLikRenderSize,
  p.trailAlpha,
  p.rgbShiftAmount,
  p.rgbShiftAngleDeg,
  p.rgbShiftJitter,
  p.animationSpeed,
  p.paletteSaturation,
  p.paletteLightness,
  p.compositeOperation,
] as const satisfies ReadonlyArray<ParameterKey>

export type LoopableKey = (typeof LOOPABLE_KEYS)[number]

export function isLoopableKey(key: string): key is LoopableKey {
  return LOOPABLE_KEYS.some((loopable) => loopable === key)
}

const PARAMETER_KEYS: ReadonlyArray<ParameterKey> = Object.values(swarmKeywords.parameters)

export function isParameterKey(key: string): key is ParameterKey {
  return PARAMETER_KEYS.some((parameterKey) => parameterKey === key)
}
