/**
 * @liks/swarm-engine
 *
 * Particle swarm simulation core: LIKs (colored particles) attract similar
 * hues, repel dissimilar ones, keep their personal space and drift together
 * inside a sphere. Close, similar pairs are reported as resonance lines.
 *
 * Philosophy:
 * - The core is pure state and numbers; drawing belongs to the host
 * - Parameters are data: one validated table, typed snapshots per frame
 * - Every random draw goes through an injected source
 */

export const PACKAGE_NAME = '@liks/swarm-engine'

// ============================================================================
// Vocabulary & Config
// ============================================================================

export * from './vocabulary'
export * from './config'

// ============================================================================
// Core
// ============================================================================

export * from './lib'
export * from './color/colorMath'
export * from './particles'
export * from './physics'
export * from './population'
export * from './resonance'
export * from './modulator'
export * from './simulation'

// ============================================================================
// System
// ============================================================================

export * from './resources'
export * from './system'
