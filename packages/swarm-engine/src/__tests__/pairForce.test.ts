import { describe, expect, it } from 'vitest'
import {
  computePairCoefficients,
  createPairCoefficients,
  pairForceOn,
} from '../physics'
import { forceParams, makeParticle } from './fixtures'

describe('pairForceOn', () => {
  it('should push apart inside personal space and attract similar hues', () => {
    const a = makeParticle({ hue: 0 })
    const b = makeParticle({ x: 30, hue: 0 })

    const force = pairForceOn(a, b, forceParams({ attractionSimilarityThreshold: 0.9 }))

    // -0.5 * (50 - 30) / 30 per unit of delta, delta.x = 30
    expect(force.personalSpace.x).toBeCloseTo(-10, 12)
    // 0.005 * 1 / 900 per unit of delta
    expect(force.affinity.x).toBeCloseTo(30 * 0.005 / 900, 15)
    expect(force.total.x).toBeCloseTo(force.personalSpace.x + force.affinity.x, 12)
    expect(force.total.x).toBeCloseTo(-10 + 30 * 0.005 / 900, 12)
    // 0 * negative coefficient is -0
    expect(force.total.y).toBeCloseTo(0, 12)
    expect(force.total.z).toBeCloseTo(0, 12)
  })

  it('should be equal and opposite for the two particles of a pair', () => {
    const a = makeParticle({ x: 3, y: -7, z: 12, hue: 40 })
    const b = makeParticle({ x: -20, y: 15, z: 2, hue: 100 })
    const params = forceParams({ attractionSimilarityThreshold: 0.5 })

    const onA = pairForceOn(a, b, params).total
    const onB = pairForceOn(b, a, params).total

    expect(onA.x + onB.x).toBeCloseTo(0, 12)
    expect(onA.y + onB.y).toBeCloseTo(0, 12)
    expect(onA.z + onB.z).toBeCloseTo(0, 12)
  })

  it('should repel dissimilar hues outside personal space', () => {
    const a = makeParticle({ hue: 0 })
    const b = makeParticle({ x: 100, hue: 180 })

    const force = pairForceOn(a, b, forceParams())

    expect(force.personalSpace.x).toBe(0)
    // -0.005 * (1 - 0) / 10000 per unit of delta, delta.x = 100
    expect(force.affinity.x).toBeCloseTo(-5e-5, 15)
  })

  it('should repel when similarity equals the threshold exactly', () => {
    const a = makeParticle({ hue: 0 })
    const b = makeParticle({ x: 100, hue: 90 })

    const force = pairForceOn(a, b, forceParams({ attractionSimilarityThreshold: 0.5 }))

    expect(force.affinity.x).toBeCloseTo(100 * -0.005 * 0.5 / 10000, 15)
  })
})

describe('computePairCoefficients', () => {
  it('should skip coincident particles', () => {
    const out = createPairCoefficients()
    out.personalSpace = 3
    out.affinity = 4

    expect(computePairCoefficients(0, 0, 0, forceParams(), out)).toBe(false)
    expect(out).toEqual({ personalSpace: 0, affinity: 0 })
  })

  it('should have no personal-space term at or beyond the radius', () => {
    const out = createPairCoefficients()
    computePairCoefficients(50 * 50, 0, 0, forceParams(), out)
    expect(out.personalSpace).toBe(0)
  })
})
