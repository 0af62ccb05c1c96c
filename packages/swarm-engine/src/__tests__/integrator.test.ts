import { describe, expect, it } from 'vitest'
import { createSeededRandom } from '../lib/random'
import { length, zero } from '../lib/vector'
import type { Particle } from '../particles'
import {
  containWithinSphere,
  createBatchedIntegrator,
  createIntegrator,
  createScalarIntegrator,
  updateGlobalDrift,
} from '../physics'
import { constantRandom, forceParams, makeParticle } from './fixtures'

const scatter = (count: number, seed: number): Array<Particle> => {
  const random = createSeededRandom(seed)
  return Array.from({ length: count }, (_, id) =>
    makeParticle({
      id,
      x: (random() - 0.5) * 300,
      y: (random() - 0.5) * 300,
      z: (random() - 0.5) * 300,
      hue: random() * 360,
    }),
  )
}

describe('containWithinSphere', () => {
  it('should rescale positions outside the sphere onto its surface', () => {
    const particle = makeParticle({ x: 600, y: 800 })
    containWithinSphere(particle, 500)
    expect(particle.x).toBeCloseTo(300, 10)
    expect(particle.y).toBeCloseTo(400, 10)
    expect(particle.z).toBe(0)
  })

  it('should leave positions inside the sphere alone', () => {
    const particle = makeParticle({ x: 10, y: 20, z: 30 })
    containWithinSphere(particle, 500)
    expect([particle.x, particle.y, particle.z]).toEqual([10, 20, 30])
  })
})

describe('scalar integrator', () => {
  it('should clamp a particle leaving the universe back onto the boundary', () => {
    const particle = makeParticle({ x: 990, vx: 50 })
    const integrator = createScalarIntegrator(constantRandom(0.5))

    integrator.advance([particle], 1, zero(), forceParams())

    expect(particle.vx).toBeCloseTo(49, 12)
    expect(length(particle)).toBeCloseTo(1000, 9)
    expect(particle.x).toBeCloseTo(1000, 9)
  })

  it('should damp velocity and move by it', () => {
    const particle = makeParticle({ vx: 1, vy: 2, vz: 3 })
    const integrator = createScalarIntegrator(constantRandom(0.5))

    integrator.advance([particle], 1, zero(), forceParams())

    expect(particle.vx).toBeCloseTo(0.98, 12)
    expect(particle.vy).toBeCloseTo(1.96, 12)
    expect(particle.vz).toBeCloseTo(2.94, 12)
    expect(particle.x).toBeCloseTo(0.98, 12)
    expect(particle.z).toBeCloseTo(2.94, 12)
  })

  it('should add the shared drift to every particle', () => {
    const particles = [makeParticle({ id: 0 }), makeParticle({ id: 1, x: 900 })]
    const integrator = createScalarIntegrator(constantRandom(0.5))
    const params = forceParams({ attractionStrength: 0, repulsionStrength: 0 })

    integrator.advance(particles, 1, { x: 1, y: 0, z: 0 }, params)

    expect(particles[0].vx).toBeCloseTo(0.98, 12)
    expect(particles[1].vx).toBeCloseTo(0.98, 12)
  })

  it('should conserve momentum without noise or drift', () => {
    const particles = scatter(12, 7)
    createScalarIntegrator(constantRandom(0.5)).advance(particles, 1, zero(), forceParams())

    const total = particles.reduce(
      (sum, particle) => ({
        x: sum.x + particle.vx,
        y: sum.y + particle.vy,
        z: sum.z + particle.vz,
      }),
      zero(),
    )
    expect(total.x).toBeCloseTo(0, 9)
    expect(total.y).toBeCloseTo(0, 9)
    expect(total.z).toBeCloseTo(0, 9)
  })

  it('should do nothing for an empty population', () => {
    const particles: Array<Particle> = []
    createScalarIntegrator().advance(particles, 1, zero(), forceParams())
    expect(particles).toEqual([])
  })
})

describe('batched integrator', () => {
  it('should agree with the scalar integrator', () => {
    const scalarParticles = scatter(24, 42)
    const batchedParticles = scatter(24, 42)
    const params = forceParams({ baseMigrationSpeed: 0.01 })
    const drift = { x: 0.02, y: -0.01, z: 0.005 }

    const scalar = createScalarIntegrator(createSeededRandom(9))
    const batched = createBatchedIntegrator(createSeededRandom(9))

    for (let step = 0; step < 3; step++) {
      scalar.advance(scalarParticles, 1, drift, params)
      batched.advance(batchedParticles, 1, drift, params)
    }

    scalarParticles.forEach((expected, index) => {
      const actual = batchedParticles[index]
      expect(actual.x).toBeCloseTo(expected.x, 6)
      expect(actual.y).toBeCloseTo(expected.y, 6)
      expect(actual.z).toBeCloseTo(expected.z, 6)
      expect(actual.vx).toBeCloseTo(expected.vx, 6)
    })
  })

  it('should handle a population that grows between calls', () => {
    const integrator = createBatchedIntegrator(constantRandom(0.5))
    integrator.advance(scatter(3, 1), 1, zero(), forceParams())

    const larger = scatter(100, 2)
    integrator.advance(larger, 1, zero(), forceParams())

    expect(larger.every((particle) => Number.isFinite(particle.x))).toBe(true)
  })
})

describe('createIntegrator', () => {
  it('should select a strategy by name', () => {
    expect(createIntegrator('scalar').strategy).toBe('scalar')
    expect(createIntegrator('batched').strategy).toBe('batched')
  })
})

describe('updateGlobalDrift', () => {
  it('should decay by momentum and add centred noise', () => {
    const drift = { x: 1, y: 2, z: 3 }
    updateGlobalDrift(drift, 0.1, 0.5, constantRandom(1))

    // centred noise at random() = 1 is 0.5, scaled by 0.1
    expect(drift.x).toBeCloseTo(0.55, 12)
    expect(drift.y).toBeCloseTo(1.05, 12)
    expect(drift.z).toBeCloseTo(1.55, 12)
  })
})
