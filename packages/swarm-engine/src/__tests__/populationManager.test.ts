import { describe, expect, it } from 'vitest'
import { createSeededRandom } from '../lib/random'
import { createParticleStore } from '../particles'
import { SPAWN_JITTER, ensurePopulation, spawnParticle } from '../population'
import type { PopulationParams } from '../population'
import { constantRandom } from './fixtures'

const origin = { x: 0, y: 0, z: 0 }

const populationParams = (overrides: Partial<PopulationParams> = {}): PopulationParams => ({
  minLikCount: 5,
  maxLikCount: 10,
  maxLikLifespan: 100,
  paletteSaturation: 50,
  paletteLightness: 50,
  ...overrides,
})

describe('spawnParticle', () => {
  it('should place new particles near the origin at rest', () => {
    const store = createParticleStore()
    const random = createSeededRandom(3)

    for (let i = 0; i < 20; i++) {
      spawnParticle(store, 12, populationParams(), { x: 100, y: -50, z: 0 }, random)
    }

    store.particles.forEach((particle, index) => {
      expect(particle.id).toBe(index)
      expect(particle.birthFrame).toBe(12)
      expect([particle.vx, particle.vy, particle.vz]).toEqual([0, 0, 0])
      expect(Math.abs(particle.x - 100)).toBeLessThanOrEqual(SPAWN_JITTER / 2)
      expect(Math.abs(particle.y + 50)).toBeLessThanOrEqual(SPAWN_JITTER / 2)
      expect(Math.abs(particle.z)).toBeLessThanOrEqual(SPAWN_JITTER / 2)
      expect(particle.lifespan).toBeGreaterThanOrEqual(50)
      expect(particle.lifespan).toBeLessThan(100)
      expect(particle.initialHue).toBeGreaterThanOrEqual(0)
      expect(particle.initialHue).toBeLessThan(360)
      expect(particle.hue).toBe(particle.initialHue)
    })
  })
})

describe('ensurePopulation', () => {
  it('should fill up to the minimum in one call', () => {
    const store = createParticleStore()

    const report = ensurePopulation(store, 0, populationParams(), origin, createSeededRandom(1))

    expect(store.particles).toHaveLength(5)
    expect(report).toEqual({ culled: 0, spawned: 5, truncated: 0 })
  })

  it('should spawn one particle with small probability between min and max', () => {
    const store = createParticleStore()
    ensurePopulation(store, 0, populationParams(), origin, constantRandom(0.5))

    const quiet = ensurePopulation(store, 1, populationParams(), origin, constantRandom(0.5))
    expect(quiet.spawned).toBe(0)
    expect(store.particles).toHaveLength(5)

    const lucky = ensurePopulation(store, 2, populationParams(), origin, constantRandom(0.01))
    expect(lucky.spawned).toBe(1)
    expect(store.particles).toHaveLength(6)
  })

  it('should cull particles whose age reached their lifespan', () => {
    const store = createParticleStore()
    const params = populationParams({ minLikCount: 0 })
    // random() = 0 gives lifespan = 100 * 0.5
    for (let i = 0; i < 3; i++) {
      spawnParticle(store, 0, params, origin, constantRandom(0))
    }

    const early = ensurePopulation(store, 49, params, origin, constantRandom(0.99))
    expect(early.culled).toBe(0)

    const report = ensurePopulation(store, 50, params, origin, constantRandom(0.99))
    expect(report).toEqual({ culled: 3, spawned: 0, truncated: 0 })
    expect(store.particles).toHaveLength(0)
  })

  it('should drop the newest particles above the maximum', () => {
    const store = createParticleStore()
    for (let i = 0; i < 12; i++) {
      spawnParticle(store, 0, populationParams(), origin, constantRandom(0))
    }

    const report = ensurePopulation(store, 1, populationParams(), origin, constantRandom(0))

    expect(report.truncated).toBe(2)
    expect(store.particles.map((particle) => particle.id)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9])
  })

  it('should let the maximum win when the minimum exceeds it', () => {
    const store = createParticleStore()
    const params = populationParams({ minLikCount: 20, maxLikCount: 10 })

    ensurePopulation(store, 0, params, origin, createSeededRandom(5))

    expect(store.particles).toHaveLength(10)
  })

  it('should stay within bounds over many frames', () => {
    const store = createParticleStore()
    const random = createSeededRandom(11)
    const params = populationParams({ maxLikLifespan: 100 })

    for (let frame = 0; frame < 500; frame++) {
      ensurePopulation(store, frame, params, origin, random)
      expect(store.particles.length).toBeGreaterThanOrEqual(5)
      expect(store.particles.length).toBeLessThanOrEqual(10)
    }
  })
})
