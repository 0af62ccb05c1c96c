import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { FrameCallback, FrameScheduler } from '@liks/system'
import { createSeededRandom } from '../lib/random'
import { createSwarmSystemConfig, haltSwarmSystem, startSwarmSystem } from '../system'

const createManualScheduler = () => {
  let pending: FrameCallback | null = null
  let timestamp = 0
  const scheduler: FrameScheduler = {
    request: (callback) => {
      pending = callback
      return 1
    },
    cancel: () => {
      pending = null
    },
  }
  const frame = (deltaMs: number) => {
    const callback = pending
    pending = null
    timestamp += deltaMs
    callback?.(timestamp)
  }
  return { scheduler, frame, hasPending: () => pending !== null }
}

describe('swarm system', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should start config, simulation and loop and step on every frame', async () => {
    const manual = createManualScheduler()
    const systemConfig = createSwarmSystemConfig({
      config: { initial: { minLikCount: 20, maxLikCount: 40, animationSpeed: 2 } },
      simulation: { random: createSeededRandom(21) },
      loop: { scheduler: manual.scheduler },
    })

    const system = await startSwarmSystem(systemConfig)
    expect(system.loop.isRunning()).toBe(true)
    expect(system.simulation.config).toBe(system.config)

    const steps: Array<number> = []
    system.simulation.step$.subscribe((info) => steps.push(info.frame))

    manual.frame(16)
    manual.frame(16)
    manual.frame(16)

    expect(steps).toEqual([1, 2, 3])
    // min is reached on the first frame; later frames may add one each
    expect(system.simulation.getParticles().length).toBeGreaterThanOrEqual(20)
    expect(system.simulation.getParticles().length).toBeLessThanOrEqual(22)

    await haltSwarmSystem(system, systemConfig)
    expect(system.loop.isRunning()).toBe(false)
    expect(system.simulation.isPaused()).toBe(true)
    expect(manual.hasPending()).toBe(false)
  })

  it('should scale frame time by animationSpeed', async () => {
    const manual = createManualScheduler()
    const systemConfig = createSwarmSystemConfig({
      config: { initial: { animationSpeed: 2 } },
      simulation: { random: createSeededRandom(22) },
      loop: { scheduler: manual.scheduler },
    })
    const system = await startSwarmSystem(systemConfig)
    const step = vi.spyOn(system.simulation, 'step')

    manual.frame(10)
    manual.frame(25)

    expect(step).toHaveBeenNthCalledWith(1, 0)
    expect(step).toHaveBeenNthCalledWith(2, 0.05)

    await haltSwarmSystem(system, systemConfig)
  })
})
