/**
 * Loop Resource
 *
 * Steps the simulation once per frame with wall-clock delta scaled by
 * animationSpeed. Rendering, when present, hooks in through afterRender.
 *
 * Dependency Graph:
 *   config, simulation
 *     ↓
 *   loop ← simulation, config
 */

import { defineResource } from 'braided'
import { startRenderLoop } from '@liks/system'
import type { FrameScheduler, RenderLoopAPI } from '@liks/system'
import type { ConfigResource } from './configResource'
import type { SimulationResource } from './simulationResource'

export type SwarmFrameContext = {
  simulation: SimulationResource
  config: ConfigResource
}

export type LoopResource = RenderLoopAPI<SwarmFrameContext>

export type LoopResourceOptions = {
  targetFPS?: number
  scheduler?: FrameScheduler
  /** Drawing pass, called after the simulation step */
  render?: (context: SwarmFrameContext, timestamp: number, deltaMs: number) => void
}

export const createLoopResource = (options: LoopResourceOptions = {}) =>
  defineResource({
    dependencies: ['simulation', 'config'],
    start: ({ simulation, config }: SwarmFrameContext) =>
      startRenderLoop<SwarmFrameContext>({
        createContext: () => ({ simulation, config }),
        beforeRender: (context, _timestamp, deltaMs) => {
          context.simulation.step((deltaMs / 1000) * context.config.get('animationSpeed'))
        },
        afterRender: options.render,
        onError: (error) => {
          console.error('[SwarmLoop] Frame failed:', error)
        },
        targetFPS: options.targetFPS,
        scheduler: options.scheduler,
      }),
    halt: (loop: LoopResource) => {
      loop.stop()
    },
  })
