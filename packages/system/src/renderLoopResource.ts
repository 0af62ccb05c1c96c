/**
 * Render Loop Resource
 *
 * createRenderLoop wrapped in a braided resource: the loop starts with the
 * system and stops when the system halts.
 */

import { defineResource } from 'braided'
import { createRenderLoop } from './renderLoop'
import type { RenderLoopAPI, RenderLoopOptions } from './renderLoop'

/**
 * Create a braided resource for a loop whose options do not depend on other resources
 *
 * @example
 * ```typescript
 * const heartbeat = createRenderLoopResource({
 *   createContext: () => ({ frames: 0 }),
 *   beforeRender: (context) => {
 *     context.frames++
 *   },
 * })
 * ```
 */
export function createRenderLoopResource<TContext>(
  options: RenderLoopOptions<TContext>,
) {
  return defineResource({
    start: () => startRenderLoop(options),
    halt: (loop: RenderLoopAPI<TContext>) => {
      loop.stop()
    },
  })
}

/**
 * Create and start a loop. Resources with dependencies call this from their
 * own start function once the dependencies are available.
 */
export function startRenderLoop<TContext>(
  options: RenderLoopOptions<TContext>,
): RenderLoopAPI<TContext> {
  const loop = createRenderLoop(options)
  loop.start()
  return loop
}
