/**
 * Frame Loop
 *
 * Drives one simulation step (and optionally one render pass) per frame.
 * Frames are requested from an injected FrameScheduler, so the loop works
 * headless under Node as well as on top of requestAnimationFrame.
 *
 * Philosophy:
 * - Generic context type, the loop knows nothing about particles
 * - beforeRender for state updates, afterRender for drawing
 * - Pausing is a flag checked between frames, never mid-frame
 * - A throwing hook is reported, the loop keeps going
 */

import { createTimerScheduler } from './frameScheduler'
import type { FrameScheduler } from './frameScheduler'

export type RenderLoopOptions<TContext> = {
  /**
   * Factory for the frame context, called once on first start
   */
  createContext: () => TContext

  /**
   * Called first on every frame. The swarm advances its simulation here.
   */
  beforeRender?: (context: TContext, timestamp: number, deltaMs: number) => void

  /**
   * Called after beforeRender on every frame
   */
  afterRender?: (context: TContext, timestamp: number, deltaMs: number) => void

  /**
   * Receives anything thrown by a hook. Without it errors go to console.error.
   */
  onError?: (error: Error) => void

  /**
   * Optional FPS cap. Frames arriving sooner than 1000 / targetFPS ms after
   * the last executed frame are skipped.
   */
  targetFPS?: number

  /**
   * Where frames come from. Defaults to a timer scheduler at targetFPS (or 60).
   */
  scheduler?: FrameScheduler
}

export type RenderLoopAPI<TContext = unknown> = {
  /** Start the loop. Calling it again while running does nothing. */
  start: () => void

  /** Stop the loop and forget the last timestamp */
  stop: () => void

  /** Stop requesting frames but keep the running state */
  pause: () => void

  /** Continue after pause; the first frame after resume has deltaMs = 0 */
  resume: () => void

  isRunning: () => boolean

  isPaused: () => boolean

  /** The context, or null before the first start */
  getContext: () => TContext | null
}

/**
 * Create a frame loop
 *
 * @example
 * ```typescript
 * const loop = createRenderLoop({
 *   createContext: () => ({ simulation }),
 *   beforeRender: ({ simulation }, _timestamp, deltaMs) => {
 *     simulation.step(deltaMs / 1000)
 *   },
 * })
 *
 * loop.start()
 * ```
 */
export function createRenderLoop<TContext>(
  options: RenderLoopOptions<TContext>,
): RenderLoopAPI<TContext> {
  const {
    createContext,
    beforeRender,
    afterRender,
    onError,
    targetFPS,
  } = options

  const scheduler = options.scheduler ?? createTimerScheduler(1000 / (targetFPS ?? 60))

  let running = false
  let paused = false
  let frameHandle: number | null = null
  let context: TContext | null = null
  let lastTimestamp = 0

  const frameInterval = targetFPS ? 1000 / targetFPS : 0

  const tick = (timestamp: number) => {
    if (!running || paused) return

    const deltaMs = lastTimestamp === 0 ? 0 : timestamp - lastTimestamp

    // Too early for the FPS cap: wait for the next frame
    if (frameInterval > 0 && lastTimestamp !== 0 && deltaMs < frameInterval) {
      frameHandle = scheduler.request(tick)
      return
    }

    lastTimestamp = timestamp

    try {
      if (context) {
        beforeRender?.(context, timestamp, deltaMs)
        afterRender?.(context, timestamp, deltaMs)
      }
    } catch (error) {
      if (onError) {
        onError(error instanceof Error ? error : new Error(String(error)))
      } else {
        console.error('[RenderLoop] Error in render loop:', error)
      }
    }

    frameHandle = scheduler.request(tick)
  }

  const cancelPending = () => {
    if (frameHandle !== null) {
      scheduler.cancel(frameHandle)
      frameHandle = null
    }
  }

  const start = () => {
    if (running) return

    if (!context) {
      context = createContext()
    }

    running = true
    paused = false
    lastTimestamp = 0

    frameHandle = scheduler.request(tick)
  }

  const stop = () => {
    running = false
    paused = false
    cancelPending()
    lastTimestamp = 0
  }

  const pause = () => {
    if (!running || paused) return

    paused = true
    cancelPending()
  }

  const resume = () => {
    if (!running || !paused) return

    paused = false
    lastTimestamp = 0

    frameHandle = scheduler.request(tick)
  }

  return {
    start,
    stop,
    pause,
    resume,
    isRunning: () => running,
    isPaused: () => paused,
    getContext: () => context,
  }
}
