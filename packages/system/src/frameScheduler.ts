/**
 * Frame Scheduler
 *
 * The render loop asks for "the next frame" through this interface instead of
 * calling requestAnimationFrame directly, so the same loop drives a browser
 * canvas, a headless Node process or a test with a hand-cranked clock.
 */

export type FrameCallback = (timestamp: number) => void

export type FrameScheduler = {
  request: (callback: FrameCallback) => number
  cancel: (handle: number) => void
}

/**
 * Timer-backed scheduler for hosts without requestAnimationFrame.
 * Timestamps come from performance.now(), like rAF timestamps.
 */
export function createTimerScheduler(intervalMs = 1000 / 60): FrameScheduler {
  let nextHandle = 0
  const timers = new Map<number, ReturnType<typeof setTimeout>>()

  return {
    request: (callback) => {
      const handle = ++nextHandle
      const timer = setTimeout(() => {
        timers.delete(handle)
        callback(performance.now())
      }, intervalMs)
      timers.set(handle, timer)
      return handle
    },
    cancel: (handle) => {
      const timer = timers.get(handle)
      if (timer !== undefined) {
        clearTimeout(timer)
        timers.delete(handle)
      }
    },
  }
}
