/**
 * @liks/system
 *
 * Runtime plumbing for the swarm: frame loop, observable state and a typed
 * event bus. Nothing in here knows about particles.
 *
 * @example
 * ```ts
 * import { createAtom, createEventBus, createRenderLoop } from '@liks/system'
 *
 * const frame = createAtom(0)
 * const loop = createRenderLoop({
 *   createContext: () => ({ frame }),
 *   beforeRender: (ctx) => ctx.frame.update((n) => n + 1),
 * })
 * loop.start()
 * ```
 */

// ============================================================================
// State Management
// ============================================================================

export * from './state'

// ============================================================================
// Event Bus
// ============================================================================

export * from './eventBus'

// ============================================================================
// Frame Loop
// ============================================================================

export * from './frameScheduler'
export * from './renderLoop'
export * from './renderLoopResource'
