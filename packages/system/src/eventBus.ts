/**
 * Type-Safe Event Bus
 *
 * Publishes discrete simulation events (particles spawned or culled, pause
 * toggled, parameters randomized) to loggers and UI layers. The event map is
 * a type parameter, so event payloads are inferred from the event name.
 *
 * Philosophy:
 * - No magic strings: event names come from a keywords object
 * - A throwing subscriber never breaks the emitter when onError is set
 */

// ============================================================================
// Types
// ============================================================================

export type EventMap = Record<string, unknown>

export type EventCallback<TEvent> = (event: TEvent) => void

export type AnyEventCallback<TEvents extends EventMap> = (
  type: keyof TEvents,
  event: TEvents[keyof TEvents],
) => void

export type Unsubscribe = () => void

export interface EventBusOptions {
  /**
   * Receives errors thrown by subscribers. Without it they are rethrown.
   */
  onError?: (error: unknown, type: string) => void
}

export interface EventBus<TEvents extends EventMap> {
  /** Subscribe to a single event type */
  on: <K extends keyof TEvents & string>(
    type: K,
    callback: EventCallback<TEvents[K]>,
  ) => Unsubscribe

  /** Subscribe to every event */
  onAny: (callback: AnyEventCallback<TEvents>) => Unsubscribe

  emit: <K extends keyof TEvents & string>(type: K, event: TEvents[K]) => void

  clear: () => void

  /** Number of active subscriptions */
  size: () => number
}

type SubscriptionTable<TEvents extends EventMap> = {
  [K in keyof TEvents]?: Set<EventCallback<TEvents[K]>>
}

// ============================================================================
// Event Bus Implementation
// ============================================================================

/**
 * Create an event bus for an event map.
 *
 * @example
 * ```ts
 * type SwarmEvents = { 'particles:spawned': { count: number; frame: number } }
 *
 * const bus = createEventBus<SwarmEvents>()
 * const unsub = bus.on('particles:spawned', (event) => {
 *   console.log(`[Swarm] +${event.count} at frame ${event.frame}`)
 * })
 * bus.emit('particles:spawned', { count: 3, frame: 120 })
 * unsub()
 * ```
 */
export function createEventBus<TEvents extends EventMap>(
  options: EventBusOptions = {},
): EventBus<TEvents> {
  let subscriptions: SubscriptionTable<TEvents> = {}
  let typedCount = 0
  // Bumped by clear() so stale unsubscribers become no-ops
  let generation = 0
  const anySubscriptions = new Set<AnyEventCallback<TEvents>>()

  const handleError =
    options.onError ??
    ((error: unknown) => {
      throw error
    })

  const guard = (type: string, invoke: () => void) => {
    try {
      invoke()
    } catch (error) {
      handleError(error, type)
    }
  }

  return {
    on(type, callback) {
      const existing = subscriptions[type]
      const callbacks = existing ?? new Set<EventCallback<TEvents[typeof type]>>()
      if (!existing) {
        subscriptions[type] = callbacks
      }
      if (!callbacks.has(callback)) {
        callbacks.add(callback)
        typedCount++
      }

      const subscribedGeneration = generation
      return () => {
        if (subscribedGeneration !== generation) return
        if (callbacks.delete(callback)) {
          typedCount--
        }
        if (callbacks.size === 0 && subscriptions[type] === callbacks) {
          delete subscriptions[type]
        }
      }
    },

    onAny(callback) {
      anySubscriptions.add(callback)
      return () => {
        anySubscriptions.delete(callback)
      }
    },

    emit(type, event) {
      subscriptions[type]?.forEach((callback) => guard(type, () => callback(event)))
      anySubscriptions.forEach((callback) => guard(type, () => callback(type, event)))
    },

    clear() {
      subscriptions = {}
      typedCount = 0
      generation++
      anySubscriptions.clear()
    },

    size() {
      return typedCount + anySubscriptions.size
    },
  }
}
