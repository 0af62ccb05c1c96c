/**
 * Observable State
 *
 * Subscriptions and atoms for values that change once per frame or on user input.
 * No framework bindings: renderers and UI layers subscribe directly.
 */

export type Listener<TPayload> = (payload: TPayload) => void

/**
 * Create a subscription channel for a payload type
 */
export function createSubscription<TPayload>() {
  const subscribers = new Set<Listener<TPayload>>()

  return {
    subscribe: (callback: Listener<TPayload>): (() => void) => {
      subscribers.add(callback)
      return () => {
        subscribers.delete(callback)
      }
    },
    notify: (payload: TPayload) => {
      subscribers.forEach((callback) => callback(payload))
    },
    clear: () => {
      subscribers.clear()
    },
    size: () => subscribers.size,
  }
}

export type Subscription<TPayload> = ReturnType<
  typeof createSubscription<TPayload>
>

/**
 * Create a state atom. Every write notifies subscribers with the new state.
 */
export function createAtom<T>(initialState: T) {
  let state = initialState
  const stateSubscription = createSubscription<T>()

  return {
    get: () => state,
    update: (updater: (state: T) => T) => {
      state = updater(state)
      stateSubscription.notify(state)
    },
    set: (newState: T) => {
      state = newState
      stateSubscription.notify(state)
    },
    mutate: (mutator: (state: T) => void) => {
      mutator(state)
      stateSubscription.notify(state)
    },
    subscribe: (callback: Listener<T>): (() => void) =>
      stateSubscription.subscribe(callback),
  }
}

export type Atom<T> = ReturnType<typeof createAtom<T>>
