/**
 * Observable State Tests
 */

import { describe, expect, it, vi } from 'vitest'
import { createAtom, createSubscription } from '@liks/system'

describe('createSubscription', () => {
  it('should notify subscribers until they unsubscribe', () => {
    const subscription = createSubscription<number>()
    const listener = vi.fn()

    const unsubscribe = subscription.subscribe(listener)
    subscription.notify(1)
    unsubscribe()
    subscription.notify(2)

    expect(listener).toHaveBeenCalledTimes(1)
    expect(listener).toHaveBeenCalledWith(1)
    expect(subscription.size()).toBe(0)
  })
})

describe('createAtom', () => {
  it('should set, update and mutate with notifications', () => {
    const atom = createAtom({ frame: 0, paused: false })
    const listener = vi.fn()
    atom.subscribe(listener)

    atom.set({ frame: 1, paused: false })
    atom.update((state) => ({ ...state, frame: state.frame + 1 }))
    atom.mutate((state) => {
      state.paused = true
    })

    expect(atom.get()).toEqual({ frame: 2, paused: true })
    expect(listener).toHaveBeenCalledTimes(3)
  })
})
