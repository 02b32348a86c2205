/**
 * Reactive state primitives
 *
 * Subscriptions fan a payload out to callbacks, atoms hold one value and
 * notify on change. Both are synchronous and framework-free.
 */

/**
 * Create a subscription object with a payload
 * @returns A subscription object
 */
export function createSubscription<TPayload>() {
  const subscribers = new Set<(payload: TPayload) => void>()

  return {
    subscribe: (callback: (payload: TPayload) => void): (() => void) => {
      subscribers.add(callback)
      return () => {
        subscribers.delete(callback)
      }
    },
    notify: (payload: TPayload) => {
      // copy so callbacks may unsubscribe while being notified
      Array.from(subscribers).forEach((callback) => callback(payload))
    },
    clear: () => {
      subscribers.clear()
    },
    size: () => {
      return subscribers.size
    },
  }
}

export type Subscription<TPayload> = ReturnType<
  typeof createSubscription<TPayload>
>

/**
 * Create a lightweight state atom with subscriptions
 */
export function createAtom<T>(initialState: T) {
  let state = initialState
  const stateSubscription = createSubscription<T>()

  const api = {
    get: () => state,
    update: (updater: (state: T) => T) => {
      state = updater(state)
      stateSubscription.notify(state)
    },
    set: (newState: T) => {
      state = newState
      stateSubscription.notify(state)
    },
    subscribe: (callback: (state: T) => void): (() => void) => {
      return stateSubscription.subscribe(callback)
    },
  }

  return api
}

export type Atom<T> = ReturnType<typeof createAtom<T>>

/**
 * Freeze a value and everything reachable from it. Typed arrays are left
 * as they are: they cannot be frozen while they hold elements.
 */
export const deepFreeze = <T>(value: T): T => {
  if (
    value !== null &&
    typeof value === 'object' &&
    !ArrayBuffer.isView(value) &&
    !Object.isFrozen(value)
  ) {
    Object.freeze(value)
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key))
    }
  }
  return value
}
