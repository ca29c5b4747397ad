/**
 * Create a subscription object with a payload
 * @param payload - The payload to subscribe to
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
      subscribers.forEach((callback) => callback(payload))
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
 *
 * Subscribers are notified after every write, including writes that leave
 * the value unchanged.
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
