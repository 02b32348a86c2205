/**
 * State Holder
 *
 * Owns one renderer's snapshot. Snapshots are replaced wholesale and
 * deep-frozen on publish, so a reference handed to `draw` never changes
 * under it. A holder bound to an upstream source keeps exactly one live
 * subscription.
 */

import { createAtom, deepFreeze } from '@lumenwall/system'

/**
 * Upstream feed: called with a listener, returns the unsubscribe.
 * `SharedStream.subscribe` fits this shape.
 */
export type SnapshotSource<TValue> = (listener: (value: TValue) => void) => () => void

export function createStateHolder<TState>() {
  const snapshot = createAtom<TState | null>(null)
  let unsubscribe: (() => void) | null = null

  const release = () => {
    if (unsubscribe) {
      const dispose = unsubscribe
      unsubscribe = null
      dispose()
    }
  }

  return {
    get: () => snapshot.get(),
    publish: (next: TState) => {
      snapshot.set(deepFreeze(next))
    },
    /** Replace any existing subscription with one on `source` */
    bind: <TValue>(source: SnapshotSource<TValue>, onValue: (value: TValue) => void) => {
      release()
      unsubscribe = source(onValue)
    },
    isBound: () => unsubscribe !== null,
    /** Called with every published snapshot */
    subscribe: (callback: (state: TState | null) => void) => snapshot.subscribe(callback),
    /** Drop the subscription and the snapshot */
    dispose: () => {
      release()
      snapshot.set(null)
    },
  }
}

export type StateHolder<TState> = ReturnType<typeof createStateHolder<TState>>
