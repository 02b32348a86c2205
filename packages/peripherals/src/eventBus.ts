/**
 * Peripheral Event Bus
 *
 * Typed pub/sub for input events coming from physical and virtual
 * peripherals. Every bus owns its state store, playlist manager and
 * virtual peripheral registry, so two buses never share state.
 *
 * Philosophy:
 * - Higher priority handlers run first, ties in subscription order
 * - Wildcard handlers interleave with typed handlers by priority
 * - A failing handler never stops the others; failures are reported
 * - Handlers see the event before the state store records it
 */

import { createThrottledLog, toError } from '@lumenwall/system'
import type { BusScheduler } from '@lumenwall/system'
import { createInputEvent } from './input'
import type { EventDescriptor, InputEvent, ProducerId } from './input'
import { createStateStore } from './stateStore'
import type { StateStore } from './stateStore'
import { createPlaylistManager } from './playlists'
import type { EventPlaylistManager } from './playlists'
import { createVirtualPeripheralManager } from './virtualPeripherals'
import type { VirtualPeripheralManager } from './virtualPeripherals'

// ============================================================================
// Types
// ============================================================================

export type EventHandler<TData = unknown> = (event: InputEvent<TData>) => void

/**
 * Unsubscribe function
 */
export type Unsubscribe = () => void

export type SubscribeOptions = {
  /** Higher runs earlier (default 0) */
  priority?: number
}

export type SubscriptionHandle = {
  readonly id: number
  /** null for wildcard subscriptions */
  readonly eventType: string | null
  readonly priority: number
  readonly unsubscribe: Unsubscribe
}

export type HandlerFailure = {
  readonly handle: SubscriptionHandle
  readonly event: InputEvent
  readonly error: Error
}

export type DispatchReport = {
  readonly event: InputEvent
  readonly delivered: number
  readonly failures: ReadonlyArray<HandlerFailure>
  readonly durationMs: number
}

export type EmitOptions = {
  producerId?: ProducerId
}

/**
 * The part of the bus that playlists and virtual peripherals build on.
 */
export type EventBusCore = {
  on: <TData = unknown>(
    eventType: string,
    handler: EventHandler<TData>,
    options?: SubscribeOptions,
  ) => SubscriptionHandle
  onAny: (handler: EventHandler, options?: SubscribeOptions) => SubscriptionHandle
  unsubscribe: (handle: SubscriptionHandle) => boolean
  emit: <TData>(
    target: string | EventDescriptor<TData>,
    data: TData,
    options?: EmitOptions,
  ) => InputEvent<TData>
  stateStore: StateStore
  /** Bus clock in milliseconds */
  now: () => number
}

export type EventBusOptions = {
  /** inline dispatches inside emit, microtask defers to the next microtask */
  scheduler?: BusScheduler
  stateStore?: StateStore
  now?: () => number
  /** Called once per failed handler (default: console.error) */
  onError?: (failure: HandlerFailure) => void
}

/**
 * @example
 * ```ts
 * const bus = createEventBus()
 * const buttonPressed = defineEventType<{ pressed: boolean }>('input.button')
 *
 * bus.subscribe(buttonPressed, (event) => {
 *   console.log(event.data.pressed) // typed
 * }, { priority: 10 })
 *
 * bus.emit(buttonPressed, { pressed: true }, { producerId: 3 })
 * bus.stateStore.getLatest('input.button', 3)
 * ```
 */
export type EventBus = EventBusCore & {
  subscribe: <TData>(
    descriptor: EventDescriptor<TData>,
    handler: EventHandler<TData>,
    options?: SubscribeOptions,
  ) => SubscriptionHandle
  /** Deliver an already built event, synchronously, returning the outcome */
  dispatch: (event: InputEvent) => DispatchReport
  /** Resolve once every queued event has been dispatched */
  drain: () => Promise<void>
  /** Drop every subscription, virtual peripheral and playlist run */
  clear: () => void
  /** Number of active subscriptions */
  size: () => number
  scheduler: BusScheduler
  playlists: EventPlaylistManager
  virtualPeripherals: VirtualPeripheralManager
}

type Subscriber = {
  handle: SubscriptionHandle
  handler: EventHandler
  active: boolean
}

// ============================================================================
// Event Bus Implementation
// ============================================================================

const byPriority = (a: Subscriber, b: Subscriber) =>
  b.handle.priority - a.handle.priority || a.handle.id - b.handle.id

export function createEventBus(options: EventBusOptions = {}): EventBus {
  const {
    scheduler = 'inline',
    stateStore = createStateStore(),
    now = () => performance.now(),
  } = options

  const handleError =
    options.onError ??
    ((failure: HandlerFailure) => {
      console.error(
        `[EventBus] Subscriber failed for "${failure.event.eventType}" from producer ${failure.event.producerId}:`,
        failure.error,
      )
    })

  const logDispatch = createThrottledLog('event.dispatch', { waitMs: 1000 })

  // event type (null = wildcard) -> subscribers sorted by priority
  const subscriptions = new Map<string | null, Array<Subscriber>>()
  let nextSubscriptionId = 0
  let nextSequence = 0

  const queue: Array<InputEvent> = []
  let flushScheduled = false
  let drainWaiters: Array<() => void> = []

  function addSubscription(
    eventType: string | null,
    handler: EventHandler,
    subscribeOptions: SubscribeOptions = {},
  ): SubscriptionHandle {
    const id = nextSubscriptionId++
    const handle: SubscriptionHandle = Object.freeze({
      id,
      eventType,
      priority: subscribeOptions.priority ?? 0,
      unsubscribe: () => {
        removeSubscription(handle)
      },
    })

    const bucket = subscriptions.get(eventType) ?? []
    bucket.push({ handle, handler, active: true })
    bucket.sort(byPriority)
    subscriptions.set(eventType, bucket)
    return handle
  }

  function removeSubscription(handle: SubscriptionHandle): boolean {
    const bucket = subscriptions.get(handle.eventType)
    if (!bucket) return false
    const index = bucket.findIndex((subscriber) => subscriber.handle === handle)
    if (index === -1) return false

    const [removed] = bucket.splice(index, 1)
    if (removed) removed.active = false
    if (bucket.length === 0) {
      subscriptions.delete(handle.eventType)
    }
    return true
  }

  function targetsFor(eventType: string): Array<Subscriber> {
    const wildcard = subscriptions.get(null) ?? []
    const specific = subscriptions.get(eventType) ?? []
    return [...wildcard, ...specific].sort(byPriority)
  }

  function dispatch(event: InputEvent): DispatchReport {
    const startedAt = now()
    const failures: Array<HandlerFailure> = []
    let delivered = 0

    for (const subscriber of targetsFor(event.eventType)) {
      // unsubscribed by an earlier handler of this same dispatch
      if (!subscriber.active) continue
      try {
        subscriber.handler(event)
        delivered += 1
      } catch (error) {
        const failure: HandlerFailure = {
          handle: subscriber.handle,
          event,
          error: toError(error),
        }
        failures.push(failure)
        handleError(failure)
      }
    }

    stateStore.update(event)

    const durationMs = now() - startedAt
    logDispatch({
      eventType: event.eventType,
      producerId: event.producerId,
      delivered,
      failed: failures.length,
      durationMs: Number(durationMs.toFixed(3)),
    })

    return { event, delivered, failures, durationMs }
  }

  function flush() {
    flushScheduled = false
    while (queue.length > 0) {
      const event = queue.shift()
      if (event) dispatch(event)
    }
    const waiters = drainWaiters
    drainWaiters = []
    waiters.forEach((resolve) => resolve())
  }

  function emit<TData>(
    target: string | EventDescriptor<TData>,
    data: TData,
    emitOptions: EmitOptions = {},
  ): InputEvent<TData> {
    const event = createInputEvent({
      eventType: typeof target === 'string' ? target : target.type,
      data,
      producerId: emitOptions.producerId,
      timestamp: now(),
      sequence: nextSequence++,
    })

    if (scheduler === 'inline') {
      dispatch(event)
      return event
    }

    queue.push(event)
    if (!flushScheduled) {
      flushScheduled = true
      queueMicrotask(flush)
    }
    return event
  }

  const core: EventBusCore = {
    on: <TData = unknown>(
      eventType: string,
      handler: EventHandler<TData>,
      subscribeOptions?: SubscribeOptions,
    ) => addSubscription(eventType, narrowHandler(handler), subscribeOptions),
    onAny: (handler, subscribeOptions) =>
      addSubscription(null, handler, subscribeOptions),
    unsubscribe: removeSubscription,
    emit,
    stateStore,
    now,
  }

  const playlists = createPlaylistManager(core)
  const virtualPeripherals = createVirtualPeripheralManager(core, playlists)

  return {
    ...core,
    subscribe: (descriptor, handler, subscribeOptions) =>
      core.on(descriptor.type, handler, subscribeOptions),
    dispatch,
    drain: () => {
      if (queue.length === 0 && !flushScheduled) return Promise.resolve()
      return new Promise<void>((resolve) => {
        drainWaiters.push(resolve)
      })
    },
    clear: () => {
      virtualPeripherals.clear()
      playlists.clear()
      subscriptions.forEach((bucket) =>
        bucket.forEach((subscriber) => {
          subscriber.active = false
        }),
      )
      subscriptions.clear()
    },
    size: () => {
      let count = 0
      subscriptions.forEach((bucket) => {
        count += bucket.length
      })
      return count
    },
    scheduler,
    playlists,
    virtualPeripherals,
  }
}

/**
 * Typed handlers are registered against a type string; the bus only ever
 * delivers events of that type to them, so the payload type holds.
 */
function narrowHandler<TData>(handler: EventHandler<TData>): EventHandler {
  return (event) => handler(event as InputEvent<TData>)
}

// ============================================================================
// Utility: Subscribe to Multiple Events
// ============================================================================

/**
 * Subscribe to multiple event descriptors at once.
 * Returns a single unsubscribe function that removes all subscriptions.
 *
 * @example
 * ```ts
 * const unsub = subscribeMany(bus, [
 *   [buttonPressed, handlePress],
 *   [switchRotated, handleRotate],
 * ])
 *
 * // Later: unsubscribe from all
 * unsub()
 * ```
 */
export function subscribeMany<TData = unknown>(
  bus: Pick<EventBus, 'subscribe' | 'unsubscribe'>,
  entries: Array<readonly [EventDescriptor<TData>, EventHandler<TData>]>,
): Unsubscribe {
  const handles = entries.map(([descriptor, handler]) =>
    bus.subscribe(descriptor, handler),
  )

  return () => {
    handles.forEach((handle) => bus.unsubscribe(handle))
  }
}
