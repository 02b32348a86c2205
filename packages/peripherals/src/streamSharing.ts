/**
 * Stream Sharing
 *
 * One upstream source (a peripheral reading loop, a clock tick, a window
 * resize feed) shared by many subscribers. The sharing strategy decides
 * when the source is connected, when it is torn down, and what late
 * subscribers receive on arrival.
 *
 * Strategies:
 * - share: ref-counted, no replay
 * - replay_latest: ref-counted, replays the last value
 * - replay_buffer: ref-counted, replays the last N values
 * - *_auto_connect: connect once enough subscribers arrive, stay connected
 *
 * Ref-counted strategies disconnect when subscribers drop below the
 * minimum, optionally after a grace period that a new subscriber cancels.
 * The replay buffer outlives a disconnect; a source that completes or
 * fails starts the next connection with an empty one.
 */

import {
  BehaviorSubject,
  Observable,
  ReplaySubject,
  Subject,
  auditTime,
  connectable,
  identity,
  isObservable,
  share,
  takeUntil,
  tap,
  timer,
} from 'rxjs'
import type {
  MonoTypeOperatorFunction,
  Observer,
  Subscriber,
  Subscription,
  TeardownLogic,
} from 'rxjs'
import {
  ConfigurationError,
  createThrottledLog,
  streamConfigSchema,
  toError,
} from '@lumenwall/system'
import type { StreamConfig, StreamShareStrategy } from '@lumenwall/system'

// ============================================================================
// Types
// ============================================================================

/** Connect function: push into the subscriber, return the teardown */
export type StreamConnect<T> = (subscriber: Subscriber<T>) => TeardownLogic

export type StreamSource<T> = Observable<T> | StreamConnect<T>

export type StreamShareSettings = StreamConfig

export type StreamStats = {
  /** Values pulled from the source */
  received: number
  /** Values handed to subscribers, replays included */
  delivered: number
  connects: number
  disconnects: number
}

export type SharedStream<T> = {
  readonly name: string
  readonly strategy: StreamShareStrategy
  subscribe: (observer: Partial<Observer<T>> | ((value: T) => void)) => () => void
  isConnected: () => boolean
  subscriberCount: () => number
  stats: () => StreamStats
  /** Complete every subscriber and disconnect for good */
  close: () => void
}

export type SharedStreamOptions = {
  /** Clock for the replay window (defaults to Date.now) */
  now?: () => number
}

/**
 * Validate sharing settings, filling defaults.
 * @throws ConfigurationError for out-of-range values
 */
export function resolveStreamShareSettings(
  input: Partial<StreamShareSettings> = {},
): StreamShareSettings {
  const result = streamConfigSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const setting = issue ? `stream.${issue.path.join('.')}` : undefined
    throw new ConfigurationError(
      `Invalid stream sharing settings: ${issue ? `${setting}: ${issue.message}` : 'invalid'}`,
      setting,
      { cause: result.error },
    )
  }
  return result.data
}

const replaySizeFor = (settings: StreamShareSettings): number => {
  switch (settings.strategy) {
    case 'share':
    case 'share_auto_connect':
      return 0
    case 'replay_latest':
    case 'replay_latest_auto_connect':
      return 1
    case 'replay_buffer':
    case 'replay_buffer_auto_connect':
      return settings.replayBufferSize
  }
}

const isAutoConnect = (strategy: StreamShareStrategy) =>
  strategy.endsWith('_auto_connect')

const toObservable = <T>(source: StreamSource<T>): Observable<T> =>
  isObservable(source) ? source : new Observable<T>(source)

// ============================================================================
// Shared stream
// ============================================================================

/**
 * Share `source` among subscribers.
 *
 * Plain ref-counting (one subscriber minimum, lazy connect) is rxjs
 * `share`. Auto-connect, higher minimums and eager connects count
 * subscribers over a `connectable`.
 *
 * @example
 * ```ts
 * const ticks = createValueSubject(0)
 * const shared = createSharedStream(ticks.source, resolveStreamShareSettings({
 *   strategy: 'replay_latest',
 *   refcountGraceMs: 250,
 * }), 'clock.tick')
 *
 * const unsubscribe = shared.subscribe((tick) => console.log(tick))
 * ```
 */
export function createSharedStream<T>(
  source: StreamSource<T>,
  settings: StreamShareSettings,
  name: string,
  options: SharedStreamOptions = {},
): SharedStream<T> {
  const replaySize = replaySizeFor(settings)
  const autoConnect = isAutoConnect(settings.strategy)
  const minimumSubscribers = autoConnect
    ? settings.autoConnectMinSubscribers
    : settings.refcountMinSubscribers
  const useShare =
    !autoConnect && minimumSubscribers <= 1 && settings.connectMode === 'lazy'
  const timestampProvider = options.now ? { now: options.now } : undefined

  const stats: StreamStats = { received: 0, delivered: 0, connects: 0, disconnects: 0 }
  const logStats =
    settings.statsLogMs > 0
      ? createThrottledLog('stream.stats', { waitMs: settings.statsLogMs, level: 'info' })
      : null

  const active = new Set<Subscription>()
  const closing = new Subject<void>()
  let connected = false
  let closed = false

  const createHub = (): Subject<T> =>
    replaySize > 0
      ? new ReplaySubject<T>(replaySize, settings.replayWindowMs ?? Infinity, timestampProvider)
      : new Subject<T>()
  let hub = createHub()

  const coalesce: MonoTypeOperatorFunction<T> =
    settings.coalesceWindowMs > 0 ? auditTime(settings.coalesceWindowMs) : identity

  const upstream = new Observable<T>((subscriber) => {
    connected = true
    stats.connects += 1
    console.debug(`[SharedStream] "${name}" connected (${settings.strategy})`)

    const subscription = toObservable(source)
      .pipe(
        tap(() => {
          stats.received += 1
        }),
        coalesce,
      )
      .subscribe({
        next: (value) => subscriber.next(value),
        error: (error: unknown) => {
          hub = createHub()
          subscriber.error(error)
        },
        complete: () => {
          hub = createHub()
          subscriber.complete()
        },
      })

    return () => {
      subscription.unsubscribe()
      connected = false
      stats.disconnects += 1
      console.debug(`[SharedStream] "${name}" disconnected`)
    }
  }).pipe(takeUntil(closing))

  // ref-counted by rxjs
  const shared = upstream.pipe(
    share({
      connector: () => hub,
      resetOnError: true,
      resetOnComplete: true,
      resetOnRefCountZero:
        settings.refcountGraceMs > 0 ? () => timer(settings.refcountGraceMs) : true,
    }),
  )

  // counted here
  const multicast = connectable(upstream, { connector: () => hub })
  let connection: Subscription | null = null
  let grace: Subscription | null = null
  let counted = 0

  const isLive = () => connection !== null && !connection.closed

  const connect = () => {
    if (closed || isLive() || counted < minimumSubscribers) return
    connection = multicast.connect()
  }

  const disconnect = () => {
    grace = null
    if (counted >= minimumSubscribers) return
    connection?.unsubscribe()
    connection = null
  }

  const release = () => {
    counted -= 1
    // auto-connect streams stay connected until closed
    if (autoConnect || !isLive() || counted >= minimumSubscribers) return
    grace?.unsubscribe()
    if (settings.refcountGraceMs <= 0) {
      disconnect()
      return
    }
    grace = timer(settings.refcountGraceMs).subscribe(disconnect)
  }

  const attach = (observer: Partial<Observer<T>>): Subscription => {
    const target: Partial<Observer<T>> = {
      next: (value) => {
        stats.delivered += 1
        observer.next?.(value)
        logStats?.({ name, subscribers: active.size, ...stats })
      },
      error: (error: unknown) => {
        const normalized = toError(error)
        if (observer.error) {
          observer.error(normalized)
        } else {
          console.error(`[SharedStream] "${name}" source failed:`, normalized)
        }
      },
      complete: () => observer.complete?.(),
    }

    if (useShare) return shared.subscribe(target)

    counted += 1
    grace?.unsubscribe()
    grace = null
    // eager: connect before the subscriber attaches, lazy: after
    if (settings.connectMode === 'eager') connect()
    const subscription = multicast.subscribe(target)
    subscription.add(release)
    connect()
    return subscription
  }

  return {
    name,
    strategy: settings.strategy,

    subscribe: (observerOrNext) => {
      if (closed) {
        throw new Error(`Shared stream "${name}" is closed`)
      }
      const subscription = attach(
        typeof observerOrNext === 'function' ? { next: observerOrNext } : observerOrNext,
      )
      active.add(subscription)
      subscription.add(() => active.delete(subscription))
      return () => subscription.unsubscribe()
    },

    isConnected: () => connected,
    subscriberCount: () => active.size,
    stats: () => ({ ...stats }),

    close: () => {
      if (closed) return
      closed = true
      grace?.unsubscribe()
      closing.next()
      closing.complete()
      // subscribers still waiting for a connection
      hub.complete()
    },
  }
}

// ============================================================================
// Value subject
// ============================================================================

/**
 * Push-based source holding a current value (a tick counter, a window
 * size, a clock). Each new connection starts from the current value.
 */
export function createValueSubject<T>(initial: T) {
  const subject = new BehaviorSubject<T>(initial)

  return {
    source: subject.asObservable(),
    next: (value: T) => subject.next(value),
    complete: () => subject.complete(),
    value: () => subject.getValue(),
    /** Whether any connection is listening */
    isObserved: () => subject.observed,
  }
}

export type ValueSubject<T> = ReturnType<typeof createValueSubject<T>>
