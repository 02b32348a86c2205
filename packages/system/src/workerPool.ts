/**
 * Worker Pool
 *
 * Bounded executor for asynchronous work. At most `maxWorkers` tasks run at
 * once; the rest wait in FIFO order. `map` keeps input order in its results
 * no matter which task finishes first, and settles only after every one
 * of its tasks has.
 *
 * Philosophy:
 * - Bounded concurrency, unbounded queue
 * - A failing task rejects its own promise, nothing else
 * - No retries
 * - `close()` refuses new work and waits for everything already accepted
 */

import { WorkerPoolClosedError } from './errors'

export type PoolTask<T> = () => T | Promise<T>

export type WorkerPoolOptions = {
  /** Upper bound on concurrently running tasks (>= 1) */
  maxWorkers: number
  /** Name used in logs and errors */
  name?: string
}

export type WorkerPool = {
  /** Schedule a task, resolving with its result */
  run: <T>(task: PoolTask<T>) => Promise<T>
  /**
   * Run `fn` over every item, results in input order. Rejects with the
   * first failure once all items have settled.
   */
  map: <TItem, TResult>(
    items: ReadonlyArray<TItem>,
    fn: (item: TItem, index: number) => TResult | Promise<TResult>,
  ) => Promise<Array<TResult>>
  /** Resolve once nothing is queued or running */
  drain: () => Promise<void>
  /** Refuse new work, then drain */
  close: () => Promise<void>
  isClosed: () => boolean
  activeCount: () => number
  pendingCount: () => number
  maxWorkers: number
}

type QueueEntry = {
  start: () => void
}

/**
 * Create a bounded worker pool
 *
 * @example
 * ```ts
 * const pool = createWorkerPool({ maxWorkers: 4, name: 'render' })
 * const surfaces = await pool.map(renderers, (renderer) => renderer.render())
 * await pool.close()
 * ```
 */
export function createWorkerPool(options: WorkerPoolOptions): WorkerPool {
  const { name = 'pool' } = options
  const maxWorkers = Math.max(1, Math.floor(options.maxWorkers))

  const queue: Array<QueueEntry> = []
  let active = 0
  let closed = false
  let idleWaiters: Array<() => void> = []

  const settleIdle = () => {
    if (active > 0 || queue.length > 0) return
    const waiters = idleWaiters
    idleWaiters = []
    waiters.forEach((resolve) => resolve())
  }

  const pump = () => {
    while (active < maxWorkers && queue.length > 0) {
      const entry = queue.shift()
      if (!entry) break
      active += 1
      entry.start()
    }
    settleIdle()
  }

  const run = <T>(task: PoolTask<T>): Promise<T> => {
    if (closed) {
      return Promise.reject(new WorkerPoolClosedError(name))
    }

    return new Promise<T>((resolve, reject) => {
      queue.push({
        start: () => {
          Promise.resolve()
            .then(task)
            .then(resolve, reject)
            .finally(() => {
              active -= 1
              pump()
            })
        },
      })
      pump()
    })
  }

  const map = async <TItem, TResult>(
    items: ReadonlyArray<TItem>,
    fn: (item: TItem, index: number) => TResult | Promise<TResult>,
  ): Promise<Array<TResult>> => {
    const settled = await Promise.allSettled(
      items.map((item, index) => run(() => fn(item, index))),
    )
    const results: Array<TResult> = []
    for (const outcome of settled) {
      // first failure in input order
      if (outcome.status === 'rejected') throw outcome.reason
      results.push(outcome.value)
    }
    return results
  }

  const drain = (): Promise<void> =>
    new Promise<void>((resolve) => {
      idleWaiters.push(resolve)
      settleIdle()
    })

  const api = {
    run,
    map,
    drain,
    close: async () => {
      if (!closed) {
        closed = true
        console.log(`[WorkerPool] Closing "${name}"...`)
      }
      await drain()
    },
    isClosed: () => closed,
    activeCount: () => active,
    pendingCount: () => queue.length,
    maxWorkers,
  } satisfies WorkerPool

  return api
}
