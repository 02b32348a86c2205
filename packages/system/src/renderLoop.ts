/**
 * Generic Render Loop
 *
 * A reusable frame driver for any frame-based system running under Node.
 * Frames are scheduled with timers; each frame may be asynchronous and the
 * next one is only scheduled once the current one has settled, so frames
 * never overlap.
 *
 * Philosophy:
 * - Generic context type for maximum flexibility
 * - Lifecycle hooks (beforeRender, render, afterRender) for custom logic
 * - Pacing is delegated: a `nextDelayMs` hook decides how long to sleep
 * - Clean state management (running, paused)
 * - Per-frame error policy: drop the frame or halt the loop
 */

import { toError } from './errors'

export type FrameInfo = {
  /** Loop clock at frame start, in milliseconds */
  timestamp: number
  /** Time since the previous frame started (0 for the first frame) */
  deltaMs: number
  /** 1-based frame counter */
  frame: number
}

/**
 * What to do after a frame threw.
 * - drop: log, skip the frame, keep running
 * - halt: stop the loop
 */
export type FrameErrorPolicy = 'drop' | 'halt'

export type RenderLoopOptions<TContext> = {
  /**
   * Factory function to create the render context
   * Called once when the loop first starts
   */
  createContext: () => TContext

  /**
   * Optional hook called before each frame
   */
  beforeRender?: (context: TContext, info: FrameInfo) => void

  /**
   * Frame body. May return a promise; the loop waits for it.
   */
  render?: (context: TContext, info: FrameInfo) => void | Promise<void>

  /**
   * Optional hook called after each successful frame
   */
  afterRender?: (context: TContext, info: FrameInfo) => void

  /**
   * Optional error handler, returns the policy for this failure.
   * Without one, errors are logged and the frame is dropped.
   */
  onError?: (error: Error, info: FrameInfo) => FrameErrorPolicy | void

  /**
   * Delay before the next frame, given when the current one started.
   * Takes precedence over `targetFPS`. Negative values are treated as 0.
   */
  nextDelayMs?: (frameStartedAt: number, context: TContext) => number

  /**
   * Optional target FPS used when no `nextDelayMs` is given.
   * 0 or unset runs frames back to back.
   */
  targetFPS?: number

  /** Monotonic clock in milliseconds (default performance.now) */
  now?: () => number
}

export type RenderLoopAPI<TContext = unknown> = {
  /**
   * Start the render loop
   * Safe to call multiple times (idempotent)
   */
  start: () => void

  /**
   * Stop the render loop.
   * Resolves once the in-flight frame (if any) has settled.
   */
  stop: () => Promise<void>

  /**
   * Pause the render loop
   * Cancels the pending frame but keeps the context
   */
  pause: () => void

  /**
   * Resume the render loop from paused state
   */
  resume: () => void

  isRunning: () => boolean
  isPaused: () => boolean

  /**
   * Get the current context
   * Returns null if loop hasn't started yet
   */
  getContext: () => TContext | null

  /** Number of frames started so far */
  frameCount: () => number

  /** Last error that halted the loop, if any */
  haltedBy: () => Error | null
}

/**
 * Create a generic render loop
 *
 * @example
 * ```typescript
 * const loop = createRenderLoop({
 *   createContext: () => ({ device }),
 *   render: async (context) => {
 *     const { surface } = await pipeline.renderWithPlan(renderers)
 *     if (surface) await context.device.present(surface)
 *   },
 *   nextDelayMs: (startedAt) => pacer.delayMs(startedAt),
 * })
 *
 * loop.start()
 * ```
 */
export function createRenderLoop<TContext>(
  options: RenderLoopOptions<TContext>,
): RenderLoopAPI<TContext> {
  const {
    createContext,
    beforeRender,
    render,
    afterRender,
    onError,
    nextDelayMs,
    targetFPS,
    now = () => performance.now(),
  } = options

  // State
  let running = false
  let paused = false
  let timer: ReturnType<typeof setTimeout> | null = null
  let context: TContext | null = null
  let lastTimestamp: number | null = null
  let frames = 0
  let inFlight: Promise<void> | null = null
  let haltError: Error | null = null

  const frameInterval = targetFPS && targetFPS > 0 ? 1000 / targetFPS : 0

  const cancelPending = () => {
    if (timer !== null) {
      clearTimeout(timer)
      timer = null
    }
  }

  const schedule = (delayMs: number) => {
    cancelPending()
    timer = setTimeout(() => {
      timer = null
      // the in-flight frame reschedules itself when it settles
      if (inFlight !== null) return
      inFlight = tick().finally(() => {
        inFlight = null
      })
    }, Math.max(0, delayMs))
  }

  const delayAfter = (startedAt: number, ctx: TContext) => {
    if (nextDelayMs) {
      const delay = nextDelayMs(startedAt, ctx)
      return Number.isFinite(delay) ? Math.max(0, delay) : 0
    }
    if (frameInterval <= 0) return 0
    return Math.max(0, frameInterval - (now() - startedAt))
  }

  /**
   * Main render loop tick
   */
  const tick = async () => {
    if (!running || paused || context === null) return
    const ctx = context

    const timestamp = now()
    const deltaMs = lastTimestamp === null ? 0 : timestamp - lastTimestamp
    lastTimestamp = timestamp
    frames += 1
    const info: FrameInfo = { timestamp, deltaMs, frame: frames }

    try {
      beforeRender?.(ctx, info)
      await render?.(ctx, info)
      afterRender?.(ctx, info)
    } catch (error) {
      const normalized = toError(error)
      let policy: FrameErrorPolicy = 'drop'
      if (onError) {
        policy = onError(normalized, info) ?? 'drop'
      } else {
        console.error('[RenderLoop] Error in render loop:', normalized)
      }

      if (policy === 'halt') {
        console.error(`[RenderLoop] Halting after frame ${info.frame}`)
        haltError = normalized
        running = false
        paused = false
        cancelPending()
        return
      }
    }

    if (running && !paused) {
      schedule(delayAfter(timestamp, ctx))
    }
  }

  const start = () => {
    if (running) return

    if (!context) {
      context = createContext()
    }

    running = true
    paused = false
    haltError = null
    lastTimestamp = null

    schedule(0)
  }

  const stop = async () => {
    running = false
    paused = false
    cancelPending()
    lastTimestamp = null

    if (inFlight) {
      await inFlight
    }
  }

  const pause = () => {
    if (!running || paused) return
    paused = true
    cancelPending()
  }

  const resume = () => {
    if (!running || !paused) return
    paused = false
    lastTimestamp = null
    schedule(0)
  }

  return {
    start,
    stop,
    pause,
    resume,
    isRunning: () => running,
    isPaused: () => paused,
    getContext: () => context,
    frameCount: () => frames,
    haltedBy: () => haltError,
  }
}
