/**
 * Logging helpers
 *
 * Components log through `console` with a `[Tag]` prefix. Hot-path lines
 * (one per frame or per event) go through a throttled logger so a 60 FPS
 * loop does not flood the output.
 */

import { throttle } from '@tanstack/pacer'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogSink = (message: string, fields?: Record<string, unknown>) => void

const sinkFor = (level: LogLevel): LogSink => {
  switch (level) {
    case 'debug':
      return (message, fields) =>
        fields ? console.debug(message, fields) : console.debug(message)
    case 'info':
      return (message, fields) =>
        fields ? console.info(message, fields) : console.info(message)
    case 'warn':
      return (message, fields) =>
        fields ? console.warn(message, fields) : console.warn(message)
    case 'error':
      return (message, fields) =>
        fields ? console.error(message, fields) : console.error(message)
  }
}

export type ThrottledLogOptions = {
  /** Minimum spacing between two emitted lines, in milliseconds */
  waitMs?: number
  level?: LogLevel
}

/**
 * Create a logger for a structured key such as `render.plan`.
 * At most one line is written per `waitMs`; the rest are dropped.
 *
 * @example
 * ```ts
 * const logPlan = createThrottledLog('render.plan', { waitMs: 1000 })
 * logPlan({ variant: 'binary', renderers: 4 })
 * ```
 */
export function createThrottledLog(
  key: string,
  options: ThrottledLogOptions = {},
) {
  const { waitMs = 1000, level = 'debug' } = options
  const sink = sinkFor(level)
  const write = (fields: Record<string, unknown>) => sink(`[${key}]`, fields)

  if (waitMs <= 0) {
    return write
  }

  return throttle(write, { wait: waitMs, leading: true, trailing: false })
}

export type ThrottledLog = ReturnType<typeof createThrottledLog>
