/**
 * Error Taxonomy
 *
 * Every error raised on purpose by the runtime carries a stable `code` so
 * callers can branch without string matching on messages.
 *
 * - configuration: bad settings, raised while constructing components
 * - renderer_state: renderer used outside its lifecycle (render before initialize)
 * - plan: unknown variants or plans that do not match the request
 * - pool_closed: work submitted to a drained worker pool
 */

export type ErrorCode =
  | 'configuration'
  | 'renderer_state'
  | 'plan'
  | 'pool_closed'

export class LumenwallError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'LumenwallError'
    this.code = code
  }
}

export class ConfigurationError extends LumenwallError {
  /** Dotted path of the offending setting, when known */
  readonly setting?: string

  constructor(message: string, setting?: string, options?: { cause?: unknown }) {
    super('configuration', message, options)
    this.name = 'ConfigurationError'
    this.setting = setting
  }
}

export class RendererStateError extends LumenwallError {
  readonly renderer: string

  constructor(renderer: string, message: string) {
    super('renderer_state', `Renderer "${renderer}": ${message}`)
    this.name = 'RendererStateError'
    this.renderer = renderer
  }
}

export class PlanError extends LumenwallError {
  constructor(message: string) {
    super('plan', message)
    this.name = 'PlanError'
  }
}

export class WorkerPoolClosedError extends LumenwallError {
  constructor(pool: string) {
    super('pool_closed', `Worker pool "${pool}" is closed`)
    this.name = 'WorkerPoolClosedError'
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error))
