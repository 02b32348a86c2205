/**
 * Runtime Configuration
 *
 * One zod schema describes every tunable of the runtime. Values come either
 * from a plain object (`parseConfig`) or from `LUMENWALL_*` environment
 * variables (`loadConfig`). Configuration is resolved once and each
 * component receives the slice it needs.
 *
 * Invalid values fail fast with a ConfigurationError naming the setting.
 */

import { z } from 'zod'
import { ConfigurationError } from './errors'

// ============================================================================
// Schema
// ============================================================================

export const renderVariantSchema = z.enum(['binary', 'iterative', 'auto'])
export const mergeStrategySchema = z.enum(['in_place', 'batched', 'adaptive'])
export const tileStrategySchema = z.enum(['blits', 'loop'])
export const planRefreshStrategySchema = z.enum(['on_change', 'time_boxed'])
export const planSignatureStrategySchema = z.enum(['identity', 'type'])
export const timingStrategySchema = z.enum(['ema', 'cumulative'])
export const framePacingStrategySchema = z.enum(['off', 'adaptive'])
export const busSchedulerSchema = z.enum(['inline', 'microtask'])
export const streamShareStrategySchema = z.enum([
  'share',
  'share_auto_connect',
  'replay_latest',
  'replay_latest_auto_connect',
  'replay_buffer',
  'replay_buffer_auto_connect',
])
export const streamConnectModeSchema = z.enum(['lazy', 'eager'])

const nonNegativeInt = z.number().int().min(0)
const positiveInt = z.number().int().min(1)

export const renderConfigSchema = z.object({
  variant: renderVariantSchema.default('iterative'),
  mergeStrategy: mergeStrategySchema.default('adaptive'),
  mergeCostThresholdMs: nonNegativeInt.default(6),
  mergeSurfaceThreshold: positiveInt.default(3),
  tileStrategy: tileStrategySchema.default('blits'),
  parallelThreshold: positiveInt.default(4),
  parallelCostThresholdMs: nonNegativeInt.default(12),
  maxWorkers: positiveInt.default(4),
  surfaceCache: z.boolean().default(false),
  screenCache: z.boolean().default(false),
  planRefreshMs: nonNegativeInt.default(100),
  planRefreshStrategy: planRefreshStrategySchema.default('time_boxed'),
  planSignatureStrategy: planSignatureStrategySchema.default('identity'),
  timingStrategy: timingStrategySchema.default('ema'),
  timingEmaAlpha: z.number().gt(0).max(1).default(0.2),
})

export const frameConfigSchema = z.object({
  pacingStrategy: framePacingStrategySchema.default('off'),
  minIntervalMs: z.number().min(0).finite().default(0),
  utilizationTarget: z.number().gt(0).max(1).default(0.9),
  maxFps: nonNegativeInt.default(60),
})

export const eventBusConfigSchema = z.object({
  scheduler: busSchedulerSchema.default('inline'),
})

export const streamConfigSchema = z.object({
  strategy: streamShareStrategySchema.default('replay_latest'),
  replayBufferSize: positiveInt.default(16),
  replayWindowMs: positiveInt.optional(),
  autoConnectMinSubscribers: positiveInt.default(1),
  refcountMinSubscribers: positiveInt.default(1),
  refcountGraceMs: nonNegativeInt.default(0),
  connectMode: streamConnectModeSchema.default('lazy'),
  coalesceWindowMs: nonNegativeInt.default(0),
  statsLogMs: nonNegativeInt.default(0),
})

export const configSchema = z.object({
  render: renderConfigSchema.default({}),
  frame: frameConfigSchema.default({}),
  eventBus: eventBusConfigSchema.default({}),
  stream: streamConfigSchema.default({}),
})

export type RenderVariantSetting = z.infer<typeof renderVariantSchema>
export type MergeStrategySetting = z.infer<typeof mergeStrategySchema>
export type TileStrategy = z.infer<typeof tileStrategySchema>
export type PlanRefreshStrategy = z.infer<typeof planRefreshStrategySchema>
export type PlanSignatureStrategy = z.infer<typeof planSignatureStrategySchema>
export type TimingStrategy = z.infer<typeof timingStrategySchema>
export type FramePacingStrategy = z.infer<typeof framePacingStrategySchema>
export type BusScheduler = z.infer<typeof busSchedulerSchema>
export type StreamShareStrategy = z.infer<typeof streamShareStrategySchema>
export type StreamConnectMode = z.infer<typeof streamConnectModeSchema>

export type RenderConfig = z.infer<typeof renderConfigSchema>
export type FrameConfig = z.infer<typeof frameConfigSchema>
export type EventBusConfig = z.infer<typeof eventBusConfigSchema>
export type StreamConfig = z.infer<typeof streamConfigSchema>
export type RuntimeConfig = z.infer<typeof configSchema>
export type RuntimeConfigInput = z.input<typeof configSchema>

// ============================================================================
// Parsing
// ============================================================================

const describeIssues = (error: z.ZodError) =>
  error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('; ')

/**
 * Validate a configuration object, filling defaults.
 * @throws ConfigurationError when any value is out of range
 */
export function parseConfig(input: unknown = {}): RuntimeConfig {
  const result = configSchema.safeParse(input)
  if (!result.success) {
    const first = result.error.issues[0]
    throw new ConfigurationError(
      `Invalid configuration: ${describeIssues(result.error)}`,
      first ? first.path.join('.') : undefined,
      { cause: result.error },
    )
  }
  return result.data
}

// ============================================================================
// Environment
// ============================================================================

export const ENV_PREFIX = 'LUMENWALL_'

type EnvKind = 'string' | 'int' | 'number' | 'flag'

type EnvBinding = {
  section: keyof RuntimeConfig
  field: string
  kind: EnvKind
}

/**
 * Environment variable name (without prefix) -> config location
 */
export const envBindings: Record<string, EnvBinding> = {
  RENDER_VARIANT: { section: 'render', field: 'variant', kind: 'string' },
  RENDER_MERGE_STRATEGY: { section: 'render', field: 'mergeStrategy', kind: 'string' },
  RENDER_MERGE_COST_THRESHOLD_MS: { section: 'render', field: 'mergeCostThresholdMs', kind: 'int' },
  RENDER_MERGE_SURFACE_THRESHOLD: { section: 'render', field: 'mergeSurfaceThreshold', kind: 'int' },
  RENDER_TILE_STRATEGY: { section: 'render', field: 'tileStrategy', kind: 'string' },
  RENDER_PARALLEL_THRESHOLD: { section: 'render', field: 'parallelThreshold', kind: 'int' },
  RENDER_PARALLEL_COST_THRESHOLD_MS: { section: 'render', field: 'parallelCostThresholdMs', kind: 'int' },
  RENDER_MAX_WORKERS: { section: 'render', field: 'maxWorkers', kind: 'int' },
  RENDER_SURFACE_CACHE: { section: 'render', field: 'surfaceCache', kind: 'flag' },
  RENDER_SCREEN_CACHE: { section: 'render', field: 'screenCache', kind: 'flag' },
  RENDER_PLAN_REFRESH_MS: { section: 'render', field: 'planRefreshMs', kind: 'int' },
  RENDER_PLAN_REFRESH_STRATEGY: { section: 'render', field: 'planRefreshStrategy', kind: 'string' },
  RENDER_PLAN_SIGNATURE_STRATEGY: { section: 'render', field: 'planSignatureStrategy', kind: 'string' },
  RENDER_TIMING_STRATEGY: { section: 'render', field: 'timingStrategy', kind: 'string' },
  RENDER_TIMING_EMA_ALPHA: { section: 'render', field: 'timingEmaAlpha', kind: 'number' },
  FRAME_PACING_STRATEGY: { section: 'frame', field: 'pacingStrategy', kind: 'string' },
  FRAME_MIN_INTERVAL_MS: { section: 'frame', field: 'minIntervalMs', kind: 'number' },
  FRAME_UTILIZATION_TARGET: { section: 'frame', field: 'utilizationTarget', kind: 'number' },
  MAX_FPS: { section: 'frame', field: 'maxFps', kind: 'int' },
  EVENT_BUS_SCHEDULER: { section: 'eventBus', field: 'scheduler', kind: 'string' },
  STREAM_SHARE_STRATEGY: { section: 'stream', field: 'strategy', kind: 'string' },
  STREAM_REPLAY_BUFFER: { section: 'stream', field: 'replayBufferSize', kind: 'int' },
  STREAM_REPLAY_WINDOW_MS: { section: 'stream', field: 'replayWindowMs', kind: 'int' },
  STREAM_AUTO_CONNECT_MIN_SUBSCRIBERS: { section: 'stream', field: 'autoConnectMinSubscribers', kind: 'int' },
  STREAM_REFCOUNT_MIN_SUBSCRIBERS: { section: 'stream', field: 'refcountMinSubscribers', kind: 'int' },
  STREAM_REFCOUNT_GRACE_MS: { section: 'stream', field: 'refcountGraceMs', kind: 'int' },
  STREAM_CONNECT_MODE: { section: 'stream', field: 'connectMode', kind: 'string' },
  STREAM_COALESCE_WINDOW_MS: { section: 'stream', field: 'coalesceWindowMs', kind: 'int' },
  STREAM_STATS_LOG_MS: { section: 'stream', field: 'statsLogMs', kind: 'int' },
}

const TRUE_FLAGS = new Set(['1', 'true', 'yes', 'on'])
const FALSE_FLAGS = new Set(['0', 'false', 'no', 'off'])

const coerceEnvValue = (
  name: string,
  raw: string,
  kind: EnvKind,
): string | number | boolean => {
  const value = raw.trim()
  switch (kind) {
    case 'string':
      return value.toLowerCase()
    case 'flag': {
      const lowered = value.toLowerCase()
      if (TRUE_FLAGS.has(lowered)) return true
      if (FALSE_FLAGS.has(lowered)) return false
      throw new ConfigurationError(
        `${name} must be a boolean flag, got "${raw}"`,
        name,
      )
    }
    case 'int':
    case 'number': {
      const parsed = Number(value)
      if (value === '' || !Number.isFinite(parsed)) {
        throw new ConfigurationError(`${name} must be numeric, got "${raw}"`, name)
      }
      return parsed
    }
  }
}

/**
 * Build configuration from environment variables.
 * Unset and empty variables keep their defaults.
 *
 * @example
 * ```ts
 * const config = loadConfig(process.env)
 * config.render.maxWorkers // 4 unless LUMENWALL_RENDER_MAX_WORKERS is set
 * ```
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
  const sections: Record<keyof RuntimeConfig, Record<string, unknown>> = {
    render: {},
    frame: {},
    eventBus: {},
    stream: {},
  }

  for (const [suffix, binding] of Object.entries(envBindings)) {
    const name = `${ENV_PREFIX}${suffix}`
    const raw = env[name]
    if (raw === undefined || raw.trim() === '') continue
    sections[binding.section][binding.field] = coerceEnvValue(name, raw, binding.kind)
  }

  return parseConfig(sections)
}
