/**
 * Render Planner
 *
 * Decides, per frame, how a renderer set is collected and composed:
 * - variant binary: render across the worker pool, reduce pairwise
 * - variant iterative: render one after the other, fold in order
 * - merge in_place: blit each surface onto the first
 * - merge batched: queue every blit against one destination, flush once
 *
 * `auto` and `adaptive` settings resolve against the timing tracker's cost
 * estimate. A renderer set with no samples yet is treated as cheap.
 */

import { PlanError, createThrottledLog, mergeStrategySchema, renderVariantSchema } from '@lumenwall/system'
import type { MergeStrategySetting, RenderConfig, RenderVariantSetting } from '@lumenwall/system'
import type { RendererHandle } from './renderer'
import { rendererSignature } from './signature'
import type { RendererTimingSnapshot, RendererTimingTracker } from './timing'

export type RenderVariant = Exclude<RenderVariantSetting, 'auto'>
export type MergeStrategy = Exclude<MergeStrategySetting, 'adaptive'>

export type RenderPlan = Readonly<{
  variant: RenderVariant
  mergeStrategy: MergeStrategy
  estimatedCostMs: number
  hasSamples: boolean
  timingSnapshots: ReadonlyArray<RendererTimingSnapshot>
  timingMissing: ReadonlyArray<string>
  generatedAt: number
  signature: string
  rendererCount: number
}>

export type PlannerSettings = Pick<
  RenderConfig,
  | 'mergeStrategy'
  | 'mergeCostThresholdMs'
  | 'mergeSurfaceThreshold'
  | 'parallelThreshold'
  | 'parallelCostThresholdMs'
>

export type RenderPlannerOptions = {
  tracker: RendererTimingTracker
  defaultVariant: RenderVariantSetting
  settings: PlannerSettings
  now?: () => number
}

export type RenderPlanner = {
  plan: (
    renderers: ReadonlyArray<RendererHandle>,
    override?: RenderVariantSetting,
    signature?: string,
  ) => RenderPlan
  resolveVariant: (
    renderers: ReadonlyArray<RendererHandle>,
    override?: RenderVariantSetting,
  ) => RenderVariant
  resolveMergeStrategy: (renderers: ReadonlyArray<RendererHandle>) => MergeStrategy
  setDefaultVariant: (variant: RenderVariantSetting) => void
  defaultVariant: () => RenderVariantSetting
  /** Merge strategy of the latest plan */
  currentMergeStrategy: () => MergeStrategy
  timingVersion: () => number
}

/**
 * @throws PlanError for anything that is not a known variant
 */
export function assertRenderVariant(value: unknown): RenderVariantSetting {
  const result = renderVariantSchema.safeParse(value)
  if (!result.success) {
    throw new PlanError(`Unknown render variant: ${String(value)}`)
  }
  return result.data
}

export function createRenderPlanner(options: RenderPlannerOptions): RenderPlanner {
  const { tracker, settings, now = () => performance.now() } = options
  if (!mergeStrategySchema.safeParse(settings.mergeStrategy).success) {
    throw new PlanError(`Unknown merge strategy: ${String(settings.mergeStrategy)}`)
  }

  let defaultVariant = assertRenderVariant(options.defaultVariant)
  let currentMergeStrategy: MergeStrategy =
    settings.mergeStrategy === 'batched' ? 'batched' : 'in_place'

  const logPlan = createThrottledLog('render.plan', { waitMs: 1000, level: 'info' })

  const resolveVariant = (
    renderers: ReadonlyArray<RendererHandle>,
    override?: RenderVariantSetting,
  ): RenderVariant => {
    const variant = override === undefined ? defaultVariant : assertRenderVariant(override)
    if (variant !== 'auto') return variant

    if (renderers.length < settings.parallelThreshold) return 'iterative'
    if (settings.parallelCostThresholdMs === 0) return 'binary'
    const { totalMs, hasSamples } = tracker.estimateTotal(renderers)
    if (hasSamples && totalMs >= settings.parallelCostThresholdMs) return 'binary'
    return 'iterative'
  }

  const resolveMergeStrategy = (renderers: ReadonlyArray<RendererHandle>): MergeStrategy => {
    if (settings.mergeStrategy !== 'adaptive') return settings.mergeStrategy

    if (renderers.length < settings.mergeSurfaceThreshold) return 'in_place'
    if (settings.mergeCostThresholdMs === 0) return 'batched'
    const { totalMs, hasSamples } = tracker.estimateTotal(renderers)
    if (hasSamples && totalMs >= settings.mergeCostThresholdMs) return 'batched'
    return 'in_place'
  }

  return {
    plan: (renderers, override, signature) => {
      const variant = resolveVariant(renderers, override)
      const mergeStrategy = resolveMergeStrategy(renderers)
      const { totalMs, hasSamples } = tracker.estimateTotal(renderers)
      const { snapshots, missing } = tracker.snapshot(renderers)
      currentMergeStrategy = mergeStrategy

      const plan: RenderPlan = Object.freeze({
        variant,
        mergeStrategy,
        estimatedCostMs: totalMs,
        hasSamples,
        timingSnapshots: Object.freeze(snapshots),
        timingMissing: Object.freeze(missing),
        generatedAt: now(),
        signature: signature ?? rendererSignature(renderers),
        rendererCount: renderers.length,
      })

      logPlan({
        variant,
        mergeStrategy,
        rendererCount: renderers.length,
        estimatedCostMs: Number(totalMs.toFixed(2)),
        hasSamples,
        rendererTimings: snapshots.map((snapshot) => ({
          renderer: snapshot.name,
          averageMs: snapshot.averageMs,
          lastMs: snapshot.lastMs,
          samples: snapshot.sampleCount,
        })),
        rendererTimingsMissing: missing,
      })

      return plan
    },

    resolveVariant,
    resolveMergeStrategy,
    setDefaultVariant: (variant) => {
      defaultVariant = assertRenderVariant(variant)
    },
    defaultVariant: () => defaultVariant,
    currentMergeStrategy: () => currentMergeStrategy,
    timingVersion: () => tracker.version(),
  }
}
