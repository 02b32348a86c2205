/**
 * Render Pipeline
 *
 * One frame, end to end:
 *   plan (cached) → collect surfaces → compose → { surface, plan }
 *
 * Binary plans render across the worker pool and reduce pairwise;
 * iterative plans render in order and fold. Composition follows the plan's
 * merge strategy either way.
 */

import { createWorkerPool } from '@lumenwall/system'
import type { RenderConfig, RenderVariantSetting, WorkerPool } from '@lumenwall/system'
import { createSurfaceCollector } from './collector'
import { createSurfaceComposer, createSurfaceCompositionManager } from './composer'
import type { MergeFn } from './composer'
import { createRenderPlanCache } from './planCache'
import { createRenderPlanner } from './planner'
import type { RenderPlan } from './planner'
import { createRendererProcessor } from './processor'
import { DEFAULT_ORIENTATION } from './renderer'
import type { Orientation, RendererHandle } from './renderer'
import { createSurfaceProvider } from './surfaceProvider'
import type { Size, Surface } from './surface'
import { createRendererTimingTracker } from './timing'

export type RenderPipelineOptions = {
  config: RenderConfig
  display: Size
  orientation?: () => Orientation
  now?: () => number
  /** Defaults to a pool of `config.maxWorkers` owned by the pipeline */
  pool?: WorkerPool
  merge?: MergeFn
}

export type PipelineFrame = {
  /** Composed frame, null when no renderer drew anything */
  surface: Surface | null
  plan: RenderPlan
}

export function createRenderPipeline(options: RenderPipelineOptions) {
  const {
    config,
    display,
    orientation = () => DEFAULT_ORIENTATION,
    now = () => performance.now(),
    merge,
  } = options

  const pool = options.pool ?? createWorkerPool({ maxWorkers: config.maxWorkers, name: 'render' })

  const tracker = createRendererTimingTracker({
    strategy: config.timingStrategy,
    emaAlpha: config.timingEmaAlpha,
  })
  const planner = createRenderPlanner({
    tracker,
    defaultVariant: config.variant,
    settings: config,
    now,
  })
  const planCache = createRenderPlanCache({
    planner,
    refreshStrategy: config.planRefreshStrategy,
    refreshMs: config.planRefreshMs,
    signatureStrategy: config.planSignatureStrategy,
    now,
  })
  const provider = createSurfaceProvider({
    display,
    tileStrategy: config.tileStrategy,
    surfaceCache: config.surfaceCache,
  })
  const processor = createRendererProcessor({ provider, tracker, orientation, now })
  const collector = createSurfaceCollector(processor.process, pool)
  const composer = createSurfaceComposer({ screenCache: config.screenCache })
  const composition = createSurfaceCompositionManager(composer)

  let defaultVariant: RenderVariantSetting = config.variant

  const renderWithPlan = async (
    renderers: ReadonlyArray<RendererHandle>,
    override?: RenderVariantSetting,
  ): Promise<PipelineFrame> => {
    const plan = planCache.getPlan(renderers, defaultVariant, override)

    if (plan.variant === 'binary') {
      const surfaces = await collector.collect(renderers, { parallel: true })
      const surface = await composition.composeParallel(surfaces, plan.mergeStrategy, pool, merge)
      return { surface, plan }
    }

    const surfaces = await collector.collect(renderers, { parallel: false })
    const surface = await composition.composeSerial(surfaces, plan.mergeStrategy, merge)
    return { surface, plan }
  }

  return {
    renderWithPlan,

    render: async (renderers: ReadonlyArray<RendererHandle>, override?: RenderVariantSetting) => {
      const { surface } = await renderWithPlan(renderers, override)
      return surface
    },

    estimateRenderCostMs: (renderers: ReadonlyArray<RendererHandle>) =>
      tracker.estimateTotal(renderers).totalMs,

    setDefaultVariant: (variant: RenderVariantSetting) => {
      planner.setDefaultVariant(variant)
      defaultVariant = variant
    },

    tracker,
    planCache,
    provider,

    /** Refuse new work and wait for in-flight renders */
    shutdown: async () => {
      await pool.close()
      provider.clearCache()
      composer.clearCache()
      console.log('[RenderPipeline] Shut down')
    },
  }
}

export type RenderPipeline = ReturnType<typeof createRenderPipeline>
