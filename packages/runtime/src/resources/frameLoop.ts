/**
 * Frame Loop Resource
 *
 * Drives the installation: every tick renders the scene through the
 * pipeline and presents the result on the display.
 *
 * - RenderLoopPacer decides how long to sleep after a frame, and is the
 *   only gate: every tick renders
 * - Renderer faults reach `onError`; the configured policy drops the
 *   frame or halts the loop
 */

import type { StartedResource } from 'braided'
import { createRenderLoopPacer } from '@lumenwall/rendering'
import type { RenderLoopPacer } from '@lumenwall/rendering'
import { createRenderLoopResource, createThrottledLog } from '@lumenwall/system'
import type { FrameErrorPolicy, RuntimeConfig } from '@lumenwall/system'
import type { DisplayDevice } from '../display/displayDevice'
import type { RenderPipelineResource } from './renderPipeline'
import type { Scene } from './scene'

export type FrameLoopDependencies = {
  config: RuntimeConfig
  renderPipeline: RenderPipelineResource
  display: DisplayDevice
  scene: Scene
}

export type FrameStats = {
  presented: number
  /** Ticks that completed without a frame to show */
  empty: number
  failed: number
}

export type FrameLoopContext = {
  loopPacer: RenderLoopPacer
  stats: FrameStats
}

export type FrameLoopOptions = {
  /** What a failed frame does to the loop (default drop) */
  errorPolicy?: FrameErrorPolicy
  now?: () => number
}

export const createFrameLoopResource = (options: FrameLoopOptions = {}) =>
  createRenderLoopResource(
    ['config', 'renderPipeline', 'display', 'scene'],
    ({ config, renderPipeline, display, scene }: FrameLoopDependencies) => {
      const { errorPolicy = 'drop', now = () => performance.now() } = options
      const { frame } = config
      const stats: FrameStats = { presented: 0, empty: 0, failed: 0 }
      const logFrame = createThrottledLog('frame.loop', { waitMs: 5000, level: 'info' })

      const estimatedCost = () => renderPipeline.estimateRenderCostMs(scene.renderers())

      return {
        now,

        createContext: (): FrameLoopContext => ({
          loopPacer: createRenderLoopPacer({
            strategy: frame.pacingStrategy,
            minIntervalMs: frame.minIntervalMs,
            utilizationTarget: frame.utilizationTarget,
            maxFps: frame.maxFps,
            now,
          }),
          stats,
        }),

        render: async (_context, info) => {
          const renderers = scene.renderers()
          const { surface, plan } = await renderPipeline.renderWithPlan(renderers)
          if (surface) {
            await display.present(surface)
            stats.presented += 1
          } else {
            stats.empty += 1
          }

          logFrame({
            frame: info.frame,
            deltaMs: Number(info.deltaMs.toFixed(2)),
            variant: plan.variant,
            mergeStrategy: plan.mergeStrategy,
            renderers: renderers.length,
            ...stats,
          })
        },

        onError: (error, info) => {
          stats.failed += 1
          console.error(`[FrameLoop] Frame ${info.frame} failed:`, error)
          return errorPolicy
        },

        nextDelayMs: (startedAt, context) => context.loopPacer.delayMs(startedAt, estimatedCost()),
      }
    },
  )

export type FrameLoopResource = StartedResource<ReturnType<typeof createFrameLoopResource>>
