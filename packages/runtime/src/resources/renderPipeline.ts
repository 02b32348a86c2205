/**
 * Render Pipeline Resource
 *
 * Builds the pipeline for the display's size and layout. A scene change
 * drops the cached plan so the next frame plans for the new renderer set.
 * Halting waits for in-flight renders and closes the worker pool.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { createRenderPipeline } from '@lumenwall/rendering'
import type { RenderPipeline } from '@lumenwall/rendering'
import type { RuntimeConfig } from '@lumenwall/system'
import type { DisplayDevice } from '../display/displayDevice'
import type { Scene } from './scene'

export type RenderPipelineDependencies = {
  config: RuntimeConfig
  display: DisplayDevice
  scene: Scene
}

export type RenderPipelineResourceOptions = {
  now?: () => number
}

type RunningPipeline = RenderPipeline & { detach: () => void }

export const createRenderPipelineResource = (options: RenderPipelineResourceOptions = {}) =>
  defineResource({
    dependencies: ['config', 'display', 'scene'] as const,
    start: ({ config, display, scene }: RenderPipelineDependencies): RunningPipeline => {
      const pipeline = createRenderPipeline({
        config: config.render,
        display: display.size,
        orientation: display.orientation,
        now: options.now,
      })
      const detach = scene.subscribe(() => pipeline.planCache.invalidate())

      console.log('[RenderPipeline] Started', {
        variant: config.render.variant,
        maxWorkers: config.render.maxWorkers,
      })
      return { ...pipeline, detach }
    },
    halt: async (pipeline: RunningPipeline) => {
      pipeline.detach()
      await pipeline.shutdown()
    },
  })

export type RenderPipelineResource = StartedResource<
  ReturnType<typeof createRenderPipelineResource>
>
