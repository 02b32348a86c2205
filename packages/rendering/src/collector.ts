import type { WorkerPool } from '@lumenwall/system'
import type { ProcessRenderer } from './processor'
import type { RendererHandle } from './renderer'
import type { Surface } from './surface'

export type CollectOptions = {
  /** Render across the worker pool instead of one after the other */
  parallel: boolean
}

export type RenderSurfaceCollector = {
  collect: (renderers: ReadonlyArray<RendererHandle>, options: CollectOptions) => Promise<Array<Surface>>
}

const present = (surface: Surface | null): surface is Surface => surface !== null

/**
 * Gathers one surface per renderer, in renderer order, skipping renderers
 * that drew nothing.
 */
export function createSurfaceCollector(
  processRenderer: ProcessRenderer,
  pool: WorkerPool,
): RenderSurfaceCollector {
  const collectSerial = async (renderers: ReadonlyArray<RendererHandle>) => {
    const surfaces: Array<Surface> = []
    for (const renderer of renderers) {
      const surface = await processRenderer(renderer)
      if (surface) surfaces.push(surface)
    }
    return surfaces
  }

  const collectParallel = async (renderers: ReadonlyArray<RendererHandle>) => {
    const results = await pool.map(renderers, (renderer) => processRenderer(renderer))
    return results.filter(present)
  }

  return {
    collect: (renderers, { parallel }) => {
      if (renderers.length === 0) return Promise.resolve([])
      return parallel ? collectParallel(renderers) : collectSerial(renderers)
    },
  }
}
