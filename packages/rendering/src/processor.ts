/**
 * Renderer Processor
 *
 * Runs one renderer for one frame: prepares its surface, initializes it on
 * first use, times the render and expands the output to display size.
 * Renderer faults propagate; the frame loop decides what a failed frame
 * means.
 */

import { createThrottledLog } from '@lumenwall/system'
import type { Orientation, RendererHandle } from './renderer'
import type { SurfaceProvider } from './surfaceProvider'
import type { Surface } from './surface'
import type { RendererTimingTracker } from './timing'

export type RendererProcessorOptions = {
  provider: SurfaceProvider
  tracker: RendererTimingTracker
  orientation: () => Orientation
  now?: () => number
}

export type ProcessRenderer = (renderer: RendererHandle) => Promise<Surface | null>

export function createRendererProcessor(options: RendererProcessorOptions) {
  const { provider, tracker, orientation, now = () => performance.now() } = options
  const logRender = createThrottledLog('render.loop', { waitMs: 1000 })

  const processRenderer: ProcessRenderer = async (renderer) => {
    const currentOrientation = orientation()
    const surface = provider.prepare(renderer, currentOrientation)

    const startedAt = now()
    if (!renderer.isInitialized()) {
      renderer.initialize({ surface, orientation: currentOrientation, now })
    }
    const result = await renderer.render(surface, currentOrientation)
    const durationMs = now() - startedAt
    tracker.record(renderer.name, durationMs)

    logRender({
      renderer: renderer.name,
      durationMs: Number(durationMs.toFixed(2)),
      displayMode: renderer.displayMode,
      usesOpengl: renderer.displayMode === 'OPENGL',
      drew: result !== false,
    })

    if (result === false) return null
    return provider.postprocess(surface, renderer.displayMode, currentOrientation)
  }

  return { process: processRenderer }
}

export type RendererProcessor = ReturnType<typeof createRendererProcessor>
