/**
 * Surface Provider
 *
 * Hands each renderer the surface it draws into and turns what it drew
 * into a display-sized surface:
 * - FULL / OPENGL: full display size, used as is
 * - MIRRORED: one layout tile, repeated across the rows x columns grid
 *
 * With the surface cache on, each renderer keeps its surface between
 * frames (cleared, not reallocated).
 */

import type { TileStrategy } from '@lumenwall/system'
import type { DisplayMode, Orientation, RendererHandle } from './renderer'
import { blit, blits, clearSurface, createSurface, sameSize } from './surface'
import type { Size, Surface } from './surface'

export type SurfaceProviderOptions = {
  display: Size
  tileStrategy?: TileStrategy
  surfaceCache?: boolean
}

export type SurfaceProvider = {
  sizeFor: (displayMode: DisplayMode, orientation: Orientation) => Size
  /** A cleared surface for this renderer's next frame */
  prepare: (renderer: RendererHandle, orientation: Orientation) => Surface
  /** Expand a renderer's output to display size */
  postprocess: (surface: Surface, displayMode: DisplayMode, orientation: Orientation) => Surface
  /** Repeat `tile` across a rows x columns grid on a display-sized surface */
  tile: (tile: Surface, rows: number, columns: number) => Surface
  clearCache: () => void
}

export function createSurfaceProvider(options: SurfaceProviderOptions): SurfaceProvider {
  const { display, tileStrategy = 'blits', surfaceCache = false } = options
  let cache = new WeakMap<RendererHandle, Surface>()

  const sizeFor = (displayMode: DisplayMode, orientation: Orientation): Size => {
    if (displayMode !== 'MIRRORED') {
      return { width: display.width, height: display.height }
    }
    const { rows, columns } = orientation.layout
    return {
      width: Math.max(1, Math.floor(display.width / columns)),
      height: Math.max(1, Math.floor(display.height / rows)),
    }
  }

  const tile = (source: Surface, rows: number, columns: number): Surface => {
    // display-sized even when the tile does not divide it evenly
    const tiled = createSurface(display.width, display.height)

    if (tileStrategy === 'blits') {
      const positions = Array.from({ length: rows * columns }, (_, index) => ({
        source,
        x: (index % columns) * source.width,
        y: Math.floor(index / columns) * source.height,
      }))
      return blits(tiled, positions)
    }

    for (let row = 0; row < rows; row += 1) {
      for (let column = 0; column < columns; column += 1) {
        blit(tiled, source, column * source.width, row * source.height)
      }
    }
    return tiled
  }

  return {
    sizeFor,

    prepare: (renderer, orientation) => {
      const size = sizeFor(renderer.displayMode, orientation)
      if (!surfaceCache) {
        return createSurface(size.width, size.height)
      }
      const cached = cache.get(renderer)
      if (cached && sameSize(cached, size)) {
        return clearSurface(cached)
      }
      const surface = createSurface(size.width, size.height)
      cache.set(renderer, surface)
      return surface
    },

    postprocess: (surface, displayMode, orientation) => {
      if (displayMode !== 'MIRRORED') return surface
      const { rows, columns } = orientation.layout
      if (rows === 1 && columns === 1) return surface
      return tile(surface, rows, columns)
    },

    tile,

    clearCache: () => {
      cache = new WeakMap()
    },
  }
}
