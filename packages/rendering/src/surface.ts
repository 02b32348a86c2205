/**
 * Surfaces
 *
 * A surface is a width x height RGBA pixel buffer (straight alpha, one byte
 * per channel, row-major). Renderers draw into surfaces; composition blits
 * them onto each other with source-over blending.
 */

export type Surface = {
  readonly width: number
  readonly height: number
  readonly pixels: Uint8ClampedArray
}

export type Size = {
  width: number
  height: number
}

export type Rgba = readonly [r: number, g: number, b: number, a: number]

export const TRANSPARENT: Rgba = [0, 0, 0, 0]

const requireDimension = (value: number, label: string) => {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`Surface ${label} must be a positive integer, got ${value}`)
  }
}

export function createSurface(width: number, height: number): Surface {
  requireDimension(width, 'width')
  requireDimension(height, 'height')
  return { width, height, pixels: new Uint8ClampedArray(width * height * 4) }
}

export const sameSize = (a: Size, b: Size) => a.width === b.width && a.height === b.height

export function fillSurface(surface: Surface, color: Rgba = TRANSPARENT): Surface {
  const [r, g, b, a] = color
  const { pixels } = surface
  for (let offset = 0; offset < pixels.length; offset += 4) {
    pixels[offset] = r
    pixels[offset + 1] = g
    pixels[offset + 2] = b
    pixels[offset + 3] = a
  }
  return surface
}

export const clearSurface = (surface: Surface) => {
  surface.pixels.fill(0)
  return surface
}

export function setPixel(surface: Surface, x: number, y: number, color: Rgba) {
  if (x < 0 || y < 0 || x >= surface.width || y >= surface.height) return
  const offset = (y * surface.width + x) * 4
  surface.pixels.set(color, offset)
}

export function getPixel(surface: Surface, x: number, y: number): Rgba {
  const offset = (y * surface.width + x) * 4
  const { pixels } = surface
  return [pixels[offset] ?? 0, pixels[offset + 1] ?? 0, pixels[offset + 2] ?? 0, pixels[offset + 3] ?? 0]
}

export function copySurface(surface: Surface): Surface {
  return { width: surface.width, height: surface.height, pixels: surface.pixels.slice() }
}

export const surfacesEqual = (a: Surface, b: Surface) =>
  sameSize(a, b) && a.pixels.every((value, index) => value === b.pixels[index])

// ============================================================================
// Blitting
// ============================================================================

/**
 * Draw `source` onto `destination` at (x, y) with source-over blending.
 * Pixels falling outside the destination are clipped.
 */
export function blit(destination: Surface, source: Surface, x = 0, y = 0): Surface {
  const startX = Math.max(0, x)
  const startY = Math.max(0, y)
  const endX = Math.min(destination.width, x + source.width)
  const endY = Math.min(destination.height, y + source.height)
  const dst = destination.pixels
  const src = source.pixels

  for (let row = startY; row < endY; row += 1) {
    let dstOffset = (row * destination.width + startX) * 4
    let srcOffset = ((row - y) * source.width + (startX - x)) * 4

    for (let column = startX; column < endX; column += 1) {
      const srcAlpha = src[srcOffset + 3] ?? 0

      if (srcAlpha === 255) {
        dst[dstOffset] = src[srcOffset] ?? 0
        dst[dstOffset + 1] = src[srcOffset + 1] ?? 0
        dst[dstOffset + 2] = src[srcOffset + 2] ?? 0
        dst[dstOffset + 3] = 255
      } else if (srcAlpha > 0) {
        const sa = srcAlpha / 255
        const da = (dst[dstOffset + 3] ?? 0) / 255
        const outAlpha = sa + da * (1 - sa)
        for (let channel = 0; channel < 3; channel += 1) {
          const s = src[srcOffset + channel] ?? 0
          const d = dst[dstOffset + channel] ?? 0
          dst[dstOffset + channel] = (s * sa + d * da * (1 - sa)) / outAlpha
        }
        dst[dstOffset + 3] = outAlpha * 255
      }

      dstOffset += 4
      srcOffset += 4
    }
  }

  return destination
}

export type BlitEntry = {
  source: Surface
  x?: number
  y?: number
}

export function blits(destination: Surface, entries: Iterable<BlitEntry>): Surface {
  for (const { source, x = 0, y = 0 } of entries) {
    blit(destination, source, x, y)
  }
  return destination
}

// ============================================================================
// Frame accumulator
// ============================================================================

/**
 * Queues blits against one destination and applies them together on
 * `flush`.
 */
export function createFrameAccumulator(surface: Surface) {
  let queue: Array<BlitEntry> = []

  return {
    surface,
    queueBlit: (source: Surface, x = 0, y = 0) => {
      queue.push({ source, x, y })
    },
    pending: () => queue.length,
    /** Drop queued blits */
    reset: () => {
      queue = []
    },
    flush: (options: { clear?: boolean } = {}) => {
      if (options.clear) clearSurface(surface)
      const entries = queue
      queue = []
      return blits(surface, entries)
    },
  }
}

export type FrameAccumulator = ReturnType<typeof createFrameAccumulator>
