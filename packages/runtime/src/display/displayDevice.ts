/**
 * Display Devices
 *
 * The frame loop's only view of the hardware: a fixed pixel size, the
 * panel layout, and somewhere to send finished frames. Physical drivers
 * implement the same contract outside this package.
 */

import { DEFAULT_ORIENTATION, copySurface } from '@lumenwall/rendering'
import type { Orientation, Size, Surface } from '@lumenwall/rendering'

export type DisplayDevice = {
  readonly id: string
  readonly size: Size
  orientation: () => Orientation
  present: (surface: Surface) => void | Promise<void>
  close: () => void | Promise<void>
}

export type MemoryDisplayOptions = {
  id?: string
  width: number
  height: number
  orientation?: Orientation
  /** Presented frames kept for inspection, oldest dropped first */
  historySize?: number
}

/**
 * In-process display that keeps copies of what it was shown.
 *
 * @example
 * ```ts
 * const display = createMemoryDisplay({ width: 64, height: 32 })
 * await display.present(frame)
 * display.lastFrame() // copy of `frame`
 * ```
 */
export function createMemoryDisplay(options: MemoryDisplayOptions) {
  const { id = 'memory', width, height, historySize = 8 } = options
  let orientation = options.orientation ?? DEFAULT_ORIENTATION
  const history: Array<Surface> = []
  let presented = 0
  let closed = false

  return {
    id,
    size: { width, height },
    orientation: () => orientation,
    setOrientation: (next: Orientation) => {
      orientation = next
    },

    present: (surface: Surface) => {
      if (closed) {
        throw new Error(`Display "${id}" is closed`)
      }
      if (surface.width !== width || surface.height !== height) {
        throw new RangeError(
          `Display "${id}" is ${width}x${height}, got a ${surface.width}x${surface.height} frame`,
        )
      }
      presented += 1
      history.push(copySurface(surface))
      if (history.length > historySize) history.shift()
    },

    close: () => {
      if (closed) return
      closed = true
      console.log(`[Display] ${id} closed after ${presented} frame(s)`)
    },

    frameCount: () => presented,
    lastFrame: (): Surface | null => history[history.length - 1] ?? null,
    frames: (): ReadonlyArray<Surface> => history,
    isClosed: () => closed,
  }
}

export type MemoryDisplay = ReturnType<typeof createMemoryDisplay>
