/**
 * Renderer contract
 *
 * One capability interface for every renderer: initialize, render, reset,
 * plus a display mode tag telling the surface provider how big the input
 * surface is and what to do with it afterwards.
 *
 * Renderers are either stateless (draw from nothing but the surface and
 * orientation) or stateful, composing a StateHolder whose frozen snapshot
 * is the only thing `draw` reads.
 */

import { ConfigurationError, RendererStateError } from '@lumenwall/system'
import { createStateHolder } from './stateHolder'
import type { SnapshotSource } from './stateHolder'
import type { Surface } from './surface'

// ============================================================================
// Types
// ============================================================================

/**
 * - FULL: renders onto the whole display
 * - MIRRORED: renders one tile, repeated across the layout grid
 * - OPENGL: renders the whole display through its own pipeline
 */
export type DisplayMode = 'FULL' | 'MIRRORED' | 'OPENGL'

export type Layout = {
  rows: number
  columns: number
}

export type Orientation = {
  layout: Layout
  /** Clockwise rotation of the physical display, in degrees */
  rotation?: 0 | 90 | 180 | 270
}

export const DEFAULT_ORIENTATION: Orientation = { layout: { rows: 1, columns: 1 } }

export type RendererContext = {
  /** The surface the first render will draw into */
  surface: Surface
  orientation: Orientation
  now: () => number
}

/**
 * `false` means nothing was drawn this frame; the surface is left out of
 * composition.
 */
export type RenderResult = void | false

export type RendererHandle = {
  readonly name: string
  /** Type identity shared by interchangeable renderers */
  readonly kind?: string
  readonly displayMode: DisplayMode
  initialize: (context: RendererContext) => void
  render: (surface: Surface, orientation: Orientation) => RenderResult | Promise<RenderResult>
  reset: () => void
  isInitialized: () => boolean
}

// ============================================================================
// Stateless renderer
// ============================================================================

export type StatelessRendererOptions = {
  name: string
  kind?: string
  displayMode?: DisplayMode
  setup?: (context: RendererContext) => void
  draw: (surface: Surface, orientation: Orientation) => RenderResult | Promise<RenderResult>
}

export function createRenderer(options: StatelessRendererOptions): RendererHandle {
  const { name, kind, displayMode = 'FULL', setup, draw } = options
  let initialized = false

  return {
    name,
    kind,
    displayMode,
    initialize: (context) => {
      if (initialized) return
      setup?.(context)
      initialized = true
    },
    render: (surface, orientation) => {
      if (!initialized) {
        throw new RendererStateError(name, 'render called before initialize')
      }
      return draw(surface, orientation)
    },
    reset: () => {
      initialized = false
    },
    isInitialized: () => initialized,
  }
}

// ============================================================================
// Stateful renderer
// ============================================================================

export type StatefulRendererOptions<TState, TValue = never> = {
  name: string
  kind?: string
  displayMode?: DisplayMode
  /** Static first snapshot */
  initialState?: TState
  /** First snapshot computed at initialize time; wins over initialState */
  createInitialState?: (context: RendererContext) => TState
  /** Upstream feed; every delivered value goes through `update` */
  source?: SnapshotSource<TValue>
  /** Produce the next snapshot. Required with a source. */
  update?: (previous: TState | null, value: TValue) => TState
  draw: (surface: Surface, state: TState, orientation: Orientation) => void | Promise<void>
}

export type StatefulRenderer<TState, TValue = never> = RendererHandle & {
  /** Replace the snapshot with `update(current, value)` */
  update: (value: TValue) => void
  snapshot: () => TState | null
}

/**
 * Build a renderer whose draw reads a frozen snapshot.
 *
 * @example
 * ```ts
 * const heartRate = createStatefulRenderer({
 *   name: 'heart-rate',
 *   source: (listener) => shared.subscribe(listener),
 *   update: (_previous, bpm: number) => ({ bpm }),
 *   draw: (surface, { bpm }) => drawPulse(surface, bpm),
 * })
 * ```
 */
export function createStatefulRenderer<TState, TValue = never>(
  options: StatefulRendererOptions<TState, TValue>,
): StatefulRenderer<TState, TValue> {
  const { name, kind, displayMode = 'FULL', source, update, draw } = options

  const hasInitialState =
    options.initialState !== undefined || options.createInitialState !== undefined
  if (!hasInitialState && !source) {
    throw new ConfigurationError(
      `Renderer "${name}" needs an initial state or a source`,
    )
  }
  if (source && !update) {
    throw new ConfigurationError(`Renderer "${name}" has a source but no update function`)
  }

  const holder = createStateHolder<TState>()
  let initialized = false

  const applyUpdate = (value: TValue) => {
    if (!update) {
      throw new RendererStateError(name, 'update called without an update function')
    }
    holder.publish(update(holder.get(), value))
  }

  return {
    name,
    kind,
    displayMode,

    initialize: (context) => {
      if (initialized) return
      if (options.createInitialState) {
        holder.publish(options.createInitialState(context))
      } else if (options.initialState !== undefined) {
        holder.publish(options.initialState)
      }
      if (source) {
        holder.bind(source, applyUpdate)
      }
      initialized = true
    },

    update: (value) => {
      if (!initialized) {
        throw new RendererStateError(name, 'update called before initialize')
      }
      applyUpdate(value)
    },

    render: (surface, orientation) => {
      if (!initialized) {
        throw new RendererStateError(name, 'render called before initialize')
      }
      const state = holder.get()
      // no snapshot delivered yet
      if (state === null) return false
      return draw(surface, state, orientation)
    },

    reset: () => {
      holder.dispose()
      initialized = false
    },

    isInitialized: () => initialized,
    snapshot: () => holder.get(),
  }
}
