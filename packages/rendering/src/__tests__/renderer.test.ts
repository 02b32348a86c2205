import { describe, expect, it, vi } from 'vitest'
import { ConfigurationError, RendererStateError } from '@lumenwall/system'
import { DEFAULT_ORIENTATION, createRenderer, createStatefulRenderer } from '../renderer'
import type { RendererContext } from '../renderer'
import { createStateHolder } from '../stateHolder'
import type { SnapshotSource } from '../stateHolder'
import { createSurface } from '../surface'

const contextFor = (): RendererContext => ({
  surface: createSurface(2, 2),
  orientation: DEFAULT_ORIENTATION,
  now: () => 0,
})

/** A source that records its listener so tests can push values */
const createManualSource = <T>() => {
  const listeners = new Set<(value: T) => void>()
  const source: SnapshotSource<T> = (listener) => {
    listeners.add(listener)
    return () => {
      listeners.delete(listener)
    }
  }
  return {
    source,
    push: (value: T) => listeners.forEach((listener) => listener(value)),
    listenerCount: () => listeners.size,
  }
}

describe('createRenderer', () => {
  it('should refuse to render before initialize', () => {
    const renderer = createRenderer({ name: 'clock', draw: () => undefined })

    expect(() => renderer.render(createSurface(1, 1), DEFAULT_ORIENTATION)).toThrow(
      RendererStateError,
    )
    expect(() => renderer.render(createSurface(1, 1), DEFAULT_ORIENTATION)).toThrow(
      'Renderer "clock": render called before initialize',
    )
  })

  it('should run setup once and draw after initialize', () => {
    const setup = vi.fn()
    const draw = vi.fn()
    const renderer = createRenderer({ name: 'clock', setup, draw })
    const context = contextFor()

    renderer.initialize(context)
    renderer.initialize(context)
    renderer.render(context.surface, DEFAULT_ORIENTATION)

    expect(setup).toHaveBeenCalledTimes(1)
    expect(draw).toHaveBeenCalledWith(context.surface, DEFAULT_ORIENTATION)
    expect(renderer.displayMode).toBe('FULL')
  })

  it('should need initialize again after reset', () => {
    const renderer = createRenderer({ name: 'clock', draw: () => undefined })
    renderer.initialize(contextFor())

    renderer.reset()

    expect(renderer.isInitialized()).toBe(false)
  })
})

describe('createStatefulRenderer', () => {
  it('should reject a renderer with neither initial state nor source', () => {
    expect(() => createStatefulRenderer({ name: 'empty', draw: () => undefined })).toThrow(
      ConfigurationError,
    )
  })

  it('should reject a source without an update function', () => {
    const { source } = createManualSource<number>()

    expect(() =>
      createStatefulRenderer<{ bpm: number }, number>({
        name: 'pulse',
        source,
        draw: () => undefined,
      }),
    ).toThrow('Renderer "pulse" has a source but no update function')
  })

  it('should draw the initial state as a frozen snapshot', () => {
    const draw = vi.fn()
    const renderer = createStatefulRenderer({
      name: 'banner',
      initialState: { text: 'hello' },
      draw,
    })
    const context = contextFor()

    renderer.initialize(context)
    renderer.render(context.surface, DEFAULT_ORIENTATION)

    expect(draw).toHaveBeenCalledWith(context.surface, { text: 'hello' }, DEFAULT_ORIENTATION)
    expect(Object.isFrozen(renderer.snapshot())).toBe(true)
  })

  it('should prefer createInitialState over initialState', () => {
    const renderer = createStatefulRenderer({
      name: 'banner',
      initialState: { width: 0 },
      createInitialState: (context) => ({ width: context.surface.width }),
      draw: () => undefined,
    })

    renderer.initialize(contextFor())

    expect(renderer.snapshot()).toEqual({ width: 2 })
  })

  it('should fold source values through update', () => {
    const manual = createManualSource<number>()
    const renderer = createStatefulRenderer<{ total: number }, number>({
      name: 'counter',
      initialState: { total: 0 },
      source: manual.source,
      update: (previous, value) => ({ total: (previous?.total ?? 0) + value }),
      draw: () => undefined,
    })

    renderer.initialize(contextFor())
    manual.push(2)
    manual.push(3)
    renderer.update(5)

    expect(renderer.snapshot()).toEqual({ total: 10 })
  })

  it('should report a skipped frame until the first value arrives', () => {
    const manual = createManualSource<number>()
    const draw = vi.fn()
    const renderer = createStatefulRenderer<{ bpm: number }, number>({
      name: 'pulse',
      source: manual.source,
      update: (_previous, bpm) => ({ bpm }),
      draw,
    })
    const context = contextFor()
    renderer.initialize(context)

    expect(renderer.render(context.surface, DEFAULT_ORIENTATION)).toBe(false)

    manual.push(72)
    renderer.render(context.surface, DEFAULT_ORIENTATION)

    expect(draw).toHaveBeenCalledWith(context.surface, { bpm: 72 }, DEFAULT_ORIENTATION)
  })

  it('should refuse updates before initialize', () => {
    const renderer = createStatefulRenderer<{ total: number }, number>({
      name: 'counter',
      initialState: { total: 0 },
      update: (_previous, total) => ({ total }),
      draw: () => undefined,
    })

    expect(() => renderer.update(1)).toThrow(
      'Renderer "counter": update called before initialize',
    )
  })

  it('should release the source subscription on reset', () => {
    const manual = createManualSource<number>()
    const renderer = createStatefulRenderer<{ bpm: number }, number>({
      name: 'pulse',
      source: manual.source,
      update: (_previous, bpm) => ({ bpm }),
      draw: () => undefined,
    })

    renderer.initialize(contextFor())
    expect(manual.listenerCount()).toBe(1)

    renderer.reset()

    expect(manual.listenerCount()).toBe(0)
    expect(renderer.snapshot()).toBeNull()
    expect(renderer.isInitialized()).toBe(false)
  })
})

describe('createStateHolder', () => {
  it('should keep a single subscription when rebound', () => {
    const first = createManualSource<number>()
    const second = createManualSource<number>()
    const holder = createStateHolder<number>()

    holder.bind(first.source, (value) => holder.publish(value))
    holder.bind(second.source, (value) => holder.publish(value * 10))
    first.push(1)
    second.push(2)

    expect(first.listenerCount()).toBe(0)
    expect(second.listenerCount()).toBe(1)
    expect(holder.get()).toBe(20)
  })

  it('should freeze nested snapshot state', () => {
    const holder = createStateHolder<{ palette: { colors: Array<number> }; pixels: Uint8Array }>()

    holder.publish({ palette: { colors: [1, 2] }, pixels: new Uint8Array([3]) })

    const state = holder.get()
    expect(Object.isFrozen(state?.palette)).toBe(true)
    expect(Object.isFrozen(state?.palette.colors)).toBe(true)
    expect(Object.isFrozen(state?.pixels)).toBe(false)
  })

  it('should leave typed arrays unfrozen', () => {
    const holder = createStateHolder<Uint8Array>()

    holder.publish(new Uint8Array([1, 2]))

    expect(Object.isFrozen(holder.get())).toBe(false)
  })
})
