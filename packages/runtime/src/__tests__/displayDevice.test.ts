import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createSurface, getPixel, setPixel } from '@lumenwall/rendering'
import { createMemoryDisplay } from '../display/displayDevice'

describe('createMemoryDisplay', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should keep a copy of each presented frame', () => {
    const display = createMemoryDisplay({ width: 2, height: 1 })
    const frame = createSurface(2, 1)
    setPixel(frame, 1, 0, [255, 0, 0, 255])

    display.present(frame)
    setPixel(frame, 1, 0, [0, 0, 255, 255])

    const last = display.lastFrame()
    expect(last).not.toBe(frame)
    expect(last && getPixel(last, 1, 0)).toEqual([255, 0, 0, 255])
    expect(display.frameCount()).toBe(1)
  })

  it('should drop the oldest frames beyond its history size', () => {
    const display = createMemoryDisplay({ width: 1, height: 1, historySize: 2 })

    for (let shade = 1; shade <= 3; shade += 1) {
      const frame = createSurface(1, 1)
      setPixel(frame, 0, 0, [shade, 0, 0, 255])
      display.present(frame)
    }

    expect(display.frameCount()).toBe(3)
    expect(display.frames().map((frame) => getPixel(frame, 0, 0)[0])).toEqual([2, 3])
  })

  it('should refuse frames of the wrong size', () => {
    const display = createMemoryDisplay({ id: 'panel', width: 4, height: 2 })

    expect(() => display.present(createSurface(2, 2))).toThrow(
      new RangeError('Display "panel" is 4x2, got a 2x2 frame'),
    )
  })

  it('should refuse frames once closed', () => {
    const display = createMemoryDisplay({ id: 'panel', width: 1, height: 1 })

    display.close()
    display.close()

    expect(display.isClosed()).toBe(true)
    expect(() => display.present(createSurface(1, 1))).toThrow('Display "panel" is closed')
    expect(console.log).toHaveBeenCalledTimes(1)
  })

  it('should report orientation changes', () => {
    const display = createMemoryDisplay({ width: 4, height: 2 })

    display.setOrientation({ layout: { rows: 1, columns: 2 } })

    expect(display.orientation()).toEqual({ layout: { rows: 1, columns: 2 } })
  })
})
