import { describe, expect, it } from 'vitest'
import { ConfigurationError } from '@lumenwall/system'
import { createFramePacer, createRenderLoopPacer } from '../framePacer'

const manualClock = (start = 0) => {
  let current = start
  return {
    now: () => current,
    set: (value: number) => {
      current = value
    },
  }
}

describe('createFramePacer', () => {
  it('should render immediately, then once per frame interval', () => {
    const clock = manualClock()
    const pacer = createFramePacer(50, { now: clock.now })

    expect(pacer.shouldRender()).toBe(true)
    pacer.markRendered()

    clock.set(19)
    expect(pacer.shouldRender()).toBe(false)
    clock.set(20)
    expect(pacer.shouldRender()).toBe(true)
    expect(pacer.lastRenderAt()).toBe(0)
  })

  it('should stretch the interval to the measured cost when adaptive', () => {
    const pacer = createFramePacer(0, { strategy: 'adaptive', utilizationTarget: 0.9 })

    expect(pacer.targetIntervalMs(9)).toBeCloseTo(10)
    expect(pacer.targetIntervalMs()).toBe(0)
  })

  it('should ignore cost when pacing is off', () => {
    const pacer = createFramePacer(50, { strategy: 'off' })

    expect(pacer.targetIntervalMs(100)).toBe(20)
  })

  it('should take the largest of the minimum interval, fps cap and cost', () => {
    const pacer = createFramePacer(50, { strategy: 'adaptive', minIntervalMs: 40 })

    expect(pacer.targetIntervalMs(18)).toBe(40)
    expect(pacer.targetIntervalMs(45)).toBeCloseTo(50)
  })

  it('should treat a max fps of 0 as uncapped', () => {
    const clock = manualClock()
    const pacer = createFramePacer(0, { now: clock.now })
    pacer.markRendered()

    expect(pacer.shouldRender()).toBe(true)
  })
})

describe('createRenderLoopPacer', () => {
  it('should sleep the rest of the fixed interval', () => {
    const clock = manualClock()
    const pacer = createRenderLoopPacer({ maxFps: 50, now: clock.now })

    clock.set(5)
    expect(pacer.delayMs(0)).toBe(15)
  })

  it('should never return a negative delay for a late frame', () => {
    const clock = manualClock()
    const pacer = createRenderLoopPacer({ maxFps: 50, now: clock.now })

    clock.set(30)
    expect(pacer.delayMs(0)).toBe(0)
  })

  it('should include the cost under adaptive pacing', () => {
    const clock = manualClock(100)
    const pacer = createRenderLoopPacer({
      strategy: 'adaptive',
      utilizationTarget: 0.5,
      maxFps: 100,
      now: clock.now,
    })

    clock.set(104)
    expect(pacer.delayMs(100, 15)).toBe(26)
    expect(pacer.delayMs(100)).toBe(6)
  })

  it('should not sleep without a cap or minimum interval', () => {
    const pacer = createRenderLoopPacer({ maxFps: 0, now: () => 0 })

    expect(pacer.delayMs(0)).toBe(0)
  })
})

describe('pacing options', () => {
  const settingOf = (build: () => unknown) => {
    try {
      build()
    } catch (error) {
      if (error instanceof ConfigurationError) return error.setting
      throw error
    }
    return undefined
  }

  it('should reject invalid intervals and utilization targets', () => {
    expect(settingOf(() => createFramePacer(60, { minIntervalMs: -1 }))).toBe('frame.minIntervalMs')
    expect(settingOf(() => createRenderLoopPacer({ minIntervalMs: Infinity }))).toBe(
      'frame.minIntervalMs',
    )
    expect(settingOf(() => createFramePacer(60, { utilizationTarget: 0 }))).toBe(
      'frame.utilizationTarget',
    )
    expect(settingOf(() => createRenderLoopPacer({ utilizationTarget: 1.5 }))).toBe(
      'frame.utilizationTarget',
    )
    expect(settingOf(() => createFramePacer(Number.NaN))).toBe('frame.maxFps')
    expect(settingOf(() => createRenderLoopPacer({ maxFps: -1 }))).toBe('frame.maxFps')
  })

  it('should accept a utilization target of exactly 1', () => {
    expect(createRenderLoopPacer({ utilizationTarget: 1 }).targetIntervalMs()).toBe(0)
  })
})
