import { describe, expect, it, vi } from 'vitest'
import { createEventBus, subscribeMany } from '../eventBus'
import type { HandlerFailure } from '../eventBus'
import { defineEventType } from '../input'

const quietBus = (options: Parameters<typeof createEventBus>[0] = {}) =>
  createEventBus({ onError: () => {}, now: () => 0, ...options })

describe('createEventBus', () => {
  it('should run handlers by priority, then subscription order, wildcards included', () => {
    const bus = quietBus()
    const calls: Array<string> = []

    bus.on('input.button', () => calls.push('typed-0'))
    bus.onAny(() => calls.push('any-5'), { priority: 5 })
    bus.on('input.button', () => calls.push('typed-10'), { priority: 10 })
    bus.onAny(() => calls.push('any-0'))
    bus.on('input.switch', () => calls.push('other'))

    bus.emit('input.button', { pressed: true })

    expect(calls).toEqual(['typed-10', 'any-5', 'typed-0', 'any-0'])
  })

  it('should isolate a failing handler and report it', () => {
    const failures: Array<HandlerFailure> = []
    const bus = createEventBus({ onError: (failure) => failures.push(failure) })
    const after = vi.fn()

    const failing = bus.on('input.button', () => {
      throw new Error('handler broke')
    }, { priority: 1 })
    bus.on('input.button', after)

    const event = bus.emit('input.button', null)

    expect(after).toHaveBeenCalledWith(event)
    expect(failures).toHaveLength(1)
    expect(failures[0]?.handle).toBe(failing)
    expect(failures[0]?.error.message).toBe('handler broke')
  })

  it('should return a dispatch report for prebuilt events', () => {
    const bus = quietBus()
    bus.on('input.button', () => {})
    bus.onAny(() => {
      throw new Error('nope')
    })

    const first = bus.emit('seed', 1)
    const report = bus.dispatch({ ...first, eventType: 'input.button' })

    expect(report.delivered).toBe(1)
    expect(report.failures).toHaveLength(1)
    expect(report.durationMs).toBe(0)
  })

  it('should let handlers see the state before the event is recorded', () => {
    const bus = quietBus()
    const seen: Array<unknown> = []

    bus.on('input.knob', () => {
      seen.push(bus.stateStore.getLatest('input.knob', 1)?.data)
    })

    bus.emit('input.knob', { value: 1 }, { producerId: 1 })
    bus.emit('input.knob', { value: 2 }, { producerId: 1 })

    expect(seen).toEqual([undefined, { value: 1 }])
    expect(bus.stateStore.getLatest('input.knob', 1)?.data).toEqual({ value: 2 })
  })

  it('should assign increasing sequence numbers and default producer 0', () => {
    const bus = quietBus()
    const first = bus.emit('a', null)
    const second = bus.emit('b', null, { producerId: 4 })

    expect(second.sequence).toBeGreaterThan(first.sequence)
    expect(first.producerId).toBe(0)
    expect(second.producerId).toBe(4)
  })

  it('should freeze events and copy payloads', () => {
    const bus = quietBus()
    const payload = { readings: [1, 2] }
    const event = bus.emit('sensor', payload)

    payload.readings.push(3)

    expect(event.data).toEqual({ readings: [1, 2] })
    expect(Object.isFrozen(event)).toBe(true)
    expect(Object.isFrozen(event.data)).toBe(true)
  })

  it('should unsubscribe by handle, and skip handlers removed mid-dispatch', () => {
    const bus = quietBus()
    const second = vi.fn()

    const secondHandle = bus.on('tick', second)
    bus.on('tick', () => bus.unsubscribe(secondHandle), { priority: 1 })

    bus.emit('tick', null)
    expect(second).not.toHaveBeenCalled()
    expect(bus.unsubscribe(secondHandle)).toBe(false)
    expect(bus.size()).toBe(1)
  })

  it('should defer dispatch to a microtask when configured', async () => {
    const bus = quietBus({ scheduler: 'microtask' })
    const handler = vi.fn()
    bus.on('tick', handler)

    bus.emit('tick', 1)
    bus.emit('tick', 2)
    expect(handler).not.toHaveBeenCalled()

    await bus.drain()

    expect(handler).toHaveBeenCalledTimes(2)
    expect(handler.mock.calls.map((call) => call[0]?.data)).toEqual([1, 2])
  })

  it('should type payloads through descriptors', () => {
    const bus = quietBus()
    const buttonPressed = defineEventType<{ pressed: boolean }>('input.button')
    const switchTurned = defineEventType<{ pressed: boolean }>('input.switch')
    const pressed: Array<boolean> = []

    const unsubscribe = subscribeMany(bus, [
      [buttonPressed, (event) => pressed.push(event.data.pressed)],
      [switchTurned, (event) => pressed.push(!event.data.pressed)],
    ])

    bus.emit(buttonPressed, { pressed: true })
    bus.emit(switchTurned, { pressed: true })
    unsubscribe()
    bus.emit(buttonPressed, { pressed: true })

    expect(pressed).toEqual([true, false])
    expect(bus.size()).toBe(0)
  })

  it('should drop every subscription on clear', () => {
    const bus = quietBus()
    bus.on('a', () => {})
    bus.onAny(() => {})

    bus.clear()

    expect(bus.size()).toBe(0)
  })
})
