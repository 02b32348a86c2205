import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createEventBus } from '../eventBus'
import type { EventBus } from '../eventBus'
import type { InputEvent } from '../input'
import {
  doubleTapVirtualPeripheral,
  sequenceVirtualPeripheral,
  simultaneousVirtualPeripheral,
} from '../gestures'
import { defaultGatePredicate, gatedMirrorVirtualPeripheral } from '../gates'
import type { VirtualPeripheralContext } from '../virtualPeripherals'

describe('virtual peripherals', () => {
  let clock = 0
  let bus: EventBus
  let outputs: Array<InputEvent>

  const record = (eventType: string) => {
    bus.on(eventType, (event) => {
      outputs.push(event)
    })
  }

  beforeEach(() => {
    clock = 0
    outputs = []
    bus = createEventBus({ now: () => clock })
  })

  describe('manager', () => {
    it('should tag emitted payloads and wrap non-object data', () => {
      const handle = bus.virtualPeripherals.register({
        name: 'echo',
        eventTypes: ['raw'],
        metadata: { zone: 'north' },
        create: (ctx) => ({
          handle: (event) => ctx.emit('echoed', event.data, 7),
        }),
      })
      record('echoed')

      bus.emit('raw', 42)
      bus.emit('raw', { level: 3 })

      expect(outputs.map((event) => event.data)).toEqual([
        { value: 42, virtualPeripheral: { id: handle.peripheralId, name: 'echo', metadata: { zone: 'north' } } },
        { level: 3, virtualPeripheral: { id: handle.peripheralId, name: 'echo', metadata: { zone: 'north' } } },
      ])
      expect(outputs[0]?.producerId).toBe(7)
    })

    it('should build a fresh instance per registration and on update', () => {
      const create = vi.fn(() => ({ handle: () => {}, shutdown: vi.fn() }))
      const definition = { name: 'counter', eventTypes: ['raw'], create }

      const first = bus.virtualPeripherals.register(definition)
      bus.virtualPeripherals.register(definition)
      bus.virtualPeripherals.update(first, { ...definition, name: 'counter-v2' })

      expect(create).toHaveBeenCalledTimes(3)
      expect(bus.virtualPeripherals.list().get(first.peripheralId)?.name).toBe('counter-v2')
      expect(bus.virtualPeripherals.list().size).toBe(2)
    })

    it('should unsubscribe and shut down on remove', () => {
      const shutdown = vi.fn()
      const handleEvent = vi.fn()
      const handle = bus.virtualPeripherals.register({
        name: 'removable',
        eventTypes: ['raw'],
        create: () => ({ handle: handleEvent, shutdown }),
      })

      bus.virtualPeripherals.remove(handle)
      bus.emit('raw', 1)

      expect(shutdown).toHaveBeenCalledTimes(1)
      expect(handleEvent).not.toHaveBeenCalled()
      expect(bus.size()).toBe(0)
    })

    it('should log instance failures without disturbing other handlers', () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
      const after = vi.fn()
      bus.virtualPeripherals.register({
        name: 'broken',
        eventTypes: ['raw'],
        priority: 10,
        create: () => ({
          handle: () => {
            throw new Error('broken peripheral')
          },
        }),
      })
      bus.on('raw', after)

      bus.emit('raw', 1)

      expect(after).toHaveBeenCalledTimes(1)
      expect(consoleError).toHaveBeenCalledTimes(1)
      consoleError.mockRestore()
    })

    it('should reject an update of an unknown handle', () => {
      expect(() =>
        bus.virtualPeripherals.update(
          { peripheralId: 'vp-missing' },
          { name: 'x', eventTypes: ['raw'], create: () => ({ handle: () => {} }) },
        ),
      ).toThrow('Unknown virtual peripheral id: vp-missing')
    })
  })

  describe('doubleTapVirtualPeripheral', () => {
    beforeEach(() => {
      bus.virtualPeripherals.register(
        doubleTapVirtualPeripheral('input.tap', { outputEventType: 'input.double_tap' }),
      )
      record('input.double_tap')
    })

    it('should emit when the same producer taps twice within the window', () => {
      bus.emit('input.tap', { pressed: true }, { producerId: 1 })
      clock = 200
      bus.emit('input.tap', { pressed: true }, { producerId: 1 })

      expect(outputs).toHaveLength(1)
      expect(outputs[0]?.producerId).toBe(1)
      expect(outputs[0]?.data).toEqual({
        events: [
          { eventType: 'input.tap', producerId: 1, data: { pressed: true }, timestamp: 0 },
          { eventType: 'input.tap', producerId: 1, data: { pressed: true }, timestamp: 200 },
        ],
        virtualPeripheral: { id: 'vp-1', name: 'input.tap.double_tap' },
      })
    })

    it('should start a new pair when the gap exceeds the window', () => {
      bus.emit('input.tap', null, { producerId: 1 })
      clock = 400
      bus.emit('input.tap', null, { producerId: 1 })
      expect(outputs).toHaveLength(0)

      clock = 500
      bus.emit('input.tap', null, { producerId: 1 })
      expect(outputs).toHaveLength(1)
    })

    it('should track producers independently', () => {
      bus.emit('input.tap', null, { producerId: 1 })
      clock = 100
      bus.emit('input.tap', null, { producerId: 2 })

      expect(outputs).toHaveLength(0)
    })

    it('should not pair a third tap with the second', () => {
      bus.emit('input.tap', null, { producerId: 1 })
      clock = 100
      bus.emit('input.tap', null, { producerId: 1 })
      clock = 200
      bus.emit('input.tap', null, { producerId: 1 })

      expect(outputs).toHaveLength(1)
    })
  })

  describe('simultaneousVirtualPeripheral', () => {
    beforeEach(() => {
      bus.virtualPeripherals.register(
        simultaneousVirtualPeripheral('input.button', {
          outputEventType: 'input.chord',
          windowMs: 10,
        }),
      )
      record('input.chord')
    })

    it('should emit once two producers fire inside the window', () => {
      bus.emit('input.button', 'a', { producerId: 1 })
      clock = 5
      bus.emit('input.button', 'b', { producerId: 2 })

      expect(outputs).toHaveLength(1)
      expect(outputs[0]?.producerId).toBe(0)
      expect(outputs[0]?.data).toMatchObject({
        events: [
          { producerId: 1, data: 'a', timestamp: 0 },
          { producerId: 2, data: 'b', timestamp: 5 },
        ],
      })
    })

    it('should ignore producers that fell out of the window', () => {
      bus.emit('input.button', 'a', { producerId: 1 })
      clock = 20
      bus.emit('input.button', 'b', { producerId: 2 })

      expect(outputs).toHaveLength(0)
    })

    it('should not count one producer twice', () => {
      bus.emit('input.button', 'a', { producerId: 1 })
      clock = 2
      bus.emit('input.button', 'a', { producerId: 1 })

      expect(outputs).toHaveLength(0)
    })

    it('should reject fewer than two required sources', () => {
      expect(() =>
        simultaneousVirtualPeripheral('x', { outputEventType: 'y', requiredSources: 1 }),
      ).toThrow(RangeError)
    })
  })

  describe('sequenceVirtualPeripheral', () => {
    beforeEach(() => {
      bus.virtualPeripherals.register(
        sequenceVirtualPeripheral(
          'konami',
          [
            { eventType: 'input.up' },
            { eventType: 'input.down' },
            { eventType: 'input.button', predicate: (event) => event.data === 'a' },
          ],
          { outputEventType: 'input.combo' },
        ),
      )
      record('input.combo')
    })

    it('should emit when every matcher passes in order', () => {
      bus.emit('input.up', null, { producerId: 3 })
      clock = 100
      bus.emit('input.down', null, { producerId: 3 })
      clock = 200
      bus.emit('input.button', 'a', { producerId: 3 })

      expect(outputs).toHaveLength(1)
      expect(outputs[0]?.producerId).toBe(3)
      expect(outputs[0]?.data).toMatchObject({
        sequence: [
          { eventType: 'input.up' },
          { eventType: 'input.down' },
          { eventType: 'input.button', data: 'a' },
        ],
      })
    })

    it('should reset when a step arrives after the timeout', () => {
      bus.emit('input.up', null, { producerId: 3 })
      clock = 1500
      bus.emit('input.down', null, { producerId: 3 })
      clock = 1600
      bus.emit('input.button', 'a', { producerId: 3 })

      expect(outputs).toHaveLength(0)
    })

    it('should reset when a predicate fails', () => {
      bus.emit('input.up', null, { producerId: 3 })
      bus.emit('input.down', null, { producerId: 3 })
      bus.emit('input.button', 'b', { producerId: 3 })
      bus.emit('input.button', 'a', { producerId: 3 })

      expect(outputs).toHaveLength(0)
    })

    it('should restart from a first-step match mid sequence', () => {
      bus.emit('input.up', null, { producerId: 3 })
      bus.emit('input.up', null, { producerId: 3 })
      bus.emit('input.down', null, { producerId: 3 })
      bus.emit('input.button', 'a', { producerId: 3 })

      expect(outputs).toHaveLength(1)
    })
  })

  describe('gatedMirrorVirtualPeripheral', () => {
    it('should mirror only while the gate is on', () => {
      bus.virtualPeripherals.register(
        gatedMirrorVirtualPeripheral('mirror', {
          gateEventTypes: 'input.switch',
          mirrorEventTypes: ['input.knob'],
          outputProducerId: 9,
        }),
      )
      bus.on('input.knob', (event) => {
        if (event.producerId === 9) outputs.push(event)
      })

      bus.emit('input.knob', { value: 1 }, { producerId: 1 })
      bus.emit('input.switch', { pressed: true }, { producerId: 1 })
      bus.emit('input.knob', { value: 2 }, { producerId: 1 })
      bus.emit('input.switch', { pressed: false }, { producerId: 1 })
      bus.emit('input.knob', { value: 3 }, { producerId: 1 })

      expect(outputs).toHaveLength(1)
      expect(outputs[0]?.data).toMatchObject({ value: 2 })
    })

    it('should read the usual gate keys by default', () => {
      const contexts: Array<VirtualPeripheralContext> = []
      bus.virtualPeripherals.register({
        name: 'probe',
        eventTypes: ['probe'],
        create: (ctx) => {
          contexts.push(ctx)
          return { handle: () => {} }
        },
      })
      const [context] = contexts
      if (!context) throw new Error('probe context was not created')
      const gate = (data: unknown) =>
        defaultGatePredicate(context, {
          eventType: 'gate',
          data,
          producerId: 0,
          timestamp: 0,
          sequence: 0,
        })

      expect(gate({ pressed: true })).toBe(true)
      expect(gate({ state: 0 })).toBe(false)
      expect(gate({ enabled: 1 })).toBe(true)
      expect(gate({ value: '' })).toBe(false)
      expect(gate({})).toBe(false)
      expect(gate({ other: 1 })).toBe(true)
      expect(gate(0)).toBe(false)
      expect(gate('on')).toBe(true)
    })
  })
})
