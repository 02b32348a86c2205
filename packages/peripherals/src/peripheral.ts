/**
 * Peripherals
 *
 * Physical (or simulated) input devices. A peripheral runs its own
 * background loop, pushing readings onto the bus, and may accept events
 * back (an LED ring echoing a button press). The manager finds
 * peripherals through detectors, runs them, and stops them together.
 */

import { toError } from '@lumenwall/system'
import type { EventBus, SubscriptionHandle } from './eventBus'
import type { InputEvent, ProducerId } from './input'

// ============================================================================
// Types
// ============================================================================

export type PeripheralInfo = {
  id: string
  kind: string
  description?: string
}

export type PeripheralEmit = (eventType: string, data: unknown, producerId?: ProducerId) => void

export type Peripheral = {
  readonly id: string
  info: () => PeripheralInfo
  /**
   * Background work, started once by the manager. Must return when
   * `signal` aborts.
   */
  run?: (emit: PeripheralEmit, signal: AbortSignal) => Promise<void>
  /** Event types routed back to `handleInput` */
  inputEventTypes?: ReadonlyArray<string>
  handleInput?: (event: InputEvent) => void
}

/** Returns the peripherals it can find right now */
export type PeripheralDetector = () => Iterable<Peripheral>

export type PeripheralManagerOptions = {
  bus: EventBus
  detectors?: ReadonlyArray<PeripheralDetector>
}

export type PeripheralManager = {
  /** Run every detector, registering peripherals not seen before */
  detect: () => Array<Peripheral>
  register: (peripheral: Peripheral) => void
  /** Start every registered peripheral's background loop */
  start: () => void
  peripherals: () => ReadonlyArray<Peripheral>
  isStarted: () => boolean
  /** Abort every loop and wait for all of them to settle */
  close: () => Promise<void>
}

// ============================================================================
// Manager
// ============================================================================

export function createPeripheralManager(
  options: PeripheralManagerOptions,
): PeripheralManager {
  const { bus, detectors = [] } = options
  const registered = new Map<string, Peripheral>()
  const inputSubscriptions: Array<SubscriptionHandle> = []
  const runs: Array<Promise<void>> = []
  const controller = new AbortController()
  let started = false
  let closed = false

  const subscribeInputs = (peripheral: Peripheral) => {
    const { handleInput, inputEventTypes = [] } = peripheral
    if (!handleInput) return
    inputEventTypes.forEach((eventType) => {
      inputSubscriptions.push(bus.on(eventType, (event) => handleInput(event)))
    })
  }

  const launch = (peripheral: Peripheral) => {
    if (!peripheral.run) return
    const emit: PeripheralEmit = (eventType, data, producerId) => {
      if (controller.signal.aborted) return
      bus.emit(eventType, data, { producerId })
    }

    console.log(`[Peripherals] Starting ${peripheral.id}`)
    runs.push(
      peripheral.run(emit, controller.signal).catch((error: unknown) => {
        console.error(`[Peripherals] ${peripheral.id} stopped with error:`, toError(error))
      }),
    )
  }

  const register = (peripheral: Peripheral) => {
    if (closed) {
      throw new Error('Peripheral manager is closed')
    }
    if (registered.has(peripheral.id)) return
    registered.set(peripheral.id, peripheral)
    subscribeInputs(peripheral)
    // late arrivals join a running manager
    if (started) launch(peripheral)
  }

  const api = {
    detect: () => {
      const found: Array<Peripheral> = []
      for (const detector of detectors) {
        for (const peripheral of detector()) {
          if (registered.has(peripheral.id)) continue
          register(peripheral)
          found.push(peripheral)
        }
      }
      console.log(`[Peripherals] Detected ${found.length} peripheral(s)`)
      return found
    },

    register,

    start: () => {
      if (started) {
        throw new Error('Peripheral manager already started')
      }
      started = true
      registered.forEach(launch)
    },

    peripherals: () => Array.from(registered.values()),

    isStarted: () => started,

    close: async () => {
      if (closed) return
      closed = true
      controller.abort()
      inputSubscriptions.forEach((subscription) => bus.unsubscribe(subscription))
      inputSubscriptions.length = 0
      await Promise.all(runs)
      console.log('[Peripherals] All peripherals stopped')
    },
  } satisfies PeripheralManager

  return api
}
