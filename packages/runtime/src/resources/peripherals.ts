/**
 * Peripherals Resource
 *
 * Detects peripherals, starts their background loops against the bus and
 * stops them all at halt.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { createPeripheralManager } from '@lumenwall/peripherals'
import type { EventBus, Peripheral, PeripheralDetector, PeripheralManager } from '@lumenwall/peripherals'

export type PeripheralsResourceOptions = {
  detectors?: ReadonlyArray<PeripheralDetector>
  /** Registered before detection runs */
  peripherals?: ReadonlyArray<Peripheral>
}

export const createPeripheralsResource = (options: PeripheralsResourceOptions = {}) =>
  defineResource({
    dependencies: ['eventBus'] as const,
    start: ({ eventBus }: { eventBus: EventBus }): PeripheralManager => {
      const manager = createPeripheralManager({ bus: eventBus, detectors: options.detectors })
      options.peripherals?.forEach((peripheral) => manager.register(peripheral))
      manager.detect()
      manager.start()
      return manager
    },
    halt: async (manager: PeripheralManager) => {
      await manager.close()
    },
  })

export type PeripheralsResource = StartedResource<ReturnType<typeof createPeripheralsResource>>
