/**
 * Event Bus Resource
 *
 * One bus per running system. It owns the state store, the virtual
 * peripheral registry and the playlist manager, so halting it also stops
 * every playlist run.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { createEventBus } from '@lumenwall/peripherals'
import type { EventBus } from '@lumenwall/peripherals'
import type { RuntimeConfig } from '@lumenwall/system'

export type EventBusResourceOptions = {
  now?: () => number
}

export const createEventBusResource = (options: EventBusResourceOptions = {}) =>
  defineResource({
    dependencies: ['config'] as const,
    start: ({ config }: { config: RuntimeConfig }): EventBus => {
      const bus = createEventBus({ scheduler: config.eventBus.scheduler, now: options.now })
      console.log(`[EventBus] Started (${bus.scheduler} dispatch)`)
      return bus
    },
    halt: async (bus: EventBus) => {
      await bus.drain()
      bus.clear()
      console.log('[EventBus] Cleared')
    },
  })

export type EventBusResource = StartedResource<ReturnType<typeof createEventBusResource>>
