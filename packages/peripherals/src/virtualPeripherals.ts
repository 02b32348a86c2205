/**
 * Virtual Peripherals
 *
 * A virtual peripheral listens to bus events and emits derived events, the
 * way a physical device would: a double tap, a chord pressed across
 * several buttons, a gesture sequence. Definitions are data; the manager
 * builds one instance per registration, so instance state (last tap per
 * producer, partial sequences) is never shared between registrations.
 */

import type { EventBusCore, SubscriptionHandle } from './eventBus'
import type { InputEvent, ProducerId } from './input'
import { DEFAULT_PRODUCER_ID } from './input'
import type { StateStore } from './stateStore'
import type { EventPlaylistManager } from './playlists'

// ============================================================================
// Types
// ============================================================================

export type VirtualPeripheralMetadata = Readonly<Record<string, unknown>>

export type VirtualPeripheralInstance = {
  handle: (event: InputEvent) => void
  shutdown?: () => void
}

export type VirtualPeripheralDefinition = {
  readonly name: string
  readonly eventTypes: ReadonlyArray<string>
  readonly create: (context: VirtualPeripheralContext) => VirtualPeripheralInstance
  /** Bus priority of the instance's subscriptions (default 0) */
  readonly priority?: number
  readonly metadata?: VirtualPeripheralMetadata
}

export type VirtualPeripheralHandle = {
  readonly peripheralId: string
}

/** Tag added to every payload a virtual peripheral emits */
export type VirtualPeripheralDescriptor = {
  id: string
  name: string
  metadata?: VirtualPeripheralMetadata
}

export type EventDescription = {
  eventType: string
  producerId: ProducerId
  data: unknown
  timestamp: number
}

export type VirtualPeripheralContext = {
  readonly definition: VirtualPeripheralDefinition
  readonly stateStore: StateStore
  readonly playlists: EventPlaylistManager
  /** Bus clock in milliseconds */
  now: () => number
  /**
   * Emit on the owning bus. Object payloads are copied and tagged with
   * `virtualPeripheral`; anything else is wrapped as `{ value }`.
   */
  emit: (eventType: string, data: unknown, producerId?: ProducerId) => void
  describe: (event: InputEvent) => EventDescription
}

export type VirtualPeripheralManager = {
  register: (definition: VirtualPeripheralDefinition) => VirtualPeripheralHandle
  /** Replace a registration's definition, rebuilding its instance */
  update: (handle: VirtualPeripheralHandle, definition: VirtualPeripheralDefinition) => void
  remove: (handle: VirtualPeripheralHandle) => void
  list: () => ReadonlyMap<string, VirtualPeripheralDefinition>
  /** Remove every registration */
  clear: () => void
}

// ============================================================================
// Context
// ============================================================================

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value)

export const describeEvent = (event: InputEvent): EventDescription => ({
  eventType: event.eventType,
  producerId: event.producerId,
  data: event.data,
  timestamp: event.timestamp,
})

const createContext = (
  bus: EventBusCore,
  playlists: EventPlaylistManager,
  definition: VirtualPeripheralDefinition,
  handle: VirtualPeripheralHandle,
): VirtualPeripheralContext => ({
  definition,
  stateStore: bus.stateStore,
  playlists,
  now: bus.now,
  emit: (eventType, data, producerId = DEFAULT_PRODUCER_ID) => {
    const payload: Record<string, unknown> = isRecord(data)
      ? { ...data }
      : { value: data }

    if (!('virtualPeripheral' in payload)) {
      const descriptor: VirtualPeripheralDescriptor = {
        id: handle.peripheralId,
        name: definition.name,
      }
      if (definition.metadata !== undefined) {
        descriptor.metadata = definition.metadata
      }
      payload.virtualPeripheral = descriptor
    }

    bus.emit(eventType, payload, { producerId })
  },
  describe: describeEvent,
})

// ============================================================================
// Manager
// ============================================================================

type Binding = {
  definition: VirtualPeripheralDefinition
  instance: VirtualPeripheralInstance
  subscriptions: Array<SubscriptionHandle>
}

export function createVirtualPeripheralManager(
  bus: EventBusCore,
  playlists: EventPlaylistManager,
): VirtualPeripheralManager {
  const bindings = new Map<string, Binding>()
  let nextId = 0

  const route = (peripheralId: string, event: InputEvent) => {
    const binding = bindings.get(peripheralId)
    if (!binding) return
    try {
      binding.instance.handle(event)
    } catch (error) {
      console.error(
        `[VirtualPeripherals] "${binding.definition.name}" failed for "${event.eventType}":`,
        error,
      )
    }
  }

  const bind = (handle: VirtualPeripheralHandle, definition: VirtualPeripheralDefinition) => {
    if (definition.eventTypes.length === 0) {
      throw new Error(`Virtual peripheral "${definition.name}" requires eventTypes`)
    }
    const context = createContext(bus, playlists, definition, handle)
    const instance = definition.create(context)
    const subscriptions = Array.from(new Set(definition.eventTypes)).map((eventType) =>
      bus.on(eventType, (event) => route(handle.peripheralId, event), {
        priority: definition.priority ?? 0,
      }),
    )
    bindings.set(handle.peripheralId, { definition, instance, subscriptions })
  }

  const unbind = (handle: VirtualPeripheralHandle) => {
    const binding = bindings.get(handle.peripheralId)
    if (!binding) return
    bindings.delete(handle.peripheralId)
    binding.subscriptions.forEach((subscription) => bus.unsubscribe(subscription))
    try {
      binding.instance.shutdown?.()
    } catch (error) {
      console.error(
        `[VirtualPeripherals] "${binding.definition.name}" shutdown failed:`,
        error,
      )
    }
    console.debug(`[VirtualPeripherals] Unregistered "${binding.definition.name}"`)
  }

  const api = {
    register: (definition) => {
      const handle = Object.freeze({ peripheralId: `vp-${++nextId}` })
      bind(handle, definition)
      return handle
    },

    update: (handle, definition) => {
      if (!bindings.has(handle.peripheralId)) {
        throw new Error(`Unknown virtual peripheral id: ${handle.peripheralId}`)
      }
      unbind(handle)
      bind(handle, definition)
    },

    remove: (handle) => unbind(handle),

    list: () =>
      new Map(
        Array.from(bindings, ([peripheralId, binding]) => [peripheralId, binding.definition] as const),
      ),

    clear: () => {
      Array.from(bindings.keys()).forEach((peripheralId) => unbind({ peripheralId }))
    },
  } satisfies VirtualPeripheralManager

  return api
}
