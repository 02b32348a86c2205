/**
 * Gate virtual peripherals
 *
 * A gate event (a switch, a held button) turns behaviour on or off:
 * mirroring another producer's events, or starting a playlist.
 */

import type { InputEvent, ProducerId } from './input'
import { PLAYLIST_STOPPED } from './playlists'
import type { EventPlaylist, EventPlaylistInput, PlaylistHandle } from './playlists'
import type {
  VirtualPeripheralContext,
  VirtualPeripheralDefinition,
  VirtualPeripheralMetadata,
} from './virtualPeripherals'

export type GatePredicate = (
  context: VirtualPeripheralContext,
  event: InputEvent,
) => boolean

const GATE_KEYS = ['pressed', 'state', 'enabled', 'value'] as const

/**
 * Truthiness of the first of `pressed`, `state`, `enabled`, `value` found on
 * an object payload, else of the payload itself. Empty objects are off.
 */
export const defaultGatePredicate: GatePredicate = (_context, event) => {
  const { data } = event
  if (data !== null && typeof data === 'object' && !Array.isArray(data)) {
    for (const key of GATE_KEYS) {
      if (key in data) return Boolean(Reflect.get(data, key))
    }
    return Object.keys(data).length > 0
  }
  if (Array.isArray(data)) return data.length > 0
  return Boolean(data)
}

const toList = (value: string | ReadonlyArray<string>): Array<string> =>
  typeof value === 'string' ? [value] : Array.from(value)

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value)

// ============================================================================
// Gated mirror
// ============================================================================

export type GatedMirrorOptions = {
  gateEventTypes: string | ReadonlyArray<string>
  mirrorEventTypes: string | ReadonlyArray<string>
  /** Producer id the mirrored events are re-emitted under */
  outputProducerId: ProducerId
  gatePredicate?: GatePredicate
  /** Gate state before any gate event arrives (default off) */
  initialState?: boolean
  priority?: number
  metadata?: VirtualPeripheralMetadata
}

/**
 * While the gate is on, re-emit every mirror event under
 * `outputProducerId`.
 */
export function gatedMirrorVirtualPeripheral(
  name: string,
  options: GatedMirrorOptions,
): VirtualPeripheralDefinition {
  const gateTypes = toList(options.gateEventTypes)
  const mirrorTypes = toList(options.mirrorEventTypes)
  if (gateTypes.length === 0) throw new RangeError('gateEventTypes must not be empty')
  if (mirrorTypes.length === 0) throw new RangeError('mirrorEventTypes must not be empty')
  const predicate = options.gatePredicate ?? defaultGatePredicate

  return {
    name,
    eventTypes: Array.from(new Set([...gateTypes, ...mirrorTypes])),
    priority: options.priority ?? 0,
    metadata: options.metadata,
    create: (context) => {
      let enabled = options.initialState ?? false

      return {
        handle: (event) => {
          if (gateTypes.includes(event.eventType)) {
            try {
              enabled = predicate(context, event)
            } catch (error) {
              console.error(
                `[VirtualPeripherals] "${name}" failed to evaluate gate event:`,
                error,
              )
            }
            return
          }

          // our own output comes back through the bus; never mirror it twice
          if (event.producerId === options.outputProducerId) return

          if (enabled && mirrorTypes.includes(event.eventType)) {
            context.emit(event.eventType, event.data, options.outputProducerId)
          }
        },
      }
    },
  }
}

// ============================================================================
// Gated playlist
// ============================================================================

export type GatedPlaylistOptions = {
  playlist: EventPlaylist | EventPlaylistInput
  /** Decides whether a gate event starts the playlist (default: always) */
  predicate?: GatePredicate
  /** Cancel runs this peripheral started before starting a new one */
  cancelActiveRuns?: boolean
  name?: string
  priority?: number
  metadata?: VirtualPeripheralMetadata
}

/**
 * Start a playlist whenever a gate event passes the predicate. The playlist
 * is registered with the bus for the lifetime of the peripheral.
 */
export function gatedPlaylistVirtualPeripheral(
  gateEventTypes: ReadonlyArray<string>,
  options: GatedPlaylistOptions,
): VirtualPeripheralDefinition {
  if (gateEventTypes.length === 0) {
    throw new RangeError('gateEventTypes must not be empty')
  }
  if (options.playlist.triggerEventType !== undefined) {
    throw new RangeError('gated playlists must not declare triggerEventType')
  }
  const gateTypes = Array.from(gateEventTypes)

  return {
    name: options.name ?? `${options.playlist.name}.gated`,
    eventTypes: Array.from(new Set([...gateTypes, PLAYLIST_STOPPED])),
    priority: options.priority ?? 50,
    metadata: options.metadata,
    create: (context) => {
      const playlistHandle: PlaylistHandle = context.playlists.register(options.playlist)
      const activeRuns = new Set<string>()

      return {
        handle: (event) => {
          if (event.eventType === PLAYLIST_STOPPED) {
            const { data } = event
            if (isRecord(data) && data.definitionId === playlistHandle.playlistId) {
              const runId = data.playlistId
              if (typeof runId === 'string') activeRuns.delete(runId)
            }
            return
          }

          if (!gateTypes.includes(event.eventType)) return

          if (options.predicate) {
            try {
              if (!options.predicate(context, event)) return
            } catch (error) {
              console.error(
                `[VirtualPeripherals] "${context.definition.name}" failed to evaluate gate predicate:`,
                error,
              )
              return
            }
          }

          if (options.cancelActiveRuns) {
            Array.from(activeRuns).forEach((runId) =>
              context.playlists.stop(runId, 'cancelled'),
            )
          }

          activeRuns.add(context.playlists.start(playlistHandle, event))
        },
        shutdown: () => {
          Array.from(activeRuns).forEach((runId) => context.playlists.stop(runId, 'cancelled'))
          activeRuns.clear()
          context.playlists.remove(playlistHandle)
        },
      }
    },
  }
}
