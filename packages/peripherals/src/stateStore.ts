/**
 * State Store
 *
 * Latest event per (event type, producer). The bus records every
 * dispatched event here so consumers can ask "what did button 3 last
 * report?" without subscribing.
 *
 * Reads hand out copies; the internal maps never escape.
 */

import type { InputEvent, ProducerId } from './input'

export type StateEntry<TData = unknown> = {
  readonly eventType: string
  readonly producerId: ProducerId
  readonly data: TData
  readonly timestamp: number
  readonly sequence: number
}

export type StateSnapshot = Readonly<
  Record<string, Readonly<Record<string, StateEntry>>>
>

export type StateStore = {
  /**
   * Record an event as the latest for its type and producer. An event
   * older (by sequence) than the stored one is ignored and the stored
   * entry returned.
   */
  update: (event: InputEvent) => StateEntry
  /**
   * Latest entry for a type. Without a producer, the most recent entry
   * across all producers of that type.
   */
  getLatest: (eventType: string, producerId?: ProducerId) => StateEntry | undefined
  /** Every producer's latest entry for a type, as a fresh map */
  getAll: (eventType: string) => ReadonlyMap<ProducerId, StateEntry>
  /** Frozen copy of everything, keyed by type then producer */
  snapshot: () => StateSnapshot
  /** Number of (type, producer) entries */
  size: () => number
  clear: () => void
}

export function createStateStore(): StateStore {
  const entries = new Map<string, Map<ProducerId, StateEntry>>()

  const api = {
    update: (event) => {
      const existing = entries.get(event.eventType)?.get(event.producerId)
      // a handler may have re-emitted, and recorded, a newer event first
      if (existing && existing.sequence >= event.sequence) return existing

      const entry: StateEntry = Object.freeze({
        eventType: event.eventType,
        producerId: event.producerId,
        data: event.data,
        timestamp: event.timestamp,
        sequence: event.sequence,
      })

      let byProducer = entries.get(event.eventType)
      if (!byProducer) {
        byProducer = new Map()
        entries.set(event.eventType, byProducer)
      }
      byProducer.set(event.producerId, entry)
      return entry
    },

    getLatest: (eventType, producerId) => {
      const byProducer = entries.get(eventType)
      if (!byProducer) return undefined
      if (producerId !== undefined) return byProducer.get(producerId)

      let latest: StateEntry | undefined
      for (const entry of byProducer.values()) {
        if (!latest || entry.sequence > latest.sequence) {
          latest = entry
        }
      }
      return latest
    },

    getAll: (eventType) => new Map(entries.get(eventType) ?? []),

    snapshot: () => {
      const result: Record<string, Readonly<Record<string, StateEntry>>> = {}
      for (const [eventType, byProducer] of entries) {
        result[eventType] = Object.freeze(
          Object.fromEntries(
            Array.from(byProducer, ([producerId, entry]) => [String(producerId), entry] as const),
          ),
        )
      }
      return Object.freeze(result)
    },

    size: () => {
      let count = 0
      entries.forEach((byProducer) => {
        count += byProducer.size
      })
      return count
    },

    clear: () => {
      entries.clear()
    },
  } satisfies StateStore

  return api
}
