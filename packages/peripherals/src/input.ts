/**
 * Input events
 *
 * The unit of traffic on the peripheral bus. Events are immutable once
 * created: the payload is copied and frozen so no handler can change what
 * another handler (or the state store) sees.
 */

import { deepFreeze } from '@lumenwall/system'

export type ProducerId = number

/** Producer id used when an emitter does not name one */
export const DEFAULT_PRODUCER_ID: ProducerId = 0

export type InputEvent<TData = unknown> = {
  readonly eventType: string
  readonly data: TData
  readonly producerId: ProducerId
  /** Bus clock at creation, in milliseconds */
  readonly timestamp: number
  /** Bus-wide emission order, strictly increasing */
  readonly sequence: number
}

/**
 * Copy a payload so later mutations by the emitter do not leak in.
 * Values structuredClone cannot copy (functions, class instances with
 * private state) are kept by reference.
 */
export const snapshotPayload = <T>(data: T): T => {
  if (data === null || typeof data !== 'object') return data
  try {
    return deepFreeze(structuredClone(data))
  } catch {
    // uncloneable payloads are frozen in place
    return deepFreeze(data)
  }
}

export type CreateInputEventOptions<TData> = {
  eventType: string
  data: TData
  producerId?: ProducerId
  timestamp: number
  sequence: number
}

export function createInputEvent<TData>(
  options: CreateInputEventOptions<TData>,
): InputEvent<TData> {
  return Object.freeze({
    eventType: options.eventType,
    data: snapshotPayload(options.data),
    producerId: options.producerId ?? DEFAULT_PRODUCER_ID,
    timestamp: options.timestamp,
    sequence: options.sequence,
  })
}

/**
 * Event descriptor for type-safe subscriptions.
 * Carries the event type string and a phantom payload type for inference.
 */
export interface EventDescriptor<TData = unknown> {
  readonly type: string
  /** Phantom type for inference - not present at runtime */
  readonly _data?: TData
}

/**
 * Define a typed event type.
 *
 * @example
 * ```ts
 * const buttonPressed = defineEventType<{ pressed: boolean }>('input.button')
 * bus.subscribe(buttonPressed, (event) => event.data.pressed)
 * ```
 */
export const defineEventType = <TData>(type: string): EventDescriptor<TData> =>
  Object.freeze({ type })
