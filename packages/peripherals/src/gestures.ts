/**
 * Gesture virtual peripherals
 *
 * Derived inputs built from timing between raw events: double taps on one
 * producer, chords across producers, ordered sequences. All windows are in
 * milliseconds on the bus clock.
 */

import type { InputEvent, ProducerId } from './input'
import type {
  VirtualPeripheralContext,
  VirtualPeripheralDefinition,
  VirtualPeripheralMetadata,
} from './virtualPeripherals'

type GestureOptions = {
  outputEventType: string
  name?: string
  /** Bus priority (default 50) */
  priority?: number
  metadata?: VirtualPeripheralMetadata
}

const DEFAULT_GESTURE_PRIORITY = 50

const requirePositive = (value: number, label: string) => {
  if (!(value > 0) || !Number.isFinite(value)) {
    throw new RangeError(`${label} must be a positive number, got ${value}`)
  }
}

// ============================================================================
// Double tap
// ============================================================================

export type DoubleTapOptions = GestureOptions & {
  /** Maximum gap between the two taps (default 300ms) */
  windowMs?: number
}

/**
 * Emit `outputEventType` when the same producer fires `sourceEventType`
 * twice within the window. The output carries both taps as `events` and
 * the producer id of the taps. A third tap starts a new pair.
 */
export function doubleTapVirtualPeripheral(
  sourceEventType: string,
  options: DoubleTapOptions,
): VirtualPeripheralDefinition {
  const { windowMs = 300 } = options
  requirePositive(windowMs, 'windowMs')

  return {
    name: options.name ?? `${sourceEventType}.double_tap`,
    eventTypes: [sourceEventType],
    priority: options.priority ?? DEFAULT_GESTURE_PRIORITY,
    metadata: options.metadata,
    create: (context) => {
      const lastTap = new Map<ProducerId, { at: number; event: InputEvent }>()

      return {
        handle: (event) => {
          const now = context.now()
          const previous = lastTap.get(event.producerId)

          if (previous && now - previous.at <= windowMs) {
            lastTap.delete(event.producerId)
            context.emit(
              options.outputEventType,
              { events: [context.describe(previous.event), context.describe(event)] },
              event.producerId,
            )
            return
          }

          lastTap.set(event.producerId, { at: now, event })
        },
        shutdown: () => lastTap.clear(),
      }
    },
  }
}

// ============================================================================
// Simultaneous
// ============================================================================

export type SimultaneousOptions = GestureOptions & {
  /** Window in which the producers must all fire (default 10ms) */
  windowMs?: number
  /** Distinct producers needed (default 2, at least 2) */
  requiredSources?: number
}

/**
 * Emit `outputEventType` (producer 0) once `requiredSources` distinct
 * producers fire `eventType` within the window. The output lists the most
 * recent event of each producer, oldest first.
 */
export function simultaneousVirtualPeripheral(
  eventType: string,
  options: SimultaneousOptions,
): VirtualPeripheralDefinition {
  const { windowMs = 10, requiredSources = 2 } = options
  requirePositive(windowMs, 'windowMs')
  if (!Number.isInteger(requiredSources) || requiredSources < 2) {
    throw new RangeError(`requiredSources must be at least 2, got ${requiredSources}`)
  }

  return {
    name: options.name ?? `${eventType}.simultaneous`,
    eventTypes: [eventType],
    priority: options.priority ?? DEFAULT_GESTURE_PRIORITY,
    metadata: options.metadata,
    create: (context) => {
      let pending: Array<{ at: number; event: InputEvent }> = []

      return {
        handle: (event) => {
          const now = context.now()
          pending = pending.filter((entry) => now - entry.at <= windowMs)
          pending.push({ at: now, event })

          // latest event per producer, walking newest to oldest
          const latest = new Map<ProducerId, InputEvent>()
          for (let index = pending.length - 1; index >= 0; index -= 1) {
            const entry = pending[index]
            if (entry && !latest.has(entry.event.producerId)) {
              latest.set(entry.event.producerId, entry.event)
            }
          }

          if (latest.size >= requiredSources) {
            const ordered = Array.from(latest.values()).reverse()
            context.emit(
              options.outputEventType,
              { events: ordered.map((candidate) => context.describe(candidate)) },
              0,
            )
            pending = []
          }
        },
        shutdown: () => {
          pending = []
        },
      }
    },
  }
}

// ============================================================================
// Sequence
// ============================================================================

export type SequenceMatcher = {
  eventType: string
  predicate?: (event: InputEvent) => boolean
}

export type SequenceOptions = GestureOptions & {
  /**
   * Maximum gap between consecutive matches (default 1000ms).
   * null disables the timeout.
   */
  timeoutMs?: number | null
}

type SequenceProgress = {
  index: number
  at: number
  history: Array<InputEvent>
}

/**
 * Emit `outputEventType` when one producer's events match every matcher in
 * order. A non-matching event restarts the sequence (or begins a new one
 * if it matches the first step).
 */
export function sequenceVirtualPeripheral(
  name: string,
  matchers: ReadonlyArray<SequenceMatcher>,
  options: SequenceOptions,
): VirtualPeripheralDefinition {
  if (matchers.length === 0) {
    throw new RangeError('matchers must not be empty')
  }
  const timeoutMs = options.timeoutMs === undefined ? 1000 : options.timeoutMs
  if (timeoutMs !== null) requirePositive(timeoutMs, 'timeoutMs')

  const matches = (index: number, event: InputEvent) => {
    const matcher = matchers[index]
    if (!matcher || matcher.eventType !== event.eventType) return false
    return matcher.predicate ? matcher.predicate(event) : true
  }

  return {
    name,
    eventTypes: Array.from(new Set(matchers.map((matcher) => matcher.eventType))),
    priority: options.priority ?? DEFAULT_GESTURE_PRIORITY,
    metadata: options.metadata,
    create: (context: VirtualPeripheralContext) => {
      const progress = new Map<ProducerId, SequenceProgress>()

      return {
        handle: (event) => {
          const now = context.now()
          const state = progress.get(event.producerId)
          let index = 0
          let history: Array<InputEvent> = []

          if (state && (timeoutMs === null || now - state.at <= timeoutMs)) {
            index = state.index
            history = state.history
          }

          if (matches(index, event)) {
            const nextHistory = [...history, event]
            if (index + 1 === matchers.length) {
              progress.delete(event.producerId)
              context.emit(
                options.outputEventType,
                { sequence: nextHistory.map((item) => context.describe(item)) },
                event.producerId,
              )
            } else {
              progress.set(event.producerId, { index: index + 1, at: now, history: nextHistory })
            }
            return
          }

          if (matches(0, event)) {
            progress.set(event.producerId, { index: 1, at: now, history: [event] })
          } else {
            progress.delete(event.producerId)
          }
        },
        shutdown: () => progress.clear(),
      }
    },
  }
}
