/**
 * Event Playlists
 *
 * A playlist is a scripted series of events played onto the bus with
 * timing: each step fires at an offset from the run start and may repeat
 * at a fixed interval. Playlists start on demand or when their trigger
 * event arrives, and stop early on cancellation or an interrupt event.
 *
 * Every run announces itself on the bus:
 * - event.playlist.created when it starts
 * - event.playlist.emitted after each step emission
 * - event.playlist.stopped with reason completed | cancelled | interrupted
 * - the playlist's own completion event type, when it completes
 */

import { z } from 'zod'
import { ConfigurationError } from '@lumenwall/system'
import type { EventBusCore, SubscriptionHandle } from './eventBus'
import type { InputEvent, ProducerId } from './input'
import { DEFAULT_PRODUCER_ID } from './input'

export const PLAYLIST_CREATED = 'event.playlist.created'
export const PLAYLIST_EMITTED = 'event.playlist.emitted'
export const PLAYLIST_STOPPED = 'event.playlist.stopped'

/** Trigger and interrupt subscriptions run ahead of ordinary handlers */
const PLAYLIST_SUBSCRIPTION_PRIORITY = 100

// ============================================================================
// Definitions
// ============================================================================

export const playlistStepSchema = z
  .object({
    eventType: z.string().min(1),
    data: z.unknown().optional(),
    offsetMs: z.number().min(0).finite().default(0),
    repeat: z.number().int().min(1).default(1),
    intervalMs: z.number().gt(0).finite().optional(),
    producerId: z.number().int().default(DEFAULT_PRODUCER_ID),
  })
  .refine((step) => step.repeat === 1 || step.intervalMs !== undefined, {
    message: 'intervalMs must be positive when repeat > 1',
    path: ['intervalMs'],
  })

export const eventPlaylistSchema = z.object({
  name: z.string().min(1),
  steps: z.array(playlistStepSchema).min(1),
  triggerEventType: z.string().min(1).optional(),
  interruptEvents: z.array(z.string().min(1)).default([]),
  completionEventType: z.string().min(1).optional(),
  metadata: z.record(z.unknown()).optional(),
})

export type PlaylistStepInput = z.input<typeof playlistStepSchema>
export type EventPlaylistInput = z.input<typeof eventPlaylistSchema>
export type PlaylistStep = z.output<typeof playlistStepSchema>
export type EventPlaylist = Readonly<z.output<typeof eventPlaylistSchema>>

/**
 * Validate and normalize a playlist definition.
 * @throws ConfigurationError describing the first invalid field
 */
export function defineEventPlaylist(input: EventPlaylistInput): EventPlaylist {
  const result = eventPlaylistSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    const path = issue ? issue.path.join('.') : ''
    throw new ConfigurationError(
      `Invalid playlist "${input.name}": ${path ? `${path}: ` : ''}${issue?.message ?? 'invalid'}`,
      path || undefined,
      { cause: result.error },
    )
  }
  return Object.freeze(result.data)
}

export type PlaylistHandle = {
  readonly playlistId: string
}

export type PlaylistStopReason = 'completed' | 'cancelled' | 'interrupted'

type EventSummary = {
  eventType: string
  producerId: ProducerId
  data: unknown
}

const summarize = (event: InputEvent): EventSummary => ({
  eventType: event.eventType,
  producerId: event.producerId,
  data: event.data,
})

// ============================================================================
// Manager
// ============================================================================

export type EventPlaylistManager = {
  register: (playlist: EventPlaylist | EventPlaylistInput) => PlaylistHandle
  update: (handle: PlaylistHandle, playlist: EventPlaylist | EventPlaylistInput) => void
  remove: (handle: PlaylistHandle) => void
  list: () => ReadonlyMap<string, EventPlaylist>
  /** Start a run, returning its run id */
  start: (handle: PlaylistHandle | string, triggerEvent?: InputEvent) => string
  stop: (runId: string, reason?: Exclude<PlaylistStopReason, 'completed'>) => void
  /**
   * Resolve true once the run has finished, false if `timeoutMs` passes
   * first. Unknown (already finished) runs resolve true.
   */
  join: (runId: string, timeoutMs?: number) => Promise<boolean>
  activeRuns: () => Array<string>
  /** Cancel every run and drop every definition */
  clear: () => void
}

type Emission = {
  stepIndex: number
  repeatIndex: number
  step: PlaylistStep
  /** Scheduled offset from the run start */
  offsetMs: number
}

type Run = {
  runId: string
  playlistId: string
  playlist: EventPlaylist
  triggerEvent?: InputEvent
  timer: ReturnType<typeof setTimeout> | null
  finished: boolean
  waiters: Array<() => void>
}

/**
 * Steps play in offset order (ties in definition order); every repeat of a
 * step plays before the next step starts.
 */
const planEmissions = (playlist: EventPlaylist): Array<Emission> =>
  playlist.steps
    .map((step, stepIndex) => ({ step, stepIndex }))
    .sort((a, b) => a.step.offsetMs - b.step.offsetMs || a.stepIndex - b.stepIndex)
    .flatMap(({ step, stepIndex }) =>
      Array.from({ length: step.repeat }, (_, repeatIndex) => ({
        stepIndex,
        repeatIndex,
        step,
        offsetMs: step.offsetMs + repeatIndex * (step.intervalMs ?? 0),
      })),
    )

export function createPlaylistManager(bus: EventBusCore): EventPlaylistManager {
  const playlists = new Map<string, EventPlaylist>()
  const triggers = new Map<string, SubscriptionHandle>()
  const runs = new Map<string, Run>()
  const interruptSubscriptions = new Map<string, SubscriptionHandle>()
  let nextPlaylistId = 0
  let nextRunId = 0

  const normalize = (playlist: EventPlaylist | EventPlaylistInput) =>
    defineEventPlaylist(playlist)

  const bindTrigger = (playlistId: string, playlist: EventPlaylist) => {
    if (playlist.triggerEventType === undefined) return
    triggers.set(
      playlistId,
      bus.on(
        playlist.triggerEventType,
        (event) => {
          start(playlistId, event)
        },
        { priority: PLAYLIST_SUBSCRIPTION_PRIORITY },
      ),
    )
  }

  const unbindTrigger = (playlistId: string) => {
    const trigger = triggers.get(playlistId)
    if (trigger) {
      bus.unsubscribe(trigger)
      triggers.delete(playlistId)
    }
  }

  const baseRunPayload = (run: Run) => ({
    playlistId: run.runId,
    definitionId: run.playlistId,
    playlistName: run.playlist.name,
    ...(run.playlist.metadata ? { playlistMetadata: run.playlist.metadata } : {}),
  })

  const withTrigger = (run: Run) =>
    run.triggerEvent ? { triggerEvent: summarize(run.triggerEvent) } : {}

  const handleInterrupt = (event: InputEvent) => {
    for (const run of Array.from(runs.values())) {
      if (run.playlist.interruptEvents.includes(event.eventType)) {
        finish(run, 'interrupted', event)
      }
    }
  }

  const releaseInterrupts = (run: Run) => {
    for (const eventType of run.playlist.interruptEvents) {
      const stillNeeded = Array.from(runs.values()).some((other) =>
        other.playlist.interruptEvents.includes(eventType),
      )
      const subscription = interruptSubscriptions.get(eventType)
      if (!stillNeeded && subscription) {
        bus.unsubscribe(subscription)
        interruptSubscriptions.delete(eventType)
      }
    }
  }

  function finish(run: Run, reason: PlaylistStopReason, interruptEvent?: InputEvent) {
    if (run.finished) return
    run.finished = true
    if (run.timer !== null) {
      clearTimeout(run.timer)
      run.timer = null
    }
    runs.delete(run.runId)
    releaseInterrupts(run)

    bus.emit(PLAYLIST_STOPPED, {
      ...baseRunPayload(run),
      reason,
      ...(interruptEvent ? { interruptEvent: summarize(interruptEvent) } : {}),
    })

    if (reason === 'completed' && run.playlist.completionEventType) {
      bus.emit(run.playlist.completionEventType, {
        ...baseRunPayload(run),
        ...withTrigger(run),
      })
    }

    const waiters = run.waiters
    run.waiters = []
    waiters.forEach((resolve) => resolve())
  }

  function play(run: Run, emissions: Array<Emission>, startedAt: number, index: number) {
    const emission = emissions[index]
    if (!emission) {
      finish(run, 'completed')
      return
    }

    const delay = Math.max(0, startedAt + emission.offsetMs - bus.now())
    run.timer = setTimeout(() => {
      run.timer = null
      if (run.finished) return

      const { step } = emission
      bus.emit(step.eventType, step.data ?? null, { producerId: step.producerId })
      // a handler of the step event may have stopped this run
      if (run.finished) return

      bus.emit(PLAYLIST_EMITTED, {
        ...baseRunPayload(run),
        stepIndex: emission.stepIndex,
        repeatIndex: emission.repeatIndex,
        eventType: step.eventType,
        producerId: step.producerId,
        offsetMs: emission.offsetMs,
        data: step.data ?? null,
        ...withTrigger(run),
      })
      if (run.finished) return

      play(run, emissions, startedAt, index + 1)
    }, delay)
  }

  function start(handle: PlaylistHandle | string, triggerEvent?: InputEvent): string {
    const playlistId = typeof handle === 'string' ? handle : handle.playlistId
    const playlist = playlists.get(playlistId)
    if (!playlist) {
      throw new Error(`Unknown playlist id: ${playlistId}`)
    }

    const run: Run = {
      runId: `run-${++nextRunId}`,
      playlistId,
      playlist,
      triggerEvent,
      timer: null,
      finished: false,
      waiters: [],
    }
    runs.set(run.runId, run)

    for (const eventType of playlist.interruptEvents) {
      if (!interruptSubscriptions.has(eventType)) {
        interruptSubscriptions.set(
          eventType,
          bus.on(eventType, handleInterrupt, {
            priority: PLAYLIST_SUBSCRIPTION_PRIORITY,
          }),
        )
      }
    }

    bus.emit(PLAYLIST_CREATED, {
      ...baseRunPayload(run),
      steps: playlist.steps.map((step) => ({
        eventType: step.eventType,
        offsetMs: step.offsetMs,
        repeat: step.repeat,
        intervalMs: step.intervalMs ?? null,
        producerId: step.producerId,
        data: step.data ?? null,
      })),
      ...withTrigger(run),
    })

    console.debug(`[Playlists] Started "${playlist.name}" as ${run.runId}`)
    play(run, planEmissions(playlist), bus.now(), 0)
    return run.runId
  }

  const api = {
    register: (playlist) => {
      const normalized = normalize(playlist)
      const playlistId = `playlist-${++nextPlaylistId}`
      playlists.set(playlistId, normalized)
      bindTrigger(playlistId, normalized)
      return Object.freeze({ playlistId })
    },

    update: (handle, playlist) => {
      if (!playlists.has(handle.playlistId)) {
        throw new Error(`Unknown playlist id: ${handle.playlistId}`)
      }
      const normalized = normalize(playlist)
      unbindTrigger(handle.playlistId)
      playlists.set(handle.playlistId, normalized)
      bindTrigger(handle.playlistId, normalized)
    },

    remove: (handle) => {
      playlists.delete(handle.playlistId)
      unbindTrigger(handle.playlistId)
    },

    list: () => new Map(playlists),

    start,

    stop: (runId, reason = 'cancelled') => {
      const run = runs.get(runId)
      if (run) finish(run, reason)
    },

    join: (runId, timeoutMs) => {
      const run = runs.get(runId)
      if (!run) return Promise.resolve(true)

      return new Promise<boolean>((resolve) => {
        let timeout: ReturnType<typeof setTimeout> | null = null
        run.waiters.push(() => {
          if (timeout !== null) clearTimeout(timeout)
          resolve(true)
        })
        if (timeoutMs !== undefined) {
          timeout = setTimeout(() => resolve(false), timeoutMs)
        }
      })
    },

    activeRuns: () => Array.from(runs.keys()),

    clear: () => {
      Array.from(runs.values()).forEach((run) => finish(run, 'cancelled'))
      Array.from(triggers.keys()).forEach(unbindTrigger)
      playlists.clear()
    },
  } satisfies EventPlaylistManager

  return api
}
