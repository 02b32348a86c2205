/**
 * Renderer Timing Tracker
 *
 * Per-renderer render durations, smoothed either as an exponential moving
 * average or a cumulative mean. The planner reads the totals to decide
 * between serial and parallel work; the plan cache reads `version()` to
 * notice that the cost model moved.
 *
 * Philosophy:
 * - The first sample seeds the average under both strategies
 * - Renderers with no samples cost 0 and are reported as missing
 * - Every record bumps the version, no deep comparison needed
 */

import { ConfigurationError } from '@lumenwall/system'
import type { TimingStrategy } from '@lumenwall/system'

export type RendererTimingSnapshot = {
  readonly name: string
  readonly averageMs: number
  readonly lastMs: number
  readonly sampleCount: number
}

export type TimingEstimate = {
  totalMs: number
  /** True when at least one renderer has been measured */
  hasSamples: boolean
  /** Renderers with no samples yet */
  missing: Array<string>
}

export type TimingSnapshotReport = {
  snapshots: Array<RendererTimingSnapshot>
  missing: Array<string>
}

export type TimedRenderer = { readonly name: string }

export type TimingTrackerOptions = {
  strategy?: TimingStrategy
  /** Smoothing factor in (0, 1] for the ema strategy */
  emaAlpha?: number
}

export type RendererTimingTracker = {
  record: (name: string, durationMs: number) => void
  estimateTotal: (renderers: Iterable<TimedRenderer>) => TimingEstimate
  snapshot: (renderers: Iterable<TimedRenderer>) => TimingSnapshotReport
  get: (name: string) => RendererTimingSnapshot | undefined
  version: () => number
  strategy: TimingStrategy
}

export function createRendererTimingTracker(
  options: TimingTrackerOptions = {},
): RendererTimingTracker {
  const { strategy = 'ema', emaAlpha = 0.2 } = options
  if (!(emaAlpha > 0 && emaAlpha <= 1)) {
    throw new ConfigurationError(
      `Timing ema alpha must be in (0, 1], got ${emaAlpha}`,
      'render.timingEmaAlpha',
    )
  }

  // entries are replaced, never mutated, so readers always see whole samples
  const stats = new Map<string, RendererTimingSnapshot>()
  let version = 0

  const nextAverage = (previous: RendererTimingSnapshot, durationMs: number, count: number) =>
    strategy === 'ema'
      ? previous.averageMs + emaAlpha * (durationMs - previous.averageMs)
      : previous.averageMs + (durationMs - previous.averageMs) / count

  return {
    strategy,

    record: (name, durationMs) => {
      if (!Number.isFinite(durationMs) || durationMs < 0) {
        throw new RangeError(
          `Render duration for "${name}" must be a finite non-negative number, got ${durationMs}`,
        )
      }
      const previous = stats.get(name)
      const sampleCount = (previous?.sampleCount ?? 0) + 1
      const averageMs = previous ? nextAverage(previous, durationMs, sampleCount) : durationMs

      stats.set(name, Object.freeze({ name, averageMs, lastMs: durationMs, sampleCount }))
      version += 1
    },

    estimateTotal: (renderers) => {
      let totalMs = 0
      let hasSamples = false
      const missing: Array<string> = []
      for (const renderer of renderers) {
        const entry = stats.get(renderer.name)
        if (!entry) {
          missing.push(renderer.name)
          continue
        }
        totalMs += entry.averageMs
        hasSamples = true
      }
      return { totalMs, hasSamples, missing }
    },

    snapshot: (renderers) => {
      const snapshots: Array<RendererTimingSnapshot> = []
      const missing: Array<string> = []
      for (const renderer of renderers) {
        const entry = stats.get(renderer.name)
        if (entry) {
          snapshots.push(entry)
        } else {
          missing.push(renderer.name)
        }
      }
      return { snapshots, missing }
    },

    get: (name) => stats.get(name),
    version: () => version,
  }
}
