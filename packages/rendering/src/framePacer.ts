/**
 * Frame Pacing
 *
 * Two views of the same target interval:
 * - FramePacer answers "is it time to render again?"
 * - RenderLoopPacer answers "how long should the loop sleep?"
 *
 * Target interval = max(minIntervalMs, 1000 / maxFps, cost / utilization),
 * the cost term only under the adaptive strategy. A maxFps of 0 removes
 * the FPS cap. Sleeps are clamped at zero: a late frame is never caught
 * up by skipping frames.
 */

import { ConfigurationError } from '@lumenwall/system'
import type { FramePacingStrategy } from '@lumenwall/system'

const ONE_SECOND_MS = 1000

export type PacingOptions = {
  strategy?: FramePacingStrategy
  minIntervalMs?: number
  /** Share of the interval the measured cost may take, in (0, 1] */
  utilizationTarget?: number
  now?: () => number
}

type ResolvedPacing = {
  strategy: FramePacingStrategy
  minIntervalMs: number
  utilizationTarget: number
  baseIntervalMs: number
}

/**
 * @throws ConfigurationError for negative or non-finite intervals and
 * utilization outside (0, 1]
 */
function resolvePacing(maxFps: number, options: PacingOptions): ResolvedPacing {
  const { strategy = 'off', minIntervalMs = 0, utilizationTarget = 0.9 } = options

  if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
    throw new ConfigurationError(
      `Minimum frame interval must be a finite non-negative number, got ${minIntervalMs}`,
      'frame.minIntervalMs',
    )
  }
  if (!(utilizationTarget > 0 && utilizationTarget <= 1)) {
    throw new ConfigurationError(
      `Utilization target must be greater than 0 and at most 1, got ${utilizationTarget}`,
      'frame.utilizationTarget',
    )
  }
  if (!Number.isFinite(maxFps) || maxFps < 0) {
    throw new ConfigurationError(
      `Max FPS must be a finite non-negative number, got ${maxFps}`,
      'frame.maxFps',
    )
  }

  return {
    strategy,
    minIntervalMs,
    utilizationTarget,
    baseIntervalMs: maxFps > 0 ? ONE_SECOND_MS / maxFps : 0,
  }
}

const targetInterval = (pacing: ResolvedPacing, estimatedCostMs?: number) => {
  const adaptiveMs =
    pacing.strategy === 'adaptive' && estimatedCostMs !== undefined && estimatedCostMs > 0
      ? estimatedCostMs / pacing.utilizationTarget
      : 0
  return Math.max(pacing.minIntervalMs, pacing.baseIntervalMs, adaptiveMs)
}

// ============================================================================
// FramePacer
// ============================================================================

export type FramePacer = {
  shouldRender: (estimatedCostMs?: number) => boolean
  markRendered: () => void
  targetIntervalMs: (estimatedCostMs?: number) => number
  lastRenderAt: () => number | null
}

export function createFramePacer(maxFps: number, options: PacingOptions = {}): FramePacer {
  const pacing = resolvePacing(maxFps, options)
  const { now = () => performance.now() } = options
  let lastRenderAt: number | null = null

  return {
    shouldRender: (estimatedCostMs) => {
      if (lastRenderAt === null) return true
      return now() - lastRenderAt >= targetInterval(pacing, estimatedCostMs)
    },
    markRendered: () => {
      lastRenderAt = now()
    },
    targetIntervalMs: (estimatedCostMs) => targetInterval(pacing, estimatedCostMs),
    lastRenderAt: () => lastRenderAt,
  }
}

// ============================================================================
// RenderLoopPacer
// ============================================================================

export type RenderLoopPacerOptions = PacingOptions & {
  /** 0 for no FPS cap */
  maxFps?: number
}

export type RenderLoopPacer = {
  /** Remaining sleep before the next frame, never negative */
  delayMs: (frameStartedAt: number, estimatedCostMs?: number) => number
  targetIntervalMs: (estimatedCostMs?: number) => number
}

export function createRenderLoopPacer(options: RenderLoopPacerOptions = {}): RenderLoopPacer {
  const pacing = resolvePacing(options.maxFps ?? 0, options)
  const { now = () => performance.now() } = options

  return {
    delayMs: (frameStartedAt, estimatedCostMs) => {
      const elapsed = now() - frameStartedAt
      return Math.max(0, targetInterval(pacing, estimatedCostMs) - elapsed)
    },
    targetIntervalMs: (estimatedCostMs) => targetInterval(pacing, estimatedCostMs),
  }
}
