/**
 * Surface Composition
 *
 * Reduces the surfaces of one frame to a single surface, later surfaces
 * drawn over earlier ones:
 * - in-place: fold every surface onto the first (equal sizes only)
 * - batched: one pre-cleared destination, blits queued and flushed once
 * - pairwise: adjacent pairs merged across the worker pool, log2(n) rounds
 *
 * Pairwise reduction needs an associative merge that only writes to its
 * left operand; every surface is touched by one task per round.
 */

import type { WorkerPool } from '@lumenwall/system'
import type { MergeStrategy } from './planner'
import { blit, clearSurface, createFrameAccumulator, createSurface, sameSize } from './surface'
import type { FrameAccumulator, Surface } from './surface'

export type MergeFn = (base: Surface, overlay: Surface) => Surface | Promise<Surface>

// ============================================================================
// Batched composer
// ============================================================================

export type SurfaceComposerOptions = {
  /** Reuse one destination per size, cleared between frames */
  screenCache?: boolean
}

export function createSurfaceComposer(options: SurfaceComposerOptions = {}) {
  const { screenCache = false } = options
  const destinations = new Map<string, Surface>()
  let accumulator: FrameAccumulator | null = null

  const destinationFor = (width: number, height: number) => {
    if (!screenCache) return createSurface(width, height)
    const key = `${width}x${height}`
    const cached = destinations.get(key)
    if (cached) return clearSurface(cached)
    const surface = createSurface(width, height)
    destinations.set(key, surface)
    return surface
  }

  const accumulatorFor = (surface: Surface) => {
    if (accumulator === null || accumulator.surface !== surface) {
      accumulator = createFrameAccumulator(surface)
    } else {
      accumulator.reset()
    }
    return accumulator
  }

  return {
    composeBatched: (surfaces: ReadonlyArray<Surface>): Surface | null => {
      const [first] = surfaces
      if (!first) return null
      const frame = accumulatorFor(destinationFor(first.width, first.height))
      surfaces.forEach((surface) => frame.queueBlit(surface))
      return frame.flush({ clear: false })
    },
    cachedDestinations: () => destinations.size,
    clearCache: () => {
      destinations.clear()
      accumulator = null
    },
  }
}

export type SurfaceComposer = ReturnType<typeof createSurfaceComposer>

// ============================================================================
// Composition manager
// ============================================================================

/**
 * Blit `overlay` onto `base`, returning `base`.
 * @throws RangeError when the sizes differ
 */
export const mergeInPlace = ((base: Surface, overlay: Surface): Surface => {
  if (!sameSize(base, overlay)) {
    throw new RangeError(
      `Cannot merge ${overlay.width}x${overlay.height} onto ${base.width}x${base.height}`,
    )
  }
  return blit(base, overlay)
}) satisfies MergeFn

export function createSurfaceCompositionManager(composer: SurfaceComposer) {
  const composeSerial = async (
    surfaces: ReadonlyArray<Surface>,
    strategy: MergeStrategy,
    merge: MergeFn = mergeInPlace,
  ): Promise<Surface | null> => {
    if (strategy === 'batched') return composer.composeBatched(surfaces)

    const [first, ...rest] = surfaces
    if (!first) return null
    let composed = first
    for (const surface of rest) {
      composed = await merge(composed, surface)
    }
    return composed
  }

  const composeParallel = async (
    surfaces: ReadonlyArray<Surface>,
    strategy: MergeStrategy,
    pool: WorkerPool,
    merge: MergeFn = mergeInPlace,
  ): Promise<Surface | null> => {
    if (strategy === 'batched') return composer.composeBatched(surfaces)
    if (surfaces.length === 0) return null

    let round = Array.from(surfaces)
    while (round.length > 1) {
      const pairs: Array<readonly [Surface, Surface]> = []
      for (let index = 0; index + 1 < round.length; index += 2) {
        const left = round[index]
        const right = round[index + 1]
        if (left && right) pairs.push([left, right])
      }
      // odd tail rides along to the next round
      const tail = round.length % 2 === 1 ? round[round.length - 1] : undefined

      const merged = await pool.map(pairs, ([left, right]) => merge(left, right))
      round = tail ? [...merged, tail] : merged
    }
    return round[0] ?? null
  }

  return { composeSerial, composeParallel, mergeInPlace }
}

export type SurfaceCompositionManager = ReturnType<typeof createSurfaceCompositionManager>
