/**
 * Render Plan Cache
 *
 * Keeps the last plan and hands back the same object while nothing it
 * was computed from has changed: renderer-set signature, override, default
 * variant and the timing version. The refresh strategy adds an age limit:
 * - on_change: valid until an input changes, however old
 * - time_boxed: additionally expires after refreshMs (0 disables caching)
 */

import { PlanError } from '@lumenwall/system'
import type {
  PlanRefreshStrategy,
  PlanSignatureStrategy,
  RenderVariantSetting,
} from '@lumenwall/system'
import { assertRenderVariant } from './planner'
import type { RenderPlan, RenderPlanner } from './planner'
import type { RendererHandle } from './renderer'
import { rendererSignature } from './signature'

export type RenderPlanCacheOptions = {
  planner: Pick<RenderPlanner, 'plan' | 'setDefaultVariant' | 'timingVersion'>
  refreshStrategy?: PlanRefreshStrategy
  refreshMs?: number
  signatureStrategy?: PlanSignatureStrategy
  now?: () => number
}

type CacheEntry = {
  plan: RenderPlan
  signature: string
  override: RenderVariantSetting | undefined
  defaultVariant: RenderVariantSetting
  timingVersion: number
  createdAt: number
}

export type RenderPlanCache = {
  getPlan: (
    renderers: ReadonlyArray<RendererHandle>,
    defaultVariant: RenderVariantSetting,
    override?: RenderVariantSetting,
  ) => RenderPlan
  invalidate: () => void
  /** The cached plan, valid or not */
  peek: () => RenderPlan | null
}

export function createRenderPlanCache(options: RenderPlanCacheOptions): RenderPlanCache {
  const {
    planner,
    refreshStrategy = 'time_boxed',
    refreshMs = 100,
    signatureStrategy = 'identity',
    now = () => performance.now(),
  } = options

  let entry: CacheEntry | null = null

  const accepts = (cached: CacheEntry) => {
    if (refreshStrategy === 'on_change') return true
    return refreshMs > 0 && now() - cached.createdAt < refreshMs
  }

  return {
    getPlan: (renderers, defaultVariant, override) => {
      const variant = assertRenderVariant(defaultVariant)
      const requested = override === undefined ? undefined : assertRenderVariant(override)
      const signature = rendererSignature(renderers, signatureStrategy)
      const timingVersion = planner.timingVersion()

      if (
        entry &&
        entry.signature === signature &&
        entry.override === requested &&
        entry.defaultVariant === variant &&
        entry.timingVersion === timingVersion &&
        accepts(entry)
      ) {
        return entry.plan
      }

      planner.setDefaultVariant(variant)
      const plan = planner.plan(renderers, requested, signature)
      if (plan.signature !== signature) {
        throw new PlanError(
          `Plan signature "${plan.signature}" does not match the requested renderer set "${signature}"`,
        )
      }

      entry = {
        plan,
        signature,
        override: requested,
        defaultVariant: variant,
        timingVersion,
        createdAt: now(),
      }
      return plan
    },

    invalidate: () => {
      entry = null
    },

    peek: () => entry?.plan ?? null,
  }
}
