import type { PlanSignatureStrategy } from '@lumenwall/system'
import type { RendererHandle } from './renderer'

const instanceIds = new WeakMap<object, number>()
let nextInstanceId = 0

const instanceId = (renderer: object) => {
  let id = instanceIds.get(renderer)
  if (id === undefined) {
    id = ++nextInstanceId
    instanceIds.set(renderer, id)
  }
  return id
}

/**
 * Key identifying a renderer set, in order.
 *
 * identity: one entry per renderer instance.
 * type: renderers sharing a `kind` (or, without one, a name) are
 * interchangeable. Opt-in: two same-kind renderers configured differently
 * share a plan.
 */
export function rendererSignature(
  renderers: ReadonlyArray<Pick<RendererHandle, 'name' | 'kind'>>,
  strategy: PlanSignatureStrategy = 'identity',
): string {
  return renderers
    .map((renderer) =>
      strategy === 'type'
        ? `type:${renderer.kind ?? renderer.name}`
        : `id:${instanceId(renderer)}`,
    )
    .join('|')
}
