/**
 * Scene Resource
 *
 * The renderer set the frame loop draws, in back-to-front order. Scenes
 * are built from the bus and the peripheral manager so renderers can
 * subscribe to input; swapping the set takes effect on the next frame.
 * Halting resets every renderer the scene ever held.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import type { EventBus, PeripheralManager } from '@lumenwall/peripherals'
import type { RendererHandle } from '@lumenwall/rendering'
import { createAtom } from '@lumenwall/system'

export type SceneDependencies = {
  eventBus: EventBus
  peripherals: PeripheralManager
}

export type SceneBuilder = (deps: SceneDependencies) => ReadonlyArray<RendererHandle>

export function createScene(initial: ReadonlyArray<RendererHandle> = []) {
  const renderers = createAtom<ReadonlyArray<RendererHandle>>(initial)
  const seen = new Set<RendererHandle>(initial)

  return {
    renderers: () => renderers.get(),
    setRenderers: (next: ReadonlyArray<RendererHandle>) => {
      next.forEach((renderer) => seen.add(renderer))
      renderers.set(next)
    },
    subscribe: renderers.subscribe,
    /** Reset everything the scene has held */
    reset: () => {
      seen.forEach((renderer) => renderer.reset())
    },
  }
}

export type Scene = ReturnType<typeof createScene>

export const createSceneResource = (build: SceneBuilder = () => []) =>
  defineResource({
    dependencies: ['eventBus', 'peripherals'] as const,
    start: (deps: SceneDependencies): Scene => createScene(build(deps)),
    halt: (scene: Scene) => {
      scene.reset()
    },
  })

export type SceneResource = StartedResource<ReturnType<typeof createSceneResource>>
