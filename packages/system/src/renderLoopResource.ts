/**
 * Render Loop Resource
 *
 * Higher-order resource pattern for render loops.
 * Wraps createRenderLoop with Braided resource lifecycle: the loop is built
 * from its started dependencies, starts with the resource, and halting
 * waits for the in-flight frame.
 */

import { defineResource } from 'braided'
import { createRenderLoop } from './renderLoop'
import type { RenderLoopAPI, RenderLoopOptions } from './renderLoop'

/**
 * Create a Braided resource for a render loop
 *
 * @example
 * ```typescript
 * const frameLoop = createRenderLoopResource(
 *   ['renderPipeline', 'display'],
 *   ({ renderPipeline, display }: FrameLoopDeps) => ({
 *     createContext: () => ({ renderPipeline, display }),
 *     render: async (context) => { ... },
 *   }),
 * )
 * ```
 */
export function createRenderLoopResource<TDeps, TContext>(
  dependencies: ReadonlyArray<keyof TDeps>,
  buildOptions: (deps: TDeps) => RenderLoopOptions<TContext>,
) {
  return defineResource({
    dependencies,
    start: (deps: TDeps): RenderLoopAPI<TContext> => {
      const loop = createRenderLoop(buildOptions(deps))
      loop.start()
      return loop
    },
    halt: async (loop: RenderLoopAPI<TContext>) => {
      await loop.stop()
    },
  })
}
