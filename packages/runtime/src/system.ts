/**
 * Runtime System Configuration
 *
 * The installation as one braided resource graph. Resources start in
 * dependency order and halt in reverse order.
 *
 * Dependency Graph:
 *
 *   config (no deps)
 *       ↓
 *   display (no deps) - output device
 *       ↓
 *   eventBus ← config
 *       ↓
 *   peripherals ← eventBus
 *       ↓
 *   scene ← eventBus, peripherals - renderer set
 *       ↓
 *   renderPipeline ← config, display, scene
 *       ↓
 *   frameLoop ← config, renderPipeline, display, scene
 *
 * Halting therefore stops the loop (waiting for the in-flight frame),
 * closes the worker pool, stops the peripherals, and closes the display
 * after everything that presents to it.
 */

import type { StartedSystem } from 'braided'
import { haltSystem, startSystem } from 'braided'
import type { Peripheral, PeripheralDetector } from '@lumenwall/peripherals'
import type { FrameErrorPolicy } from '@lumenwall/system'
import type { DisplayDevice } from './display/displayDevice'
import { createConfigResource } from './resources/config'
import type { ConfigSource } from './resources/config'
import { createDisplayResource } from './resources/display'
import { createEventBusResource } from './resources/eventBus'
import { createFrameLoopResource } from './resources/frameLoop'
import { createPeripheralsResource } from './resources/peripherals'
import { createRenderPipelineResource } from './resources/renderPipeline'
import { createSceneResource } from './resources/scene'
import type { SceneBuilder } from './resources/scene'

export type RuntimeOptions<TDevice extends DisplayDevice = DisplayDevice> = {
  config?: ConfigSource
  openDisplay: () => TDevice
  scene?: SceneBuilder
  detectors?: ReadonlyArray<PeripheralDetector>
  peripherals?: ReadonlyArray<Peripheral>
  errorPolicy?: FrameErrorPolicy
  /** Clock shared by the bus, the pipeline and the frame loop */
  now?: () => number
}

/**
 * Create the runtime system configuration
 */
export const createRuntimeSystemConfig = <TDevice extends DisplayDevice>(
  options: RuntimeOptions<TDevice>,
) => {
  const { now } = options
  return {
    config: createConfigResource(options.config),
    display: createDisplayResource(options.openDisplay),
    eventBus: createEventBusResource({ now }),
    peripherals: createPeripheralsResource({
      detectors: options.detectors,
      peripherals: options.peripherals,
    }),
    scene: createSceneResource(options.scene),
    renderPipeline: createRenderPipelineResource({ now }),
    frameLoop: createFrameLoopResource({ errorPolicy: options.errorPolicy, now }),
  }
}

export type RuntimeSystemConfig = ReturnType<typeof createRuntimeSystemConfig>

/**
 * Type for the started runtime system
 */
export type RuntimeSystem = StartedSystem<RuntimeSystemConfig>

export type Runtime = {
  system: RuntimeSystem
  halt: () => Promise<void>
}

/**
 * Start the whole graph. A resource that fails to start halts whatever
 * already started and rejects with the collected failures.
 *
 * @example
 * ```ts
 * const runtime = await startRuntime({
 *   config: { kind: 'env' },
 *   openDisplay: () => createMemoryDisplay({ width: 64, height: 32 }),
 *   scene: () => [clockRenderer],
 * })
 * // ...
 * await runtime.halt()
 * ```
 */
export async function startRuntime<TDevice extends DisplayDevice>(
  options: RuntimeOptions<TDevice>,
): Promise<Runtime> {
  const systemConfig = createRuntimeSystemConfig(options)
  const { system, errors } = await startSystem(systemConfig)

  if (errors.size > 0) {
    const failures = Array.from(errors.entries())
    console.error('[Runtime] System started with errors:', failures)
    await haltSystem(systemConfig, system)
    throw new Error(
      `Runtime start failed: ${failures.map(([key, error]) => `${key}: ${error.message}`).join(', ')}`,
      { cause: failures[0]?.[1] },
    )
  }

  console.log('[Runtime] ✅ System started')
  let halted = false

  return {
    system,
    halt: async () => {
      if (halted) return
      halted = true
      await haltSystem(systemConfig, system)
      console.log('[Runtime] System halted')
    },
  }
}
