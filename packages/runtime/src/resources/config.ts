/**
 * Config Resource
 *
 * Resolves the runtime configuration once, at system start. Everything
 * downstream receives the section it needs from here.
 */

import type { StartedResource } from 'braided'
import { defineResource } from 'braided'
import { loadConfig, parseConfig } from '@lumenwall/system'
import type { RuntimeConfig, RuntimeConfigInput } from '@lumenwall/system'

export type ConfigSource =
  | { kind: 'object'; value: RuntimeConfigInput }
  | { kind: 'env'; env?: Record<string, string | undefined> }

export const createConfigResource = (source: ConfigSource = { kind: 'object', value: {} }) =>
  defineResource({
    dependencies: [] as const,
    start: (): RuntimeConfig => {
      const config = source.kind === 'env' ? loadConfig(source.env) : parseConfig(source.value)
      console.log('[Config] Resolved:', {
        variant: config.render.variant,
        mergeStrategy: config.render.mergeStrategy,
        maxWorkers: config.render.maxWorkers,
        pacing: config.frame.pacingStrategy,
        maxFps: config.frame.maxFps,
      })
      return config
    },
    halt: () => undefined,
  })

export type ConfigResource = StartedResource<ReturnType<typeof createConfigResource>>
