/**
 * @lumenwall/runtime
 *
 * Composes peripherals, the render pipeline and a display into one
 * startable system.
 */

export * from './display/displayDevice'
export * from './resources/config'
export * from './resources/display'
export * from './resources/eventBus'
export * from './resources/peripherals'
export * from './resources/scene'
export * from './resources/renderPipeline'
export * from './resources/frameLoop'
export * from './system'
