/**
 * @lumenwall/rendering
 *
 * Renderer lifecycle, per-renderer timing, frame planning, surface
 * collection and composition, and frame pacing.
 */

// Surfaces
export * from './surface'
export * from './surfaceProvider'

// Renderers
export * from './renderer'
export * from './stateHolder'
export * from './processor'

// Planning
export * from './timing'
export * from './signature'
export * from './planner'
export * from './planCache'

// Composition
export * from './collector'
export * from './composer'

// Frame
export * from './framePacer'
export * from './pipeline'
