/**
 * @lumenwall/system
 *
 * Framework-agnostic infrastructure shared by the peripheral and rendering
 * packages.
 *
 * ## Modules
 *
 * ### State Management
 * Lightweight atoms and subscriptions for reactive state.
 *
 * ### Configuration
 * zod schema for every runtime tunable, loadable from `LUMENWALL_*` variables.
 *
 * ### Errors and Logging
 * Coded error classes and throttled `[key]` log lines.
 *
 * ### Worker Pool
 * Bounded async executor with ordered `map`.
 *
 * ### Render Loop
 * Timer-driven frame loop with pluggable pacing and error policy.
 */

// ============================================================================
// State Management
// ============================================================================

export * from './state'

// ============================================================================
// Configuration
// ============================================================================

export * from './config'

// ============================================================================
// Errors and Logging
// ============================================================================

export * from './errors'
export * from './logging'

// ============================================================================
// Worker Pool
// ============================================================================

export * from './workerPool'

// ============================================================================
// Render Loop
// ============================================================================

export * from './renderLoop'
export * from './renderLoopResource'
