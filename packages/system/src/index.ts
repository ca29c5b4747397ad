/**
 * @threadlane/system
 *
 * Small primitives shared by the threadlane packages.
 *
 * ## Modules
 *
 * ### State Management
 * Lightweight atoms and subscriptions for observable state.
 *
 * ### Logging
 * Scoped, level-filtered console logging.
 */

// ============================================================================
// State Management
// ============================================================================

export * from './state'

// ============================================================================
// Logging
// ============================================================================

export * from './logger'
