/**
 * @threadlane/bridge
 *
 * Serialized execution bridge for resources that must be called
 * synchronously from a single execution stream.
 *
 * ## Modules
 *
 * ### Bridge
 * `createBridge` owns the queue, the worker loop and the resource handle.
 * Callers get a promise per `submit`, settled from their own async context.
 *
 * ### Resources
 * Braided resources that connect on start and close on halt.
 *
 * ### Worker Tasks
 * The same lifecycle across a worker-thread channel, with tasks defined as
 * data and validated with zod.
 */

// ============================================================================
// Bridge
// ============================================================================

export * from './bridge'
export * from './completion'
export * from './config'
export * from './errors'
export * from './lifecycle'
export * from './resources'
export * from './taskQueue'
export * from './workerLoop'

// ============================================================================
// Worker Tasks
// ============================================================================

export * from './workerTasks'
