/**
 * Worker Loop
 *
 * The only code path that calls into the underlying resource. Items are run
 * one at a time, synchronously, in queue order. A failing item rejects its
 * own completion handle and the loop moves on.
 *
 * The loop keeps draining after the running flag drops and exits only when
 * it finds the queue empty with the flag down.
 */

import type { Logger } from '@threadlane/system'
import type { CompletionHandle } from './completion'
import { AsyncOperationError } from './errors'
import type { TaskQueue } from './taskQueue'

export type WorkItem = {
  readonly completion: CompletionHandle<unknown>
  readonly operation: () => unknown
  /** Used in debug logs only */
  readonly label: string
}

export type WorkerLoopOptions = {
  queue: TaskQueue<WorkItem>
  isRunning: () => boolean
  pollIntervalMs: number
  logger: Logger
}

export type WorkerLoop = {
  /** Starts the loop; the returned promise settles when the loop exits */
  start: () => Promise<void>
  isAlive: () => boolean
  executedCount: () => number
}

function isThenable(value: unknown): value is PromiseLike<unknown> {
  return (
    (typeof value === 'object' || typeof value === 'function') &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  )
}

/**
 * Run one work item and report its outcome through its completion handle
 */
export const executeWorkItem = (item: WorkItem, logger: Logger): void => {
  let result: unknown
  try {
    logger.debug(`executing ${item.label}`)
    result = item.operation()
  } catch (error) {
    logger.debug(`${item.label} failed`, error)
    item.completion.reject(error)
    return
  }

  if (isThenable(result)) {
    // Keep observing the stray promise so its failure is logged
    Promise.resolve(result).catch((error: unknown) => {
      logger.warn(`late rejection from async ${item.label}`, error)
    })
    item.completion.reject(new AsyncOperationError())
    return
  }

  logger.debug(`${item.label} completed`)
  item.completion.resolve(result)
}

export function createWorkerLoop(options: WorkerLoopOptions): WorkerLoop {
  const { queue, isRunning, pollIntervalMs, logger } = options
  let alive = false
  let executed = 0
  let exited: Promise<void> | null = null

  const run = async (): Promise<void> => {
    logger.debug('worker loop started')
    try {
      for (;;) {
        const item = await queue.pop(pollIntervalMs)
        if (item === undefined) {
          if (isRunning() || queue.size() > 0) continue
          break
        }
        executeWorkItem(item, logger)
        executed += 1
      }
    } finally {
      alive = false
      logger.debug(`worker loop exited after ${executed} item(s)`)
    }
  }

  return {
    start: () => {
      if (!exited) {
        alive = true
        exited = run()
      }
      return exited
    },
    isAlive: () => alive,
    executedCount: () => executed,
  }
}
