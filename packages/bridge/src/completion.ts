/**
 * Completion Handle
 *
 * Single-assignment result slot for one caller. The handle captures the async
 * context it was created in; settling posts the result back onto the event
 * loop and runs it inside that context, so a caller resumes from its own
 * scope and never from inside the worker's execution step.
 */

import { AsyncResource } from 'node:async_hooks'

export type CompletionHandle<T> = {
  promise: Promise<T>
  /** Returns false when the handle was already settled */
  resolve(value: T): boolean
  /** Returns false when the handle was already settled */
  reject(error: unknown): boolean
  isSettled(): boolean
}

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown }

export function createCompletionHandle<T>(
  label = 'threadlane.completion',
): CompletionHandle<T> {
  const scope = new AsyncResource(label)
  let settled = false
  let settlePromise: (outcome: Outcome<T>) => void = () => {}

  const promise = new Promise<T>((resolve, reject) => {
    settlePromise = (outcome) => {
      if (outcome.ok) resolve(outcome.value)
      else reject(outcome.error)
    }
  })

  const post = (outcome: Outcome<T>): boolean => {
    if (settled) return false
    settled = true
    setImmediate(() => {
      scope.runInAsyncScope(settlePromise, null, outcome)
      scope.emitDestroy()
    })
    return true
  }

  return {
    promise,
    resolve: (value) => post({ ok: true, value }),
    reject: (error) => post({ ok: false, error }),
    isSettled: () => settled,
  }
}
