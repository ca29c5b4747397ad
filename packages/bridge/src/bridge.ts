/**
 * Execution Bridge
 *
 * Promise-based access, from any number of callers, to a resource that may
 * only be touched synchronously and from one execution stream.
 *
 *   caller ──submit──► TaskQueue ──► WorkerLoop ──► CompletionHandle ──► caller
 *
 * The resource handle is created by the bootstrap work item and released by
 * the teardown work item, so every call into the resource, including its
 * construction and destruction, happens on the worker loop in FIFO order.
 */

import { createLogger } from '@threadlane/system'
import type { Logger } from '@threadlane/system'
import { createCompletionHandle } from './completion'
import { parseBridgeConfig } from './config'
import type { BridgeConfig, BridgeConfigInput } from './config'
import { NotConnectedError } from './errors'
import { connectionStatusKeywords, createLifecycle } from './lifecycle'
import type { ConnectionStatus } from './lifecycle'
import { createTaskQueue } from './taskQueue'
import { createWorkerLoop } from './workerLoop'
import type { WorkItem } from './workerLoop'

export type BridgeOptions<THandle> = {
  /** Builds the resource handle; runs on the worker loop */
  connector: () => THandle
  /** Releases the resource handle; runs on the worker loop during close */
  teardown?: (handle: THandle) => void
  config?: BridgeConfigInput
  logger?: Logger
}

export type Operation<THandle, TResult> = (handle: THandle) => TResult

export type Bridge<THandle> = {
  readonly config: BridgeConfig
  /** Open the connection. Concurrent callers share one attempt. */
  connect: () => Promise<Bridge<THandle>>
  /**
   * Queue an operation against the resource handle.
   * Throws NotConnectedError synchronously unless the connection is open.
   */
  submit: <TResult>(
    operation: Operation<THandle, TResult>,
    label?: string,
  ) => Promise<TResult>
  /** Drain queued work, release the handle and stop the worker loop */
  close: () => Promise<void>
  status: () => ConnectionStatus
  isRunning: () => boolean
  pendingCount: () => number
  onStatusChange: (callback: (status: ConnectionStatus) => void) => () => void
}

/**
 * Create a bridge for a single resource handle
 *
 * @example
 * ```ts
 * const bridge = createBridge({
 *   connector: () => new Database(':memory:'),
 *   teardown: (db) => db.close(),
 * })
 * await bridge.connect()
 * const rows = await bridge.submit((db) => db.prepare('select 1 as one').all())
 * await bridge.close()
 * ```
 */
export function createBridge<THandle>(
  options: BridgeOptions<THandle>,
): Bridge<THandle> {
  const config = parseBridgeConfig(options.config)
  const logger = options.logger ?? createLogger(config.name, config.logLevel)
  const { connector, teardown } = options

  const lifecycle = createLifecycle()
  const queue = createTaskQueue<WorkItem>()
  let running = false
  // Boxed so a handle that is itself falsy still counts as present
  let handle: { current: THandle } | null = null
  let connecting: Promise<Bridge<THandle>> | null = null
  let closing: Promise<void> | null = null
  let exited: Promise<void> = Promise.resolve()

  const loop = createWorkerLoop({
    queue,
    isRunning: () => running,
    pollIntervalMs: config.pollIntervalMs,
    logger: logger.child('worker'),
  })

  lifecycle.subscribe((status) => {
    logger.debug(`status -> ${status}`)
  })

  const enqueue = <TResult>(
    operation: () => TResult,
    label: string,
  ): Promise<TResult> => {
    const completion = createCompletionHandle<TResult>()
    queue.push({ completion, operation, label })
    return completion.promise
  }

  const bootstrap = async (): Promise<Bridge<THandle>> => {
    lifecycle.transition(connectionStatusKeywords.connecting)
    running = true
    exited = loop.start()

    try {
      const created = await enqueue(connector, 'bootstrap')
      handle = { current: created }
    } catch (error) {
      logger.warn('bootstrap failed, closing', error)
      running = false
      queue.interrupt()
      await exited
      lifecycle.transition(connectionStatusKeywords.closed)
      throw error
    }

    lifecycle.transition(connectionStatusKeywords.open)
    logger.info('connection open')
    return api
  }

  const shutdown = async (): Promise<void> => {
    if (connecting && lifecycle.status() === connectionStatusKeywords.connecting) {
      // A failed attempt is reported to connect() callers
      await Promise.allSettled([connecting])
    }

    const status = lifecycle.status()
    if (status === connectionStatusKeywords.closed) return
    if (status === connectionStatusKeywords.unconnected) {
      lifecycle.transition(connectionStatusKeywords.closed)
      return
    }

    lifecycle.transition(connectionStatusKeywords.closing)
    logger.info(`closing, ${queue.size()} item(s) still queued`)
    const owned = handle

    try {
      await enqueue(() => {
        if (owned && teardown) teardown(owned.current)
      }, 'teardown')
    } catch (error) {
      logger.error('teardown failed', error)
      throw error
    } finally {
      running = false
      handle = null
      queue.interrupt()
      await exited
      lifecycle.transition(connectionStatusKeywords.closed)
      logger.info('connection closed')
    }
  }

  const api: Bridge<THandle> = {
    config,

    connect: () => {
      const status = lifecycle.status()
      if (status === connectionStatusKeywords.open) return Promise.resolve(api)
      if (status === connectionStatusKeywords.connecting && connecting) {
        return connecting
      }
      if (status !== connectionStatusKeywords.unconnected) {
        return Promise.reject(new NotConnectedError(status))
      }
      connecting = bootstrap()
      return connecting
    },

    submit: (operation, label = 'operation') => {
      const status = lifecycle.status()
      if (status !== connectionStatusKeywords.open || !running || !handle) {
        throw new NotConnectedError(status)
      }
      const owned = handle
      return enqueue(() => operation(owned.current), label)
    },

    close: () => {
      if (!closing) {
        closing = shutdown()
      }
      return closing
    },

    status: lifecycle.status,
    isRunning: () => running,
    pendingCount: queue.size,
    onStatusChange: lifecycle.subscribe,
  }

  return api
}
