/**
 * Worker Tasks - Client Side
 *
 * Main thread client for a worker host. Shares the bridge's connection
 * lifecycle: `connect` waits for the host's ready signal, `dispatch` only
 * works while open, and `close` asks the host to drain before releasing the
 * port. Replies are delivered through completion handles, so each caller
 * resumes from its own async context.
 *
 * @example
 * ```ts
 * const worker = new Worker(new URL('./dbWorker.js', import.meta.url))
 * const client = createWorkerClient({
 *   port: worker,
 *   tasks,
 *   release: () => worker.terminate(),
 * })
 * await client.connect()
 * const total = await client.dispatch('count', { table: 'orders' })
 * await client.close()
 * ```
 */

import { createAtom, createLogger } from '@threadlane/system'
import { createCompletionHandle } from '../completion'
import type { CompletionHandle } from '../completion'
import { parseBridgeConfig } from '../config'
import { NotConnectedError, RemoteTaskError, serializeError } from '../errors'
import type { SerializedError } from '../errors'
import { connectionStatusKeywords, createLifecycle } from '../lifecycle'
import type { ConnectionStatus } from '../lifecycle'
import {
  eventKeywords,
  generateTaskId,
  onPortEnd,
  workerEventSchema,
} from './core'
import type {
  ClientEvent,
  PortEndEvent,
  TaskInput,
  TaskOutput,
  TaskPort,
  TaskShape,
  WorkerEvent,
} from './core'

export type WorkerClientOptions<TTasks extends Record<string, TaskShape>> = {
  port: TaskPort
  tasks: TTasks
  /** Called once the client is closed, e.g. to terminate the worker */
  release?: () => unknown
  config?: unknown
}

export type WorkerClient<TTasks extends Record<string, TaskShape>> = {
  connect: () => Promise<WorkerClient<TTasks>>
  /**
   * Send a task to the host.
   * Throws NotConnectedError synchronously unless the connection is open.
   */
  dispatch: <TName extends keyof TTasks & string>(
    taskName: TName,
    input: TaskInput<TTasks[TName]>,
  ) => Promise<TaskOutput<TTasks[TName]>>
  close: () => Promise<void>
  status: () => ConnectionStatus
  pendingCount: () => number
  onStatusChange: (callback: (status: ConnectionStatus) => void) => () => void
}

type HostSignal =
  | { kind: 'pending' }
  | { kind: 'settled'; error?: SerializedError }

export function createWorkerClient<TTasks extends Record<string, TaskShape>>(
  options: WorkerClientOptions<TTasks>,
): WorkerClient<TTasks> {
  const { port, release } = options
  const registry: Record<string, TaskShape> = options.tasks
  const config = parseBridgeConfig(options.config)
  const logger = createLogger(`${config.name}:client`, config.logLevel)

  const lifecycle = createLifecycle()
  const pending = new Map<string, CompletionHandle<unknown>>()
  const readiness = createAtom<HostSignal>({ kind: 'pending' })
  const closure = createAtom<HostSignal>({ kind: 'pending' })
  let connecting: Promise<WorkerClient<TTasks>> | null = null
  let closing: Promise<void> | null = null
  let hostGone = false

  const waitFor = (signal: typeof readiness): Promise<void> =>
    new Promise((resolve, reject) => {
      const check = (state: HostSignal): boolean => {
        if (state.kind === 'pending') return false
        if (state.error) reject(new RemoteTaskError(state.error))
        else resolve()
        return true
      }
      if (check(signal.get())) return
      const unsubscribe = signal.subscribe((state) => {
        if (check(state)) unsubscribe()
      })
    })

  const settleTask = (event: Extract<
    WorkerEvent,
    { type: typeof eventKeywords.taskComplete | typeof eventKeywords.taskError }
  >): void => {
    const completion = pending.get(event.taskId)
    if (!completion) {
      logger.warn(`reply for unknown task ${event.taskName} (${event.taskId})`)
      return
    }
    pending.delete(event.taskId)

    if (event.type === eventKeywords.taskError) {
      completion.reject(new RemoteTaskError(event.error))
      return
    }

    const task = Object.hasOwn(registry, event.taskName)
      ? registry[event.taskName]
      : undefined
    if (task?.parseIO) {
      const outputResult = task.output.safeParse(event.output)
      if (!outputResult.success) {
        completion.reject(
          new TypeError(`Invalid output: ${outputResult.error.message}`),
        )
        return
      }
      completion.resolve(outputResult.data)
      return
    }
    completion.resolve(event.output)
  }

  const onMessage = (message: unknown): void => {
    const parsed = workerEventSchema.safeParse(message)
    if (!parsed.success) {
      logger.warn('ignoring malformed message', parsed.error.message)
      return
    }

    const event = parsed.data
    switch (event.type) {
      case eventKeywords.workerReady:
        readiness.set({ kind: 'settled' })
        return
      case eventKeywords.workerError:
        readiness.set({ kind: 'settled', error: event.error })
        return
      case eventKeywords.workerClosed:
        closure.set({ kind: 'settled', error: event.error })
        return
      case eventKeywords.taskComplete:
      case eventKeywords.taskError:
        settleTask(event)
        return
    }
  }

  // The host can no longer answer: fail whatever waits on it and wind down
  const handlePortEnd = (event: PortEndEvent, reason?: unknown): void => {
    if (hostGone) return
    hostGone = true
    logger.warn(`host port ended (${event})`, reason)

    const failure =
      reason instanceof Error
        ? new RemoteTaskError(serializeError(reason))
        : new NotConnectedError(connectionStatusKeywords.closed)
    for (const completion of pending.values()) {
      completion.reject(failure)
    }
    pending.clear()

    if (readiness.get().kind === 'pending') {
      readiness.set({
        kind: 'settled',
        error:
          reason instanceof Error
            ? serializeError(reason)
            : { name: 'Error', message: `Worker host ended before it was ready (${event})` },
      })
    }
    if (closure.get().kind === 'pending') {
      closure.set({ kind: 'settled' })
    }

    if (lifecycle.status() === connectionStatusKeywords.open) {
      api.close().catch((error: unknown) => {
        logger.error('close after losing the host failed', error)
      })
    }
  }

  // Listen right away: the host may announce itself before connect() is called
  port.on('message', onMessage)
  const stopWatchingPort = onPortEnd(port, handlePortEnd)

  const detach = async (): Promise<void> => {
    port.off('message', onMessage)
    stopWatchingPort()
    for (const [taskId, completion] of pending) {
      logger.warn(`task ${taskId} still pending at close`)
      completion.reject(new NotConnectedError(connectionStatusKeywords.closed))
    }
    pending.clear()
    if (release) await release()
  }

  const post = (event: ClientEvent): void => {
    port.postMessage(event)
  }

  const handshake = async (): Promise<WorkerClient<TTasks>> => {
    lifecycle.transition(connectionStatusKeywords.connecting)
    try {
      await waitFor(readiness)
    } catch (error) {
      logger.error('host failed to start', error)
      try {
        await detach()
      } finally {
        lifecycle.transition(connectionStatusKeywords.closed)
      }
      throw error
    }
    lifecycle.transition(connectionStatusKeywords.open)
    logger.info('connected to host')
    return api
  }

  const shutdown = async (): Promise<void> => {
    if (connecting && lifecycle.status() === connectionStatusKeywords.connecting) {
      await Promise.allSettled([connecting])
    }

    const status = lifecycle.status()
    if (status === connectionStatusKeywords.closed) return
    if (status === connectionStatusKeywords.unconnected) {
      try {
        await detach()
      } finally {
        lifecycle.transition(connectionStatusKeywords.closed)
      }
      return
    }

    lifecycle.transition(connectionStatusKeywords.closing)
    try {
      if (!hostGone) post({ type: eventKeywords.workerClose })
      await waitFor(closure)
    } catch (error) {
      logger.error('host failed to close cleanly', error)
      throw error
    } finally {
      try {
        await detach()
      } finally {
        lifecycle.transition(connectionStatusKeywords.closed)
      }
    }
  }

  const api: WorkerClient<TTasks> = {
    connect: () => {
      const status = lifecycle.status()
      if (status === connectionStatusKeywords.open) return Promise.resolve(api)
      if (status === connectionStatusKeywords.connecting && connecting) {
        return connecting
      }
      if (status !== connectionStatusKeywords.unconnected) {
        return Promise.reject(new NotConnectedError(status))
      }
      connecting = handshake()
      return connecting
    },

    dispatch: <TName extends keyof TTasks & string>(
      taskName: TName,
      input: TaskInput<TTasks[TName]>,
    ): Promise<TaskOutput<TTasks[TName]>> => {
      const status = lifecycle.status()
      if (status !== connectionStatusKeywords.open) {
        throw new NotConnectedError(status)
      }

      const taskId = generateTaskId()
      const completion = createCompletionHandle<TaskOutput<TTasks[TName]>>()
      pending.set(taskId, completion)
      try {
        post({ type: eventKeywords.taskRequest, taskId, taskName, input })
      } catch (error) {
        pending.delete(taskId)
        throw error
      }
      return completion.promise
    },

    close: () => {
      if (!closing) {
        closing = shutdown()
      }
      return closing
    },

    status: lifecycle.status,
    pendingCount: () => pending.size,
    onStatusChange: lifecycle.subscribe,
  }

  return api
}
