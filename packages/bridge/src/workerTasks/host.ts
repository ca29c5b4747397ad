/**
 * Worker Tasks - Host Side
 *
 * Runs inside the worker thread. Owns a bridge, and with it the resource
 * handle, and answers task requests arriving over the port. Requests are
 * submitted in arrival order, so the bridge's FIFO guarantee carries across
 * the channel.
 */

import { parentPort } from 'node:worker_threads'
import { createLogger } from '@threadlane/system'
import { createBridge } from '../bridge'
import type { Bridge } from '../bridge'
import { parseBridgeConfig } from '../config'
import { serializeError } from '../errors'
import { clientEventSchema, eventKeywords, onPortEnd } from './core'
import type {
  ClientEvent,
  PortEndEvent,
  TaskPort,
  TaskRegistry,
  WorkerEvent,
} from './core'

export type WorkerHostOptions<THandle> = {
  /** Defaults to `parentPort` of the current worker thread */
  port?: TaskPort
  tasks: TaskRegistry<THandle>
  connector: () => THandle
  teardown?: (handle: THandle) => void
  config?: unknown
}

export type WorkerHost<THandle> = {
  bridge: Bridge<THandle>
  /** Settles once ready or the bootstrap failure has been reported */
  started: Promise<void>
  /** Settles once the host has closed and said so */
  stopped: Promise<void>
}

export function createWorkerHost<THandle>(
  options: WorkerHostOptions<THandle>,
): WorkerHost<THandle> {
  const maybePort: TaskPort | null = options.port ?? parentPort
  if (!maybePort) {
    throw new Error('createWorkerHost needs a port outside of a worker thread')
  }
  const port: TaskPort = maybePort

  const config = parseBridgeConfig(options.config)
  const logger = createLogger(`${config.name}:host`, config.logLevel)
  const { tasks } = options
  const bridge = createBridge({
    connector: options.connector,
    teardown: options.teardown,
    config,
    logger,
  })

  let markStopped: () => void = () => {}
  const stopped = new Promise<void>((resolve) => {
    markStopped = resolve
  })

  const send = (event: WorkerEvent): void => {
    try {
      port.postMessage(event)
    } catch (error) {
      // Usually an output that cannot be structured-cloned
      if (event.type !== eventKeywords.taskComplete) throw error
      port.postMessage({
        type: eventKeywords.taskError,
        taskId: event.taskId,
        taskName: event.taskName,
        error: serializeError(error),
      } satisfies WorkerEvent)
    }
  }

  const sendTaskError = (taskId: string, taskName: string, error: unknown) => {
    send({
      type: eventKeywords.taskError,
      taskId,
      taskName,
      error: serializeError(error),
    })
  }

  const handleTaskRequest = (
    event: Extract<ClientEvent, { type: typeof eventKeywords.taskRequest }>,
  ): void => {
    const { taskId, taskName } = event
    const task = Object.hasOwn(tasks, taskName) ? tasks[taskName] : undefined
    if (!task) {
      logger.warn(`unknown task: ${taskName}`)
      sendTaskError(taskId, taskName, new Error(`Unknown task: ${taskName}`))
      return
    }

    const inputResult = task.parseIO
      ? task.input.safeParse(event.input)
      : ({ success: true, data: event.input } as const)
    if (!inputResult.success) {
      sendTaskError(
        taskId,
        taskName,
        new TypeError(`Invalid input: ${inputResult.error.message}`),
      )
      return
    }

    const input = inputResult.data
    let result: Promise<unknown>
    try {
      result = bridge.submit((handle) => {
        const output = task.execute(handle, input)
        return task.parseIO ? task.output.parse(output) : output
      }, taskName)
    } catch (error) {
      sendTaskError(taskId, taskName, error)
      return
    }

    void result.then(
      (output) => {
        send({ type: eventKeywords.taskComplete, taskId, taskName, output })
      },
      (error: unknown) => {
        sendTaskError(taskId, taskName, error)
      },
    )
  }

  const handleClose = (): void => {
    void bridge.close().then(
      () => {
        send({ type: eventKeywords.workerClosed })
      },
      (error: unknown) => {
        send({ type: eventKeywords.workerClosed, error: serializeError(error) })
      },
    ).finally(finish)
  }

  // Nobody is left to answer, but the handle still has to be released
  const handlePortEnd = (event: PortEndEvent): void => {
    logger.warn(`client port ended (${event}), closing`)
    void bridge
      .close()
      .catch((error: unknown) => {
        logger.error('close after losing the client failed', error)
      })
      .finally(finish)
  }

  const onMessage = (message: unknown): void => {
    const parsed = clientEventSchema.safeParse(message)
    if (!parsed.success) {
      logger.warn('ignoring malformed message', parsed.error.message)
      return
    }

    const event = parsed.data
    switch (event.type) {
      case eventKeywords.taskRequest:
        handleTaskRequest(event)
        return
      case eventKeywords.workerClose:
        handleClose()
        return
    }
  }

  port.on('message', onMessage)
  const stopWatchingPort = onPortEnd(port, handlePortEnd)

  function finish(): void {
    port.off('message', onMessage)
    stopWatchingPort()
    markStopped()
  }

  const started = bridge.connect().then(
    () => {
      logger.debug('ready')
      send({ type: eventKeywords.workerReady, timestamp: Date.now() })
    },
    (error: unknown) => {
      logger.error('bootstrap failed', error)
      send({ type: eventKeywords.workerError, error: serializeError(error) })
      finish()
    },
  )

  return { bridge, started, stopped }
}
