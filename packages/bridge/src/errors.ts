/**
 * Bridge error vocabulary
 *
 * Precondition failures are raised synchronously with one of these classes.
 * Failures raised by the operations themselves reach the caller untouched.
 */

export const errorCodes = {
  notConnected: 'NOT_CONNECTED',
  invalidTransition: 'INVALID_TRANSITION',
  asyncOperation: 'ASYNC_OPERATION',
  remoteTask: 'REMOTE_TASK',
  invalidConfig: 'INVALID_CONFIG',
} as const

export type ErrorCode = (typeof errorCodes)[keyof typeof errorCodes]

export class BridgeError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'BridgeError'
    this.code = code
  }
}

/**
 * Submission attempted while the connection is not open.
 */
export class NotConnectedError extends BridgeError {
  readonly status: string

  constructor(status: string) {
    super(
      errorCodes.notConnected,
      status === 'closed' || status === 'closing'
        ? 'Connection closed'
        : `Connection not open (status: ${status})`,
    )
    this.name = 'NotConnectedError'
    this.status = status
  }
}

export class InvalidTransitionError extends BridgeError {
  readonly from: string
  readonly to: string

  constructor(from: string, to: string) {
    super(
      errorCodes.invalidTransition,
      `Invalid connection transition: ${from} -> ${to}`,
    )
    this.name = 'InvalidTransitionError'
    this.from = from
    this.to = to
  }
}

/**
 * An operation handed back a promise. The resource is synchronous, so the
 * worker cannot keep its serialization guarantee across an await.
 */
export class AsyncOperationError extends BridgeError {
  constructor() {
    super(
      errorCodes.asyncOperation,
      'Operations must run synchronously; the operation returned a thenable',
    )
    this.name = 'AsyncOperationError'
  }
}

/**
 * A failure raised on the other side of a worker-thread channel.
 */
export class RemoteTaskError extends BridgeError {
  readonly remoteName: string

  constructor(remote: { name: string; message: string; stack?: string }) {
    super(errorCodes.remoteTask, remote.message)
    this.name = 'RemoteTaskError'
    this.remoteName = remote.name
    if (remote.stack) this.stack = remote.stack
  }
}

export class ConfigError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(errorCodes.invalidConfig, message, options)
    this.name = 'ConfigError'
  }
}

export type SerializedError = {
  name: string
  message: string
  stack?: string
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack }
  }
  return { name: 'Error', message: String(error) }
}
