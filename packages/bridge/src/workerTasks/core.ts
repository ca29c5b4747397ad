/**
 * Worker Tasks - Core
 *
 * Tasks are data: a name, zod schemas for input and output, and a synchronous
 * `execute` that receives the resource handle owned by the worker thread.
 * Both sides of the channel share the registry, so dispatch is typed from
 * the same definitions the host executes.
 *
 * Dependencies:
 * - zod: schema validation and type inference
 */

import { z } from 'zod'
import type { ZodType } from 'zod'

/**
 * Unified task definition
 * `execute` runs on the host's worker loop and must not return a promise
 */
export type WorkerTaskDefinition<
  THandle,
  TInput extends ZodType = ZodType,
  TOutput extends ZodType = ZodType,
> = {
  input: TInput
  output: TOutput
  /** Validate input on the host and output before it is sent back */
  parseIO?: boolean
  execute(handle: THandle, input: z.infer<TInput>): z.infer<TOutput>
}

/**
 * Registry of tasks
 */
export type TaskRegistry<THandle> = Record<string, WorkerTaskDefinition<THandle>>

/**
 * The part of a task both sides agree on; the client never sees the handle
 */
export type TaskShape = {
  input: ZodType
  output: ZodType
  parseIO?: boolean
}

export type TaskInput<T extends TaskShape> = z.input<T['input']>

export type TaskOutput<T extends TaskShape> = z.output<T['output']>

/**
 * Fix the handle type once, then define tasks with full inference
 *
 * @example
 * ```ts
 * const defineTask = taskDefiner<Database.Database>()
 * const tasks = {
 *   count: defineTask({
 *     input: z.object({ table: z.string() }),
 *     output: z.number(),
 *     execute: (db, { table }) => db.prepare(`select count(*) from ${table}`).pluck().get(),
 *   }),
 * }
 * ```
 */
export function taskDefiner<THandle>() {
  return function defineTask<TInput extends ZodType, TOutput extends ZodType>(
    definition: WorkerTaskDefinition<THandle, TInput, TOutput>,
  ): WorkerTaskDefinition<THandle, TInput, TOutput> {
    return definition
  }
}

/**
 * Event type keywords
 * Use these instead of raw strings
 */
export const eventKeywords = {
  taskRequest: 'task/request',
  workerClose: 'worker/close',
  workerReady: 'worker/ready',
  workerError: 'worker/error',
  taskComplete: 'task/complete',
  taskError: 'task/error',
  workerClosed: 'worker/closed',
} as const

export const serializedErrorSchema = z.object({
  name: z.string(),
  message: z.string(),
  stack: z.string().optional(),
})

/** Client → Host */
export const clientEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal(eventKeywords.taskRequest),
    taskId: z.string(),
    taskName: z.string(),
    input: z.unknown(), // Validated against the task schema on the host
  }),
  z.object({
    type: z.literal(eventKeywords.workerClose),
  }),
])

/** Host → Client */
export const workerEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal(eventKeywords.workerReady),
    timestamp: z.number(),
  }),
  z.object({
    type: z.literal(eventKeywords.workerError),
    error: serializedErrorSchema,
  }),
  z.object({
    type: z.literal(eventKeywords.taskComplete),
    taskId: z.string(),
    taskName: z.string(),
    output: z.unknown(),
  }),
  z.object({
    type: z.literal(eventKeywords.taskError),
    taskId: z.string(),
    taskName: z.string(),
    error: serializedErrorSchema,
  }),
  z.object({
    type: z.literal(eventKeywords.workerClosed),
    error: serializedErrorSchema.optional(),
  }),
])

export type ClientEvent = z.infer<typeof clientEventSchema>

export type WorkerEvent = z.infer<typeof workerEventSchema>

/**
 * Events after which the other side can no longer answer:
 * `close` on a `MessagePort`, `exit` and `error` on a `Worker`
 */
export const portEndEvents = ['close', 'exit', 'error'] as const

export type PortEndEvent = (typeof portEndEvents)[number]

/**
 * The slice of `MessagePort` and `Worker` both sides need
 */
export interface TaskPort {
  postMessage(message: unknown): void
  on(event: 'message', listener: (message: unknown) => void): unknown
  on(event: PortEndEvent, listener: (reason?: unknown) => void): unknown
  off(event: 'message', listener: (message: unknown) => void): unknown
  off(event: PortEndEvent, listener: (reason?: unknown) => void): unknown
}

/**
 * Listen for the end of a port; the returned function stops listening
 */
export function onPortEnd(
  port: TaskPort,
  listener: (event: PortEndEvent, reason?: unknown) => void,
): () => void {
  const listeners = portEndEvents.map((event) => {
    const handler = (reason?: unknown) => listener(event, reason)
    port.on(event, handler)
    return () => {
      port.off(event, handler)
    }
  })
  return () => listeners.forEach((stop) => stop())
}

let taskSequence = 0

/**
 * Generate lightweight task ID: timestamp-sequence
 * Example: "1704234567890-1f"
 */
export function generateTaskId(): string {
  taskSequence = (taskSequence + 1) % Number.MAX_SAFE_INTEGER
  return `${Date.now()}-${taskSequence.toString(16)}`
}
