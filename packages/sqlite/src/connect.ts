/**
 * Opening connections
 *
 * By default the database lives on its own worker thread and every call is
 * a task dispatched to it, so a slow statement never stalls the caller's
 * event loop. With `threaded: false` the database is opened by an in-process
 * bridge instead; calls are still serialized, but they run on this thread.
 */

import { Worker } from 'node:worker_threads'
import Database from 'better-sqlite3'
import {
  ConfigError,
  createBridge,
  createWorkerClient,
  parseBridgeConfig,
} from '@threadlane/bridge'
import type { BridgeConfigInput } from '@threadlane/bridge'
import type { z } from 'zod'
import { createConnection } from './connection'
import type { Connection } from './connection'
import { connectOptionsSchema } from './options'
import type { DatabaseOptions, SqliteWorkerData } from './options'
import { createBridgeSession, createThreadSession } from './session'
import type { SqliteSession } from './session'
import { sqliteTasks } from './tasks'

export type ConnectOptions = z.input<typeof connectOptionsSchema> & {
  bridge?: BridgeConfigInput
}

/**
 * Locate the worker entry beside this module. Loaded from its TypeScript
 * sources, the worker needs tsx to run `worker.ts`.
 */
export function workerEntry(moduleUrl: string = import.meta.url): {
  url: URL
  execArgv: Array<string>
} {
  const fromSources = moduleUrl.endsWith('.ts')
  return {
    url: new URL(fromSources ? './worker.ts' : './worker.js', moduleUrl),
    execArgv: fromSources ? ['--import', 'tsx'] : [],
  }
}

const openThreadSession = async (
  filename: string,
  database: DatabaseOptions,
  bridge: BridgeConfigInput,
): Promise<SqliteSession> => {
  const config = parseBridgeConfig({ name: 'sqlite', ...bridge })
  const { url, execArgv } = workerEntry()
  const workerData: SqliteWorkerData = { filename, database, bridge: config }
  const worker = new Worker(url, { execArgv, workerData })
  const client = createWorkerClient({
    port: worker,
    tasks: sqliteTasks,
    release: () => worker.terminate(),
    config,
  })
  await client.connect()
  return createThreadSession(client)
}

const openBridgeSession = async (
  filename: string,
  database: DatabaseOptions,
  bridge: BridgeConfigInput,
): Promise<SqliteSession> => {
  const opened = createBridge({
    connector: () => new Database(filename, database),
    teardown: (db) => {
      db.close()
    },
    config: { name: 'sqlite', ...bridge },
  })
  await opened.connect()
  return createBridgeSession(opened)
}

/**
 * Open a database and resolve once the handle exists
 *
 * @example
 * ```ts
 * const db = await connect(':memory:')
 * await db.exec('create table notes (body text)')
 * await db.executeInsert('insert into notes values (?)', ['hello'])
 * await db.close()
 * ```
 */
export async function connect(
  filename: string,
  options: ConnectOptions = {},
): Promise<Connection> {
  const parsed = connectOptionsSchema.safeParse({
    iterChunkSize: options.iterChunkSize,
    threaded: options.threaded,
    database: options.database,
  })
  if (!parsed.success) {
    throw new ConfigError(`Invalid connect options: ${parsed.error.message}`, {
      cause: parsed.error,
    })
  }

  const { iterChunkSize, threaded, database } = parsed.data
  const bridge = options.bridge ?? {}
  const session = threaded
    ? await openThreadSession(filename, database, bridge)
    : await openBridgeSession(filename, database, bridge)
  return createConnection(session, iterChunkSize)
}

/**
 * Open a connection for the duration of `fn` and close it on every path
 */
export async function withConnection<TResult>(
  filename: string,
  fn: (connection: Connection) => Promise<TResult>,
  options: ConnectOptions = {},
): Promise<TResult> {
  const connection = await connect(filename, options)
  try {
    return await fn(connection)
  } finally {
    await connection.close()
  }
}
