/**
 * Sessions
 *
 * The connection and cursor talk to a session: one promise-returning call
 * per task. A thread session dispatches to a worker thread host; a bridge
 * session runs the same tasks on an in-process bridge.
 */

import type { Database } from 'better-sqlite3'
import type {
  Bridge,
  ConnectionStatus,
  TaskInput,
  TaskOutput,
  WorkerClient,
} from '@threadlane/bridge'
import { sqliteTasks } from './tasks'
import type { SqliteTasks } from './tasks'

export type SessionCalls = {
  [TName in keyof SqliteTasks]: (
    input: TaskInput<SqliteTasks[TName]>,
  ) => Promise<TaskOutput<SqliteTasks[TName]>>
}

export type SqliteSession = SessionCalls & {
  close: () => Promise<void>
  status: () => ConnectionStatus
}

export function createThreadSession(
  client: WorkerClient<SqliteTasks>,
): SqliteSession {
  const call =
    <TName extends keyof SqliteTasks & string>(taskName: TName) =>
    (input: TaskInput<SqliteTasks[TName]>) =>
      client.dispatch(taskName, input)

  return {
    execute: call('execute'),
    executemany: call('executemany'),
    all: call('all'),
    run: call('run'),
    exec: call('exec'),
    transaction: call('transaction'),
    inTransaction: call('inTransaction'),
    pragma: call('pragma'),
    close: client.close,
    status: client.status,
  }
}

export function createBridgeSession(bridge: Bridge<Database>): SqliteSession {
  return {
    execute: (input) =>
      bridge.submit((db) => sqliteTasks.execute.execute(db, input), 'execute'),
    executemany: (input) =>
      bridge.submit(
        (db) => sqliteTasks.executemany.execute(db, input),
        'executemany',
      ),
    all: (input) =>
      bridge.submit((db) => sqliteTasks.all.execute(db, input), 'all'),
    run: (input) =>
      bridge.submit((db) => sqliteTasks.run.execute(db, input), 'run'),
    exec: (input) =>
      bridge.submit((db) => sqliteTasks.exec.execute(db, input), 'exec'),
    transaction: (input) =>
      bridge.submit(
        (db) => sqliteTasks.transaction.execute(db, input),
        'transaction',
      ),
    inTransaction: (input) =>
      bridge.submit(
        (db) => sqliteTasks.inTransaction.execute(db, input),
        'inTransaction',
      ),
    pragma: (input) =>
      bridge.submit((db) => sqliteTasks.pragma.execute(db, input), 'pragma'),
    close: bridge.close,
    status: bridge.status,
  }
}
