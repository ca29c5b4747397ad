/**
 * Connection
 *
 * Promise-based facade over a better-sqlite3 handle. Each method is a single
 * call on the session; ordering, draining and failure delivery are the
 * session's job.
 */

import type { ConnectionStatus } from '@threadlane/bridge'
import type { ZodType } from 'zod'
import { createCursor } from './cursor'
import type { Cursor } from './cursor'
import type { BindParameters, Row, RunSummary } from './rows'
import type { SqliteSession } from './session'

export type PragmaOptions = {
  /** Return the first column of the first row only */
  simple?: boolean
}

export type Connection = {
  readonly iterChunkSize: number
  /** New cursor sharing this connection's queue */
  cursor: () => Cursor
  /** Run a statement on a fresh cursor */
  execute: (sql: string, params?: BindParameters) => Promise<Cursor>
  executemany: (
    sql: string,
    paramsList: Iterable<BindParameters>,
  ) => Promise<Cursor>
  executeFetchall: {
    (sql: string, params?: BindParameters): Promise<Array<Row>>
    <TRow>(
      sql: string,
      params: BindParameters | undefined,
      schema: ZodType<TRow>,
    ): Promise<Array<TRow>>
  }
  executeInsert: (sql: string, params?: BindParameters) => Promise<RunSummary>
  /** Run a script of one or more statements without parameters */
  exec: (script: string) => Promise<void>
  begin: () => Promise<void>
  /** No-op outside a transaction */
  commit: () => Promise<void>
  /** No-op outside a transaction */
  rollback: () => Promise<void>
  inTransaction: () => Promise<boolean>
  pragma: (source: string, options?: PragmaOptions) => Promise<unknown>
  close: () => Promise<void>
  status: () => ConnectionStatus
}

export function createConnection(
  session: SqliteSession,
  iterChunkSize: number,
): Connection {
  function executeFetchall(
    sql: string,
    params?: BindParameters,
  ): Promise<Array<Row>>
  function executeFetchall<TRow>(
    sql: string,
    params: BindParameters | undefined,
    schema: ZodType<TRow>,
  ): Promise<Array<TRow>>
  function executeFetchall<TRow>(
    sql: string,
    params?: BindParameters,
    schema?: ZodType<TRow>,
  ): Promise<Array<Row> | Array<TRow>> {
    const rows = session.all({ sql, params })
    return schema ? rows.then((all) => all.map((row) => schema.parse(row))) : rows
  }

  const transaction = async (
    action: 'begin' | 'commit' | 'rollback',
  ): Promise<void> => {
    await session.transaction({ action })
  }

  const connection: Connection = {
    iterChunkSize,

    cursor: () => createCursor(session, iterChunkSize),

    execute: (sql, params) => connection.cursor().execute(sql, params),

    executemany: (sql, paramsList) =>
      connection.cursor().executemany(sql, paramsList),

    executeFetchall,

    executeInsert: (sql, params) => session.run({ sql, params }),

    exec: async (script) => {
      await session.exec({ script })
    },

    begin: () => transaction('begin'),
    commit: () => transaction('commit'),
    rollback: () => transaction('rollback'),

    inTransaction: () => session.inTransaction({}),

    pragma: (source, options) =>
      session.pragma({ source, simple: options?.simple }),

    close: session.close,

    status: session.status,
  }

  return connection
}
