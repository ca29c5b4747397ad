/**
 * SQLite tasks
 *
 * Every call the connection and cursor make, defined once as data. The same
 * definitions run inside a worker thread host or directly on an in-process
 * bridge.
 */

import type { Database } from 'better-sqlite3'
import { taskDefiner } from '@threadlane/bridge'
import { z } from 'zod'
import {
  bindArgs,
  bindParametersSchema,
  rowSchema,
  rowidSchema,
  runStatement,
  runSummarySchema,
  toRows,
} from './rows'

const defineTask = taskDefiner<Database>()

const statementInput = z.object({
  sql: z.string(),
  params: bindParametersSchema.optional(),
})

export const statementResultSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('rows'),
    rows: z.array(rowSchema),
  }),
  z.object({
    kind: z.literal('changes'),
    changes: z.number(),
    lastInsertRowid: rowidSchema.nullable(),
  }),
])

export type StatementResult = z.infer<typeof statementResultSchema>

export const transactionActions = ['begin', 'commit', 'rollback'] as const

export const sqliteTasks = {
  /** Run one statement; readers return their rows, writers their changes */
  execute: defineTask({
    input: statementInput,
    output: statementResultSchema,
    parseIO: true,
    execute: (db, { sql, params }): StatementResult => {
      const statement = db.prepare(sql)
      if (statement.reader) {
        return { kind: 'rows', rows: toRows(statement.all(...bindArgs(params))) }
      }
      const { changes, lastInsertRowid } = runStatement(statement, params)
      return {
        kind: 'changes',
        changes,
        lastInsertRowid: changes > 0 ? lastInsertRowid : null,
      }
    },
  }),

  /** Run one statement per parameter set inside a single transaction */
  executemany: defineTask({
    input: z.object({
      sql: z.string(),
      paramsList: z.array(bindParametersSchema),
    }),
    output: z.object({
      changes: z.number(),
      lastInsertRowid: rowidSchema.nullable(),
    }),
    parseIO: true,
    execute: (db, { sql, paramsList }) => {
      const statement = db.prepare(sql)
      const runAll = db.transaction(() => {
        let changes = 0
        let lastInsertRowid: number | bigint | null = null
        for (const params of paramsList) {
          const summary = runStatement(statement, params)
          changes += summary.changes
          if (summary.changes > 0) lastInsertRowid = summary.lastInsertRowid
        }
        return { changes, lastInsertRowid }
      })
      return runAll()
    },
  }),

  all: defineTask({
    input: statementInput,
    output: z.array(rowSchema),
    parseIO: true,
    execute: (db, { sql, params }) =>
      toRows(db.prepare(sql).all(...bindArgs(params))),
  }),

  run: defineTask({
    input: statementInput,
    output: runSummarySchema,
    parseIO: true,
    execute: (db, { sql, params }) => runStatement(db.prepare(sql), params),
  }),

  exec: defineTask({
    input: z.object({ script: z.string() }),
    output: z.null(),
    parseIO: true,
    execute: (db, { script }) => {
      db.exec(script)
      return null
    },
  }),

  /** commit and rollback are no-ops outside a transaction */
  transaction: defineTask({
    input: z.object({ action: z.enum(transactionActions) }),
    output: z.null(),
    parseIO: true,
    execute: (db, { action }) => {
      if (action === 'begin') db.exec('BEGIN')
      else if (db.inTransaction) db.exec(action === 'commit' ? 'COMMIT' : 'ROLLBACK')
      return null
    },
  }),

  inTransaction: defineTask({
    input: z.object({}),
    output: z.boolean(),
    parseIO: true,
    execute: (db) => db.inTransaction,
  }),

  pragma: defineTask({
    input: z.object({ source: z.string(), simple: z.boolean().optional() }),
    output: z.unknown(),
    parseIO: true,
    execute: (db, { source, simple }): unknown => db.pragma(source, { simple }),
  }),
}

export type SqliteTasks = typeof sqliteTasks
