import type { Statement } from 'better-sqlite3'
import { z } from 'zod'

export const rowSchema = z.record(z.string(), z.unknown())

export type Row = z.infer<typeof rowSchema>

/** Positional (`?`) or named (`@name`, `:name`, `$name`) parameters */
export const bindParametersSchema = z.union([
  z.array(z.unknown()),
  z.record(z.string(), z.unknown()),
])

export type BindParameters = z.infer<typeof bindParametersSchema>

export const rowidSchema = z.union([z.number(), z.bigint()])

export const runSummarySchema = z.object({
  changes: z.number(),
  lastInsertRowid: rowidSchema,
})

export type RunSummary = z.infer<typeof runSummarySchema>

function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function toRows(values: Array<unknown>): Array<Row> {
  return values.map((value) => {
    if (!isRow(value)) {
      throw new TypeError(`Expected a row object, got ${typeof value}`)
    }
    return value
  })
}

export function bindArgs(params?: BindParameters): Array<unknown> {
  if (params === undefined) return []
  return Array.isArray(params) ? [...params] : [params]
}

export function runStatement(
  statement: Statement,
  params?: BindParameters,
): RunSummary {
  const { changes, lastInsertRowid } = statement.run(...bindArgs(params))
  return { changes, lastInsertRowid }
}
