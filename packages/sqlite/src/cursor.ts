/**
 * Cursor
 *
 * Holds the result of the last statement it ran for paged fetching. Calls
 * on one cursor run in the order they were made: a fetch issued right after
 * an `execute` sees that execute's rows.
 */

import { z } from 'zod'
import type { ZodType } from 'zod'
import type { BindParameters, Row } from './rows'
import type { SqliteSession } from './session'

export type Cursor = {
  /** Rows returned by `fetchmany()` without a size */
  arraysize: number
  readonly iterChunkSize: number
  /** Rows changed by the last write, -1 after a read */
  readonly rowcount: number
  /** Rowid of the last inserted row, null when nothing was inserted */
  readonly lastrowid: number | bigint | null
  execute: (sql: string, params?: BindParameters) => Promise<Cursor>
  executemany: (
    sql: string,
    paramsList: Iterable<BindParameters>,
  ) => Promise<Cursor>
  fetchone: () => Promise<Row | null>
  fetchmany: (size?: number) => Promise<Array<Row>>
  fetchall: {
    (): Promise<Array<Row>>
    <TRow>(schema: ZodType<TRow>): Promise<Array<TRow>>
  }
  close: () => Promise<void>
  [Symbol.asyncIterator]: () => AsyncIterator<Row>
}

export const fetchSizeSchema = z.number().int().positive()

type ResultState = {
  rows: Array<Row>
  position: number
  rowcount: number
  lastrowid: number | bigint | null
  closed: boolean
}

export function createCursor(
  session: SqliteSession,
  iterChunkSize: number,
): Cursor {
  const state: ResultState = {
    rows: [],
    position: 0,
    rowcount: -1,
    lastrowid: null,
    closed: false,
  }
  let tail: Promise<unknown> = Promise.resolve()

  // Chain onto the previous call; its failure already went to its own caller
  const serial = <T>(step: () => T | Promise<T>): Promise<T> => {
    const next = tail.then(step)
    tail = next.then(
      () => undefined,
      () => undefined,
    )
    return next
  }

  const requireOpen = (): void => {
    if (state.closed) {
      throw new Error('Cannot operate on a closed cursor')
    }
  }

  const take = (count: number): Array<Row> => {
    requireOpen()
    const chunk = state.rows.slice(state.position, state.position + count)
    state.position += chunk.length
    return chunk
  }

  function fetchall(): Promise<Array<Row>>
  function fetchall<TRow>(schema: ZodType<TRow>): Promise<Array<TRow>>
  async function fetchall<TRow>(
    schema?: ZodType<TRow>,
  ): Promise<Array<Row> | Array<TRow>> {
    const rows = await serial(() => take(state.rows.length - state.position))
    return schema ? rows.map((row) => schema.parse(row)) : rows
  }

  const cursor: Cursor = {
    arraysize: 1,
    iterChunkSize,

    get rowcount() {
      return state.rowcount
    },

    get lastrowid() {
      return state.lastrowid
    },

    execute: (sql, params) =>
      serial(async () => {
        requireOpen()
        const result = await session.execute({ sql, params })
        if (result.kind === 'rows') {
          state.rows = result.rows
          state.rowcount = -1
          state.lastrowid = null
        } else {
          state.rows = []
          state.rowcount = result.changes
          state.lastrowid = result.lastInsertRowid
        }
        state.position = 0
        return cursor
      }),

    executemany: (sql, paramsList) => {
      const batch = [...paramsList]
      return serial(async () => {
        requireOpen()
        const { changes, lastInsertRowid } = await session.executemany({
          sql,
          paramsList: batch,
        })
        state.rows = []
        state.position = 0
        state.rowcount = changes
        state.lastrowid = lastInsertRowid
        return cursor
      })
    },

    fetchone: () => serial(() => take(1)[0] ?? null),

    fetchmany: (size) => {
      const count = size ?? cursor.arraysize
      if (!fetchSizeSchema.safeParse(count).success) {
        return Promise.reject(
          new RangeError(`Fetch size must be a positive integer, got ${count}`),
        )
      }
      return serial(() => take(count))
    },

    fetchall,

    close: () =>
      serial(() => {
        state.rows = []
        state.position = 0
        state.closed = true
      }),

    [Symbol.asyncIterator]: async function* () {
      for (;;) {
        const rows = await cursor.fetchmany(iterChunkSize)
        if (rows.length === 0) return
        yield* rows
      }
    },
  }

  return cursor
}
