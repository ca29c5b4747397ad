import { afterEach, describe, expect, it } from 'vitest'
import { z } from 'zod'
import { connect } from '@threadlane/sqlite'
import type { Connection, Row } from '@threadlane/sqlite'

const open: Array<Connection> = []

const seeded = async (count: number, iterChunkSize?: number) => {
  const connection = await connect(':memory:', {
    iterChunkSize,
    bridge: { pollIntervalMs: 5, logLevel: 'silent' },
  })
  open.push(connection)
  await connection.exec('create table numbers (n integer not null)')
  await connection.executemany(
    'insert into numbers (n) values (?)',
    Array.from({ length: count }, (_, index) => [index + 1]),
  )
  return connection
}

afterEach(async () => {
  await Promise.allSettled(open.map((connection) => connection.close()))
  open.length = 0
})

describe('Cursor', () => {
  it('should fetch one row at a time', async () => {
    const connection = await seeded(2)
    const cursor = await connection.execute('select n from numbers order by n')

    expect(await cursor.fetchone()).toEqual({ n: 1 })
    expect(await cursor.fetchone()).toEqual({ n: 2 })
    expect(await cursor.fetchone()).toBeNull()
  })

  it('should fetch arraysize rows by default', async () => {
    const connection = await seeded(5)
    const cursor = await connection.execute('select n from numbers order by n')

    expect(await cursor.fetchmany()).toEqual([{ n: 1 }])
    cursor.arraysize = 2
    expect(await cursor.fetchmany()).toEqual([{ n: 2 }, { n: 3 }])
    expect(await cursor.fetchmany(10)).toEqual([{ n: 4 }, { n: 5 }])
    expect(await cursor.fetchmany(10)).toEqual([])
  })

  it('should return the remaining rows from fetchall', async () => {
    const connection = await seeded(3)
    const cursor = await connection.execute('select n from numbers where n > ? order by n', [1])

    await cursor.fetchone()

    expect(await cursor.fetchall()).toEqual([{ n: 3 }])
    expect(await cursor.fetchall()).toEqual([])
  })

  it('should parse rows with a schema', async () => {
    const connection = await seeded(2)
    const cursor = await connection.execute('select n from numbers order by n')

    const rows = await cursor.fetchall(z.object({ n: z.number().int() }))

    expect(rows.map((row) => row.n)).toEqual([1, 2])
  })

  it('should iterate in chunks until exhausted', async () => {
    const connection = await seeded(5, 2)
    const cursor = await connection.execute('select n from numbers order by n')

    const seen: Array<Row> = []
    for await (const row of cursor) {
      seen.push(row)
    }

    expect(cursor.iterChunkSize).toBe(2)
    expect(seen).toEqual([{ n: 1 }, { n: 2 }, { n: 3 }, { n: 4 }, { n: 5 }])
  })

  it('should report changes and the last rowid for writes', async () => {
    const connection = await seeded(3)
    const cursor = connection.cursor()

    await cursor.execute('update numbers set n = n * 10 where n >= ?', [2])
    expect(cursor.rowcount).toBe(2)

    await cursor.execute('insert into numbers (n) values (?)', [99])
    expect(cursor.rowcount).toBe(1)
    expect(cursor.lastrowid).toBe(4)

    await cursor.execute('select n from numbers')
    expect(cursor.rowcount).toBe(-1)
    expect(cursor.lastrowid).toBeNull()
  })

  it('should reject fetch sizes that are not positive integers', async () => {
    const connection = await seeded(3)
    const cursor = await connection.execute('select n from numbers order by n')

    await expect(cursor.fetchmany(-1)).rejects.toThrow(
      'Fetch size must be a positive integer, got -1',
    )
    await expect(cursor.fetchmany(1.5)).rejects.toThrow(
      'Fetch size must be a positive integer, got 1.5',
    )
    cursor.arraysize = 0
    await expect(cursor.fetchmany()).rejects.toBeInstanceOf(RangeError)

    expect(await cursor.fetchmany(3)).toEqual([{ n: 1 }, { n: 2 }, { n: 3 }])
  })

  it('should order a fetch issued right after execute behind it', async () => {
    const connection = await seeded(2)
    const cursor = connection.cursor()

    const executed = cursor.execute('select n from numbers order by n desc')
    const first = cursor.fetchone()

    await executed
    expect(await first).toEqual({ n: 2 })
  })

  it('should roll back a batch when one row fails', async () => {
    const connection = await seeded(0)

    await expect(
      connection.executemany('insert into numbers (n) values (?)', [[1], [null], [3]]),
    ).rejects.toThrow('NOT NULL constraint failed: numbers.n')

    expect(await connection.executeFetchall('select n from numbers')).toEqual([])
  })

  it('should refuse to fetch after close', async () => {
    const connection = await seeded(1)
    const cursor = await connection.execute('select n from numbers')

    await cursor.close()

    await expect(cursor.fetchone()).rejects.toThrow('Cannot operate on a closed cursor')
  })
})
