import { z } from 'zod'

export const DEFAULT_ITER_CHUNK_SIZE = 64

/** The better-sqlite3 constructor options that can cross a thread boundary */
export const databaseOptionsSchema = z.object({
  readonly: z.boolean().optional(),
  fileMustExist: z.boolean().optional(),
  timeout: z.number().int().nonnegative().optional(),
  nativeBinding: z.string().optional(),
})

export type DatabaseOptions = z.infer<typeof databaseOptionsSchema>

export const connectOptionsSchema = z.object({
  /** Rows fetched per round trip when iterating a cursor */
  iterChunkSize: z.number().int().positive().default(DEFAULT_ITER_CHUNK_SIZE),
  /** Open the database on a worker thread; false keeps it on this thread's event loop */
  threaded: z.boolean().default(true),
  database: databaseOptionsSchema.default({}),
})

/** What the worker thread entry receives as `workerData` */
export const workerDataSchema = z.object({
  filename: z.string(),
  database: databaseOptionsSchema,
  bridge: z.unknown(),
})

export type SqliteWorkerData = z.infer<typeof workerDataSchema>
