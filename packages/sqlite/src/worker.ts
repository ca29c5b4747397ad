/**
 * Worker thread entry
 *
 * Owns the database for the lifetime of the thread and serves the sqlite
 * tasks over `parentPort`.
 */

import Database from 'better-sqlite3'
import { workerData } from 'node:worker_threads'
import { createWorkerHost } from '@threadlane/bridge'
import { workerDataSchema } from './options'
import { sqliteTasks } from './tasks'

const { filename, database, bridge } = workerDataSchema.parse(workerData)

createWorkerHost({
  tasks: sqliteTasks,
  connector: () => new Database(filename, database),
  teardown: (db) => {
    db.close()
  },
  config: bridge,
})
