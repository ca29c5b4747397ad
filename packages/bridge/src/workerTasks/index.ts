/**
 * Worker Tasks
 *
 * Runs the bridge inside a worker thread. The host owns the resource and a
 * bridge; the client mirrors the connection lifecycle on the calling thread.
 *
 * @example
 * ```ts
 * // dbWorker.ts
 * createWorkerHost({
 *   tasks,
 *   connector: () => new Database(workerData.filename),
 *   teardown: (db) => db.close(),
 * })
 *
 * // main thread
 * const client = createWorkerClient({ port: worker, tasks, release: () => worker.terminate() })
 * await client.connect()
 * ```
 */

export * from './core'
export * from './client'
export * from './host'
