/**
 * @threadlane/sqlite
 *
 * better-sqlite3 on its own worker thread: a promise-based connection and
 * cursor whose every call is a task queued onto one execution stream.
 */

export * from './connect'
export * from './connection'
export * from './cursor'
export * from './options'
export * from './resources'
export * from './rows'
export * from './session'
export * from './tasks'
