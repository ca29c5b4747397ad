/**
 * Braided resources
 *
 * A started resource is connected; halting it closes it, draining whatever
 * was still queued.
 *
 * @example
 * ```ts
 * const config = {
 *   cache: createBridgeResource({ connector: () => new Map<string, string>() }),
 * }
 * const { system } = await startSystem(config)
 * await system.cache.submit((map) => map.set('greeting', 'hello'))
 * await haltSystem(config, system)
 * ```
 */

import { defineResource } from 'braided'
import { createBridge } from './bridge'
import type { BridgeOptions } from './bridge'
import { createWorkerClient } from './workerTasks/client'
import type { WorkerClientOptions } from './workerTasks/client'
import type { TaskShape } from './workerTasks/core'

export function createBridgeResource<THandle>(options: BridgeOptions<THandle>) {
  return defineResource({
    dependencies: [],
    start: () => createBridge(options).connect(),
    halt: async (bridge) => {
      await bridge.close()
    },
  })
}

export function createWorkerClientResource<
  TTasks extends Record<string, TaskShape>,
>(options: WorkerClientOptions<TTasks>) {
  return defineResource({
    dependencies: [],
    start: () => createWorkerClient(options).connect(),
    halt: async (client) => {
      await client.close()
    },
  })
}
