import { AsyncLocalStorage } from 'node:async_hooks'
import { MessageChannel, Worker, threadId } from 'node:worker_threads'
import type { MessagePort } from 'node:worker_threads'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { z } from 'zod'
import {
  NotConnectedError,
  RemoteTaskError,
  createWorkerClient,
  createWorkerHost,
  taskDefiner,
} from '@threadlane/bridge'
import type { ConnectionStatus, WorkerClient } from '@threadlane/bridge'
import { counterTasks } from './fixtures/counterTasks'

type Ledger = {
  balance: number
  entries: Array<number>
  closed: boolean
}

const defineTask = taskDefiner<Ledger>()

const tasks = {
  deposit: defineTask({
    input: z.object({ amount: z.number().int().positive() }),
    output: z.number(),
    parseIO: true,
    execute: (ledger, { amount }) => {
      ledger.balance += amount
      ledger.entries.push(amount)
      return ledger.balance
    },
  }),
  entries: defineTask({
    input: z.object({}),
    output: z.array(z.number()),
    execute: (ledger) => [...ledger.entries],
  }),
  overdraw: defineTask({
    input: z.object({ amount: z.number() }),
    output: z.number(),
    execute: (ledger, { amount }) => {
      if (amount > ledger.balance) {
        throw new RangeError(`insufficient funds for ${amount}`)
      }
      ledger.balance -= amount
      return ledger.balance
    },
  }),
}

const quiet = { name: 'ledger', pollIntervalMs: 5, logLevel: 'silent' } as const

const ports: Array<MessagePort> = []
const closers: Array<() => Promise<void>> = []

const setup = (
  overrides: { connector?: () => Ledger; teardown?: (ledger: Ledger) => void } = {},
) => {
  const { port1, port2 } = new MessageChannel()
  ports.push(port1, port2)
  const ledger: Ledger = { balance: 0, entries: [], closed: false }
  const teardown = vi.fn(
    overrides.teardown ??
      ((handle: Ledger) => {
        handle.closed = true
      }),
  )
  const host = createWorkerHost({
    port: port2,
    tasks,
    connector: overrides.connector ?? (() => ledger),
    teardown,
    config: quiet,
  })
  const release = vi.fn(() => {
    port1.close()
  })
  const client = createWorkerClient({ port: port1, tasks, release, config: quiet })
  closers.push(client.close)
  const statuses: Array<ConnectionStatus> = []
  client.onStatusChange((status) => statuses.push(status))
  return { host, client, ledger, teardown, release, statuses, port1 }
}

afterEach(async () => {
  await Promise.allSettled(closers.map((close) => close()))
  closers.length = 0
  ports.forEach((port) => port.close())
  ports.length = 0
})

describe('worker tasks', () => {
  it('should connect once the host is ready', async () => {
    const { host, client, statuses } = setup()

    await client.connect()
    await host.started

    expect(client.status()).toBe('open')
    expect(host.bridge.status()).toBe('open')
    expect(statuses).toEqual(['connecting', 'open'])
  })

  it('should run dispatched tasks in order and return their output', async () => {
    const { client, ledger } = setup()
    await client.connect()

    const balances = await Promise.all([
      client.dispatch('deposit', { amount: 5 }),
      client.dispatch('deposit', { amount: 10 }),
      client.dispatch('deposit', { amount: 1 }),
    ])

    expect(balances).toEqual([5, 15, 16])
    expect(await client.dispatch('entries', {})).toEqual([5, 10, 1])
    expect(ledger.balance).toBe(16)
  })

  it('should deliver task failures as RemoteTaskError and keep serving', async () => {
    const { client } = setup()
    await client.connect()

    const error = await client
      .dispatch('overdraw', { amount: 50 })
      .catch((failure: unknown) => failure)

    expect(error).toBeInstanceOf(RemoteTaskError)
    expect(error).toMatchObject({
      message: 'insufficient funds for 50',
      remoteName: 'RangeError',
      code: 'REMOTE_TASK',
    })

    expect(await client.dispatch('deposit', { amount: 2 })).toBe(2)
  })

  it('should reject input that fails the task schema on the host', async () => {
    const { client, ledger } = setup()
    await client.connect()

    await expect(client.dispatch('deposit', { amount: 1.5 })).rejects.toThrow(
      /^Invalid input:/,
    )
    expect(ledger.entries).toEqual([])
  })

  it('should report tasks the host does not know', async () => {
    const { port1 } = setup()
    const wider = {
      ...tasks,
      audit: taskDefiner<Ledger>()({
        input: z.object({}),
        output: z.string(),
        execute: () => 'ok',
      }),
    }
    // A second client on the same port, typed with a task the host lacks
    const client = createWorkerClient({ port: port1, tasks: wider, config: quiet })
    await client.connect()

    await expect(client.dispatch('audit', {})).rejects.toThrow('Unknown task: audit')
  })

  it('should refuse to dispatch unless open', async () => {
    const { client } = setup()

    expect(() => client.dispatch('deposit', { amount: 1 })).toThrow(NotConnectedError)

    await client.connect()
    await client.close()

    expect(() => client.dispatch('deposit', { amount: 1 })).toThrow('Connection closed')
  })

  it('should drain pending tasks before the host closes', async () => {
    const { host, client, ledger, teardown, release, statuses } = setup()
    await client.connect()

    const deposits = [1, 2, 3, 4].map((amount) =>
      client.dispatch('deposit', { amount }),
    )
    await client.close()

    expect(await Promise.all(deposits)).toEqual([1, 3, 6, 10])
    expect(client.pendingCount()).toBe(0)
    expect(teardown).toHaveBeenCalledTimes(1)
    expect(ledger.closed).toBe(true)
    expect(release).toHaveBeenCalledTimes(1)
    expect(host.bridge.status()).toBe('closed')
    expect(statuses).toEqual(['connecting', 'open', 'closing', 'closed'])
    await host.stopped
  })

  it('should close when the host fails to bootstrap', async () => {
    const { host, client, release, statuses } = setup({
      connector: () => {
        throw new Error('disk I/O error')
      },
    })

    await expect(client.connect()).rejects.toThrow('disk I/O error')
    await host.started

    expect(client.status()).toBe('closed')
    expect(host.bridge.status()).toBe('closed')
    expect(release).toHaveBeenCalledTimes(1)
    expect(statuses).toEqual(['connecting', 'closed'])
  })

  it('should surface a teardown failure from close and still reach closed', async () => {
    const { client } = setup({
      teardown: () => {
        throw new Error('busy')
      },
    })
    await client.connect()

    await expect(client.close()).rejects.toThrow('busy')
    expect(client.status()).toBe('closed')
  })

  it('should fail pending tasks and close when the host port goes away', async () => {
    const { port1, port2 } = new MessageChannel()
    ports.push(port1, port2)
    const release = vi.fn()
    const client = createWorkerClient({ port: port1, tasks, release, config: quiet })
    closers.push(client.close)
    const statuses: Array<ConnectionStatus> = []
    client.onStatusChange((status) => statuses.push(status))

    port2.postMessage({ type: 'worker/ready', timestamp: 1 })
    await client.connect()
    const deposit = client.dispatch('deposit', { amount: 1 })
    const closed = untilStatus(client, 'closed')

    port2.close()

    await expect(deposit).rejects.toBeInstanceOf(NotConnectedError)
    await closed
    expect(client.pendingCount()).toBe(0)
    expect(() => client.dispatch('deposit', { amount: 1 })).toThrow('Connection closed')
    await expect(client.close()).resolves.toBeUndefined()
    expect(release).toHaveBeenCalledTimes(1)
    expect(statuses).toEqual(['connecting', 'open', 'closing', 'closed'])
  })

  it('should reject connect when the host goes away before it is ready', async () => {
    const { port1, port2 } = new MessageChannel()
    ports.push(port1, port2)
    const client = createWorkerClient({ port: port1, tasks, config: quiet })
    closers.push(client.close)

    const connecting = client.connect()
    port2.close()

    await expect(connecting).rejects.toThrow(
      'Worker host ended before it was ready (close)',
    )
    expect(client.status()).toBe('closed')
  })

  it('should release the handle when the client port goes away', async () => {
    const { host, client, ledger, teardown, port1 } = setup()
    await client.connect()

    port1.close()
    await host.stopped

    expect(host.bridge.status()).toBe('closed')
    expect(teardown).toHaveBeenCalledTimes(1)
    expect(ledger.closed).toBe(true)
  })
})

const untilStatus = (
  client: { onStatusChange: WorkerClient<typeof tasks>['onStatusChange'] },
  wanted: ConnectionStatus,
): Promise<void> =>
  new Promise((resolve) => {
    const unsubscribe = client.onStatusChange((status) => {
      if (status === wanted) {
        unsubscribe()
        resolve()
      }
    })
  })

describe('worker tasks on a worker thread', () => {
  const startCounterWorker = () => {
    const worker = new Worker(new URL('./fixtures/counterHost.ts', import.meta.url), {
      execArgv: ['--import', 'tsx'],
    })
    const client = createWorkerClient({
      port: worker,
      tasks: counterTasks,
      release: () => worker.terminate(),
      config: quiet,
    })
    closers.push(client.close)
    return { worker, client }
  }

  it('should run tasks on the worker and resume each caller in its own context', async () => {
    const { client } = startCounterWorker()
    await client.connect()
    const storage = new AsyncLocalStorage<string>()
    const callers = ['a', 'b', 'c', 'd', 'e']

    const results = await Promise.all(
      callers.map((caller) =>
        storage.run(caller, async () => {
          const result = await client.dispatch('increment', { by: 1 })
          return { caller: storage.getStore(), ...result }
        }),
      ),
    )

    expect(results.map((result) => result.caller)).toEqual(callers)
    expect(results.map((result) => result.value)).toEqual([1, 2, 3, 4, 5])
    const workerThreads = new Set(results.map((result) => result.threadId))
    expect(workerThreads.size).toBe(1)
    expect(workerThreads.has(threadId)).toBe(false)

    await client.close()
    expect(client.status()).toBe('closed')
  }, 20_000)

  it('should keep the calling thread free while the worker is busy', async () => {
    const { client } = startCounterWorker()
    await client.connect()

    const ticks: Array<string> = []
    const spin = client.dispatch('spin', { ms: 300 }).then((value) => {
      ticks.push('spin')
      return value
    })
    await new Promise((resolve) => setTimeout(resolve, 10))
    ticks.push('timer')

    expect(await spin).toBe(0)
    expect(ticks).toEqual(['timer', 'spin'])
    await client.close()
  }, 20_000)

  it('should fail pending work and close when the worker is terminated', async () => {
    const { worker, client } = startCounterWorker()
    await client.connect()
    const closed = untilStatus(client, 'closed')

    const spin = client.dispatch('spin', { ms: 5_000 })
    await worker.terminate()

    await expect(spin).rejects.toBeInstanceOf(NotConnectedError)
    await closed
    await expect(client.close()).resolves.toBeUndefined()
  }, 20_000)
})
