/**
 * Task Queue
 *
 * Unbounded FIFO with many producers and a single consumer. `pop` waits at
 * most `timeoutMs` so the consumer can re-check its own flags while idle.
 */

export type TaskQueue<TItem> = {
  push: (item: TItem) => void
  /** Next item, or undefined once the timeout elapses or `interrupt` is called */
  pop: (timeoutMs: number) => Promise<TItem | undefined>
  /** Wake a pending `pop` with undefined */
  interrupt: () => void
  size: () => number
}

type Waiter<TItem> = {
  resolve: (item: TItem | undefined) => void
  timer: ReturnType<typeof setTimeout>
}

export function createTaskQueue<TItem>(): TaskQueue<TItem> {
  const items: Array<TItem> = []
  let waiter: Waiter<TItem> | null = null

  const settleWaiter = (item: TItem | undefined): boolean => {
    if (!waiter) return false
    const { resolve, timer } = waiter
    waiter = null
    clearTimeout(timer)
    resolve(item)
    return true
  }

  return {
    push: (item) => {
      if (!settleWaiter(item)) {
        items.push(item)
      }
    },

    pop: (timeoutMs) => {
      if (waiter) {
        throw new Error('TaskQueue supports a single consumer; pop is already pending')
      }
      if (items.length > 0) {
        return Promise.resolve(items.shift())
      }
      return new Promise<TItem | undefined>((resolve) => {
        const timer = setTimeout(() => settleWaiter(undefined), timeoutMs)
        // An idle poll must not hold the process open by itself
        timer.unref()
        waiter = { resolve, timer }
      })
    },

    interrupt: () => {
      settleWaiter(undefined)
    },

    size: () => items.length,
  }
}
