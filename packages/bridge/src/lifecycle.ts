/**
 * Connection Lifecycle
 *
 *   unconnected ──► connecting ──► open ──► closing ──► closed
 *        │               │                                ▲
 *        └───────────────┴────────────────────────────────┘
 *
 * A failed bootstrap goes straight from connecting to closed. Closing a
 * bridge that never connected goes straight from unconnected to closed.
 */

import { createAtom } from '@threadlane/system'
import { z } from 'zod'
import { InvalidTransitionError } from './errors'

export const connectionStatusKeywords = {
  unconnected: 'unconnected',
  connecting: 'connecting',
  open: 'open',
  closing: 'closing',
  closed: 'closed',
} as const

export const connectionStatusSchema = z.enum([
  connectionStatusKeywords.unconnected,
  connectionStatusKeywords.connecting,
  connectionStatusKeywords.open,
  connectionStatusKeywords.closing,
  connectionStatusKeywords.closed,
])
export type ConnectionStatus = z.infer<typeof connectionStatusSchema>

const transitions: Record<ConnectionStatus, ReadonlyArray<ConnectionStatus>> = {
  unconnected: ['connecting', 'closed'],
  connecting: ['open', 'closed'],
  open: ['closing'],
  closing: ['closed'],
  closed: [],
}

export function canTransition(
  from: ConnectionStatus,
  to: ConnectionStatus,
): boolean {
  return transitions[from].includes(to)
}

export type Lifecycle = {
  status: () => ConnectionStatus
  transition: (to: ConnectionStatus) => void
  subscribe: (callback: (status: ConnectionStatus) => void) => () => void
}

export function createLifecycle(): Lifecycle {
  const state = createAtom<ConnectionStatus>(connectionStatusKeywords.unconnected)

  return {
    status: state.get,
    transition: (to) => {
      const from = state.get()
      if (!canTransition(from, to)) {
        throw new InvalidTransitionError(from, to)
      }
      state.set(to)
    },
    subscribe: state.subscribe,
  }
}
