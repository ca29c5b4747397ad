import { defineResource } from 'braided'
import { connect } from './connect'
import type { ConnectOptions } from './connect'

/**
 * A connection as a braided resource, opened on start and closed on halt
 */
export function createConnectionResource(
  filename: string,
  options: ConnectOptions = {},
) {
  return defineResource({
    dependencies: [],
    start: () => connect(filename, options),
    halt: async (connection) => {
      await connection.close()
    },
  })
}
