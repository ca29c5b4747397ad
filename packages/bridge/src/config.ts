/**
 * Bridge configuration
 *
 * Options are validated with zod; anything left out falls back to the
 * defaults below. The log level defaults to THREADLANE_LOG_LEVEL when set.
 */

import { z } from 'zod'
import { isLogLevel, logLevels } from '@threadlane/system'
import type { LogLevel } from '@threadlane/system'
import { ConfigError } from './errors'

export const DEFAULT_POLL_INTERVAL_MS = 100

export const logLevelEnvVar = 'THREADLANE_LOG_LEVEL'

export function defaultLogLevel(
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const fromEnv = env[logLevelEnvVar]
  return isLogLevel(fromEnv) ? fromEnv : 'warn'
}

export const bridgeConfigSchema = z.object({
  /** Log scope for this bridge */
  name: z.string().min(1).default('bridge'),
  /** How long an idle worker waits before re-checking the running flag */
  pollIntervalMs: z.number().int().positive().default(DEFAULT_POLL_INTERVAL_MS),
  logLevel: z.enum(logLevels).optional(),
})

export type BridgeConfigInput = z.input<typeof bridgeConfigSchema>

export type BridgeConfig = {
  name: string
  pollIntervalMs: number
  logLevel: LogLevel
}

export function parseBridgeConfig(input: unknown = {}): BridgeConfig {
  const result = bridgeConfigSchema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(`Invalid bridge config: ${result.error.message}`, {
      cause: result.error,
    })
  }

  return {
    name: result.data.name,
    pollIntervalMs: result.data.pollIntervalMs,
    logLevel: result.data.logLevel ?? defaultLogLevel(),
  }
}
