/**
 * Scoped console logger
 *
 * Every line is prefixed with the scope in brackets, e.g. `[bridge] closing`,
 * and dropped when it is below the configured level.
 */

export const logLevels = ['debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof logLevels)[number]

export type Logger = {
  scope: string
  level: LogLevel
  debug: (message: string, ...details: Array<unknown>) => void
  info: (message: string, ...details: Array<unknown>) => void
  warn: (message: string, ...details: Array<unknown>) => void
  error: (message: string, ...details: Array<unknown>) => void
  child: (scope: string) => Logger
}

const rank: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function isLogLevel(value: unknown): value is LogLevel {
  return logLevels.some((level) => level === value)
}

export function shouldLog(configured: LogLevel, level: LogLevel): boolean {
  return level !== 'silent' && rank[level] >= rank[configured]
}

export function createLogger(scope: string, level: LogLevel = 'warn'): Logger {
  const prefix = `[${scope}]`

  const emit =
    (at: Exclude<LogLevel, 'silent'>) =>
    (message: string, ...details: Array<unknown>) => {
      if (!shouldLog(level, at)) return
      console[at](`${prefix} ${message}`, ...details)
    }

  return {
    scope,
    level,
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level),
  }
}
