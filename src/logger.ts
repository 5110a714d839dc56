export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
}

let threshold: LogLevel = 'info'

export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value)
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void
  info(message: string, ...details: unknown[]): void
  warn(message: string, ...details: unknown[]): void
  error(message: string, ...details: unknown[]): void
}

/**
 * Console logger that prefixes every line with `[scope]`.
 * Lines below the process-wide threshold are dropped.
 */
export function createLogger(scope: string): Logger {
  const enabled = (level: LogLevel) => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]
  const prefix = `[${scope}]`

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details)
    },
    info(message, ...details) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details)
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details)
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details)
    }
  }
}
