/**
 * Logger utility for revwindow
 *
 * Provides a consistent logging interface that can be configured
 * at runtime. Defaults to noop logger, can be switched to console
 * logger for development/debugging.
 *
 * @module utils/logger
 */

/**
 * Logger interface for consistent logging across the codebase
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, error?: unknown, ...args: unknown[]): void
}

/**
 * Log levels, quietest first
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug'

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug']

/**
 * Console logger implementation
 * Outputs to console with appropriate log levels
 */
export const consoleLogger: Logger = {
  debug(message: string, ...args: unknown[]): void {
    console.debug(`[DEBUG] ${message}`, ...args)
  },
  info(message: string, ...args: unknown[]): void {
    console.info(`[INFO] ${message}`, ...args)
  },
  warn(message: string, ...args: unknown[]): void {
    console.warn(`[WARN] ${message}`, ...args)
  },
  error(message: string, error?: unknown, ...args: unknown[]): void {
    if (error !== undefined) {
      console.error(`[ERROR] ${message}`, error, ...args)
    } else {
      console.error(`[ERROR] ${message}`, ...args)
    }
  },
}

/**
 * Noop logger implementation
 * Silently discards all log messages (the default)
 */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

/**
 * Wrap a logger so that messages below `level` are dropped.
 *
 * @example
 * ```typescript
 * setLogger(createLeveledLogger(consoleLogger, 'warn'))
 * ```
 */
export function createLeveledLogger(base: Logger, level: LogLevel): Logger {
  if (level === 'silent') return noopLogger
  const threshold = LOG_LEVELS.indexOf(level)
  const enabled = (l: LogLevel): boolean => LOG_LEVELS.indexOf(l) <= threshold

  return {
    debug(message: string, ...args: unknown[]): void {
      if (enabled('debug')) base.debug(message, ...args)
    },
    info(message: string, ...args: unknown[]): void {
      if (enabled('info')) base.info(message, ...args)
    },
    warn(message: string, ...args: unknown[]): void {
      if (enabled('warn')) base.warn(message, ...args)
    },
    error(message: string, error?: unknown, ...args: unknown[]): void {
      if (enabled('error')) base.error(message, error, ...args)
    },
  }
}

/**
 * Global logger instance
 * Defaults to noopLogger
 */
export let logger: Logger = noopLogger

/**
 * Set the global logger instance
 *
 * @example
 * ```typescript
 * import { setLogger, consoleLogger } from './utils/logger'
 *
 * // Enable console logging for development
 * setLogger(consoleLogger)
 * ```
 */
export function setLogger(l: Logger): void {
  logger = l
}
