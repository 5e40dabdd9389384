/**
 * revwindow Configuration
 *
 * Library-wide settings, read from the environment or set in code:
 *
 * - `REVWINDOW_LOG_LEVEL`: silent | error | warn | info | debug (default silent)
 * - `REVWINDOW_CHECK_INVARIANTS`: 1/true/yes or 0/false/no (default off)
 *
 * @module config
 */

import { ConfigurationError } from '../errors'
import {
  LOG_LEVELS,
  consoleLogger,
  createLeveledLogger,
  setLogger,
  type LogLevel,
} from '../utils/logger'
import { getEnv } from './runtime'

export { getEnv, isProduction } from './runtime'

// =============================================================================
// Types
// =============================================================================

export interface RevWindowConfig {
  /** Messages below this level are dropped */
  logLevel: LogLevel
  /** Re-verify structural invariants after every mutation */
  checkInvariants: boolean
}

export type EnvReader = (name: string) => string | undefined

export const ENV_LOG_LEVEL = 'REVWINDOW_LOG_LEVEL'
export const ENV_CHECK_INVARIANTS = 'REVWINDOW_CHECK_INVARIANTS'

export const DEFAULT_CONFIG: Readonly<RevWindowConfig> = Object.freeze({
  logLevel: 'silent',
  checkInvariants: false,
})

// =============================================================================
// Parsing
// =============================================================================

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw.trim() === '') return DEFAULT_CONFIG.logLevel
  const value = raw.trim().toLowerCase()
  if (!isLogLevel(value)) {
    throw new ConfigurationError(`Invalid ${ENV_LOG_LEVEL}: "${raw}"`, {
      configKey: ENV_LOG_LEVEL,
      expectedValue: LOG_LEVELS.join(' | '),
      actualValue: raw,
    })
  }
  return value
}

function parseBoolean(key: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback
  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
      return true
    case '0':
    case 'false':
    case 'no':
      return false
    default:
      throw new ConfigurationError(`Invalid ${key}: "${raw}"`, {
        configKey: key,
        expectedValue: '1 | true | yes | 0 | false | no',
        actualValue: raw,
      })
  }
}

/**
 * Build a configuration from environment variables.
 *
 * @param read - Variable reader, `process.env` by default
 * @throws ConfigurationError when a variable holds an unknown value
 */
export function loadConfig(read: EnvReader = getEnv): RevWindowConfig {
  return {
    logLevel: parseLogLevel(read(ENV_LOG_LEVEL)),
    checkInvariants: parseBoolean(
      ENV_CHECK_INVARIANTS,
      read(ENV_CHECK_INVARIANTS),
      DEFAULT_CONFIG.checkInvariants
    ),
  }
}

// =============================================================================
// Active Configuration
// =============================================================================

let activeConfig: RevWindowConfig = { ...DEFAULT_CONFIG }

/**
 * Get the active configuration
 */
export function getConfig(): Readonly<RevWindowConfig> {
  return activeConfig
}

/**
 * Merge settings into the active configuration and install the matching
 * logger.
 */
export function configure(overrides: Partial<RevWindowConfig>): Readonly<RevWindowConfig> {
  if (overrides.logLevel !== undefined && !isLogLevel(overrides.logLevel)) {
    throw new ConfigurationError(`Invalid log level: "${String(overrides.logLevel)}"`, {
      configKey: 'logLevel',
      expectedValue: LOG_LEVELS.join(' | '),
      actualValue: overrides.logLevel,
    })
  }
  activeConfig = { ...activeConfig, ...overrides }
  setLogger(createLeveledLogger(consoleLogger, activeConfig.logLevel))
  return activeConfig
}

/**
 * Restore the defaults (silent logging, no invariant checks)
 */
export function resetConfig(): void {
  configure({ ...DEFAULT_CONFIG })
}
