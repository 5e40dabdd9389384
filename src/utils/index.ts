/**
 * Utility functions for revwindow
 *
 * @module utils
 */

export { deepEqual } from './comparison'

export {
  type Logger,
  type LogLevel,
  LOG_LEVELS,
  consoleLogger,
  noopLogger,
  createLeveledLogger,
  logger,
  setLogger,
} from './logger'
