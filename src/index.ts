/**
 * revwindow - time-travel containers for a versioned object-graph store
 *
 * - RevisionWindowedMap: value of a slot as of any revision
 * - CursorSequence: linked sequence with a persistent cursor
 * - BidirectionalQueue: the linked deque both are built on
 *
 * @packageDocumentation
 */

// =============================================================================
// Containers
// =============================================================================

export { RevisionWindowedMap, type WindowSnapshot } from './window/windowed-map'
export {
  RevisionKeysView,
  RevisionValuesView,
  RevisionItemsView,
  type RevisionEntry,
  type HistorySource,
} from './window/views'
export { CursorSequence } from './sequence/cursor-sequence'
export { BidirectionalQueue, type ContainerOptions } from './linked/queue'
export {
  PickyDefaultMap,
  StructuredDefaultMap,
  type PickyDefaultMapOptions,
} from './slots/structured-map'

// =============================================================================
// Sentinels
// =============================================================================

export { UNSET, isUnset, type Unset } from './constants'

// =============================================================================
// Errors
// =============================================================================

export {
  ErrorCode,
  type SerializedError,
  RevWindowError,
  ValidationError,
  NotFoundError,
  RevisionNotFoundError,
  EmptyContainerError,
  OutOfRangeError,
  IndexOutOfRangeError,
  SeekOutOfRangeError,
  OrderingViolationError,
  DuplicateRevisionError,
  InvariantViolationError,
  ConfigurationError,
  isRevWindowError,
  isValidationError,
  isNotFoundError,
  isOutOfRangeError,
  isOrderingViolationError,
  isInvariantViolationError,
  isConfigurationError,
} from './errors'

// =============================================================================
// Configuration and Logging
// =============================================================================

export {
  type RevWindowConfig,
  type EnvReader,
  DEFAULT_CONFIG,
  loadConfig,
  getConfig,
  configure,
  resetConfig,
} from './config'

export {
  type Logger,
  type LogLevel,
  consoleLogger,
  noopLogger,
  createLeveledLogger,
  setLogger,
} from './utils'
