/**
 * revwindow Error Handling Module
 *
 * Standardized error hierarchy for the windowed map, the linked queue and
 * the cursor sequence. All errors extend from RevWindowError which provides:
 * - Error codes for programmatic handling
 * - Context data for debugging
 * - JSON serialization
 * - Cause chaining
 *
 * Error Hierarchy:
 * - RevWindowError (base class)
 *   - ValidationError (malformed revisions, indexes, paths, values)
 *   - NotFoundError (nothing recorded, empty container)
 *   - OutOfRangeError (index or cursor walk past an end)
 *   - OrderingViolationError (revisions supplied out of order)
 *   - InvariantViolationError (internal structure found corrupt)
 *   - ConfigurationError (invalid configuration)
 *
 * @module errors
 */

import { isProduction } from '../config/runtime'

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for revwindow operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL = 'INTERNAL',

  // Validation errors
  INVALID_INPUT = 'INVALID_INPUT',
  INVALID_REVISION = 'INVALID_REVISION',
  INVALID_INDEX = 'INVALID_INDEX',

  // Not found errors
  NOT_FOUND = 'NOT_FOUND',
  REVISION_NOT_FOUND = 'REVISION_NOT_FOUND',
  EMPTY_CONTAINER = 'EMPTY_CONTAINER',

  // Range errors
  OUT_OF_RANGE = 'OUT_OF_RANGE',
  INDEX_OUT_OF_RANGE = 'INDEX_OUT_OF_RANGE',
  SEEK_OUT_OF_RANGE = 'SEEK_OUT_OF_RANGE',

  // Ordering errors
  ORDERING_VIOLATION = 'ORDERING_VIOLATION',
  DUPLICATE_REVISION = 'DUPLICATE_REVISION',

  // Internal consistency
  INVARIANT_VIOLATION = 'INVARIANT_VIOLATION',

  // Configuration errors
  INVALID_CONFIG = 'INVALID_CONFIG',
}

// =============================================================================
// Serialized Error Format
// =============================================================================

/**
 * Serializable error format
 */
export interface SerializedError {
  /** Error class name */
  name: string
  /** Error code for programmatic handling */
  code: ErrorCode
  /** Human-readable error message */
  message: string
  /** Stack trace (omitted in production) */
  stack?: string | undefined
  /** Additional context data */
  context?: Record<string, unknown> | undefined
  /** Serialized cause (if error chaining) */
  cause?: SerializedError | undefined
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all revwindow errors.
 *
 * @example
 * ```typescript
 * throw new RevWindowError('Operation failed', ErrorCode.INTERNAL, {
 *   operation: 'seek',
 * })
 * ```
 */
export class RevWindowError extends Error {
  override readonly name: string = 'RevWindowError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error | undefined

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message)
    this.code = code
    this.context = context ?? {}
    this.cause = cause
    Object.setPrototypeOf(this, new.target.prototype)
  }

  /**
   * Serialize error to a plain object
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      stack: isProduction() ? undefined : this.stack,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof RevWindowError ? this.cause.toJSON() : undefined,
    }
  }

  /**
   * Create error from serialized format
   */
  static fromJSON(data: SerializedError): RevWindowError {
    const cause = data.cause ? RevWindowError.fromJSON(data.cause) : undefined
    const error = new RevWindowError(data.message, data.code, data.context, cause)
    if (data.stack) {
      error.stack = data.stack
    }
    return error
  }

  /**
   * Check if error matches a specific code
   */
  is(code: ErrorCode): boolean {
    return this.code === code
  }

  /**
   * Check if error is in a category (e.g., all NOT_FOUND variants)
   */
  isCategory(category: string): boolean {
    return this.code.includes(category)
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when an argument is malformed: a revision or index that is
 * not a safe integer, a slot path of the wrong depth, a rejected value.
 */
export class ValidationError extends RevWindowError {
  override readonly name = 'ValidationError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_INPUT,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}

// =============================================================================
// Not Found Errors
// =============================================================================

/**
 * Error thrown when a lookup has nothing to return.
 */
export class NotFoundError extends RevWindowError {
  override readonly name: string = 'NotFoundError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.NOT_FOUND,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, NotFoundError.prototype)
  }
}

/**
 * Error thrown when no value has been recorded at or before a revision.
 */
export class RevisionNotFoundError extends NotFoundError {
  override readonly name = 'RevisionNotFoundError'
  readonly revision: number

  constructor(revision: number, cause?: Error) {
    super(
      `No value recorded at or before revision ${revision}`,
      ErrorCode.REVISION_NOT_FOUND,
      { revision },
      cause
    )
    this.revision = revision
    Object.setPrototypeOf(this, RevisionNotFoundError.prototype)
  }
}

/**
 * Error thrown when reading or popping from an empty container.
 */
export class EmptyContainerError extends NotFoundError {
  override readonly name = 'EmptyContainerError'
  readonly operation: string

  constructor(operation: string, container: string) {
    super(
      `Cannot ${operation}: ${container} is empty`,
      ErrorCode.EMPTY_CONTAINER,
      { operation, container }
    )
    this.operation = operation
    Object.setPrototypeOf(this, EmptyContainerError.prototype)
  }
}

// =============================================================================
// Range Errors
// =============================================================================

/**
 * Error thrown when a position lies beyond either end of a container.
 */
export class OutOfRangeError extends RevWindowError {
  override readonly name: string = 'OutOfRangeError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.OUT_OF_RANGE,
    context?: Record<string, unknown>,
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, OutOfRangeError.prototype)
  }
}

/**
 * Error thrown when an absolute index has no element.
 */
export class IndexOutOfRangeError extends OutOfRangeError {
  override readonly name = 'IndexOutOfRangeError'
  readonly index: number
  readonly length: number

  constructor(index: number, length: number) {
    super(
      `Index ${index} out of range for length ${length}`,
      ErrorCode.INDEX_OUT_OF_RANGE,
      { index, length }
    )
    this.index = index
    this.length = length
    Object.setPrototypeOf(this, IndexOutOfRangeError.prototype)
  }
}

/**
 * Error thrown when a relative cursor walk would pass an end.
 */
export class SeekOutOfRangeError extends OutOfRangeError {
  override readonly name = 'SeekOutOfRangeError'
  readonly offset: number
  readonly position: number
  readonly length: number

  constructor(offset: number, position: number, length: number) {
    super(
      `Cannot seek ${offset} from position ${position} in a sequence of length ${length}`,
      ErrorCode.SEEK_OUT_OF_RANGE,
      { offset, position, length }
    )
    this.offset = offset
    this.position = position
    this.length = length
    Object.setPrototypeOf(this, SeekOutOfRangeError.prototype)
  }
}

// =============================================================================
// Ordering Errors
// =============================================================================

/**
 * Error thrown when revisions are supplied out of order.
 */
export class OrderingViolationError extends RevWindowError {
  override readonly name: string = 'OrderingViolationError'
  readonly revision: number
  readonly previousRevision: number

  constructor(
    revision: number,
    previousRevision: number,
    message = `Revision ${revision} is below revision ${previousRevision}`,
    code: ErrorCode = ErrorCode.ORDERING_VIOLATION
  ) {
    super(message, code, { revision, previousRevision })
    this.revision = revision
    this.previousRevision = previousRevision
    Object.setPrototypeOf(this, OrderingViolationError.prototype)
  }
}

/**
 * Error thrown when initial contents name the same revision twice.
 */
export class DuplicateRevisionError extends OrderingViolationError {
  override readonly name = 'DuplicateRevisionError'

  constructor(revision: number) {
    super(
      revision,
      revision,
      `Revision ${revision} appears more than once`,
      ErrorCode.DUPLICATE_REVISION
    )
    Object.setPrototypeOf(this, DuplicateRevisionError.prototype)
  }
}

// =============================================================================
// Invariant Errors
// =============================================================================

/**
 * Error thrown when a structural invariant is found broken. Always a bug.
 */
export class InvariantViolationError extends RevWindowError {
  override readonly name = 'InvariantViolationError'
  readonly structure: string

  constructor(structure: string, message: string, context?: Record<string, unknown>) {
    super(`${structure}: ${message}`, ErrorCode.INVARIANT_VIOLATION, { structure, ...context })
    this.structure = structure
    Object.setPrototypeOf(this, InvariantViolationError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends RevWindowError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    context?: {
      configKey?: string
      expectedValue?: unknown
      actualValue?: unknown
    },
    cause?: Error
  ) {
    super(message, ErrorCode.INVALID_CONFIG, context, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

/**
 * Check if an error is a RevWindowError
 */
export function isRevWindowError(error: unknown): error is RevWindowError {
  return error instanceof RevWindowError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

/**
 * Check if an error is a NotFoundError (or any subclass)
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError ||
    (isRevWindowError(error) && error.code.includes('NOT_FOUND'))
}

/**
 * Check if an error is an OutOfRangeError (or any subclass)
 */
export function isOutOfRangeError(error: unknown): error is OutOfRangeError {
  return error instanceof OutOfRangeError ||
    (isRevWindowError(error) && error.code.includes('OUT_OF_RANGE'))
}

export function isOrderingViolationError(error: unknown): error is OrderingViolationError {
  return error instanceof OrderingViolationError
}

export function isInvariantViolationError(error: unknown): error is InvariantViolationError {
  return error instanceof InvariantViolationError
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError
}

// =============================================================================
// Assertions
// =============================================================================

/**
 * Assert that a revision is a safe integer
 *
 * @throws ValidationError
 */
export function assertRevision(revision: number): void {
  if (!Number.isSafeInteger(revision)) {
    throw new ValidationError(
      `Revision must be a safe integer, got ${String(revision)}`,
      ErrorCode.INVALID_REVISION,
      { revision }
    )
  }
}

/**
 * Assert that an index or offset is a safe integer
 *
 * @throws ValidationError
 */
export function assertIndex(index: number): void {
  if (!Number.isSafeInteger(index)) {
    throw new ValidationError(
      `Index must be a safe integer, got ${String(index)}`,
      ErrorCode.INVALID_INDEX,
      { index }
    )
  }
}
