/**
 * Error Handling Module
 *
 * Standardized error hierarchy for the backup engine.
 * All errors extend from BackupError which provides:
 * - Error codes for programmatic handling
 * - Serialization support for CLI/JSON output
 * - Cause chaining for debugging
 *
 * Error Hierarchy:
 * - BackupError (base class)
 *   - StorageError (temp file, write, sync, rename, append, state read)
 *   - QueryError (store query failures)
 *   - SerializationError (values JSON cannot represent)
 *   - ValidationError (malformed state file)
 *   - ConfigurationError (invalid configuration)
 *   - CancelledError (aborted run)
 *   - ExportError (entity-scoped wrapper around any of the above)
 *
 * @module errors
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for backup operations.
 * These codes are stable and can be used for programmatic error handling.
 */
export enum ErrorCode {
  UNKNOWN = 'UNKNOWN',
  CANCELLED = 'CANCELLED',

  INVALID_STATE = 'INVALID_STATE',

  QUERY_ERROR = 'QUERY_ERROR',
  COLUMN_MISMATCH = 'COLUMN_MISMATCH',

  SERIALIZATION_ERROR = 'SERIALIZATION_ERROR',

  STORAGE_READ_ERROR = 'STORAGE_READ_ERROR',
  STORAGE_WRITE_ERROR = 'STORAGE_WRITE_ERROR',

  CONFIGURATION_ERROR = 'CONFIGURATION_ERROR',

  EXPORT_FAILED = 'EXPORT_FAILED',
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
  /** Additional context data */
  context?: Record<string, unknown>
  /** Serialized cause (if error chaining) */
  cause?: SerializedError
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all backup errors.
 *
 * @example
 * ```typescript
 * throw new BackupError('Operation failed', ErrorCode.QUERY_ERROR, {
 *   statement: 'SELECT * FROM issues',
 * })
 * ```
 */
export class BackupError extends Error {
  override readonly name: string = 'BackupError'
  readonly code: ErrorCode
  readonly context: Record<string, unknown>
  override readonly cause?: Error

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
   * Serialize error for JSON output
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: Object.keys(this.context).length > 0 ? this.context : undefined,
      cause: this.cause instanceof BackupError ? this.cause.toJSON() : undefined,
    }
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

/** File system step that failed */
export type StorageOperation =
  | 'mkdir'
  | 'open'
  | 'write'
  | 'sync'
  | 'close'
  | 'rename'
  | 'append'
  | 'read'

/**
 * Error thrown when a file system operation fails.
 */
export class StorageError extends BackupError {
  override readonly name = 'StorageError'
  readonly path: string
  readonly operation: StorageOperation

  constructor(
    message: string,
    path: string,
    operation: StorageOperation,
    cause?: Error
  ) {
    const code = operation === 'read' ? ErrorCode.STORAGE_READ_ERROR : ErrorCode.STORAGE_WRITE_ERROR
    super(message, code, { path, operation }, cause)
    this.path = path
    this.operation = operation
    Object.setPrototypeOf(this, StorageError.prototype)
  }
}

// =============================================================================
// Query Errors
// =============================================================================

/**
 * Error thrown when a store query fails or returns an unusable result.
 */
export class QueryError extends BackupError {
  override readonly name = 'QueryError'

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.QUERY_ERROR,
    context?: {
      statement?: string
      table?: string
    },
    cause?: Error
  ) {
    super(message, code, context, cause)
    Object.setPrototypeOf(this, QueryError.prototype)
  }
}

// =============================================================================
// Serialization Errors
// =============================================================================

/**
 * Error thrown when a row cannot be serialized as JSON.
 */
export class SerializationError extends BackupError {
  override readonly name = 'SerializationError'

  constructor(message: string, column?: string, cause?: Error) {
    super(message, ErrorCode.SERIALIZATION_ERROR, column !== undefined ? { column } : undefined, cause)
    Object.setPrototypeOf(this, SerializationError.prototype)
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when persisted data does not have the expected shape.
 */
export class ValidationError extends BackupError {
  override readonly name = 'ValidationError'

  constructor(
    message: string,
    context?: {
      path?: string
      field?: string
      expectedType?: string
    },
    cause?: Error
  ) {
    super(message, ErrorCode.INVALID_STATE, context, cause)
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * Error thrown when configuration is invalid.
 */
export class ConfigurationError extends BackupError {
  override readonly name = 'ConfigurationError'

  constructor(
    message: string,
    context?: {
      configKey?: string
      path?: string
    },
    cause?: Error
  ) {
    super(message, ErrorCode.CONFIGURATION_ERROR, context, cause)
    Object.setPrototypeOf(this, ConfigurationError.prototype)
  }
}

// =============================================================================
// Cancellation
// =============================================================================

/**
 * Error thrown when a run is aborted through its signal.
 */
export class CancelledError extends BackupError {
  override readonly name = 'CancelledError'

  constructor(message = 'Backup export was cancelled', cause?: Error) {
    super(message, ErrorCode.CANCELLED, undefined, cause)
    Object.setPrototypeOf(this, CancelledError.prototype)
  }
}

// =============================================================================
// Export Errors
// =============================================================================

/**
 * Error thrown by the orchestrator when exporting one entity fails.
 * The underlying error is kept as `cause`.
 */
export class ExportError extends BackupError {
  override readonly name = 'ExportError'
  readonly entity: string

  constructor(entity: string, cause: Error) {
    super(`Failed to back up ${entity}: ${cause.message}`, ErrorCode.EXPORT_FAILED, { entity }, cause)
    this.entity = entity
    Object.setPrototypeOf(this, ExportError.prototype)
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isCancelledError(error: unknown): error is CancelledError {
  return error instanceof CancelledError
}

/**
 * Check for a Node.js system error with the given code (e.g. ENOENT)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error !== null && typeof error === 'object' && 'code' in error && error.code === code
}

// =============================================================================
// Error Factory Functions
// =============================================================================

/**
 * Coerce an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
