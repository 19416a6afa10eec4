/**
 * Typed exception classes for Chunkwise
 *
 * Error hierarchy:
 * - ChunkwiseError: Base error class for all Chunkwise errors
 *   - QueryError: Evaluation failures (unbound symbols, malformed trees)
 *   - UnsupportedOperationError: No execution strategy for an expression/source pair
 *   - ValidationError: Invalid inputs (schemas, partitions, configuration)
 *   - NumericDomainError: Reductions that are undefined for their input
 *   - PredicateCompilationError: A predicate cannot be vectorised
 *
 * UnsupportedOperationError is deliberately separate from QueryError so that a
 * caller can route the expression to another backend instead of failing.
 *
 * @example
 * ```typescript
 * import { UnsupportedOperationError, NumericDomainError } from '@chunkwise/core';
 *
 * try {
 *   await engine.execute(expr, source);
 * } catch (error) {
 *   if (error instanceof UnsupportedOperationError) {
 *     return fallbackBackend.execute(expr);
 *   }
 *   if (error instanceof NumericDomainError) {
 *     logger.warn(error.message, { code: error.code });
 *   }
 *   throw error;
 * }
 * ```
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Standard error codes for programmatic error handling.
 */
export enum ErrorCode {
  // General errors
  UNKNOWN = 'UNKNOWN',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Query errors
  QUERY_ERROR = 'QUERY_ERROR',
  UNBOUND_SYMBOL = 'UNBOUND_SYMBOL',
  UNSUPPORTED_OPERATION = 'UNSUPPORTED_OPERATION',
  SPLIT_NOT_DERIVABLE = 'SPLIT_NOT_DERIVABLE',

  // Validation errors
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  COLUMN_NOT_FOUND = 'COLUMN_NOT_FOUND',
  LENGTH_MISMATCH = 'LENGTH_MISMATCH',
  INVALID_PARTITION = 'INVALID_PARTITION',

  // Numeric errors
  NUMERIC_DOMAIN_ERROR = 'NUMERIC_DOMAIN_ERROR',
  EMPTY_REDUCTION = 'EMPTY_REDUCTION',

  // Predicate compilation
  PREDICATE_COMPILATION_ERROR = 'PREDICATE_COMPILATION_ERROR',
}

/**
 * Type guard to check if a string is a valid ErrorCode.
 */
export function isErrorCode(code: string): code is ErrorCode {
  return Object.values(ErrorCode).some(value => value === code);
}

// =============================================================================
// Stack Traces
// =============================================================================

interface V8ErrorConstructor {
  captureStackTrace(targetObject: object, constructorOpt?: Function): void;
}

function hasCaptureStackTrace(
  errorConstructor: ErrorConstructor
): errorConstructor is ErrorConstructor & V8ErrorConstructor {
  return 'captureStackTrace' in errorConstructor &&
    typeof errorConstructor.captureStackTrace === 'function';
}

/**
 * Drop the error constructor frames from the stack where the runtime allows it.
 * Outside V8 the stack from the Error constructor is kept as is.
 */
export function captureStackTrace(error: Error, constructorOpt?: Function): void {
  if (hasCaptureStackTrace(Error)) {
    Error.captureStackTrace(error, constructorOpt);
  }
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all Chunkwise errors
 *
 * @example
 * ```typescript
 * if (error instanceof ChunkwiseError) {
 *   logger.error(error.message, error, { errorCode: error.code });
 * }
 * ```
 */
export class ChunkwiseError extends Error {
  /** Error code for programmatic identification */
  public readonly code: string;

  /** Structured details for debugging */
  public readonly details?: Record<string, unknown>;

  /** Suggestion for resolving the error, when one exists */
  public readonly suggestion?: string;

  /** Creation time (milliseconds since epoch) */
  public readonly timestamp: number;

  constructor(
    message: string,
    code: string = ErrorCode.UNKNOWN,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message);
    this.name = 'ChunkwiseError';
    this.code = code;
    this.details = details;
    this.suggestion = suggestion;
    this.timestamp = Date.now();

    captureStackTrace(this, ChunkwiseError);
  }

  /**
   * Structured form of the error for JSON logging.
   */
  toLogContext(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      ...(this.details && { details: this.details }),
      ...(this.suggestion && { suggestion: this.suggestion }),
      timestamp: this.timestamp,
    };
  }

  /**
   * Multi-line rendering for debugging output.
   */
  toDetailedString(): string {
    const parts = [`[${this.code}] ${this.message}`];
    if (this.details) {
      const ctx = Object.entries(this.details)
        .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
        .join(', ');
      parts.push(`Details: ${ctx}`);
    }
    if (this.suggestion) {
      parts.push(`Suggestion: ${this.suggestion}`);
    }
    return parts.join('\n  ');
  }
}

// =============================================================================
// Query Errors
// =============================================================================

/**
 * Error thrown when evaluating an expression fails.
 *
 * @example
 * ```typescript
 * throw QueryError.unboundSymbol('chunk');
 * ```
 */
export class QueryError extends ChunkwiseError {
  constructor(
    message: string,
    code: string = ErrorCode.QUERY_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'QueryError';
    captureStackTrace(this, QueryError);
  }

  /**
   * A symbol reached during evaluation has no bound value.
   */
  static unboundSymbol(name: string): QueryError {
    return new QueryError(
      `Symbol "${name}" is not bound to any data`,
      ErrorCode.UNBOUND_SYMBOL,
      { operation: 'evaluate', symbol: name },
      'Bind every leaf of the expression before evaluating it'
    );
  }
}

// =============================================================================
// Unsupported Operations
// =============================================================================

/**
 * Error thrown when an expression and data source have no execution strategy.
 *
 * This is not a runtime failure: the same expression may succeed on another
 * backend, or on this one once the data fits in memory. It is never retried
 * locally.
 */
export class UnsupportedOperationError extends ChunkwiseError {
  constructor(
    message: string,
    code: string = ErrorCode.UNSUPPORTED_OPERATION,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'UnsupportedOperationError';
    captureStackTrace(this, UnsupportedOperationError);
  }

  /**
   * No chunk/aggregate decomposition exists for the expression.
   */
  static notSplittable(expression: string, reason: string): UnsupportedOperationError {
    return new UnsupportedOperationError(
      `Cannot split "${expression}" into chunk and aggregate parts: ${reason}`,
      ErrorCode.SPLIT_NOT_DERIVABLE,
      { operation: 'split', expression, reason },
      'Use summary() to combine several reductions, or raise the memory threshold so the expression runs in memory'
    );
  }
}

/**
 * Type guard for callers that want to try an alternative backend.
 */
export function isUnsupportedOperation(error: unknown): error is UnsupportedOperationError {
  return error instanceof UnsupportedOperationError;
}

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Error thrown when an input fails validation.
 *
 * @example
 * ```typescript
 * throw ValidationError.typeMismatch('amount', 'float64', 'string');
 * throw ValidationError.columnNotFound('price', ['id', 'amount']);
 * ```
 */
export class ValidationError extends ChunkwiseError {
  constructor(
    message: string,
    code: string = ErrorCode.VALIDATION_ERROR,
    details?: Record<string, unknown>,
    suggestion?: string
  ) {
    super(message, code, details, suggestion);
    this.name = 'ValidationError';
    captureStackTrace(this, ValidationError);
  }

  static typeMismatch(path: string, expectedType: string, actualType: string): ValidationError {
    return new ValidationError(
      `Type mismatch at "${path}": expected ${expectedType}, got ${actualType}`,
      ErrorCode.TYPE_MISMATCH,
      { path, expectedType, actualType },
      `Ensure the value at "${path}" is of type ${expectedType}`
    );
  }

  static columnNotFound(column: string, available: readonly string[]): ValidationError {
    return new ValidationError(
      `Column "${column}" not found`,
      ErrorCode.COLUMN_NOT_FOUND,
      { column, available: [...available] },
      available.length > 0 ? `Available columns: ${available.join(', ')}` : undefined
    );
  }

  static invalidPartition(message: string, details?: Record<string, unknown>): ValidationError {
    return new ValidationError(message, ErrorCode.INVALID_PARTITION, { operation: 'plan', ...details });
  }
}

// =============================================================================
// Numeric Domain Errors
// =============================================================================

/**
 * Error thrown when a reduction is undefined for its input, such as the mean
 * of an empty dataset or an unbiased variance of a single value.
 */
export class NumericDomainError extends ChunkwiseError {
  constructor(
    message: string,
    code: string = ErrorCode.NUMERIC_DOMAIN_ERROR,
    details?: Record<string, unknown>
  ) {
    super(message, code, details);
    this.name = 'NumericDomainError';
    captureStackTrace(this, NumericDomainError);
  }

  static emptyReduction(reduction: string): NumericDomainError {
    return new NumericDomainError(
      `Cannot compute ${reduction} of an empty dataset`,
      ErrorCode.EMPTY_REDUCTION,
      { reduction, count: 0 }
    );
  }
}

// =============================================================================
// Predicate Compilation Errors
// =============================================================================

/**
 * Error thrown when a predicate cannot be turned into a vectorised mask.
 * Callers catch it and fall back to element-by-element evaluation.
 */
export class PredicateCompilationError extends ChunkwiseError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCode.PREDICATE_COMPILATION_ERROR, details);
    this.name = 'PredicateCompilationError';
    captureStackTrace(this, PredicateCompilationError);
  }
}

// =============================================================================
// Error Utilities
// =============================================================================

/**
 * Check if an error is a ChunkwiseError with a specific code.
 */
export function hasErrorCode(error: unknown, code: ErrorCode | string): boolean {
  return error instanceof ChunkwiseError && error.code === code;
}
