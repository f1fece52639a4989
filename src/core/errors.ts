/**
 * Error Hierarchy for the row cache
 *
 * All errors are immutable and provide structured error information.
 * Store failures are recoverable and surface per row; coalescing and row
 * state errors are programming errors and are thrown.
 */

// ============================================================================
// Base Error Class
// ============================================================================

export abstract class RowCacheError extends Error {
  public readonly code: string;
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  protected constructor(
    message: string,
    code: string,
    context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.timestamp = new Date();
    this.context = context;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    // Set the prototype explicitly for proper instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }

  public toString(): string {
    const contextStr = this.context
      ? ` | Context: ${JSON.stringify(this.context)}`
      : '';
    return `[${this.code}] ${this.name}: ${this.message}${contextStr}`;
  }
}

// ============================================================================
// Logic Errors (fatal)
// ============================================================================

export class CoalescingInvariantError extends RowCacheError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ROWCACHE_COALESCING_INVARIANT', context);
  }
}

export class RowStateError extends RowCacheError {
  public readonly position: number;

  public constructor(
    position: number,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, 'ROWCACHE_ROW_STATE', { ...context, position });
    this.position = position;
  }
}

export class InternalError extends RowCacheError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ROWCACHE_INTERNAL_ERROR', context);
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class InputValidationError extends RowCacheError {
  public readonly field?: string;
  public readonly validationErrors?: readonly string[];

  public constructor(
    message: string,
    field?: string,
    validationErrors?: readonly string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'ROWCACHE_INPUT_VALIDATION_ERROR', {
      ...context,
      field,
      validationErrors,
      subtype: 'input',
    });
    Object.defineProperty(this, 'field', {
      value: field,
      writable: false,
      enumerable: true,
      configurable: false,
    });
    Object.defineProperty(this, 'validationErrors', {
      value: validationErrors,
      writable: false,
      enumerable: true,
      configurable: false,
    });
  }
}

export class ConfigValidationError extends RowCacheError {
  public readonly validationErrors?: readonly string[];

  public constructor(
    message: string,
    validationErrors?: readonly string[],
    context?: Record<string, unknown>
  ) {
    super(message, 'ROWCACHE_CONFIG_VALIDATION_ERROR', {
      ...context,
      validationErrors,
      subtype: 'config',
    });
    Object.defineProperty(this, 'validationErrors', {
      value: validationErrors,
      writable: false,
      enumerable: true,
      configurable: false,
    });
  }
}

// ============================================================================
// Store Errors (recoverable, surfaced per row)
// ============================================================================

export class StoreQueryError extends RowCacheError {
  public constructor(
    message: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'ROWCACHE_STORE_QUERY_ERROR', { ...context, subtype: 'query' }, { cause });
  }
}

export class StoreConnectionError extends RowCacheError {
  public constructor(
    message: string,
    cause?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'ROWCACHE_STORE_CONNECTION_ERROR', { ...context, subtype: 'connection' }, { cause });
  }
}

// ============================================================================
// Lifecycle Errors
// ============================================================================

export class WorkerStoppedError extends RowCacheError {
  public constructor(message?: string, context?: Record<string, unknown>) {
    super(message ?? 'Worker channel has been stopped', 'ROWCACHE_WORKER_STOPPED', context);
  }
}

export class CacheResetError extends RowCacheError {
  public constructor(message?: string, context?: Record<string, unknown>) {
    super(message ?? 'Cache was reset', 'ROWCACHE_CACHE_RESET', context);
  }
}

export class CacheDisposedError extends RowCacheError {
  public constructor(message?: string, context?: Record<string, unknown>) {
    super(message ?? 'Cache has been disposed', 'ROWCACHE_CACHE_DISPOSED', context);
  }
}

export class TimeoutError extends RowCacheError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ROWCACHE_TIMEOUT_ERROR', { ...context, subtype: 'timeout' });
  }
}

export class AbortedError extends RowCacheError {
  public constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'ROWCACHE_ABORTED_ERROR', { ...context, subtype: 'aborted' });
  }
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Convert whatever a backing store threw into a row cache error.
 *
 * Errors that already belong to the hierarchy pass through unchanged;
 * anything else becomes a StoreQueryError that keeps the original as `cause`.
 */
export function normalizeStoreError(
  error: unknown,
  context?: Record<string, unknown>
): RowCacheError {
  if (error instanceof RowCacheError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new StoreQueryError(message, error, context);
}

// ============================================================================
// Error Type Guards
// ============================================================================

export function isRowCacheError(error: unknown): error is RowCacheError {
  return error instanceof RowCacheError;
}
