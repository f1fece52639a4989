/**
 * Result<T, E> Type for Functional Error Handling
 *
 * Forces explicit handling of operations that can fail without throwing.
 * Worker completions carry their rows-or-error as a Result.
 */

import type { RowCacheError } from './errors.js';

// ============================================================================
// Result Type Definition
// ============================================================================

export type Result<T, E = RowCacheError> = Ok<T> | Err<E>;

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

// ============================================================================
// Constructor Functions
// ============================================================================

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

// ============================================================================
// Type Guards
// ============================================================================

export function isOk<T, E>(result: Result<T, E>): result is Ok<T> {
  return result.ok === true;
}

// ============================================================================
// Transformation Functions
// ============================================================================

/**
 * Exhaustively handle both variants.
 *
 * @example
 * ```ts
 * const text = match(result, {
 *   ok: (rows) => `${rows.length} rows`,
 *   err: (error) => error.message,
 * });
 * ```
 */
export function match<T, E, U>(
  result: Result<T, E>,
  handlers: { ok: (value: T) => U; err: (error: E) => U }
): U {
  return isOk(result) ? handlers.ok(result.value) : handlers.err(result.error);
}
