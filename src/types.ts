/**
 * Shared types for the row cache
 *
 * Boundary contracts with the backing store, the row model and the
 * events published to presentation code.
 */

import type { RowCacheError } from './core/errors.js';
import type { Result } from './core/result.js';

// ============================================================================
// Records
// ============================================================================

/**
 * Primary key of a record. Composite keys are tuples.
 */
export type RecordIdentity = string | number | readonly (string | number)[];

/**
 * Display value of a single column
 */
export type FieldValue = string | number | boolean | Date | null;

/**
 * One record as returned by the backing store, in column order
 */
export interface StoreRecord {
  readonly identity: RecordIdentity;
  readonly fields: ReadonlyMap<string, FieldValue>;
}

// ============================================================================
// Backing Store Contract
// ============================================================================

/**
 * Half-open window `[start, start + count)` of the ordered result set
 */
export interface RowWindow {
  readonly start: number;
  readonly count: number;
}

/**
 * A connection-scoped session, used by exactly one worker at a time.
 *
 * `Q` is the caller's opaque description of "all rows" (table, filter,
 * ordering); the cache never interprets it.
 */
export interface StoreSession<Q> {
  /**
   * Fetch the records at `window` of the ordered result of `source`.
   * May return fewer records than requested when the data changed.
   */
  fetchWindow(source: Q, window: RowWindow, signal: AbortSignal): Promise<readonly StoreRecord[]>;

  /** Count every record in the result of `source` */
  count(source: Q, signal: AbortSignal): Promise<number>;

  close(): Promise<void>;
}

export interface BackingStore<Q> {
  openSession(): Promise<StoreSession<Q>>;
}

// ============================================================================
// Work
// ============================================================================

export type StoreQuery<Q> =
  | {
      readonly kind: 'window';
      readonly source: Q;
      readonly start: number;
      readonly count: number;
    }
  | {
      readonly kind: 'count';
      readonly source: Q;
    };

export type WorkResult =
  | { readonly kind: 'window'; readonly records: readonly StoreRecord[] }
  | { readonly kind: 'count'; readonly total: number };

export type WorkOutcome =
  | { readonly status: 'done'; readonly result: Result<WorkResult, RowCacheError> }
  | { readonly status: 'cancelled' };

/**
 * Completion event sent from the worker back to the owner of a work item
 */
export interface WorkCompletion {
  readonly requestId: number;
  readonly outcome: WorkOutcome;
}

// ============================================================================
// Rows
// ============================================================================

export type RowState = 'stub' | 'loading' | 'loaded' | 'error';

export interface StubRow {
  readonly state: 'stub';
  readonly position: number;
}

export interface LoadingRow {
  readonly state: 'loading';
  readonly position: number;
  /** Request whose completion will settle this row */
  readonly requestId: number;
}

export interface LoadedRow {
  readonly state: 'loaded';
  readonly position: number;
  readonly identity: RecordIdentity;
  readonly fields: ReadonlyMap<string, FieldValue>;
}

export interface ErrorRow {
  readonly state: 'error';
  readonly position: number;
  readonly error: RowCacheError;
  /** Epoch milliseconds when the failure was applied */
  readonly failedAt: number;
}

export type Row = StubRow | LoadingRow | LoadedRow | ErrorRow;

// ============================================================================
// Fetch Requests
// ============================================================================

/**
 * Contiguous range the cache wants populated.
 *
 * Mutated in place by the coalescer while pending; only `priority`
 * may change once dispatched.
 */
export interface FetchRequest {
  readonly id: number;
  start: number;
  count: number;
  priority: number;
  dispatched: boolean;
  cancelled: boolean;
}

// ============================================================================
// Cache Events
// ============================================================================

export type CacheEvent =
  | {
      /** Rows moved to loaded or error and should be repainted */
      kind: 'RowsChanged';
      start: number;
      count: number;
    }
  | {
      kind: 'RequestIssued';
      requestId: number;
      start: number;
      count: number;
      inFlight: number;
    }
  | {
      kind: 'RequestCompleted';
      requestId: number;
      start: number;
      count: number;
      inFlight: number;
    }
  | {
      kind: 'RequestFailed';
      requestId: number;
      start: number;
      count: number;
      inFlight: number;
      error: RowCacheError;
    }
  | {
      kind: 'TotalCountChanged';
      total: number;
    }
  | {
      kind: 'LoadedCountChanged';
      loaded: number;
    }
  | {
      kind: 'Reset';
      epoch: number;
    };

export type CacheEventKind = CacheEvent['kind'];
