/**
 * Row state machine
 *
 *   stub ──► loading ──► loaded
 *              ▲   └───► error
 *              └──────────┘   (explicit re-request)
 *
 * A loading row whose request went away without settling it (cancelled
 * work) is taken over by the next request that covers it.
 *
 * Rows only go back to stub through a full cache reset, which discards
 * them. Every transition returns a new immutable row.
 */

import { RowStateError } from '../core/errors.js';
import type { RowCacheError } from '../core/errors.js';
import type {
  ErrorRow,
  FieldValue,
  LoadedRow,
  LoadingRow,
  RecordIdentity,
  Row,
  StoreRecord,
  StubRow,
} from '../types.js';

export function stubRow(position: number): StubRow {
  return { state: 'stub', position };
}

/**
 * A covering request was dispatched.
 */
export function beginLoading(row: Row, requestId: number): LoadingRow {
  if (row.state !== 'stub' && row.state !== 'error') {
    throw new RowStateError(
      row.position,
      `Cannot start loading row ${row.position} in state ${row.state}`,
      { requestId }
    );
  }
  return { state: 'loading', position: row.position, requestId };
}

/**
 * Hand a loading row over to a newer request.
 */
export function supersedeLoading(row: Row, requestId: number): LoadingRow {
  if (row.state !== 'loading') {
    throw new RowStateError(
      row.position,
      `Cannot supersede row ${row.position} in state ${row.state}`,
      { requestId }
    );
  }
  return { state: 'loading', position: row.position, requestId };
}

export function completeLoading(row: Row, requestId: number, record: StoreRecord): LoadedRow {
  assertLoadingFor(row, requestId);
  // null and undefined are not valid identities, whatever the store claims
  if (record.identity === null || record.identity === undefined) {
    throw new RowStateError(row.position, `Record for row ${row.position} has no identity`, {
      requestId,
    });
  }
  return {
    state: 'loaded',
    position: row.position,
    identity: record.identity,
    fields: record.fields,
  };
}

export function failLoading(
  row: Row,
  requestId: number,
  error: RowCacheError,
  failedAt: number
): ErrorRow {
  assertLoadingFor(row, requestId);
  return { state: 'error', position: row.position, error, failedAt };
}

function assertLoadingFor(row: Row, requestId: number): void {
  if (row.state !== 'loading') {
    throw new RowStateError(
      row.position,
      `Cannot settle row ${row.position} in state ${row.state}`,
      { requestId }
    );
  }
  if (row.requestId !== requestId) {
    throw new RowStateError(
      row.position,
      `Row ${row.position} is loading for request ${row.requestId}, not ${requestId}`,
      { requestId, owner: row.requestId }
    );
  }
}

/**
 * Whether the row is settled by the given request's completion.
 */
export function isLoadingFor(row: Row | undefined, requestId: number): row is LoadingRow {
  return row !== undefined && row.state === 'loading' && row.requestId === requestId;
}

/**
 * Whether a visibility request should fetch this row.
 *
 * Error rows count as demand again once they are at least the cooldown
 * old. With a zero cooldown they are retried like stubs.
 */
export function needsFetch(row: Row, now: number, errorRetryCooldownMs: number): boolean {
  switch (row.state) {
    case 'stub':
      return true;
    case 'error':
      return now - row.failedAt >= errorRetryCooldownMs;
    case 'loading':
    case 'loaded':
      return false;
  }
}

/**
 * Map key for an identity. Numbers and strings stay distinct, so `1` and
 * `"1"` are different records, and composite keys compare element-wise.
 */
export function identityKey(identity: RecordIdentity): string {
  return JSON.stringify(identity);
}

export function isLoaded(row: Row): row is LoadedRow {
  return row.state === 'loaded';
}

function formatValue(value: FieldValue): string {
  if (value === null) {
    return 'NULL';
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

/**
 * One-line text for a row, e.g. for tooltips or a plain list.
 */
export function rowDisplayText(row: Row): string {
  switch (row.state) {
    case 'error':
      return 'Error';
    case 'stub':
    case 'loading':
      return 'Loading...';
    case 'loaded':
      return [...row.fields.values()].map(formatValue).join(', ');
  }
}
