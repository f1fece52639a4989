/**
 * Sparse row storage
 *
 * Stores only rows that have left the stub state. Absent positions read as
 * stubs, so a list of a million rows costs nothing until it is scrolled.
 * Loaded rows are also indexed by identity.
 */

import { identityKey, stubRow } from './row.js';
import type { RecordIdentity, Row } from '../types.js';

export class SparseRows {
  private readonly rows = new Map<number, Row>();
  private readonly positions = new Map<string, number>();
  private loaded = 0;
  private total: number | undefined;

  /**
   * Known length of the result set, or undefined before it was counted
   */
  public get length(): number | undefined {
    return this.total;
  }

  public get loadedCount(): number {
    return this.loaded;
  }

  /** Number of positions holding a non-stub row */
  public get materialized(): number {
    return this.rows.size;
  }

  public get(position: number): Row {
    return this.rows.get(position) ?? stubRow(position);
  }

  /**
   * Store a row. Positions past the known length are ignored.
   *
   * @returns false when the row was ignored
   */
  public set(row: Row): boolean {
    if (this.total !== undefined && row.position >= this.total) {
      return false;
    }
    const previous = this.rows.get(row.position);
    if (previous) {
      this.forget(previous);
    }
    if (row.state === 'stub') {
      this.rows.delete(row.position);
      return true;
    }
    if (row.state === 'loaded') {
      this.loaded++;
      this.positions.set(identityKey(row.identity), row.position);
    }
    this.rows.set(row.position, row);
    return true;
  }

  /**
   * Position of the loaded row with this identity. When the same identity
   * was loaded at several positions, the most recent one wins.
   */
  public positionOf(identity: RecordIdentity): number | undefined {
    return this.positions.get(identityKey(identity));
  }

  /**
   * Rows in `[start, start + count)`, clamped to the known length.
   */
  public slice(start: number, count: number): Row[] {
    const end = this.clampEnd(start + count);
    const result: Row[] = [];
    for (let position = start; position < end; position++) {
      result.push(this.get(position));
    }
    return result;
  }

  public clampEnd(end: number): number {
    return this.total === undefined ? end : Math.min(end, this.total);
  }

  /**
   * Set the known length. Rows past the new end are dropped.
   */
  public resize(total: number): void {
    this.total = total;
    for (const [position, row] of this.rows) {
      if (position >= total) {
        this.forget(row);
        this.rows.delete(position);
      }
    }
  }

  public clear(): void {
    this.rows.clear();
    this.positions.clear();
    this.loaded = 0;
    this.total = undefined;
  }

  private forget(row: Row): void {
    if (row.state !== 'loaded') {
      return;
    }
    this.loaded--;
    const key = identityKey(row.identity);
    if (this.positions.get(key) === row.position) {
      this.positions.delete(key);
    }
  }
}
