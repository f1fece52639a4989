/**
 * Unit Tests for WorkerStats
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { WorkerStats, type OperationInfo } from '../../src/worker/worker-stats.js';

function info(requestId: number): OperationInfo {
  return { itemId: requestId, requestId, category: 'orders', kind: 'window' };
}

describe('WorkerStats', () => {
  let clock: number;
  let stats: WorkerStats;

  beforeEach(() => {
    clock = 1000;
    stats = new WorkerStats(2, () => clock);
  });

  it('should start empty', () => {
    expect(stats.snapshot()).toEqual({
      started: 0,
      finished: 0,
      errors: 0,
      cancelled: 0,
      current: undefined,
      recent: [],
      averageDurationMs: undefined,
    });
  });

  it('should report the running operation with its elapsed time', () => {
    stats.begin(info(1));
    clock = 1050;

    expect(stats.snapshot().current).toEqual({ ...info(1), elapsedMs: 50 });
    expect(stats.snapshot().started).toBe(1);
  });

  it('should record finished, failed and skipped operations', () => {
    stats.begin(info(1));
    clock = 1050;
    stats.end('done');
    stats.skipped(info(2));
    stats.begin(info(3));
    clock = 1150;
    stats.end('error');

    const snapshot = stats.snapshot();
    expect(snapshot.started).toBe(2);
    expect(snapshot.finished).toBe(2);
    expect(snapshot.errors).toBe(1);
    expect(snapshot.cancelled).toBe(1);
    expect(snapshot.current).toBeUndefined();
    expect(snapshot.recent.map((op) => [op.requestId, op.status, op.executed])).toEqual([
      [3, 'error', true],
      [2, 'cancelled', false],
    ]);
    expect(snapshot.averageDurationMs).toBe(100);
  });

  it('should ignore end() without a running operation', () => {
    stats.end('done');
    expect(stats.snapshot().finished).toBe(0);
  });
});
