/**
 * Unit Tests for WorkerChannel
 *
 * Tests cover:
 * - Window and count execution with session reuse
 * - Error normalization and session discard
 * - Cancellation before and during execution
 * - Priority, escalation and category rotation
 * - Shutdown with queued, running and hung items
 * - Stop listeners
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WorkerChannel } from '../../src/worker/worker-channel.js';
import {
  ConfigValidationError,
  StoreConnectionError,
  StoreQueryError,
  WorkerStoppedError,
} from '../../src/core/errors.js';
import type { RowCacheError } from '../../src/core/errors.js';
import type { WorkCompletion, WorkResult } from '../../src/types.js';
import { ArrayStore, ManualStore, makeRecords, type StoreCall } from '../fixtures/in-memory-store.js';

function windowQuery(start: number, count: number) {
  return { kind: 'window' as const, source: 'items', start, count };
}

function successOf(completion: WorkCompletion | undefined): WorkResult {
  if (!completion || completion.outcome.status !== 'done') {
    throw new Error('expected a finished completion');
  }
  const { result } = completion.outcome;
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

function failureOf(completion: WorkCompletion | undefined): RowCacheError {
  if (!completion || completion.outcome.status !== 'done') {
    throw new Error('expected a finished completion');
  }
  const { result } = completion.outcome;
  if (result.ok) {
    throw new Error('expected a failed completion');
  }
  return result.error;
}

describe('WorkerChannel', () => {
  let completions: WorkCompletion[];
  const record = (completion: WorkCompletion): void => {
    completions.push(completion);
  };

  beforeEach(() => {
    completions = [];
  });

  describe('with an immediate store', () => {
    let store: ArrayStore;
    let channel: WorkerChannel<string>;

    beforeEach(() => {
      store = new ArrayStore(makeRecords(10));
      channel = new WorkerChannel({ store, name: 'unit', pollIntervalMs: 20 });
    });

    afterEach(async () => {
      await channel.stop();
    });

    it('should execute a window query and deliver the records', async () => {
      channel.submit({ requestId: 1, query: windowQuery(2, 3), onComplete: record });
      await channel.whenIdle();

      expect(completions).toHaveLength(1);
      expect(completions[0]?.requestId).toBe(1);
      const result = successOf(completions[0]);
      expect(result.kind).toBe('window');
      if (result.kind === 'window') {
        expect(result.records.map((r) => r.identity)).toEqual([2, 3, 4]);
      }
    });

    it('should execute a count query', async () => {
      channel.submit({ requestId: 7, query: { kind: 'count', source: 'items' }, onComplete: record });
      await channel.whenIdle();

      expect(completions[0]?.outcome).toEqual({
        status: 'done',
        result: { ok: true, value: { kind: 'count', total: 10 } },
      });
    });

    it('should reuse one session for consecutive items', async () => {
      channel.submit({ requestId: 1, query: windowQuery(0, 2), onComplete: record });
      channel.submit({ requestId: 2, query: windowQuery(2, 2), onComplete: record });
      await channel.whenIdle();

      expect(completions.map((c) => c.requestId)).toEqual([1, 2]);
      expect(store.sessionsOpened).toBe(1);
      expect(store.sessionsClosed).toBe(0);
    });

    it('should report store failures as StoreQueryError and open a fresh session', async () => {
      store.failures.push(new Error('permission denied for table items'));
      channel.submit({ requestId: 1, query: windowQuery(0, 2), onComplete: record });
      await channel.whenIdle();
      channel.submit({ requestId: 2, query: windowQuery(0, 2), onComplete: record });
      await channel.whenIdle();

      const error = failureOf(completions[0]);
      expect(error).toBeInstanceOf(StoreQueryError);
      expect(error.message).toBe('permission denied for table items');
      expect(store.sessionsOpened).toBe(2);
      expect(store.sessionsClosed).toBe(1);
      expect(completions[1]?.outcome.status).toBe('done');
    });

    it('should report session open failures as StoreConnectionError', async () => {
      store.openFailures.push(new Error('connection refused'));
      channel.submit({ requestId: 1, query: windowQuery(0, 2), onComplete: record });
      await channel.whenIdle();

      const error = failureOf(completions[0]);
      expect(error).toBeInstanceOf(StoreConnectionError);
      expect(error.message).toBe('Failed to open store session: connection refused');
    });

    it('should skip an item cancelled before it ran and still report it', async () => {
      const item = channel.submit({ requestId: 1, query: windowQuery(0, 2), onComplete: record });
      item.cancel();
      await channel.whenIdle();

      expect(completions).toEqual([{ requestId: 1, outcome: { status: 'cancelled' } }]);
      expect(store.calls).toEqual([]);
      expect(channel.getStats().cancelled).toBe(1);
    });

    it('should keep running when a completion callback throws', async () => {
      channel.submit({
        requestId: 1,
        query: windowQuery(0, 1),
        onComplete: () => {
          throw new Error('listener bug');
        },
      });
      channel.submit({ requestId: 2, query: windowQuery(1, 1), onComplete: record });
      await channel.whenIdle();

      expect(completions.map((c) => c.requestId)).toEqual([2]);
    });

    it('should count finished operations in its statistics', async () => {
      store.failures.push(new Error('boom'));
      channel.submit({ requestId: 1, query: windowQuery(0, 1), onComplete: record });
      channel.submit({ requestId: 2, query: windowQuery(1, 1), onComplete: record });
      await channel.whenIdle();

      const stats = channel.getStats();
      expect(stats.started).toBe(2);
      expect(stats.finished).toBe(2);
      expect(stats.errors).toBe(1);
      expect(stats.recent).toHaveLength(2);
    });

    it('should refuse work after stop', async () => {
      await channel.stop();

      expect(() =>
        channel.submit({ requestId: 1, query: windowQuery(0, 1), onComplete: record })
      ).toThrow(WorkerStoppedError);
      expect(channel.isStopped).toBe(true);
    });

    it('should resolve whenIdle immediately when nothing was submitted', async () => {
      await expect(channel.whenIdle()).resolves.toBeUndefined();
    });

    it('should call a stop listener at once on a stopped channel', async () => {
      await channel.stop();
      const listener = vi.fn();

      channel.onStopped(listener);

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should not call an unsubscribed stop listener', async () => {
      const listener = vi.fn();
      const unsubscribe = channel.onStopped(listener);

      unsubscribe();
      await channel.stop();

      expect(listener).not.toHaveBeenCalled();
    });

    it('should keep calling stop listeners after one throws', async () => {
      const failing = vi.fn(() => {
        throw new Error('listener broke');
      });
      const next = vi.fn();
      channel.onStopped(failing);
      channel.onStopped(next);

      await expect(channel.stop()).resolves.toBeUndefined();

      expect(failing).toHaveBeenCalledTimes(1);
      expect(next).toHaveBeenCalledTimes(1);
    });
  });

  describe('with a manually driven store', () => {
    let store: ManualStore;
    let channel: WorkerChannel<string>;

    const nextCall = async (): Promise<StoreCall> => {
      await vi.waitFor(() => expect(store.parkedCount).toBeGreaterThan(0));
      return store.peek().call;
    };

    beforeEach(() => {
      store = new ManualStore();
      channel = new WorkerChannel({ store, pollIntervalMs: 20, shutdownTimeoutMs: 50 });
    });

    afterEach(async () => {
      await channel.stop();
    });

    it('should report an item cancelled while running as cancelled', async () => {
      const item = channel.submit({ requestId: 1, query: windowQuery(0, 2), onComplete: record });
      await nextCall();

      item.cancel();
      expect(store.peek().signal.aborted).toBe(true);
      store.resolveNext(makeRecords(2));
      await channel.whenIdle();

      expect(completions).toEqual([{ requestId: 1, outcome: { status: 'cancelled' } }]);
    });

    it('should run the highest priority queued item next', async () => {
      channel.submit({ requestId: 1, query: windowQuery(0, 1), onComplete: record });
      await nextCall();
      channel.submit({ requestId: 2, query: windowQuery(10, 1), priority: 1, onComplete: record });
      channel.submit({ requestId: 3, query: windowQuery(20, 1), priority: 5, onComplete: record });

      store.resolveNext(makeRecords(1));
      expect(await nextCall()).toEqual({ kind: 'window', source: 'items', start: 20, count: 1 });
    });

    it('should move an escalated item forward', async () => {
      channel.submit({ requestId: 1, query: windowQuery(0, 1), onComplete: record });
      await nextCall();
      const low = channel.submit({ requestId: 2, query: windowQuery(10, 1), onComplete: record });
      channel.submit({ requestId: 3, query: windowQuery(20, 1), onComplete: record });

      expect(low.escalate(10)).toBe(true);
      expect(low.escalate(4)).toBe(false);
      store.resolveNext(makeRecords(1));

      expect(await nextCall()).toEqual({ kind: 'window', source: 'items', start: 10, count: 1 });
    });

    it('should rotate between categories', async () => {
      channel.submit({ requestId: 1, query: windowQuery(0, 1), category: 'orders', onComplete: record });
      await nextCall();
      channel.submit({ requestId: 2, query: windowQuery(1, 1), category: 'orders', onComplete: record });
      channel.submit({ requestId: 3, query: windowQuery(2, 1), category: 'customers', onComplete: record });

      expect(channel.debugSnapshot().queueSizes).toEqual({ orders: 1, customers: 1 });

      store.resolveNext(makeRecords(1));
      expect(await nextCall()).toMatchObject({ start: 2 });
    });

    it('should abandon a hung item on stop and never deliver it', async () => {
      channel.submit({ requestId: 1, query: windowQuery(0, 1), onComplete: record });
      await nextCall();
      channel.submit({ requestId: 2, query: windowQuery(1, 1), onComplete: record });

      await channel.stop();
      expect(store.sessionsClosed).toBe(1);
      expect(channel.queueSize).toBe(0);

      store.resolveNext(makeRecords(1));
      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(completions).toEqual([]);
    });

    it('should notify stop listeners after dropping queued work and cancelling the running item', async () => {
      const running = channel.submit({ requestId: 1, query: windowQuery(0, 1), onComplete: record });
      await nextCall();
      const queued = channel.submit({ requestId: 2, query: windowQuery(1, 1), onComplete: record });
      const seen: Array<{ queueSize: number; runningCancelled: boolean; queuedCancelled: boolean }> = [];
      channel.onStopped(() => {
        seen.push({
          queueSize: channel.queueSize,
          runningCancelled: running.cancelled,
          queuedCancelled: queued.cancelled,
        });
      });

      const stopping = channel.stop();

      expect(seen).toEqual([{ queueSize: 0, runningCancelled: true, queuedCancelled: true }]);
      await stopping;
      store.resolveNext(makeRecords(1));
    });

    it('should deliver the cancellation of a running item that honors abort', async () => {
      store = new ManualStore(true);
      channel = new WorkerChannel({ store, pollIntervalMs: 20, shutdownTimeoutMs: 1000 });
      channel.submit({ requestId: 1, query: windowQuery(0, 1), onComplete: record });
      channel.submit({ requestId: 2, query: windowQuery(1, 1), onComplete: record });
      await nextCall();

      await channel.stop();

      expect(completions).toEqual([{ requestId: 1, outcome: { status: 'cancelled' } }]);
      expect(store.parkedCount).toBe(0);
    });
  });

  describe('options', () => {
    it('should reject invalid options', () => {
      const store = new ArrayStore([]);
      expect(() => new WorkerChannel({ store, pollIntervalMs: 0 })).toThrow(ConfigValidationError);
      expect(() => new WorkerChannel({ store, statsHistory: 0 })).toThrow(ConfigValidationError);
    });

    it('should give every channel a short id', () => {
      const channel = new WorkerChannel({ store: new ArrayStore([]) });
      expect(channel.id).toMatch(/^[0-9a-f]{8}$/);
    });
  });
});
