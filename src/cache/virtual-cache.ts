/**
 * Virtual Cache
 *
 * Coordinates a sparse row array, a request coalescer and a worker channel
 * for one scrolling view. Visibility calls are synchronous and never wait
 * for the store; completions are folded back into row state by request id
 * and epoch, never by arrival order.
 *
 * Features:
 * - Demand computed per maximal run of rows without data
 * - Optional delayed dispatch so scroll bursts coalesce into few round trips
 * - Priority escalation of queued work for ranges asked for again
 * - Shared, cached total count with an initial prefetch
 * - Epoch-based discarding of completions from before a reset
 * - Lookup of loaded rows by record identity
 */

import {
  AbortedError,
  CacheDisposedError,
  CacheResetError,
  InputValidationError,
  InternalError,
  StoreQueryError,
  WorkerStoppedError,
  isRowCacheError,
  type RowCacheError,
} from '../core/errors.js';
import { cacheConfig } from '../core/config.js';
import { createCacheLogger, type Logger } from '../core/logger.js';
import { match } from '../core/result.js';
import {
  CacheEventEmitter,
  type CacheEventListener,
  type WaitOptions,
  type WaitPredicate,
} from '../events/cache-event-emitter.js';
import { parseVirtualCacheOptions } from '../validation/schemas.js';
import { DEFAULT_CATEGORY, type WorkItem, type WorkerChannel } from '../worker/worker-channel.js';
import type { WorkerStatsSnapshot } from '../worker/worker-stats.js';
import { RequestCoalescer } from './request-coalescer.js';
import {
  beginLoading,
  completeLoading,
  failLoading,
  isLoaded,
  isLoadingFor,
  needsFetch,
  supersedeLoading,
} from './row.js';
import { SparseRows } from './sparse-rows.js';
import type {
  LoadedRow,
  RecordIdentity,
  Row,
  StoreRecord,
  WorkCompletion,
  WorkResult,
} from '../types.js';

export interface VirtualCacheOptions<Q> {
  channel: WorkerChannel<Q>;
  /** Opaque description of "all rows", passed to the store unchanged */
  source: Q;
  /** Used in logs */
  name?: string;
  /** Priority class on the channel; defaults to the cache name */
  category?: string;
  mergeLimit?: number;
  batchSize?: number;
  prefetchBatches?: number;
  dispatchDelayMs?: number;
  errorRetryCooldownMs?: number;
  /** Count at construction and after every reset */
  autoCount?: boolean;
  now?: () => number;
  logger?: Logger;
}

interface InFlight<Q> {
  readonly start: number;
  readonly count: number;
  readonly item: WorkItem<Q>;
}

interface PendingCount<Q> {
  readonly requestId: number;
  readonly item: WorkItem<Q>;
  readonly promise: Promise<number>;
  readonly resolve: (total: number) => void;
  readonly reject: (error: RowCacheError) => void;
}

export interface VirtualCacheStats {
  name: string;
  epoch: number;
  knownTotal?: number;
  loaded: number;
  materialized: number;
  pending: number;
  inFlight: number;
  worker: WorkerStatsSnapshot;
}

export class VirtualCache<Q> {
  public readonly name: string;

  private readonly channel: WorkerChannel<Q>;
  private readonly category: string;
  private readonly batchSize: number;
  private readonly prefetchBatches: number;
  private readonly dispatchDelayMs: number;
  private readonly errorRetryCooldownMs: number;
  private readonly autoCount: boolean;
  private readonly now: () => number;
  private readonly logger: Logger;

  private readonly rowStore = new SparseRows();
  private readonly coalescer: RequestCoalescer;
  private readonly emitter: CacheEventEmitter;
  private readonly inFlight = new Map<number, InFlight<Q>>();

  private source: Q;
  private currentEpoch = 0;
  private dispatchTimer?: NodeJS.Timeout;
  private pendingCount?: PendingCount<Q>;
  private disposed = false;
  private readonly unsubscribeStopped: () => void;

  constructor(options: VirtualCacheOptions<Q>) {
    const settings = parseVirtualCacheOptions({
      name: options.name,
      category: options.category,
      mergeLimit: options.mergeLimit,
      batchSize: options.batchSize,
      prefetchBatches: options.prefetchBatches,
      dispatchDelayMs: options.dispatchDelayMs,
      errorRetryCooldownMs: options.errorRetryCooldownMs,
      autoCount: options.autoCount,
    });

    this.name = settings.name ?? 'cache';
    this.channel = options.channel;
    this.source = options.source;
    this.category = settings.category ?? settings.name ?? DEFAULT_CATEGORY;
    this.batchSize = settings.batchSize ?? cacheConfig.batchSize;
    this.prefetchBatches = settings.prefetchBatches ?? cacheConfig.prefetchBatches;
    this.dispatchDelayMs = settings.dispatchDelayMs ?? cacheConfig.dispatchDelayMs;
    this.errorRetryCooldownMs = settings.errorRetryCooldownMs ?? cacheConfig.errorRetryCooldownMs;
    this.autoCount = settings.autoCount ?? false;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createCacheLogger(this.name);
    this.emitter = new CacheEventEmitter(this.logger);
    this.coalescer = new RequestCoalescer({
      mergeLimit: settings.mergeLimit ?? cacheConfig.mergeLimit,
      logger: this.logger,
    });
    this.unsubscribeStopped = this.channel.onStopped(() => this.abandonOutstandingWork());

    if (this.autoCount) {
      this.startAutoCount();
    }
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  public get epoch(): number {
    return this.currentEpoch;
  }

  public get loadedCount(): number {
    return this.rowStore.loadedCount;
  }

  /** Total row count once it has been counted */
  public get knownTotal(): number | undefined {
    return this.rowStore.length;
  }

  public get isFullyLoaded(): boolean {
    const total = this.rowStore.length;
    return total !== undefined && this.rowStore.loadedCount === total;
  }

  public get inFlightCount(): number {
    return this.inFlight.size;
  }

  public get isDisposed(): boolean {
    return this.disposed;
  }

  public rowAt(position: number): Row {
    return this.rowStore.get(position);
  }

  /**
   * The loaded row holding this record, if any. Composite identities match
   * element-wise.
   */
  public findByIdentity(identity: RecordIdentity): LoadedRow | undefined {
    const position = this.rowStore.positionOf(identity);
    if (position === undefined) {
      return undefined;
    }
    const row = this.rowStore.get(position);
    return isLoaded(row) ? row : undefined;
  }

  public rows(start: number, count: number): Row[] {
    this.validateRange(start, count);
    return this.rowStore.slice(start, count);
  }

  public getStats(): VirtualCacheStats {
    return {
      name: this.name,
      epoch: this.currentEpoch,
      knownTotal: this.rowStore.length,
      loaded: this.rowStore.loadedCount,
      materialized: this.rowStore.materialized,
      pending: this.coalescer.pendingCount,
      inFlight: this.inFlight.size,
      worker: this.channel.getStats(),
    };
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  public on(listener: CacheEventListener): () => void {
    return this.emitter.on(listener);
  }

  public waitFor<T>(predicate: WaitPredicate<T>, options?: WaitOptions): Promise<T> {
    return this.emitter.waitFor(predicate, options);
  }

  // ==========================================================================
  // Demand
  // ==========================================================================

  /**
   * Request data for `[start, start + count)`.
   *
   * Creates one request per maximal run of rows without data, lets the
   * coalescer trim and merge them, and dispatches (now or after the
   * dispatch delay). Runs that are already loading only raise the
   * priority of the work covering them.
   *
   * @returns Number of requests registered as new pending work
   * @throws {InputValidationError} For negative or non-integer input
   * @throws {CacheDisposedError} After dispose()
   */
  public ensureVisible(start: number, count: number): number {
    this.assertOpen();
    this.validateRange(start, count);

    const end = this.rowStore.clampEnd(start + count);
    const now = this.now();
    let registered = 0;
    let priority: number | undefined;
    let runStart: number | undefined;

    const flush = (runEnd: number): void => {
      if (runStart === undefined) {
        return;
      }
      const request = this.coalescer.createRequest(runStart, runEnd - runStart, priority);
      priority ??= request.priority;
      if (this.coalescer.submit(request)) {
        registered++;
      }
      runStart = undefined;
    };

    for (let position = start; position < end; position++) {
      const row = this.rowStore.get(position);
      if (row.state === 'loading' || needsFetch(row, now, this.errorRetryCooldownMs)) {
        runStart ??= position;
      } else {
        flush(position);
      }
    }
    flush(end);

    this.propagateEscalations();
    this.scheduleDispatch();
    return registered;
  }

  /**
   * Request the batch around a single referenced row.
   */
  public requestAround(position: number): number {
    this.validateRange(position, 1);
    const start = Math.max(0, position - this.batchSize);
    return this.ensureVisible(start, position + this.batchSize - start);
  }

  /**
   * Dispatch pending requests immediately, skipping the delay.
   */
  public flush(): void {
    this.assertOpen();
    this.cancelDispatchTimer();
    this.dispatch();
  }

  // ==========================================================================
  // Count
  // ==========================================================================

  /**
   * Count all rows of the source.
   *
   * Concurrent callers share one count; the result is kept until reset().
   *
   * @throws {CacheResetError} When the cache is reset before the count arrives
   */
  public totalCount(): Promise<number> {
    if (this.disposed) {
      return Promise.reject(new CacheDisposedError());
    }
    const known = this.rowStore.length;
    if (known !== undefined) {
      return Promise.resolve(known);
    }
    if (this.pendingCount) {
      return this.pendingCount.promise;
    }

    const requestId = this.coalescer.allocateId();
    const epoch = this.currentEpoch;
    let item: WorkItem<Q>;
    try {
      item = this.channel.submit({
        requestId,
        query: { kind: 'count', source: this.source },
        category: this.category,
        onComplete: (completion) => this.onCountCompletion(epoch, completion),
      });
    } catch (error) {
      return Promise.reject(error);
    }

    let resolve: (total: number) => void = () => undefined;
    let reject: (error: RowCacheError) => void = () => undefined;
    const promise = new Promise<number>((res, rej) => {
      resolve = res;
      reject = rej;
    });
    this.pendingCount = { requestId, item, promise, resolve, reject };

    this.logger.debug({ requestId }, 'Count requested');
    return promise;
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  /**
   * Forget every row and cancel all outstanding work.
   *
   * Used when the definition of "all rows" changes. Does not wait for the
   * worker; late completions are dropped by their epoch.
   */
  public reset(source?: Q): void {
    this.assertOpen();
    if (source !== undefined) {
      this.source = source;
    }
    this.discardState(new CacheResetError(undefined, { cache: this.name }));

    this.logger.info({ epoch: this.currentEpoch }, 'Cache reset');
    this.emitter.emit({ kind: 'Reset', epoch: this.currentEpoch });

    if (this.autoCount) {
      this.startAutoCount();
    }
  }

  /**
   * Cancel outstanding work and detach listeners. The channel is left
   * running since other caches may share it.
   */
  public dispose(): void {
    if (this.disposed) {
      return;
    }
    this.discardState(new CacheDisposedError(undefined, { cache: this.name }));
    this.disposed = true;
    this.unsubscribeStopped();
    this.emitter.clear();
    this.logger.debug('Cache disposed');
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  private scheduleDispatch(): void {
    if (this.coalescer.pendingCount === 0) {
      return;
    }
    if (this.dispatchDelayMs === 0) {
      this.dispatch();
      return;
    }
    if (!this.dispatchTimer) {
      this.dispatchTimer = setTimeout(() => {
        this.dispatchTimer = undefined;
        this.dispatch();
      }, this.dispatchDelayMs);
    }
  }

  private dispatch(): void {
    const epoch = this.currentEpoch;

    for (const request of this.coalescer.pending()) {
      const { id: requestId, start, count } = request;
      let item: WorkItem<Q>;
      try {
        item = this.channel.submit({
          requestId,
          query: { kind: 'window', source: this.source, start, count },
          category: this.category,
          priority: request.priority,
          onComplete: (completion) => this.onCompletion(epoch, completion),
        });
      } catch (error) {
        this.coalescer.release(requestId);
        const failure = isRowCacheError(error)
          ? error
          : new InternalError(error instanceof Error ? error.message : String(error), { requestId });
        this.logger.error({ err: error, requestId }, 'Failed to dispatch request');
        this.emitter.emit({
          kind: 'RequestFailed',
          requestId,
          start,
          count,
          inFlight: this.inFlight.size,
          error: failure,
        });
        continue;
      }

      this.coalescer.markDispatched(requestId);
      this.markLoading(requestId, start, count);
      this.inFlight.set(requestId, { start, count, item });

      this.logger.debug({ requestId, start, count, priority: request.priority }, 'Request dispatched');
      this.emitter.emit({
        kind: 'RequestIssued',
        requestId,
        start,
        count,
        inFlight: this.inFlight.size,
      });
    }
  }

  private markLoading(requestId: number, start: number, count: number): void {
    const end = this.rowStore.clampEnd(start + count);
    for (let position = start; position < end; position++) {
      const row = this.rowStore.get(position);
      this.rowStore.set(
        row.state === 'loading' ? supersedeLoading(row, requestId) : beginLoading(row, requestId)
      );
    }
  }

  private propagateEscalations(): void {
    for (const request of this.coalescer.drainEscalated()) {
      const flight = this.inFlight.get(request.id);
      if (flight?.item.escalate(request.priority)) {
        this.logger.trace(
          { requestId: request.id, priority: request.priority },
          'Escalated in-flight request'
        );
      }
    }
  }

  // ==========================================================================
  // Completions
  // ==========================================================================

  private onCompletion(epoch: number, completion: WorkCompletion): void {
    const { requestId, outcome } = completion;
    if (epoch !== this.currentEpoch) {
      this.logger.debug({ requestId, epoch, current: this.currentEpoch }, 'Dropping stale completion');
      return;
    }
    const flight = this.inFlight.get(requestId);
    if (!flight) {
      this.logger.debug({ requestId }, 'Dropping completion without in-flight request');
      return;
    }

    this.inFlight.delete(requestId);
    this.coalescer.release(requestId);

    if (outcome.status === 'cancelled') {
      this.logger.debug({ requestId }, 'Request cancelled');
      return;
    }

    const loadedBefore = this.rowStore.loadedCount;
    match(outcome.result, {
      ok: (result) => this.applyResult(requestId, flight, result),
      err: (error) => this.applyFailure(requestId, flight, error),
    });

    this.emitter.emit({ kind: 'RowsChanged', start: flight.start, count: flight.count });
    if (this.rowStore.loadedCount !== loadedBefore) {
      this.emitter.emit({ kind: 'LoadedCountChanged', loaded: this.rowStore.loadedCount });
    }
  }

  private applyResult(requestId: number, flight: InFlight<Q>, result: WorkResult): void {
    if (result.kind !== 'window') {
      this.applyFailure(
        requestId,
        flight,
        new InternalError(`Expected window result, got ${result.kind}`, { requestId })
      );
      return;
    }

    const { records } = result;
    const failedAt = this.now();
    let missing = 0;

    for (let offset = 0; offset < flight.count; offset++) {
      const position = flight.start + offset;
      const row = this.rowStore.get(position);
      if (!isLoadingFor(row, requestId)) {
        continue;
      }
      const record: StoreRecord | undefined = records[offset];
      if (record === undefined || record.identity === null || record.identity === undefined) {
        missing++;
        const reason =
          record === undefined
            ? `Store returned no record for row ${position}`
            : `Record for row ${position} has no identity`;
        const error = new StoreQueryError(reason, undefined, { requestId, position });
        this.rowStore.set(failLoading(row, requestId, error, failedAt));
      } else {
        this.rowStore.set(completeLoading(row, requestId, record));
      }
    }

    if (missing > 0) {
      this.logger.warn(
        { requestId, requested: flight.count, received: records.length, missing },
        'Store returned fewer usable records than requested'
      );
    }
    this.emitter.emit({
      kind: 'RequestCompleted',
      requestId,
      start: flight.start,
      count: flight.count,
      inFlight: this.inFlight.size,
    });
  }

  private applyFailure(requestId: number, flight: InFlight<Q>, error: RowCacheError): void {
    const failedAt = this.now();
    for (let offset = 0; offset < flight.count; offset++) {
      const row = this.rowStore.get(flight.start + offset);
      if (isLoadingFor(row, requestId)) {
        this.rowStore.set(failLoading(row, requestId, error, failedAt));
      }
    }
    this.emitter.emit({
      kind: 'RequestFailed',
      requestId,
      start: flight.start,
      count: flight.count,
      inFlight: this.inFlight.size,
      error,
    });
  }

  private onCountCompletion(epoch: number, completion: WorkCompletion): void {
    const pending = this.pendingCount;
    if (epoch !== this.currentEpoch || !pending || pending.requestId !== completion.requestId) {
      this.logger.debug({ requestId: completion.requestId }, 'Dropping stale count completion');
      return;
    }
    this.pendingCount = undefined;

    const { outcome } = completion;
    if (outcome.status === 'cancelled') {
      pending.reject(new AbortedError('Count was cancelled', { requestId: completion.requestId }));
      return;
    }

    match(outcome.result, {
      ok: (result) => {
        if (result.kind !== 'count') {
          pending.reject(
            new InternalError(`Expected count result, got ${result.kind}`, {
              requestId: completion.requestId,
            })
          );
          return;
        }
        this.applyTotal(result.total);
        pending.resolve(result.total);
      },
      err: (error) => pending.reject(error),
    });
  }

  private applyTotal(total: number): void {
    const loadedBefore = this.rowStore.loadedCount;
    this.rowStore.resize(total);
    this.logger.debug({ total }, 'Total count known');
    this.emitter.emit({ kind: 'TotalCountChanged', total });
    if (this.rowStore.loadedCount !== loadedBefore) {
      this.emitter.emit({ kind: 'LoadedCountChanged', loaded: this.rowStore.loadedCount });
    }

    const prefetch = this.batchSize * this.prefetchBatches;
    if (this.rowStore.loadedCount === 0 && prefetch > 0 && total > 0) {
      this.ensureVisible(0, prefetch);
    }
  }

  private startAutoCount(): void {
    this.totalCount().catch((error: unknown) => {
      if (error instanceof CacheResetError || error instanceof CacheDisposedError) {
        return;
      }
      this.logger.warn({ err: error }, 'Automatic count failed');
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private discardState(reason: RowCacheError): void {
    this.currentEpoch++;
    this.cancelDispatchTimer();

    for (const flight of this.inFlight.values()) {
      flight.item.cancel(reason);
    }
    this.inFlight.clear();
    this.coalescer.clear();

    const pending = this.pendingCount;
    this.pendingCount = undefined;
    if (pending) {
      pending.item.cancel(reason);
      pending.reject(reason);
    }

    const hadLoaded = this.rowStore.loadedCount > 0;
    this.rowStore.clear();
    if (hadLoaded) {
      this.emitter.emit({ kind: 'LoadedCountChanged', loaded: 0 });
    }
  }

  /**
   * The channel stopped: nothing outstanding will complete. Loading rows
   * become errors, so the next visibility request asks again and fails
   * fast instead of waiting forever.
   */
  private abandonOutstandingWork(): void {
    if (this.disposed) {
      return;
    }
    this.cancelDispatchTimer();
    const error = new WorkerStoppedError(undefined, { cache: this.name });

    for (const request of this.coalescer.pending()) {
      this.coalescer.release(request.id);
    }
    const flights = [...this.inFlight];
    this.inFlight.clear();
    for (const [requestId, flight] of flights) {
      // Taken off the queue but not started yet; stop() could not see it
      flight.item.cancel(error);
      this.coalescer.release(requestId);
      this.applyFailure(requestId, flight, error);
      this.emitter.emit({ kind: 'RowsChanged', start: flight.start, count: flight.count });
    }

    const pending = this.pendingCount;
    this.pendingCount = undefined;
    if (pending) {
      pending.item.cancel(error);
      pending.reject(error);
    }

    if (flights.length > 0 || pending) {
      this.logger.warn(
        { abandoned: flights.length, count: pending !== undefined },
        'Worker channel stopped with outstanding work'
      );
    }
  }

  private cancelDispatchTimer(): void {
    if (this.dispatchTimer) {
      clearTimeout(this.dispatchTimer);
      this.dispatchTimer = undefined;
    }
  }

  private validateRange(start: number, count: number): void {
    const startValid = Number.isInteger(start) && start >= 0;
    const countValid = Number.isInteger(count) && count >= 0;
    if (startValid && countValid) {
      return;
    }
    const errors: string[] = [];
    if (!startValid) {
      errors.push(`start must be a non-negative integer, got ${start}`);
    }
    if (!countValid) {
      errors.push(`count must be a non-negative integer, got ${count}`);
    }
    throw new InputValidationError('Invalid row range', startValid ? 'count' : 'start', errors, {
      start,
      count,
    });
  }

  private assertOpen(): void {
    if (this.disposed) {
      throw new CacheDisposedError(undefined, { cache: this.name });
    }
  }
}
