/**
 * Worker Channel
 *
 * Runs backing-store operations one at a time on a serial async loop, off
 * the caller's synchronous path. Callers hand over work items and receive
 * a completion for each through the item's callback.
 *
 * Features:
 * - Lazy start (the loop begins with the first submitted item)
 * - Lazily opened, reused store session (discarded after a failure)
 * - Cancellation checked before execution and exposed as an AbortSignal
 * - Round-robin between categories, priority order within one
 * - Bounded shutdown (a hung operation is abandoned after a timeout)
 */

import { v4 as uuidv4 } from 'uuid';
import {
  StoreConnectionError,
  WorkerStoppedError,
  normalizeStoreError,
} from '../core/errors.js';
import { workerConfig } from '../core/config.js';
import { createWorkerLogger, type Logger } from '../core/logger.js';
import { err, ok } from '../core/result.js';
import { parseWorkerChannelOptions } from '../validation/schemas.js';
import { WorkQueue, type QueueEntry } from './work-queue.js';
import { WorkerStats, type OperationInfo, type WorkerStatsSnapshot } from './worker-stats.js';
import type {
  BackingStore,
  StoreQuery,
  StoreSession,
  WorkCompletion,
  WorkOutcome,
  WorkResult,
} from '../types.js';

export const DEFAULT_CATEGORY = 'default';

/**
 * What the owner hands to submit()
 */
export interface WorkItemSpec<Q> {
  requestId: number;
  query: StoreQuery<Q>;
  /** Priority class; one per cache when several caches share a channel */
  category?: string;
  priority?: number;
  onComplete: (completion: WorkCompletion) => void;
}

/**
 * A queued or running unit of work.
 *
 * The owner may cancel it or raise its priority at any time; the worker
 * only reads it.
 */
export class WorkItem<Q> implements QueueEntry {
  public readonly requestId: number;
  public readonly query: StoreQuery<Q>;
  public readonly category: string;
  public readonly onComplete: (completion: WorkCompletion) => void;
  private currentPriority: number;
  private readonly controller = new AbortController();

  constructor(
    public readonly sequence: number,
    spec: WorkItemSpec<Q>
  ) {
    this.requestId = spec.requestId;
    this.query = spec.query;
    this.category = spec.category ?? DEFAULT_CATEGORY;
    this.currentPriority = spec.priority ?? spec.requestId;
    this.onComplete = spec.onComplete;
  }

  public get priority(): number {
    return this.currentPriority;
  }

  public get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Aborted when the item is cancelled */
  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Raise the priority. Lower values are ignored.
   *
   * @returns true when the priority changed
   */
  public escalate(priority: number): boolean {
    if (priority <= this.currentPriority) {
      return false;
    }
    this.currentPriority = priority;
    return true;
  }

  public cancel(reason?: unknown): void {
    if (!this.cancelled) {
      this.controller.abort(reason ?? new WorkerStoppedError('Work item cancelled'));
    }
  }

  public describe(): OperationInfo {
    return {
      itemId: this.sequence,
      requestId: this.requestId,
      category: this.category,
      kind: this.query.kind,
    };
  }
}

export interface WorkerChannelOptions<Q> {
  store: BackingStore<Q>;
  /** Human readable name used in logs */
  name?: string;
  /** Longest idle wait before the loop re-checks its state (ms) */
  pollIntervalMs?: number;
  /** How long stop() waits for the running operation (ms) */
  shutdownTimeoutMs?: number;
  /** Finished operations kept in statistics */
  statsHistory?: number;
  logger?: Logger;
}

type ChannelState = 'idle' | 'running' | 'stopped';

export interface WorkerDebugSnapshot {
  channelId: string;
  name?: string;
  state: ChannelState;
  hasSession: boolean;
  queueSize: number;
  queueSizes: Record<string, number>;
  classOrder: string[];
  stats: WorkerStatsSnapshot;
}

/**
 * Serial executor for backing-store work
 *
 * Usage:
 * ```ts
 * const channel = new WorkerChannel({ store });
 * channel.submit({
 *   requestId: 1,
 *   query: { kind: 'window', source, start: 0, count: 50 },
 *   onComplete: ({ outcome }) => console.log(outcome.status),
 * });
 * await channel.stop();
 * ```
 */
export class WorkerChannel<Q> {
  public readonly id: string;
  public readonly name?: string;

  private readonly store: BackingStore<Q>;
  private readonly queue = new WorkQueue<WorkItem<Q>>();
  private readonly stats: WorkerStats;
  private readonly logger: Logger;
  private readonly pollIntervalMs: number;
  private readonly shutdownTimeoutMs: number;

  private state: ChannelState = 'idle';
  private loop?: Promise<void>;
  private session?: StoreSession<Q>;
  private current?: WorkItem<Q>;
  private abandoned?: WorkItem<Q>;
  private sequence = 0;
  /** Submitted items not yet finished or dropped */
  private outstanding = 0;
  private idleWaiters: Array<() => void> = [];
  private readonly stopListeners = new Set<() => void>();

  constructor(options: WorkerChannelOptions<Q>) {
    const parsed = parseWorkerChannelOptions({
      name: options.name,
      pollIntervalMs: options.pollIntervalMs,
      shutdownTimeoutMs: options.shutdownTimeoutMs,
      statsHistory: options.statsHistory,
    });

    this.id = uuidv4().substring(0, 8);
    this.name = parsed.name;
    this.store = options.store;
    this.pollIntervalMs = parsed.pollIntervalMs ?? workerConfig.pollIntervalMs;
    this.shutdownTimeoutMs = parsed.shutdownTimeoutMs ?? workerConfig.shutdownTimeoutMs;
    this.stats = new WorkerStats(parsed.statsHistory ?? workerConfig.statsHistory);
    this.logger = options.logger ?? createWorkerLogger(this.id, parsed.name);
  }

  public get isStopped(): boolean {
    return this.state === 'stopped';
  }

  public get queueSize(): number {
    return this.queue.size;
  }

  /**
   * Enqueue an item, starting the worker loop if needed.
   *
   * @throws {WorkerStoppedError} After stop()
   */
  public submit(spec: WorkItemSpec<Q>): WorkItem<Q> {
    if (this.state === 'stopped') {
      throw new WorkerStoppedError(undefined, { channelId: this.id, requestId: spec.requestId });
    }

    const item = new WorkItem(++this.sequence, spec);
    this.queue.put(item);
    this.outstanding++;

    if (this.state === 'idle') {
      this.state = 'running';
      this.loop = this.run().catch((error: unknown) => {
        this.logger.error({ err: error }, 'Worker loop failed');
      });
    }

    this.logger.debug(
      { requestId: item.requestId, kind: item.query.kind, queueSize: this.queue.size },
      'Work item queued'
    );
    return item;
  }

  /**
   * Resolves once nothing is queued or executing.
   */
  public whenIdle(): Promise<void> {
    if (this.isIdle() || this.state === 'stopped') {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Call `listener` when the channel stops.
   *
   * Listeners run synchronously inside stop(), after queued items were
   * dropped and the running item was cancelled, so owners can settle the
   * work whose completions will never arrive. On a stopped channel the
   * listener runs at once.
   *
   * @returns Unsubscribe function
   */
  public onStopped(listener: () => void): () => void {
    if (this.state === 'stopped') {
      this.callStopListener(listener);
      return () => undefined;
    }
    this.stopListeners.add(listener);
    return () => {
      this.stopListeners.delete(listener);
    };
  }

  public getStats(): WorkerStatsSnapshot {
    return this.stats.snapshot();
  }

  public debugSnapshot(): WorkerDebugSnapshot {
    return {
      channelId: this.id,
      name: this.name,
      state: this.state,
      hasSession: this.session !== undefined,
      queueSize: this.queue.size,
      queueSizes: this.queue.sizes(),
      classOrder: this.queue.classOrder,
      stats: this.stats.snapshot(),
    };
  }

  /**
   * Stop the loop.
   *
   * Queued items are dropped without callbacks and the running item is
   * cancelled. If it does not finish within the shutdown timeout it is
   * abandoned and its completion is never delivered. Owners that need to
   * settle such work subscribe with onStopped(); VirtualCache does, and
   * turns its outstanding rows into errors.
   */
  public async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return;
    }
    this.state = 'stopped';

    const dropped = this.queue.drain();
    this.queue.close();
    this.outstanding -= dropped.length;
    for (const item of dropped) {
      item.cancel(new WorkerStoppedError());
    }

    const running = this.current;
    running?.cancel(new WorkerStoppedError());

    const listeners = [...this.stopListeners];
    this.stopListeners.clear();
    for (const listener of listeners) {
      this.callStopListener(listener);
    }

    if (this.loop) {
      const finished = await this.waitForLoop(this.loop);
      if (!finished && this.current) {
        this.abandoned = this.current;
        this.logger.warn(
          { requestId: this.current.requestId, timeoutMs: this.shutdownTimeoutMs },
          'Abandoning work item that did not finish in time'
        );
      }
    }

    await this.closeSession();
    this.notifyIdle();

    this.logger.info({ dropped: dropped.length }, 'Worker channel stopped');
  }

  private async run(): Promise<void> {
    this.logger.debug('Worker loop started');
    while (this.state === 'running') {
      const item = await this.queue.take(this.pollIntervalMs);
      if (item !== undefined) {
        try {
          await this.execute(item);
        } finally {
          this.outstanding--;
        }
      }
      if (this.isIdle()) {
        this.notifyIdle();
      }
    }
    this.logger.debug('Worker loop exited');
  }

  private async execute(item: WorkItem<Q>): Promise<void> {
    if (item.cancelled) {
      this.stats.skipped(item.describe());
      this.deliver(item, { status: 'cancelled' });
      return;
    }

    this.current = item;
    this.stats.begin(item.describe());
    let outcome: WorkOutcome;

    try {
      const session = await this.ensureSession();
      const result = await this.runQuery(session, item);
      if (item.cancelled) {
        this.stats.end('cancelled');
        outcome = { status: 'cancelled' };
      } else {
        this.stats.end('done');
        outcome = { status: 'done', result: ok(result) };
      }
    } catch (error) {
      await this.discardSession();
      if (item.cancelled) {
        this.stats.end('cancelled');
        outcome = { status: 'cancelled' };
      } else {
        const normalized = normalizeStoreError(error, {
          requestId: item.requestId,
          kind: item.query.kind,
        });
        this.stats.end('error');
        this.logger.error(
          { err: normalized, requestId: item.requestId, kind: item.query.kind },
          'Store operation failed'
        );
        outcome = { status: 'done', result: err(normalized) };
      }
    } finally {
      this.current = undefined;
    }

    if (this.abandoned === item) {
      this.abandoned = undefined;
      await this.closeSession();
      return;
    }
    this.deliver(item, outcome);
  }

  private async runQuery(session: StoreSession<Q>, item: WorkItem<Q>): Promise<WorkResult> {
    const { query, signal } = item;
    switch (query.kind) {
      case 'window': {
        const records = await session.fetchWindow(
          query.source,
          { start: query.start, count: query.count },
          signal
        );
        return { kind: 'window', records };
      }
      case 'count': {
        const total = await session.count(query.source, signal);
        return { kind: 'count', total };
      }
    }
  }

  private async ensureSession(): Promise<StoreSession<Q>> {
    if (this.session) {
      return this.session;
    }
    try {
      this.session = await this.store.openSession();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StoreConnectionError(`Failed to open store session: ${message}`, error, {
        channelId: this.id,
      });
    }
    this.logger.debug('Store session opened');
    return this.session;
  }

  private async discardSession(): Promise<void> {
    if (this.session) {
      this.logger.debug('Discarding store session after failure');
    }
    await this.closeSession();
  }

  private async closeSession(): Promise<void> {
    const session = this.session;
    this.session = undefined;
    if (!session) {
      return;
    }
    try {
      await session.close();
    } catch (error) {
      this.logger.warn({ err: error }, 'Failed to close store session');
    }
  }

  private deliver(item: WorkItem<Q>, outcome: WorkOutcome): void {
    try {
      item.onComplete({ requestId: item.requestId, outcome });
    } catch (error) {
      // A throwing callback must not take the loop down
      this.logger.error({ err: error, requestId: item.requestId }, 'Completion callback failed');
    }
  }

  private callStopListener(listener: () => void): void {
    try {
      listener();
    } catch (error) {
      this.logger.error({ err: error }, 'Stop listener failed');
    }
  }

  private async waitForLoop(loop: Promise<void>): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), this.shutdownTimeoutMs);
    });
    try {
      return await Promise.race([loop.then(() => true), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private isIdle(): boolean {
    return this.outstanding === 0;
  }

  private notifyIdle(): void {
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
