/**
 * Cache Event Emitter
 *
 * Pub/sub for cache events and predicate-based waiting. The cache emits;
 * presentation code subscribes to repaint rows and tests wait for
 * specific transitions.
 */

import { composeWithTimeout, isTimeoutAbortReason } from '../core/abort.js';
import { TimeoutError, AbortedError } from '../core/errors.js';
import { logger as rootLogger, type Logger } from '../core/logger.js';
import type { CacheEvent } from '../types.js';

const DEFAULT_WAIT_TIMEOUT_MS = 5000;

export type CacheEventListener = (event: CacheEvent) => void;

export type WaitPredicate<T> = (
  event: CacheEvent
) => { matched: true; data: T } | { matched: false };

export interface WaitOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/**
 * Key features:
 * - Type-safe emission over the CacheEvent union
 * - Predicate-based waiting with timeout/abort support
 * - Error isolation (a throwing listener doesn't break the others)
 *
 * Usage:
 * ```ts
 * const unsubscribe = emitter.on((event) => {
 *   if (event.kind === 'RowsChanged') {
 *     view.repaint(event.start, event.count);
 *   }
 * });
 *
 * const total = await emitter.waitFor(
 *   (event) => event.kind === 'TotalCountChanged'
 *     ? { matched: true, data: event.total }
 *     : { matched: false },
 *   { timeoutMs: 2000 }
 * );
 * ```
 */
export class CacheEventEmitter {
  private listeners: CacheEventListener[] = [];

  constructor(private readonly logger: Logger = rootLogger) {}

  public get listenerCount(): number {
    return this.listeners.length;
  }

  /**
   * @returns Unsubscribe function
   */
  public on(listener: CacheEventListener): () => void {
    this.listeners.push(listener);

    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /**
   * Wait for an event that matches the predicate.
   *
   * @throws {TimeoutError} If no matching event arrives within timeout
   * @throws {AbortedError} If externally aborted via signal
   */
  public waitFor<T>(predicate: WaitPredicate<T>, options?: WaitOptions): Promise<T> {
    const timeoutMs = options?.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS;
    const signal = composeWithTimeout(options?.signal, timeoutMs);

    return new Promise<T>((resolve, reject) => {
      let unsubscribe: (() => void) | undefined;

      const onAbort = (): void => {
        cleanup();

        // Distinguish timeout from external cancellation
        if (isTimeoutAbortReason(signal.reason)) {
          reject(new TimeoutError(`waitFor timeout after ${timeoutMs}ms`, { timeoutMs }));
        } else {
          reject(new AbortedError('waitFor cancelled', { reason: signal.reason }));
        }
      };

      const cleanup = (): void => {
        signal.removeEventListener('abort', onAbort);
        unsubscribe?.();
      };

      if (signal.aborted) {
        onAbort();
        return;
      }

      signal.addEventListener('abort', onAbort, { once: true });

      unsubscribe = this.on((event) => {
        try {
          const result = predicate(event);
          if (result.matched) {
            cleanup();
            resolve(result.data);
          }
        } catch (error) {
          cleanup();
          reject(error);
        }
      });
    });
  }

  /**
   * Emit an event to every subscriber.
   *
   * Iterates over a copy so listeners may unsubscribe while being called.
   */
  public emit(event: CacheEvent): void {
    const listeners = [...this.listeners];

    for (const listener of listeners) {
      try {
        listener(event);
      } catch (error) {
        this.logger.error({ err: error, eventKind: event.kind }, 'Cache event listener failed');
      }
    }
  }

  public clear(): void {
    this.listeners = [];
  }
}
