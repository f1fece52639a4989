/**
 * Worker Statistics
 *
 * Counters and a short history of finished operations for one channel.
 */

export type OperationStatus = 'done' | 'error' | 'cancelled';

export interface OperationInfo {
  readonly itemId: number;
  readonly requestId: number;
  readonly category: string;
  readonly kind: 'window' | 'count';
}

export interface CompletedOperation extends OperationInfo {
  readonly status: OperationStatus;
  /** false when the item was cancelled before it reached the store */
  readonly executed: boolean;
  readonly durationMs: number;
  readonly finishedAt: number;
}

export interface WorkerStatsSnapshot {
  readonly started: number;
  readonly finished: number;
  readonly errors: number;
  readonly cancelled: number;
  readonly current?: OperationInfo & { readonly elapsedMs: number };
  /** Most recent first */
  readonly recent: readonly CompletedOperation[];
  readonly averageDurationMs?: number;
}

export class WorkerStats {
  private started = 0;
  private finished = 0;
  private errors = 0;
  private cancelled = 0;
  private current?: { info: OperationInfo; startedAt: number };
  private recent: CompletedOperation[] = [];

  constructor(
    private readonly historySize: number,
    private readonly now: () => number = Date.now
  ) {}

  public begin(info: OperationInfo): void {
    this.started++;
    this.current = { info, startedAt: this.now() };
  }

  /**
   * Close the operation started by begin().
   */
  public end(status: OperationStatus): void {
    if (!this.current) {
      return;
    }
    const finishedAt = this.now();
    this.record({
      ...this.current.info,
      status,
      executed: true,
      durationMs: finishedAt - this.current.startedAt,
      finishedAt,
    });
    this.current = undefined;
  }

  /**
   * An item that was cancelled before it started.
   */
  public skipped(info: OperationInfo): void {
    this.record({ ...info, status: 'cancelled', executed: false, durationMs: 0, finishedAt: this.now() });
  }

  public snapshot(): WorkerStatsSnapshot {
    const executed = this.recent.filter((op) => op.executed);
    const averageDurationMs =
      executed.length > 0
        ? executed.reduce((sum, op) => sum + op.durationMs, 0) / executed.length
        : undefined;

    return {
      started: this.started,
      finished: this.finished,
      errors: this.errors,
      cancelled: this.cancelled,
      current: this.current
        ? { ...this.current.info, elapsedMs: this.now() - this.current.startedAt }
        : undefined,
      recent: [...this.recent],
      averageDurationMs,
    };
  }

  private record(operation: CompletedOperation): void {
    switch (operation.status) {
      case 'done':
        this.finished++;
        break;
      case 'error':
        this.finished++;
        this.errors++;
        break;
      case 'cancelled':
        this.cancelled++;
        break;
    }
    this.recent.unshift(operation);
    if (this.recent.length > this.historySize) {
      this.recent.length = this.historySize;
    }
  }
}
