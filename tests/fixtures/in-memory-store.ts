/**
 * In-process backing stores for tests
 *
 * ArrayStore answers immediately from an array. ManualStore parks every
 * call until the test settles it, which makes ordering fully controllable.
 */

import type {
  BackingStore,
  FieldValue,
  RecordIdentity,
  RowWindow,
  StoreRecord,
  StoreSession,
} from '../../src/types.js';

export function makeRecord(identity: RecordIdentity, name: string): StoreRecord {
  return {
    identity,
    fields: new Map<string, FieldValue>([
      ['id', Array.isArray(identity) ? identity.join('/') : String(identity)],
      ['name', name],
    ]),
  };
}

/**
 * Records `start .. start + count - 1`, each named "Item <n>".
 */
export function makeRecords(count: number, start = 0): StoreRecord[] {
  return Array.from({ length: count }, (_, i) => makeRecord(start + i, `Item ${start + i}`));
}

export type StoreCall =
  | { kind: 'window'; source: string; start: number; count: number }
  | { kind: 'count'; source: string };

// ============================================================================
// ArrayStore
// ============================================================================

export class ArrayStore implements BackingStore<string> {
  public readonly calls: StoreCall[] = [];
  public sessionsOpened = 0;
  public sessionsClosed = 0;
  /** Errors thrown by the next calls, one per call */
  public readonly failures: Error[] = [];
  /** Errors thrown by the next openSession() calls */
  public readonly openFailures: Error[] = [];

  constructor(private records: StoreRecord[]) {}

  public replace(records: StoreRecord[]): void {
    this.records = records;
  }

  public async openSession(): Promise<StoreSession<string>> {
    const failure = this.openFailures.shift();
    if (failure) {
      throw failure;
    }
    this.sessionsOpened++;
    return {
      fetchWindow: async (source: string, window: RowWindow): Promise<StoreRecord[]> => {
        this.calls.push({ kind: 'window', source, start: window.start, count: window.count });
        this.throwPendingFailure();
        return this.records.slice(window.start, window.start + window.count);
      },
      count: async (source: string): Promise<number> => {
        this.calls.push({ kind: 'count', source });
        this.throwPendingFailure();
        return this.records.length;
      },
      close: async (): Promise<void> => {
        this.sessionsClosed++;
      },
    };
  }

  public windowCalls(): Array<{ start: number; count: number }> {
    const windows: Array<{ start: number; count: number }> = [];
    for (const call of this.calls) {
      if (call.kind === 'window') {
        windows.push({ start: call.start, count: call.count });
      }
    }
    return windows;
  }

  private throwPendingFailure(): void {
    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
  }
}

// ============================================================================
// ManualStore
// ============================================================================

interface ParkedCall {
  readonly call: StoreCall;
  readonly signal: AbortSignal;
  resolve(value: readonly StoreRecord[] | number): void;
  reject(error: unknown): void;
}

export class ManualStore implements BackingStore<string> {
  public sessionsOpened = 0;
  public sessionsClosed = 0;
  private readonly parked: ParkedCall[] = [];

  /**
   * @param honorAbort Reject a parked call as soon as its signal aborts,
   * like a driver that supports cancellation
   */
  constructor(private readonly honorAbort = false) {}

  public get parkedCount(): number {
    return this.parked.length;
  }

  public async openSession(): Promise<StoreSession<string>> {
    this.sessionsOpened++;
    return {
      fetchWindow: async (source, window, signal) => {
        const value = await this.park({ kind: 'window', source, ...window }, signal);
        if (typeof value === 'number') {
          throw new Error('Expected records for a window call');
        }
        return value;
      },
      count: async (source, signal) => {
        const value = await this.park({ kind: 'count', source }, signal);
        if (typeof value !== 'number') {
          throw new Error('Expected a number for a count call');
        }
        return value;
      },
      close: async () => {
        this.sessionsClosed++;
      },
    };
  }

  /**
   * The oldest parked call. Throws when nothing is parked.
   */
  public peek(): { call: StoreCall; signal: AbortSignal } {
    const parked = this.parked[0];
    if (!parked) {
      throw new Error('No store call is parked');
    }
    return { call: parked.call, signal: parked.signal };
  }

  public resolveNext(value: readonly StoreRecord[] | number): StoreCall {
    const parked = this.take();
    parked.resolve(value);
    return parked.call;
  }

  public rejectNext(error: unknown): StoreCall {
    const parked = this.take();
    parked.reject(error);
    return parked.call;
  }

  private take(): ParkedCall {
    const parked = this.parked.shift();
    if (!parked) {
      throw new Error('No store call is parked');
    }
    return parked;
  }

  private park(call: StoreCall, signal: AbortSignal): Promise<readonly StoreRecord[] | number> {
    return new Promise((resolve, reject) => {
      if (this.honorAbort && signal.aborted) {
        reject(signal.reason);
        return;
      }
      const parked: ParkedCall = { call, signal, resolve, reject };
      this.parked.push(parked);
      if (this.honorAbort) {
        signal.addEventListener(
          'abort',
          () => {
            const index = this.parked.indexOf(parked);
            if (index !== -1) {
              this.parked.splice(index, 1);
            }
            reject(signal.reason);
          },
          { once: true }
        );
      }
    });
  }
}
