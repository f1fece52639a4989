/**
 * Work Queue
 *
 * Hand-off between the owner side and the worker loop. Entries are grouped
 * into one priority class per category; classes are served round-robin and
 * within a class the highest priority goes first (FIFO among equals).
 *
 * Priority is read when an entry is taken, so escalating a queued entry
 * moves it forward without re-inserting it.
 */

export interface QueueEntry {
  readonly category: string;
  readonly priority: number;
  /** Insertion order, used to break priority ties */
  readonly sequence: number;
}

export class WorkQueue<T extends QueueEntry> {
  private readonly classes = new Map<string, T[]>();
  private order: string[] = [];
  private cursor = 0;
  private readonly waiters = new Set<() => void>();
  private closed = false;

  public get size(): number {
    let total = 0;
    for (const entries of this.classes.values()) {
      total += entries.length;
    }
    return total;
  }

  /**
   * Categories with queued entries, in the order they will be served next
   */
  public get classOrder(): string[] {
    const rotated = [...this.order.slice(this.cursor), ...this.order.slice(0, this.cursor)];
    return rotated.filter((category) => (this.classes.get(category)?.length ?? 0) > 0);
  }

  public sizes(): Record<string, number> {
    const result: Record<string, number> = {};
    for (const category of this.order) {
      const size = this.classes.get(category)?.length ?? 0;
      if (size > 0) {
        result[category] = size;
      }
    }
    return result;
  }

  /**
   * @returns false when the queue is closed and the entry was not accepted
   */
  public put(entry: T): boolean {
    if (this.closed) {
      return false;
    }
    const entries = this.classes.get(entry.category);
    if (entries) {
      entries.push(entry);
    } else {
      this.classes.set(entry.category, [entry]);
      this.order.push(entry.category);
    }
    this.wake();
    return true;
  }

  /**
   * Next entry, waiting at most `timeoutMs` for one to arrive.
   *
   * Resolves with undefined on timeout or when the queue is closed.
   */
  public async take(timeoutMs: number): Promise<T | undefined> {
    const entry = this.poll();
    if (entry !== undefined || this.closed) {
      return entry;
    }

    await new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      // An idle worker must not keep the process alive
      timer.unref();
      this.waiters.add(done);
    });

    return this.poll();
  }

  /**
   * Next entry without waiting.
   *
   * A class keeps its place in the rotation while empty, so a category
   * that refills right after being served still waits its turn.
   */
  public poll(): T | undefined {
    for (let step = 0; step < this.order.length; step++) {
      const index = (this.cursor + step) % this.order.length;
      const category = this.order[index];
      const entries = category === undefined ? undefined : this.classes.get(category);
      if (!entries || entries.length === 0) {
        continue;
      }
      this.cursor = (index + 1) % this.order.length;
      return this.takeBest(entries);
    }
    return undefined;
  }

  /**
   * Remove and return every queued entry.
   */
  public drain(): T[] {
    const drained: T[] = [];
    for (const category of this.order) {
      drained.push(...(this.classes.get(category) ?? []));
    }
    this.classes.clear();
    this.order = [];
    this.cursor = 0;
    return drained;
  }

  /**
   * Refuse further entries and wake any waiting taker.
   */
  public close(): void {
    this.closed = true;
    this.wake();
  }

  private takeBest(entries: T[]): T | undefined {
    let best = 0;
    for (let i = 1; i < entries.length; i++) {
      const candidate = entries[i];
      const current = entries[best];
      if (
        candidate !== undefined &&
        current !== undefined &&
        (candidate.priority > current.priority ||
          (candidate.priority === current.priority && candidate.sequence < current.sequence))
      ) {
        best = i;
      }
    }
    const [entry] = entries.splice(best, 1);
    return entry;
  }

  private wake(): void {
    for (const waiter of [...this.waiters]) {
      waiter();
    }
  }
}
