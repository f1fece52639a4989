/**
 * Request Coalescer
 *
 * Keeps the minimal set of non-overlapping fetch requests that cover the
 * ranges a cache still needs. New demand is trimmed against everything
 * already known (pending or dispatched), then merged into an adjacent
 * pending request when that one is still small.
 *
 * Requests live in an arena keyed by id. A request that was merged away
 * or released is simply absent from the arena.
 */

import { CoalescingInvariantError } from '../core/errors.js';
import { createChildLogger, type Logger } from '../core/logger.js';
import type { FetchRequest } from '../types.js';

export interface RequestCoalescerOptions {
  /** Largest pending request that may absorb an adjacent one */
  mergeLimit: number;
  logger?: Logger;
}

function endOf(request: FetchRequest): number {
  return request.start + request.count;
}

function overlaps(a: FetchRequest, start: number, end: number): boolean {
  return a.count > 0 && a.start < end && start < endOf(a);
}

export class RequestCoalescer {
  private readonly requests = new Map<number, FetchRequest>();
  private readonly escalated = new Set<number>();
  private readonly mergeLimit: number;
  private readonly logger: Logger;
  private nextId = 1;

  constructor(options: RequestCoalescerOptions) {
    this.mergeLimit = options.mergeLimit;
    this.logger = options.logger ?? createChildLogger({ component: 'coalescer' });
  }

  /** Requests currently held, pending and dispatched */
  public get size(): number {
    return this.requests.size;
  }

  public get pendingCount(): number {
    let count = 0;
    for (const request of this.requests.values()) {
      if (!request.dispatched) {
        count++;
      }
    }
    return count;
  }

  /**
   * Reserve an id without creating a range request.
   */
  public allocateId(): number {
    return this.nextId++;
  }

  /**
   * Create a request that is not yet known to the coalescer.
   *
   * Priority defaults to the id, so the most recent demand wins ties.
   */
  public createRequest(start: number, count: number, priority?: number): FetchRequest {
    const id = this.allocateId();
    const request: FetchRequest = {
      id,
      start,
      count,
      priority: priority ?? id,
      dispatched: false,
      cancelled: false,
    };
    this.assertInterval(request);
    return request;
  }

  public get(id: number): FetchRequest | undefined {
    return this.requests.get(id);
  }

  /**
   * Trim, merge and register a request.
   *
   * @returns true when any part of the range was registered as its own
   * pending request (the request itself or a split-off remainder)
   */
  public submit(request: FetchRequest): boolean {
    this.assertInterval(request);
    if (request.count === 0) {
      return false;
    }

    let registered = false;
    const originalStart = request.start;
    const originalEnd = endOf(request);

    const candidates = [...this.requests.values()]
      .filter((other) => overlaps(other, originalStart, originalEnd))
      .sort((a, b) => a.start - b.start);

    for (let i = 0; i < candidates.length && request.count > 0; i++) {
      const other = candidates[i];
      if (other === undefined || !overlaps(other, request.start, endOf(request))) {
        continue;
      }
      this.raisePriority(other, request.priority);

      const requestEnd = endOf(request);
      const otherEnd = endOf(other);

      if (other.start <= request.start && otherEnd >= requestEnd) {
        // Fully covered already
        this.setRange(request, request.start, 0);
        break;
      }

      if (other.start <= request.start) {
        this.setRange(request, otherEnd, requestEnd - otherEnd);
        continue;
      }

      const laterOverlap = candidates
        .slice(i + 1)
        .some((later) => overlaps(later, request.start, requestEnd));

      if (!other.dispatched && otherEnd <= requestEnd && !laterOverlap) {
        this.setRange(other, request.start, request.count);
        this.setRange(request, request.start, 0);
        break;
      }

      // Dispatched ranges never grow, so keep only the part left of `other`
      this.setRange(request, request.start, other.start - request.start);
      if (requestEnd > otherEnd) {
        const remainder = this.createRequest(otherEnd, requestEnd - otherEnd, request.priority);
        registered = this.submit(remainder) || registered;
      }
      break;
    }

    if (request.count > 0 && this.mergeIntoNeighbour(request)) {
      this.setRange(request, request.start, 0);
    }

    if (request.count > 0) {
      this.requests.set(request.id, request);
      registered = true;
    }

    this.logger.trace(
      {
        requestId: request.id,
        submitted: { start: originalStart, count: originalEnd - originalStart },
        registered,
      },
      'Request submitted'
    );

    return registered;
  }

  /**
   * Pending requests, highest priority first and then lowest start.
   */
  public pending(): FetchRequest[] {
    return [...this.requests.values()]
      .filter((request) => !request.dispatched)
      .sort((a, b) => b.priority - a.priority || a.start - b.start);
  }

  /**
   * Every held request, pending and dispatched, by start.
   */
  public all(): FetchRequest[] {
    return [...this.requests.values()].sort((a, b) => a.start - b.start);
  }

  public markDispatched(id: number): FetchRequest | undefined {
    const request = this.requests.get(id);
    if (request) {
      request.dispatched = true;
    }
    return request;
  }

  /**
   * Dispatched requests whose priority rose since the last call.
   */
  public drainEscalated(): FetchRequest[] {
    const result: FetchRequest[] = [];
    for (const id of this.escalated) {
      const request = this.requests.get(id);
      if (request?.dispatched) {
        result.push(request);
      }
    }
    this.escalated.clear();
    return result;
  }

  /**
   * Forget a request once its work completed.
   */
  public release(id: number): FetchRequest | undefined {
    const request = this.requests.get(id);
    this.requests.delete(id);
    this.escalated.delete(id);
    return request;
  }

  /**
   * Drop every request, marking each one cancelled.
   */
  public clear(): void {
    for (const request of this.requests.values()) {
      request.cancelled = true;
    }
    this.requests.clear();
    this.escalated.clear();
  }

  private mergeIntoNeighbour(request: FetchRequest): boolean {
    const requestEnd = endOf(request);
    let right: FetchRequest | undefined;

    for (const other of this.requests.values()) {
      if (other.dispatched || other.count > this.mergeLimit) {
        continue;
      }
      if (endOf(other) === request.start) {
        this.setRange(other, other.start, other.count + request.count);
        this.raisePriority(other, request.priority);
        return true;
      }
      if (other.start === requestEnd) {
        right = other;
      }
    }

    if (right) {
      this.setRange(right, request.start, right.count + request.count);
      this.raisePriority(right, request.priority);
      return true;
    }
    return false;
  }

  private raisePriority(request: FetchRequest, priority: number): void {
    if (priority > request.priority) {
      request.priority = priority;
      if (request.dispatched) {
        this.escalated.add(request.id);
      }
    }
  }

  private setRange(request: FetchRequest, start: number, count: number): void {
    if (request.dispatched && (start !== request.start || count !== request.count)) {
      throw new CoalescingInvariantError(`Dispatched request ${request.id} cannot change range`, {
        requestId: request.id,
      });
    }
    request.start = start;
    request.count = count;
    this.assertInterval(request);
  }

  private assertInterval(request: FetchRequest): void {
    if (
      !Number.isInteger(request.start) ||
      !Number.isInteger(request.count) ||
      request.start < 0 ||
      request.count < 0
    ) {
      throw new CoalescingInvariantError(
        `Invalid interval [${request.start}, +${request.count}) for request ${request.id}`,
        { requestId: request.id, start: request.start, count: request.count }
      );
    }
  }
}
