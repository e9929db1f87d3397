/**
 * Fleetplan — Target Queue
 *
 * FIFO of targets awaiting a negotiation. Ingestion appends while the cycle
 * loop drains; targets that miss a cycle deadline are put back at the head
 * in their original order.
 */

import type { Target } from '../types/index.js';

export class TargetQueue {
  private items: Target[] = [];
  private waiters: Array<() => void> = [];
  private arrivals: Array<() => void> = [];

  get length(): number {
    return this.items.length;
  }

  push(...targets: Target[]): void {
    if (targets.length === 0) return;
    this.items.push(...targets);
    const arrivals = this.arrivals;
    this.arrivals = [];
    for (const arrival of arrivals) arrival();
    this.wake();
  }

  /** Return targets to the head of the queue, ahead of later arrivals. */
  requeue(targets: ReadonlyArray<Target>): void {
    if (targets.length === 0) return;
    this.items = [...targets, ...this.items];
    this.wake();
  }

  /** Take everything currently queued, oldest first. */
  drain(): Target[] {
    const drained = this.items;
    this.items = [];
    return drained;
  }

  peek(): ReadonlyArray<Target> {
    return this.items;
  }

  has(targetId: string): boolean {
    return this.items.some((t) => t.descriptor.id === targetId);
  }

  /**
   * Resolve once the queue is non-empty, after timeoutMs, or when the signal
   * aborts, whichever comes first. Resolves to whether items are waiting.
   */
  waitForItems(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (this.items.length > 0) return Promise.resolve(true);
    if (signal?.aborted) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const finish = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', finish);
        this.waiters = this.waiters.filter((w) => w !== finish);
        resolve(this.items.length > 0);
      };
      const timer = setTimeout(finish, timeoutMs);
      signal?.addEventListener('abort', finish, { once: true });
      this.waiters.push(finish);
    });
  }

  /**
   * Resolve on the next push(), ignoring anything already queued or put
   * back with requeue(). Resolves to false on timeout or abort.
   */
  waitForArrival(timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return Promise.resolve(false);

    return new Promise<boolean>((resolve) => {
      const finish = (arrived: boolean): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        this.arrivals = this.arrivals.filter((a) => a !== onArrival);
        resolve(arrived);
      };
      const onArrival = (): void => finish(true);
      const onAbort = (): void => finish(false);
      const timer = setTimeout(onAbort, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });
      this.arrivals.push(onArrival);
    });
  }

  private wake(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) waiter();
  }
}
