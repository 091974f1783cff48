/**
 * Work queue of reconcile keys
 *
 * - A key is queued at most once, however often it is added.
 * - A key handed out by `get` is not handed out again until `done` is called
 *   for it; adding it meanwhile marks it dirty and requeues it on `done`.
 * - `addAfter` delays a key; a pending earlier deadline wins over a later one.
 * - `addRateLimited` delays a key exponentially in its failure count, which
 *   `forget` resets.
 * - After `shutDown`, `get` resolves to undefined and queued keys are dropped.
 */

import { backoffDelay, type BackoffOptions } from './backoff.js';

export const DEFAULT_QUEUE_BACKOFF: BackoffOptions = {
  baseDelayMs: 5,
  maxDelayMs: 1000 * 1000,
};

interface DelayedEntry {
  readyAt: number;
  timer: NodeJS.Timeout;
}

export class WorkQueue<K extends string = string> {
  private readonly queue: K[] = [];
  private readonly dirty = new Set<K>();
  private readonly processing = new Set<K>();
  private readonly delayed = new Map<K, DelayedEntry>();
  private readonly failures = new Map<K, number>();
  private readonly waiters: Array<(key: K | undefined) => void> = [];
  private shuttingDown = false;

  constructor(private readonly backoff: BackoffOptions = DEFAULT_QUEUE_BACKOFF) {}

  get length(): number {
    return this.queue.length;
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  add(key: K): void {
    if (this.shuttingDown || this.dirty.has(key)) {
      return;
    }

    this.dirty.add(key);
    if (this.processing.has(key)) {
      return;
    }

    this.enqueue(key);
  }

  addAfter(key: K, delayMs: number): void {
    if (this.shuttingDown) {
      return;
    }
    if (delayMs <= 0) {
      this.add(key);
      return;
    }

    const readyAt = Date.now() + delayMs;
    const pending = this.delayed.get(key);
    if (pending) {
      if (pending.readyAt <= readyAt) {
        return;
      }
      clearTimeout(pending.timer);
    }

    const timer = setTimeout(() => {
      this.delayed.delete(key);
      this.add(key);
    }, delayMs);
    this.delayed.set(key, { readyAt, timer });
  }

  addRateLimited(key: K): void {
    const failures = this.failures.get(key) ?? 0;
    this.failures.set(key, failures + 1);
    this.addAfter(key, backoffDelay(failures + 1, this.backoff));
  }

  forget(key: K): void {
    this.failures.delete(key);
  }

  numRequeues(key: K): number {
    return this.failures.get(key) ?? 0;
  }

  /**
   * Next key to process; resolves to undefined once the queue shuts down
   */
  get(): Promise<K | undefined> {
    if (this.shuttingDown) {
      return Promise.resolve(undefined);
    }
    const key = this.queue.shift();
    if (key !== undefined) {
      return Promise.resolve(this.startProcessing(key));
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  done(key: K): void {
    this.processing.delete(key);
    if (this.dirty.has(key) && !this.shuttingDown) {
      this.enqueue(key);
    }
  }

  shutDown(): void {
    this.shuttingDown = true;
    for (const { timer } of this.delayed.values()) {
      clearTimeout(timer);
    }
    this.delayed.clear();
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  private enqueue(key: K): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(this.startProcessing(key));
      return;
    }
    this.queue.push(key);
  }

  private startProcessing(key: K): K {
    this.dirty.delete(key);
    this.processing.add(key);
    return key;
  }
}
