import { RequeueAfterError, ensureError } from '../core/errors.js';
import type { OperatorLogger } from '../core/logging/index.js';
import type { WorkQueue } from './work-queue.js';

export type Reconcile<K extends string> = (key: K) => Promise<void>;

export interface ControllerOptions<K extends string> {
  name: string;
  queue: WorkQueue<K>;
  reconcile: Reconcile<K>;
  logger: OperatorLogger;
  /** Number of keys reconciled concurrently */
  concurrency: number;
}

/**
 * Runs reconcile workers over a work queue.
 *
 * A key that reconciles cleanly has its failure count reset. A failure
 * requeues it with backoff, except a RequeueAfterError which requeues it
 * after its own delay.
 */
export class Controller<K extends string = string> {
  private readonly logger: OperatorLogger;
  private workers: Promise<void>[] = [];

  constructor(private readonly options: ControllerOptions<K>) {
    this.logger = options.logger.child({ controller: options.name });
  }

  get queue(): WorkQueue<K> {
    return this.options.queue;
  }

  /**
   * Start the workers. The returned promise settles once the queue has shut
   * down and every worker has finished its current key.
   */
  start(): Promise<void> {
    if (this.workers.length === 0) {
      const concurrency = Math.max(1, this.options.concurrency);
      this.workers = Array.from({ length: concurrency }, (_, index) => this.runWorker(index));
      this.logger.info('Started workers', { workers: concurrency });
    }
    return Promise.all(this.workers).then(() => undefined);
  }

  private async runWorker(index: number): Promise<void> {
    const { queue } = this.options;
    for (;;) {
      const key = await queue.get();
      if (key === undefined) {
        this.logger.debug('Worker stopped', { worker: index });
        return;
      }
      try {
        await this.processKey(key);
      } finally {
        queue.done(key);
      }
    }
  }

  private async processKey(key: K): Promise<void> {
    const { queue, reconcile } = this.options;
    try {
      await reconcile(key);
      queue.forget(key);
    } catch (error) {
      if (error instanceof RequeueAfterError) {
        queue.forget(key);
        queue.addAfter(key, error.requeueAfterMs);
        this.logger.warn('Reconcile requested a delayed requeue', {
          key,
          delayMs: error.requeueAfterMs,
          error: error.message,
        });
        return;
      }

      queue.addRateLimited(key);
      this.logger.error('Reconcile failed', ensureError(error), {
        key,
        requeues: queue.numRequeues(key),
      });
    }
  }
}
