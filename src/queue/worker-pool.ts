/**
 * WorkerPool - queue processed by a bounded number of concurrent workers
 *
 * Items start in the order they were added. With a concurrency of 1 the pool
 * degrades to sequential (concatMap) processing. A stopped pool starts no
 * further items; items already running are left to finish.
 */

import { errorMessage } from '../errors/custom-errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('pool');

/**
 * Function that processes a single item
 */
export type PoolProcessor<T> = (item: T) => Promise<void>;

export type WorkerPoolOptions = {
  /** Maximum number of items processed at once */
  concurrency: number;
};

export type PoolStatus = {
  queueLength: number;
  activeCount: number;
  processedCount: number;
  failedCount: number;
};

export class WorkerPool<T> {
  private queue: T[] = [];
  private active = 0;
  private stopped = false;
  private processedCount = 0;
  private failedCount = 0;
  private idleWaiters: (() => void)[] = [];
  private readonly concurrency: number;

  constructor(
    private readonly processor: PoolProcessor<T>,
    options: WorkerPoolOptions,
  ) {
    if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${options.concurrency}`);
    }
    this.concurrency = options.concurrency;
  }

  /**
   * Add an item; it starts as soon as a worker is free
   */
  add(item: T): void {
    if (this.stopped) {
      throw new Error('Cannot add items to a stopped pool');
    }
    this.queue.push(item);
    this.pump();
  }

  addAll(items: readonly T[]): void {
    for (const item of items) {
      this.add(item);
    }
  }

  /**
   * Stop starting new items
   *
   * @returns items that were queued but never started
   */
  stop(): T[] {
    this.stopped = true;
    const unstarted = this.queue;
    this.queue = [];
    this.notifyIfIdle();
    return unstarted;
  }

  /**
   * Resolve once the queue is empty and no item is running
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  getStatus(): PoolStatus {
    return {
      queueLength: this.queue.length,
      activeCount: this.active,
      processedCount: this.processedCount,
      failedCount: this.failedCount,
    };
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.active === 0;
  }

  private pump(): void {
    while (!this.stopped && this.active < this.concurrency && this.queue.length > 0) {
      const item = this.queue.shift();
      if (item === undefined) {
        break;
      }
      this.active++;
      void this.run(item);
    }
  }

  private async run(item: T): Promise<void> {
    try {
      await this.processor(item);
      this.processedCount++;
    } catch (error) {
      // Processors report their own failures; the pool keeps going
      this.failedCount++;
      log.error(`Worker failed: ${errorMessage(error)}`);
    } finally {
      this.active--;
      this.pump();
      this.notifyIfIdle();
    }
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
