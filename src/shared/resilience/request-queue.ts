/**
 * =============================================================================
 * REQUEST QUEUE - Bounded Concurrency
 * =============================================================================
 *
 * Limits how many expensive operations (route solves) run at once.
 *
 * - Concurrency limiting (max parallel operations)
 * - FIFO waiting line with a hard size cap (backpressure)
 * - Timeout handling (reject requests that waited too long)
 * - Queue metrics for monitoring (`<name>_active`, `<name>_queue_size`)
 *
 * USAGE:
 * ```typescript
 * const queue = new RequestQueue({ name: 'solver', maxConcurrent: 2, maxQueueSize: 50 });
 * const result = await queue.run(() => solveRoute(matrix));
 * ```
 * =============================================================================
 */

import { logger } from '../services/logger.service';
import { metrics } from '../monitoring/metrics.service';

/**
 * Queued request item
 */
interface QueueItem {
  id: string;
  enqueuedAt: number;
  timer: NodeJS.Timeout;
  resolve: () => void;
  reject: (error: Error) => void;
}

/**
 * Queue configuration
 */
export interface RequestQueueOptions {
  /** Maximum concurrent operations */
  maxConcurrent?: number;
  /** Maximum waiting operations (reject if exceeded) */
  maxQueueSize?: number;
  /** Maximum wait in queue (ms) */
  queueTimeout?: number;
  /** Name for metrics/logging */
  name?: string;
}

const DEFAULT_OPTIONS: Required<RequestQueueOptions> = {
  maxConcurrent: 2,
  maxQueueSize: 50,
  queueTimeout: 60000,
  name: 'solver'
};

/**
 * Error when queue is full
 */
export class QueueFullError extends Error {
  constructor(queueName: string) {
    super(`Queue '${queueName}' is full. Please try again later.`);
    this.name = 'QueueFullError';
  }
}

/**
 * Error when request times out in queue
 */
export class QueueTimeoutError extends Error {
  constructor(queueName: string, waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting in queue '${queueName}'.`);
    this.name = 'QueueTimeoutError';
  }
}

export interface QueueStats {
  name: string;
  activeCount: number;
  queueSize: number;
  maxConcurrent: number;
  maxQueueSize: number;
}

/**
 * Request Queue Implementation
 */
export class RequestQueue {
  private queue: QueueItem[] = [];
  private activeCount: number = 0;
  private readonly options: Required<RequestQueueOptions>;
  private requestCounter: number = 0;

  constructor(options: RequestQueueOptions = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };

    logger.info(`Request queue '${this.options.name}' initialized`, {
      maxConcurrent: this.options.maxConcurrent,
      maxQueueSize: this.options.maxQueueSize
    });
  }

  /**
   * Acquire a slot (wait if necessary)
   */
  async acquire(): Promise<void> {
    if (this.activeCount < this.options.maxConcurrent) {
      this.activeCount++;
      this.publishGauges();
      return;
    }

    if (this.queue.length >= this.options.maxQueueSize) {
      metrics.incrementCounter(`${this.options.name}_queue_rejected_total`);
      throw new QueueFullError(this.options.name);
    }

    return new Promise<void>((resolve, reject) => {
      const id = `req_${++this.requestCounter}`;
      const enqueuedAt = Date.now();
      const timer = setTimeout(() => this.expire(id), this.options.queueTimeout);
      timer.unref();

      this.queue.push({
        id,
        enqueuedAt,
        timer,
        resolve: () => {
          metrics.observeHistogram(`${this.options.name}_queue_wait_ms`, Date.now() - enqueuedAt);
          resolve();
        },
        reject
      });
      this.publishGauges();

      logger.debug(`Request ${id} queued`, {
        queue: this.options.name,
        queueSize: this.queue.length
      });
    });
  }

  /**
   * Release a slot and hand it to the next waiter
   */
  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the waiter; activeCount is unchanged
      clearTimeout(next.timer);
      this.publishGauges();
      next.resolve();
      return;
    }

    if (this.activeCount > 0) {
      this.activeCount--;
    } else {
      logger.warn(`Queue '${this.options.name}' release called with activeCount=0`);
    }
    this.publishGauges();
  }

  /**
   * Run an operation inside a slot; the slot is released however it settles
   */
  async run<T>(operation: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  private expire(id: string): void {
    const index = this.queue.findIndex(item => item.id === id);
    if (index === -1) return;

    const [item] = this.queue.splice(index, 1);
    const waited = Date.now() - item.enqueuedAt;
    metrics.incrementCounter(`${this.options.name}_queue_timeout_total`);
    logger.warn(`Request ${id} timed out in queue '${this.options.name}'`, { waitedMs: waited });
    this.publishGauges();
    item.reject(new QueueTimeoutError(this.options.name, waited));
  }

  private publishGauges(): void {
    metrics.setGauge(`${this.options.name}_active`, this.activeCount);
    metrics.setGauge(`${this.options.name}_queue_size`, this.queue.length);
  }

  /**
   * Get queue statistics
   */
  getStats(): QueueStats {
    return {
      name: this.options.name,
      activeCount: this.activeCount,
      queueSize: this.queue.length,
      maxConcurrent: this.options.maxConcurrent,
      maxQueueSize: this.options.maxQueueSize
    };
  }
}
