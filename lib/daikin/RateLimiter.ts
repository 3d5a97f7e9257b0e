import type { Logger } from '../../types';
import { CloudRequestError } from './errors';

export type RequestPriority = 'command' | 'poll';

export interface RateLimiterOptions {
  maxConcurrent?: number;
  minInterval?: number;
  maxQueueSize?: number;
  logger?: Logger;
}

interface QueueItem {
  priority: RequestPriority;
  /** Settles the caller's promise; never rejects itself. */
  run: () => Promise<void>;
}

/**
 * Shared limiter for every request against the cloud: bounded concurrency and
 * a minimum spacing between request starts. Commands are started before queued polls.
 */
export class RateLimiter {
  private readonly maxConcurrent: number;
  private readonly minInterval: number;
  private readonly maxQueueSize?: number;
  private readonly logger?: Logger;
  private readonly queue: QueueItem[] = [];
  private activeCount = 0;
  private lastStart = 0;
  private wakeTimer?: NodeJS.Timeout;

  constructor(options: RateLimiterOptions = {}) {
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 2);
    this.minInterval = Math.max(0, options.minInterval ?? 400);
    this.maxQueueSize = options.maxQueueSize;
    this.logger = options.logger;
  }

  get pending(): number {
    return this.queue.length;
  }

  async schedule<T>(fn: () => Promise<T>, priority: RequestPriority = 'poll'): Promise<T> {
    if (this.maxQueueSize && this.queue.length >= this.maxQueueSize) {
      this.logger?.('[RateLimiter] Queue full (%d), rejecting %s request', this.queue.length, priority);
      throw new CloudRequestError('Request queue full');
    }

    return new Promise<T>((resolve, reject) => {
      const item: QueueItem = {
        priority,
        run: async () => {
          try {
            resolve(await fn());
          } catch (error) {
            reject(error);
          }
        },
      };

      if (priority === 'command') {
        const firstPoll = this.queue.findIndex((queued) => queued.priority === 'poll');
        this.queue.splice(firstPoll === -1 ? this.queue.length : firstPoll, 0, item);
      } else {
        this.queue.push(item);
      }
      this.process();
    });
  }

  private process(): void {
    if (!this.queue.length || this.activeCount >= this.maxConcurrent || this.wakeTimer) {
      return;
    }

    const wait = Math.max(0, this.minInterval - (Date.now() - this.lastStart));
    if (this.lastStart > 0 && wait > 0) {
      this.wakeTimer = setTimeout(() => {
        this.wakeTimer = undefined;
        this.process();
      }, wait);
      return;
    }

    const item = this.queue.shift();
    if (!item) {
      return;
    }

    this.activeCount += 1;
    this.lastStart = Date.now();

    void item.run().finally(() => {
      this.activeCount -= 1;
      this.process();
    });

    this.process();
  }
}

export default RateLimiter;
