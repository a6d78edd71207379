import { logger } from '@shared/utils/logger.js';

type Job = () => Promise<void>;

interface QueuedJob {
  label: string;
  job: Job;
}

const log = logger.child('notifications');

/**
 * In-process job queue with a fixed number of concurrent workers.
 * Callers never wait on a job; failures are logged and dropped.
 */
export class NotificationQueue {
  private active = 0;
  private readonly waiting: QueuedJob[] = [];
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError('concurrency must be a positive integer');
    }
  }

  get size(): number {
    return this.waiting.length + this.active;
  }

  enqueue(label: string, job: Job): void {
    this.waiting.push({ label, job });
    this.drain();
  }

  /**
   * Resolves once every queued job has finished
   */
  idle(): Promise<void> {
    if (this.size === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.active < this.concurrency) {
      const next = this.waiting.shift();
      if (!next) break;
      this.active++;
      void this.run(next);
    }
    if (this.size === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private async run({ label, job }: QueuedJob): Promise<void> {
    try {
      await job();
    } catch (error) {
      log.error(`Job "${label}" failed:`, error instanceof Error ? error.message : error);
    } finally {
      this.active--;
      this.drain();
    }
  }
}
