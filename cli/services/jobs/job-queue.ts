import { logger } from '../../utils/logger';
import type { JobProcessor } from './job-processor';
import type { Job } from './jobs';

export interface QueueSummary {
  done: number;
  failed: number;
  /** Jobs left in the queue when it was cancelled */
  remaining: number;
}

/**
 * FIFO of jobs processed one at a time. `cancel()` stops before the next job
 * and between concepts of the running one.
 */
export class JobQueue {
  private readonly pending: Job[] = [];
  private readonly controller = new AbortController();
  private running = false;

  constructor(private readonly processor: JobProcessor) {}

  enqueue(...jobs: Job[]): void {
    this.pending.push(...jobs);
  }

  get size(): number {
    return this.pending.length;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  cancel(): void {
    if (!this.cancelled) {
      logger.info(`Cancelling job queue (${this.pending.length} pending)`);
      this.controller.abort();
    }
  }

  /**
   * Drain the queue. Resolves once it is empty or cancelled.
   */
  async run(): Promise<QueueSummary> {
    if (this.running) {
      throw new Error('Job queue is already running');
    }
    this.running = true;
    const summary: QueueSummary = { done: 0, failed: 0, remaining: 0 };

    try {
      let job = this.pending.shift();
      while (job) {
        if (this.cancelled) {
          this.pending.unshift(job);
          break;
        }
        const finished = await this.processor.processJob(job, this.controller.signal);
        if (finished.status === 'done') {
          summary.done++;
        } else {
          summary.failed++;
        }
        job = this.pending.shift();
      }
    } finally {
      this.running = false;
    }

    summary.remaining = this.pending.length;
    return summary;
  }
}
