import { Logger } from '@nestjs/common';
import { toError } from './errors';

export type FulfillmentJob = () => Promise<void>;

/**
 * In-process hand-off for post-commit work. Jobs for the same order run one
 * after another; jobs for different orders run concurrently. Jobs never
 * reject: failures are logged and reported through `onError`.
 */
export class FulfillmentQueue {
  private readonly logger = new Logger(FulfillmentQueue.name);
  private readonly chains = new Map<string, Promise<void>>();
  private accepting = true;

  constructor(
    private readonly onError?: (error: Error, orderId: string, label: string) => void,
  ) {}

  /**
   * @returns false when the queue is closed and the job was not accepted
   */
  enqueue(orderId: string, label: string, job: FulfillmentJob): boolean {
    if (!this.accepting) {
      this.logger.warn(`Queue closed; dropping ${label} for order ${orderId}`);
      return false;
    }

    const previous = this.chains.get(orderId) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(() => this.runJob(orderId, label, job))
      .then(() => {
        if (this.chains.get(orderId) === next) {
          this.chains.delete(orderId);
        }
      });

    this.chains.set(orderId, next);
    return true;
  }

  isActive(orderId: string): boolean {
    return this.chains.has(orderId);
  }

  activeCount(): number {
    return this.chains.size;
  }

  /**
   * Resolve once every job, including jobs enqueued while draining, has finished
   */
  async drain(): Promise<void> {
    while (this.chains.size > 0) {
      await Promise.all(Array.from(this.chains.values()));
    }
  }

  async close(): Promise<void> {
    this.accepting = false;
    await this.drain();
  }

  private async runJob(orderId: string, label: string, job: FulfillmentJob): Promise<void> {
    const started = Date.now();
    try {
      await job();
      this.logger.debug(`${label} for order ${orderId} finished in ${Date.now() - started}ms`);
    } catch (error) {
      const err = toError(error);
      this.logger.error(`${label} for order ${orderId} failed: ${err.message}`, err.stack);
      try {
        this.onError?.(err, orderId, label);
      } catch (hookError) {
        this.logger.error(`onError hook failed: ${toError(hookError).message}`);
      }
    }
  }
}
