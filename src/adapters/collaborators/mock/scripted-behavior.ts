import { DownstreamError } from '../../../core';

/**
 * Queue of scripted failures plus an abortable delay, shared by the mock collaborators
 */
export class ScriptedBehavior {
  private failures: Error[] = [];
  private delayMs = 0;

  constructor(private readonly operation: string) {}

  failNext(error: Error = new DownstreamError(`${this.operation} failed`, this.operation), times = 1): void {
    for (let i = 0; i < times; i++) {
      this.failures.push(error);
    }
  }

  setDelay(ms: number): void {
    this.delayMs = ms;
  }

  reset(): void {
    this.failures = [];
    this.delayMs = 0;
  }

  /**
   * Wait the configured delay, then throw the next scripted failure if any
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.delayMs > 0) {
      await new Promise<void>((resolve, reject) => {
        const timer = setTimeout(resolve, this.delayMs);
        signal?.addEventListener(
          'abort',
          () => {
            clearTimeout(timer);
            reject(new DownstreamError(`${this.operation} aborted`, this.operation));
          },
          { once: true },
        );
      });
    }

    const failure = this.failures.shift();
    if (failure) {
      throw failure;
    }
  }
}
