/**
 * An outbound call did not answer within its per-attempt timeout
 */
export class DownstreamTimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'DownstreamTimeoutError';
  }
}

/**
 * An outbound call failed. `retryable` is false for failures another attempt
 * cannot fix (rejected input, bad credentials).
 */
export class DownstreamError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly retryable: boolean = true,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'DownstreamError';
  }
}

export class RefundFailedError extends Error {
  constructor(
    public readonly orderId: string,
    public readonly underlying: Error,
  ) {
    super(`Refund for order ${orderId} failed: ${underlying.message}`);
    this.name = 'RefundFailedError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * HTTP statuses worth another attempt: timeouts, throttling and server errors
 */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}
