import { RetryPolicy } from '../interfaces';
import { DownstreamError, DownstreamTimeoutError, toError } from './errors';

// =============================================================================
// Backoff
// =============================================================================

export interface BackoffOptions {
  /**
   * Delay for attempt 0, before jitter
   */
  initialMs: number;
  base: number;
  maxMs: number;
  /**
   * Multiplier applied to each delay; defaults to a uniform value in [0.5, 1.5)
   */
  jitterFn?: () => number;
}

export const BACKOFF_DEFAULTS = {
  initialMs: 500,
  base: 2,
  maxMs: 10_000,
} as const;

export function defaultJitter(): number {
  return 0.5 + Math.random();
}

export function noJitter(): number {
  return 1.0;
}

/**
 * min(maxMs, round(initialMs * base^attempt * jitter))
 *
 * @param attempt - zero-based retry number
 */
export function calculateBackoff(attempt: number, options: BackoffOptions): number {
  const { initialMs, base, maxMs, jitterFn = defaultJitter } = options;

  if (!Number.isInteger(attempt) || attempt < 0) {
    throw new Error(`Invalid attempt number: ${attempt}. Must be an integer >= 0.`);
  }
  if (initialMs < 0) {
    throw new Error(`Invalid initialMs: ${initialMs}. Must be >= 0.`);
  }
  if (base <= 0) {
    throw new Error(`Invalid base: ${base}. Must be > 0.`);
  }
  if (maxMs < 0) {
    throw new Error(`Invalid maxMs: ${maxMs}. Must be >= 0.`);
  }

  const jitter = jitterFn();
  if (!Number.isFinite(jitter) || jitter <= 0) {
    throw new Error(`Invalid jitter value: ${jitter}. Must be a finite number > 0.`);
  }

  return Math.min(maxMs, Math.round(initialMs * Math.pow(base, attempt) * jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Timeout
// =============================================================================

/**
 * Race an operation against a timer. When the timer wins, the operation's
 * signal is aborted and DownstreamTimeoutError is thrown.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new DownstreamTimeoutError(label, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Retry
// =============================================================================

export interface RetryOptions {
  policy: RetryPolicy;
  label: string;
  jitterFn?: () => number;
  sleepFn?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  isRetryable?: (error: Error) => boolean;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

export function isRetryableError(error: Error): boolean {
  return !(error instanceof DownstreamError) || error.retryable;
}

/**
 * Run an operation up to `policy.maxAttempts` times, each attempt bounded by
 * `policy.timeoutMs`, sleeping with exponential backoff between attempts.
 * Never throws; the last error is returned in the outcome.
 */
export async function retryWithBackoff<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const { policy, label } = options;
  const sleepFn = options.sleepFn ?? sleep;
  const isRetryable = options.isRetryable ?? isRetryableError;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let lastError: Error = new Error(`${label} was not attempted`);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await withTimeout(
        (signal) => operation(signal, attempt),
        policy.timeoutMs,
        label,
      );
      return { ok: true, value, attempts: attempt };
    } catch (error) {
      lastError = toError(error);

      if (attempt === maxAttempts || !isRetryable(lastError)) {
        return { ok: false, error: lastError, attempts: attempt };
      }

      const delayMs = calculateBackoff(attempt - 1, {
        initialMs: policy.initialDelayMs,
        base: policy.backoffBase,
        maxMs: policy.maxDelayMs,
        jitterFn: options.jitterFn,
      });
      options.onRetry?.(attempt, lastError, delayMs);
      await sleepFn(delayMs);
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}
