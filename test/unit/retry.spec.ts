import {
  calculateBackoff,
  DownstreamError,
  DownstreamTimeoutError,
  noJitter,
  retryWithBackoff,
  RetryPolicy,
  withTimeout,
} from '../../src';

const policy = (overrides: Partial<RetryPolicy> = {}): RetryPolicy => ({
  maxAttempts: 3,
  initialDelayMs: 500,
  backoffBase: 2,
  maxDelayMs: 10_000,
  timeoutMs: 1_000,
  ...overrides,
});

describe('calculateBackoff', () => {
  const options = { initialMs: 500, base: 2, maxMs: 10_000, jitterFn: noJitter };

  it('grows exponentially from the initial delay', () => {
    expect(calculateBackoff(0, options)).toBe(500);
    expect(calculateBackoff(1, options)).toBe(1000);
    expect(calculateBackoff(3, options)).toBe(4000);
  });

  it('caps at maxMs', () => {
    expect(calculateBackoff(5, options)).toBe(10_000);
  });

  it('scales by the jitter multiplier', () => {
    expect(calculateBackoff(1, { ...options, jitterFn: () => 0.5 })).toBe(500);
    expect(calculateBackoff(1, { ...options, jitterFn: () => 1.49 })).toBe(1490);
  });

  it('rejects invalid arguments', () => {
    expect(() => calculateBackoff(-1, options)).toThrow('Invalid attempt number: -1');
    expect(() => calculateBackoff(0, { ...options, base: 0 })).toThrow('Invalid base: 0');
    expect(() => calculateBackoff(0, { ...options, jitterFn: () => 0 })).toThrow(
      'Invalid jitter value: 0',
    );
  });
});

describe('withTimeout', () => {
  it('returns the value of an operation that finishes in time', async () => {
    await expect(withTimeout(async () => 'done', 1_000, 'fast')).resolves.toBe('done');
  });

  it('aborts the operation and throws DownstreamTimeoutError when time runs out', async () => {
    let seenSignal: AbortSignal | undefined;

    const attempt = withTimeout(
      (signal) => {
        seenSignal = signal;
        return new Promise<string>(() => undefined);
      },
      20,
      'enrichment',
    );

    await expect(attempt).rejects.toThrow(DownstreamTimeoutError);
    await expect(attempt).rejects.toThrow('enrichment timed out after 20ms');
    expect(seenSignal?.aborted).toBe(true);
  });
});

describe('retryWithBackoff', () => {
  it('retries until the operation succeeds, sleeping between attempts', async () => {
    const sleeps: number[] = [];
    let calls = 0;

    const outcome = await retryWithBackoff(
      async () => {
        calls++;
        if (calls < 3) {
          throw new Error(`failure ${calls}`);
        }
        return 'report';
      },
      {
        policy: policy(),
        label: 'generation',
        jitterFn: noJitter,
        sleepFn: async (ms) => {
          sleeps.push(ms);
        },
      },
    );

    expect(outcome).toEqual({ ok: true, value: 'report', attempts: 3 });
    expect(sleeps).toEqual([500, 1000]);
  });

  it('returns the last error once attempts are exhausted', async () => {
    let calls = 0;
    const retries: number[] = [];

    const outcome = await retryWithBackoff(
      async () => {
        calls++;
        throw new Error(`failure ${calls}`);
      },
      {
        policy: policy({ maxAttempts: 2 }),
        label: 'generation',
        jitterFn: noJitter,
        sleepFn: async () => undefined,
        onRetry: (attempt) => retries.push(attempt),
      },
    );

    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(2);
    if (!outcome.ok) {
      expect(outcome.error.message).toBe('failure 2');
    }
    expect(retries).toEqual([1]);
  });

  it('stops at once on a non-retryable error', async () => {
    let calls = 0;

    const outcome = await retryWithBackoff(
      async () => {
        calls++;
        throw new DownstreamError('HTTP 400', 'enrichment', false, 400);
      },
      { policy: policy(), label: 'enrichment', sleepFn: async () => undefined },
    );

    expect(calls).toBe(1);
    expect(outcome).toMatchObject({ ok: false, attempts: 1 });
  });

  it('counts a timed-out attempt as a retryable failure', async () => {
    let calls = 0;

    const outcome = await retryWithBackoff(
      async (signal) => {
        calls++;
        if (calls === 1) {
          return new Promise<string>((_, reject) => {
            signal.addEventListener('abort', () => reject(new Error('aborted')));
          });
        }
        return 'ok';
      },
      { policy: policy({ timeoutMs: 20 }), label: 'delivery', sleepFn: async () => undefined },
    );

    expect(outcome).toEqual({ ok: true, value: 'ok', attempts: 2 });
  });
});
