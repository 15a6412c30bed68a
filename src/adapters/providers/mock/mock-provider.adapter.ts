import {
  CallOptions,
  ProviderError,
  ProviderRefundResult,
  RefundRequest,
} from '../../../core';
import { HmacProviderAdapter, HmacProviderConfig } from '../hmac/hmac-provider.adapter';

export interface MockRefundCall {
  paymentReference: string;
  request: RefundRequest;
  result?: ProviderRefundResult;
  error?: Error;
}

/**
 * Mock payment provider adapter for testing
 * Verifies and normalizes webhooks like the HMAC provider; refunds are recorded
 * in memory and can be scripted to fail or hang
 */
export class MockProviderAdapter extends HmacProviderAdapter {
  readonly refundCalls: MockRefundCall[] = [];

  private refundFailures: Error[] = [];
  private refundDelayMs = 0;
  private refundCounter = 0;

  constructor(config: Partial<HmacProviderConfig> = {}) {
    super({ providerName: 'mock', ...config });
  }

  async issueRefund(
    paymentReference: string,
    request: RefundRequest,
    options: CallOptions = {},
  ): Promise<ProviderRefundResult> {
    const call: MockRefundCall = { paymentReference, request };
    this.refundCalls.push(call);

    try {
      await this.simulateDelay(options.signal);

      const failure = this.refundFailures.shift();
      if (failure) {
        throw failure;
      }

      const result: ProviderRefundResult = {
        refundReference: `mock_refund_${++this.refundCounter}`,
        amount: request.amount.amount,
        currency: request.amount.currency,
        status: 'success',
        createdAt: new Date(),
      };
      call.result = result;
      return result;
    } catch (error) {
      call.error = error instanceof Error ? error : new Error(String(error));
      throw call.error;
    }
  }

  /**
   * Make the next refund call(s) fail
   */
  failNextRefund(
    error: Error = new ProviderError('Refund rejected', 'REFUND_REJECTED', 'mock'),
    times = 1,
  ): void {
    for (let i = 0; i < times; i++) {
      this.refundFailures.push(error);
    }
  }

  /**
   * Delay every refund call; the call's AbortSignal cuts the delay short
   */
  setRefundDelay(ms: number): void {
    this.refundDelayMs = ms;
  }

  clearMockData(): void {
    this.refundCalls.length = 0;
    this.refundFailures = [];
    this.refundDelayMs = 0;
    this.refundCounter = 0;
  }

  private async simulateDelay(signal?: AbortSignal): Promise<void> {
    if (this.refundDelayMs <= 0) {
      return;
    }
    await new Promise<void>((resolve, reject) => {
      const timer = setTimeout(resolve, this.refundDelayMs);
      signal?.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          reject(new ProviderError('Refund request aborted', 'ABORTED', this.providerName));
        },
        { once: true },
      );
    });
  }
}
