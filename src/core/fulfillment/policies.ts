import { FulfillmentPolicies, RetryPolicy } from '../interfaces';
import { BACKOFF_DEFAULTS } from './retry';

const stepPolicy = (timeoutMs: number, maxAttempts = 3): RetryPolicy => ({
  maxAttempts,
  initialDelayMs: BACKOFF_DEFAULTS.initialMs,
  backoffBase: BACKOFF_DEFAULTS.base,
  maxDelayMs: BACKOFF_DEFAULTS.maxMs,
  timeoutMs,
});

export const DEFAULT_FULFILLMENT_POLICIES: FulfillmentPolicies = {
  steps: {
    enrichment: stepPolicy(15_000),
    generation: stepPolicy(60_000),
    delivery: stepPolicy(10_000),
  },
  refundTimeoutMs: 30_000,
  notificationAttempts: 3,
  notificationRetryDelayMs: 1_000,
  notificationTimeoutMs: 10_000,
};

export type FulfillmentPolicyOverrides = Partial<FulfillmentPolicies> & {
  /**
   * Replaces maxAttempts of every step
   */
  stepMaxAttempts?: number;
};

export function createFulfillmentPolicies(
  overrides: FulfillmentPolicyOverrides = {},
): FulfillmentPolicies {
  const { stepMaxAttempts, ...rest } = overrides;
  const policies: FulfillmentPolicies = { ...DEFAULT_FULFILLMENT_POLICIES, ...rest };
  if (stepMaxAttempts === undefined) {
    return policies;
  }
  return {
    ...policies,
    steps: {
      enrichment: { ...policies.steps.enrichment, maxAttempts: stepMaxAttempts },
      generation: { ...policies.steps.generation, maxAttempts: stepMaxAttempts },
      delivery: { ...policies.steps.delivery, maxAttempts: stepMaxAttempts },
    },
  };
}
