import { ProcessingStatus } from '../domain/enums';
import { Order } from '../domain/models';

/**
 * Retry policy for one outbound step
 */
export interface RetryPolicy {
  /**
   * Total attempts including the first one
   */
  maxAttempts: number;

  /**
   * Delay before the second attempt, before jitter
   */
  initialDelayMs: number;

  /**
   * Multiplier applied per attempt
   */
  backoffBase: number;

  /**
   * Upper bound for any single delay
   */
  maxDelayMs: number;

  /**
   * Per-attempt timeout; the attempt's AbortSignal fires when it elapses
   */
  timeoutMs: number;
}

export type FulfillmentStep = 'enrichment' | 'generation' | 'delivery';

/**
 * Timing and retry settings used by the fulfillment orchestrator
 */
export interface FulfillmentPolicies {
  steps: Record<FulfillmentStep, RetryPolicy>;

  /**
   * Timeout for the single refund call
   */
  refundTimeoutMs: number;

  /**
   * Attempts for payment_ack and report_ready notifications
   */
  notificationAttempts: number;

  /**
   * Delay between notification attempts
   */
  notificationRetryDelayMs: number;

  /**
   * Bound on each notification attempt
   */
  notificationTimeoutMs: number;
}

/**
 * Lifecycle hooks for monitoring and alerting
 */
export interface LifecycleHooks {
  /**
   * Called once per inbound webhook with its classified outcome
   */
  onWebhookFate?: (event: WebhookFateEvent) => void | Promise<void>;

  /**
   * Called when a refund could not be issued and needs an operator
   */
  onRefundFailed?: (event: RefundFailedEvent) => void | Promise<void>;

  /**
   * Called when an unexpected error escapes a stage or job
   */
  onError?: (error: Error, context: ErrorContext) => void | Promise<void>;
}

export interface WebhookFateEvent {
  provider: string;
  processingStatus: ProcessingStatus;
  orderId?: string;
  eventId?: string;
  latencyMs: number;
  error?: Error;
}

export interface RefundFailedEvent {
  order: Order;
  error: Error;
}

export interface ErrorContext {
  operation: string;
  orderId?: string;
  stage?: string;
}
