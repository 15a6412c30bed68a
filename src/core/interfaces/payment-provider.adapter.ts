import { OrderEvent } from '../domain/enums';
import { JsonObject } from '../domain/models';
import { Money } from '../domain/value-objects/money.vo';
import { CallOptions } from './collaborators.interface';

/**
 * Payment provider adapter interface - abstracts provider-specific logic:
 * webhook authentication, payload normalization and the refund API
 */
export interface PaymentProviderAdapter {
  /**
   * Unique identifier for this provider (e.g., 'hmac', 'mock')
   */
  readonly providerName: string;

  // ==================== Webhook Processing ====================

  /**
   * Verify webhook signature over the raw, unmodified body
   * @param headers - Lower-cased HTTP headers including the signature
   * @param secrets - Secrets to try in order (supports rotation)
   */
  verifySignature(
    rawBody: Buffer,
    headers: Record<string, string>,
    secrets: string[],
  ): boolean;

  /**
   * Parse the raw body as JSON
   * @throws NormalizationError when the body is not a JSON object
   */
  parsePayload(rawBody: Buffer): JsonObject;

  /**
   * Validate the payload and map it to an order event
   * @throws NormalizationError when the payload does not describe a payment outcome
   */
  normalize(payload: JsonObject, rawBody: Buffer): Promise<NormalizedPaymentEvent>;

  // ==================== Provider API ====================

  /**
   * Return a captured payment to the payer. Resolves only when the provider
   * accepted the refund.
   * @throws ProviderError on any rejection, transport failure or abort
   */
  issueRefund(
    paymentReference: string,
    request: RefundRequest,
    options?: CallOptions,
  ): Promise<ProviderRefundResult>;
}

/**
 * Provider-agnostic view of a payment webhook
 */
export interface NormalizedPaymentEvent {
  /**
   * Provider event id, or `derived_<sha256 of raw body>` when the provider sent none
   */
  eventId: string;
  eventIdSource: 'provider' | 'derived';
  orderId: string;
  event: OrderEvent.PAYMENT_CONFIRMED | OrderEvent.PAYMENT_FAILED;
  providerStatus: string;
  paymentReference?: string;
  money?: Money;
  failureReason?: string;
  paymentMethod?: string;
  occurredAt?: Date;
}

export interface RefundRequest {
  orderId: string;
  amount: Money;
  reason: string;
}

export interface ProviderRefundResult {
  refundReference: string;
  amount: number;
  currency: string;
  status: 'pending' | 'success';
  createdAt: Date;
}

/**
 * Standardized provider error
 */
export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly providerName: string,
    public readonly details?: JsonObject,
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

/**
 * Normalization error - when a verified webhook cannot be mapped to an order event
 */
export class NormalizationError extends Error {
  constructor(
    message: string,
    public readonly providerName: string,
    public readonly details?: JsonObject,
  ) {
    super(message);
    this.name = 'NormalizationError';
  }
}
