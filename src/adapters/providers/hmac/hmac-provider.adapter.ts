import * as crypto from 'crypto';
import { Logger } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import {
  PaymentProviderAdapter,
  NormalizedPaymentEvent,
  ProviderRefundResult,
  RefundRequest,
  CallOptions,
  ProviderError,
  NormalizationError,
  OrderEvent,
  Money,
  JsonObject,
  SignatureAlgorithm,
  verifyWithAnySecret,
} from '../../../core';
import { PaymentWebhookPayloadDto, RefundResponseDto } from './payment-webhook.dto';

export interface HmacProviderConfig {
  providerName: string;
  /**
   * Header carrying the hex signature (lower-case)
   */
  signatureHeader: string;
  algorithm: SignatureAlgorithm;
  /**
   * Base URL of the refund API; refunds fail when unset
   */
  apiBaseUrl?: string;
  apiKey?: string;
}

export const DEFAULT_HMAC_PROVIDER_CONFIG: HmacProviderConfig = {
  providerName: 'hmac',
  signatureHeader: 'x-signature',
  algorithm: 'sha256',
};

/**
 * Flatten class-validator errors into "property: constraint" messages
 */
export function describeValidationErrors(errors: ValidationError[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = `${prefix}${error.property}`;
    return [
      ...Object.values(error.constraints ?? {}).map((message) => `${path}: ${message}`),
      ...describeValidationErrors(error.children ?? [], `${path}.`),
    ];
  });
}

/**
 * Payment provider that signs webhooks with an HMAC of the raw body and
 * exposes a JSON refund endpoint
 *
 * Webhook body: { order_id, status: paid | failed | cancelled, payment_reference,
 * amount, currency, event_id?, timestamp?, payment_method?, error_message? }
 */
export class HmacProviderAdapter implements PaymentProviderAdapter {
  protected readonly logger = new Logger(HmacProviderAdapter.name);
  readonly config: HmacProviderConfig;

  constructor(config: Partial<HmacProviderConfig> = {}) {
    this.config = {
      ...DEFAULT_HMAC_PROVIDER_CONFIG,
      ...config,
      signatureHeader: (config.signatureHeader ?? DEFAULT_HMAC_PROVIDER_CONFIG.signatureHeader).toLowerCase(),
    };
  }

  get providerName(): string {
    return this.config.providerName;
  }

  verifySignature(
    rawBody: Buffer,
    headers: Record<string, string>,
    secrets: string[],
  ): boolean {
    return verifyWithAnySecret(rawBody, headers[this.config.signatureHeader], secrets, {
      algorithm: this.config.algorithm,
    });
  }

  parsePayload(rawBody: Buffer): JsonObject {
    let parsed: unknown;
    try {
      parsed = JSON.parse(rawBody.toString('utf8'));
    } catch {
      throw new NormalizationError('Invalid JSON payload', this.providerName);
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new NormalizationError('Payload must be a JSON object', this.providerName);
    }
    return Object.fromEntries(Object.entries(parsed));
  }

  async normalize(payload: JsonObject, rawBody: Buffer): Promise<NormalizedPaymentEvent> {
    const dto = plainToInstance(PaymentWebhookPayloadDto, payload);
    const errors = await validate(dto);

    if (errors.length > 0) {
      const messages = describeValidationErrors(errors);
      throw new NormalizationError(
        `Invalid webhook payload: ${messages.join('; ')}`,
        this.providerName,
        { errors: messages },
      );
    }

    if (!Number.isSafeInteger(Math.round(dto.amount * 100))) {
      throw new NormalizationError(`Amount out of range: ${dto.amount}`, this.providerName);
    }

    const providedEventId = dto.event_id;
    const eventId = providedEventId ?? `derived_${crypto.createHash('sha256').update(rawBody).digest('hex')}`;
    const occurredAt = dto.timestamp ? new Date(dto.timestamp) : undefined;

    return {
      eventId,
      eventIdSource: providedEventId ? 'provider' : 'derived',
      orderId: dto.order_id,
      event: dto.status === 'paid' ? OrderEvent.PAYMENT_CONFIRMED : OrderEvent.PAYMENT_FAILED,
      providerStatus: dto.status,
      paymentReference: dto.payment_reference ?? dto.payment_id,
      money: Money.fromMajorUnits(dto.amount, dto.currency),
      failureReason: dto.status === 'paid' ? undefined : dto.error_message ?? `Payment ${dto.status}`,
      paymentMethod: dto.payment_method,
      occurredAt: occurredAt && !Number.isNaN(occurredAt.getTime()) ? occurredAt : undefined,
    };
  }

  /**
   * POST {apiBaseUrl}/refunds. Resolves only on a 2xx response with a refund id.
   */
  async issueRefund(
    paymentReference: string,
    request: RefundRequest,
    options: CallOptions = {},
  ): Promise<ProviderRefundResult> {
    if (!this.config.apiBaseUrl) {
      throw new ProviderError('Refund API is not configured', 'NOT_CONFIGURED', this.providerName);
    }

    let response: Response;
    try {
      response = await fetch(`${this.config.apiBaseUrl}/refunds`, {
        method: 'POST',
        headers: {
          ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
          'Content-Type': 'application/json',
          'Idempotency-Key': `refund_${request.orderId}`,
        },
        body: JSON.stringify({
          payment_reference: paymentReference,
          order_id: request.orderId,
          amount: request.amount.toMajorUnits(),
          currency: request.amount.currency,
          reason: request.reason,
        }),
        signal: options.signal,
      });
    } catch (error) {
      const aborted = options.signal?.aborted ?? false;
      throw new ProviderError(
        aborted ? 'Refund request aborted' : `Refund request failed: ${error instanceof Error ? error.message : String(error)}`,
        aborted ? 'ABORTED' : 'NETWORK_ERROR',
        this.providerName,
      );
    }

    if (!response.ok) {
      throw new ProviderError(
        `Refund API error: ${response.status} ${response.statusText}`,
        `HTTP_${response.status}`,
        this.providerName,
        { status: response.status },
      );
    }

    const body: unknown = await response.json();
    const dto = plainToInstance(RefundResponseDto, body);
    const errors = await validate(dto);
    if (errors.length > 0) {
      throw new ProviderError(
        'Refund API returned an unexpected body',
        'INVALID_RESPONSE',
        this.providerName,
        { errors: describeValidationErrors(errors) },
      );
    }

    this.logger.log(`Refund ${dto.id} issued for order ${request.orderId}`);

    return {
      refundReference: dto.id,
      amount: request.amount.amount,
      currency: request.amount.currency,
      status: dto.status ?? 'pending',
      createdAt: new Date(),
    };
  }
}
