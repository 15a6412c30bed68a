import { applyDecorators } from '@nestjs/common';
import { ApiBody, ApiHeader, ApiOperation, ApiResponse } from '@nestjs/swagger';
import { WebhookResponseDto } from '../../dto/webhook.dto';
import { PaymentWebhookPayloadDto } from '../../../adapters/providers/hmac/payment-webhook.dto';

/**
 * Swagger decorator for the payment webhook endpoint
 */
export const ApiPaymentWebhook = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Receive payment webhook',
      description:
        'Verifies the signature over the raw body, deduplicates the event and applies it to the order. ' +
        'Fulfillment runs after the response. Every acknowledged delivery returns 200 with its processing status.',
    }),
    ApiHeader({
      name: 'x-signature',
      description: 'Lower-case hex HMAC of the raw body with the shared webhook secret',
      required: true,
    }),
    ApiBody({
      description: 'Payment outcome reported by the provider',
      type: PaymentWebhookPayloadDto,
    }),
    ApiResponse({
      status: 200,
      description: 'Webhook acknowledged with its processing status',
      type: WebhookResponseDto,
    }),
    ApiResponse({
      status: 401,
      description: 'Signature missing or invalid',
    }),
    ApiResponse({
      status: 413,
      description: 'Payload too large',
    }),
    ApiResponse({
      status: 500,
      description: 'Processing failed before anything was committed; the provider should retry',
    }),
  );
};
