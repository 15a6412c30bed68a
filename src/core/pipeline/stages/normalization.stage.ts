import { Logger } from '@nestjs/common';
import { ProcessingStatus } from '../../domain/enums';
import { NormalizationError, PaymentProviderAdapter } from '../../interfaces';
import { PipelineStage, StageResult, WebhookContext } from '../types';

/**
 * Stage 2: Normalization
 * Parses the verified body and maps it to an order event
 */
export class NormalizationStage implements PipelineStage {
  name = 'normalization';
  private readonly logger = new Logger(NormalizationStage.name);

  constructor(private readonly providerAdapter: PaymentProviderAdapter) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    try {
      const payload = this.providerAdapter.parsePayload(context.rawBody);
      context.payload = payload;

      const normalized = await this.providerAdapter.normalize(payload, context.rawBody);
      context.normalizedEvent = normalized;
      context.metadata.eventId = normalized.eventId;
      context.metadata.eventType = normalized.event;

      return {
        success: true,
        context,
        shouldContinue: true,
        metadata: { eventIdSource: normalized.eventIdSource },
      };
    } catch (error) {
      if (!(error instanceof NormalizationError)) {
        throw error;
      }

      context.normalizationError = error.message;
      context.processingStatus = ProcessingStatus.NORMALIZATION_FAILED;
      this.logger.warn(`Webhook ${context.processingId} could not be normalized: ${error.message}`);

      // Retrying a malformed payload cannot succeed; acknowledge it
      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { details: error.details ?? {} },
      };
    }
  }
}
