import { Logger } from '@nestjs/common';
import { ProcessingStatus } from '../../domain/enums';
import { PaymentProviderAdapter } from '../../interfaces';
import { PipelineStage, StageResult, WebhookContext } from '../types';

/**
 * Stage 1: Signature Verification
 * Authenticates the raw body before anything is parsed. Fails closed.
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';
  private readonly logger = new Logger(VerificationStage.name);

  constructor(
    private readonly providerAdapter: PaymentProviderAdapter,
    private readonly secrets: string[],
    private readonly skipVerification = false,
  ) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const startTime = Date.now();

    // DANGEROUS - only for testing
    if (this.skipVerification) {
      context.signatureValid = true;
      return {
        success: true,
        context,
        shouldContinue: true,
        metadata: { skipped: true, durationMs: Date.now() - startTime },
      };
    }

    if (this.secrets.length === 0) {
      this.logger.error('No webhook secrets configured; rejecting all webhooks');
    }

    const isValid =
      this.secrets.length > 0 &&
      this.providerAdapter.verifySignature(context.rawBody, context.headers, this.secrets);

    context.signatureValid = isValid;

    if (!isValid) {
      context.signatureError = 'Signature verification failed';
      context.processingStatus = ProcessingStatus.SIGNATURE_FAILED;
      this.logger.warn(`Rejected webhook ${context.processingId}: invalid signature`);

      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { signatureFailed: true, durationMs: Date.now() - startTime },
      };
    }

    return {
      success: true,
      context,
      shouldContinue: true,
      metadata: { durationMs: Date.now() - startTime },
    };
  }
}
