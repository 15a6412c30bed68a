import { Logger } from '@nestjs/common';
import { OrderEvent, ProcessingStatus, TriggerType } from '../../domain/enums';
import { OrderPatch } from '../../interfaces';
import { toError } from '../../fulfillment/errors';
import { EventDeduplicator } from '../../services/event-deduplicator';
import { OrderService } from '../../services/order.service';
import { PipelineStage, StageResult, WebhookContext } from '../types';

/**
 * Stage 5: State Engine
 * Applies the event through the order service. If the attempt fails before a
 * commit, the admission is released so the provider's retry is processed.
 */
export class StateEngineStage implements PipelineStage {
  name = 'state-engine';
  private readonly logger = new Logger(StateEngineStage.name);

  constructor(
    private readonly orderService: OrderService,
    private readonly deduplicator: EventDeduplicator,
  ) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const event = context.normalizedEvent;
    if (!event) {
      throw new Error('State engine requires a normalized event');
    }

    const patch: OrderPatch =
      event.event === OrderEvent.PAYMENT_CONFIRMED
        ? { paymentReference: event.paymentReference }
        : { failureReason: event.failureReason ?? `Payment ${event.providerStatus}` };

    try {
      const outcome = await this.orderService.applyEvent(event.orderId, event.event, {
        triggerType: TriggerType.WEBHOOK,
        performedBy: `provider:${context.provider}`,
        eventId: event.eventId,
        patch,
        metadata: {
          eventId: event.eventId,
          providerStatus: event.providerStatus,
          paymentMethod: event.paymentMethod ?? null,
        },
      });
      context.outcome = outcome;

      switch (outcome.kind) {
        case 'applied':
          context.processingStatus = ProcessingStatus.PROCESSED;
          return { success: true, context, shouldContinue: true };
        case 'stale':
          context.processingStatus = ProcessingStatus.STALE;
          return { success: true, context, shouldContinue: false, metadata: { reason: outcome.reason } };
        case 'rejected':
          context.processingStatus = ProcessingStatus.TRANSITION_REJECTED;
          return {
            success: true,
            context,
            shouldContinue: false,
            metadata: { reason: outcome.reason, guardFailures: outcome.guardFailures },
          };
        case 'not_found':
          context.processingStatus = ProcessingStatus.UNMATCHED;
          return { success: true, context, shouldContinue: false };
      }
    } catch (error) {
      await this.releaseAdmission(context, event.orderId, event.eventId);
      throw error;
    }
  }

  private async releaseAdmission(context: WebhookContext, orderId: string, eventId: string): Promise<void> {
    if (!context.admitted) {
      return;
    }
    try {
      await this.deduplicator.release(orderId, eventId);
      context.admitted = false;
    } catch (releaseError) {
      this.logger.error(
        `Could not release event ${eventId} for order ${orderId}: ${toError(releaseError).message}`,
      );
    }
  }
}
