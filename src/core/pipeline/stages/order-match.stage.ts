import { Logger } from '@nestjs/common';
import { ProcessingStatus } from '../../domain/enums';
import { StorageAdapter } from '../../interfaces';
import { PipelineStage, StageResult, WebhookContext } from '../types';

/**
 * Stage 3: Order Match
 * Finds the order the event refers to and checks the reported amount
 */
export class OrderMatchStage implements PipelineStage {
  name = 'order-match';
  private readonly logger = new Logger(OrderMatchStage.name);

  constructor(private readonly storageAdapter: StorageAdapter) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const event = context.normalizedEvent;
    if (!event) {
      throw new Error('Order match requires a normalized event');
    }

    const order = await this.storageAdapter.findOrder(event.orderId);
    if (!order) {
      context.processingStatus = ProcessingStatus.UNMATCHED;
      this.logger.error(`Webhook ${event.eventId} refers to unknown order ${event.orderId}`);
      return { success: true, context, shouldContinue: false };
    }

    context.order = order;

    if (event.money && !event.money.equals(order.money)) {
      context.processingStatus = ProcessingStatus.AMOUNT_MISMATCH;
      this.logger.error(
        `Webhook ${event.eventId} for order ${order.id} reports ${event.money.format()}, expected ${order.money.format()}`,
      );
      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { reported: event.money.format(), expected: order.money.format() },
      };
    }

    return { success: true, context, shouldContinue: true };
  }
}
