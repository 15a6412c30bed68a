import { ProcessingStatus } from '../../domain/enums';
import { EventDeduplicator } from '../../services/event-deduplicator';
import { PipelineStage, StageResult, WebhookContext } from '../types';

/**
 * Stage 4: Deduplication
 * Admits the (order, event id) pair before any side effect. A duplicate stops
 * the pipeline and is acknowledged without touching the order.
 */
export class DeduplicationStage implements PipelineStage {
  name = 'deduplication';

  constructor(private readonly deduplicator: EventDeduplicator) {}

  async execute(context: WebhookContext): Promise<StageResult> {
    const event = context.normalizedEvent;
    if (!event) {
      throw new Error('Deduplication requires a normalized event');
    }

    const admission = await this.deduplicator.admit(event.orderId, event.eventId, event.event);

    if (admission === 'duplicate') {
      context.processingStatus = ProcessingStatus.DUPLICATE;
      return {
        success: true,
        context,
        shouldContinue: false,
        metadata: { isDuplicate: true },
      };
    }

    context.admitted = true;
    return { success: true, context, shouldContinue: true, metadata: { isDuplicate: false } };
  }
}
