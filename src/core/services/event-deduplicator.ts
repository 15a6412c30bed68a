import { Logger } from '@nestjs/common';
import { OrderEvent } from '../domain/enums';
import { AdmissionResult, StorageAdapter } from '../interfaces';

/**
 * Exactly-once admission of provider events, keyed by (orderId, eventId).
 * Admission is a single atomic insert, so of two concurrent deliveries of the
 * same event exactly one is accepted.
 */
export class EventDeduplicator {
  private readonly logger = new Logger(EventDeduplicator.name);

  constructor(private readonly storageAdapter: StorageAdapter) {}

  async admit(
    orderId: string,
    eventId: string,
    eventType: OrderEvent,
  ): Promise<AdmissionResult> {
    const result = await this.storageAdapter.recordProcessedEvent({
      orderId,
      eventId,
      eventType,
      receivedAt: new Date(),
    });

    if (result === 'duplicate') {
      this.logger.log(`Duplicate event ${eventId} for order ${orderId}`);
    }
    return result;
  }

  /**
   * Undo an admission whose processing failed before anything was committed,
   * so the provider's retry is not mistaken for a duplicate
   */
  async release(orderId: string, eventId: string): Promise<void> {
    await this.storageAdapter.deleteProcessedEvent(orderId, eventId);
    this.logger.warn(`Released admission of event ${eventId} for order ${orderId}`);
  }

  async purgeOlderThan(cutoff: Date): Promise<number> {
    return this.storageAdapter.purgeProcessedEvents(cutoff);
  }
}
