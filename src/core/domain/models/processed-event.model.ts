import { OrderEvent } from '../enums';

/**
 * Marker that a provider event has been admitted for an order.
 * Written before any side effect, keyed by (orderId, eventId).
 */
export class ProcessedEvent {
  constructor(
    public readonly orderId: string,
    public readonly eventId: string,
    public readonly eventType: OrderEvent,
    public readonly receivedAt: Date = new Date(),
  ) {}

  /**
   * Event ids without a provider id are derived from the raw body hash
   */
  isDerivedKey(): boolean {
    return this.eventId.startsWith('derived_');
  }

  isOlderThan(cutoff: Date): boolean {
    return this.receivedAt.getTime() < cutoff.getTime();
  }
}
