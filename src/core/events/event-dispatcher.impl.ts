import { Logger } from '@nestjs/common';
import { OrderEvent } from '../domain/enums';
import {
  EventDispatcher,
  EventHandler,
  EventSubscription,
  OrderLifecycleEvent,
} from '../interfaces';

/**
 * Default implementation of the EventDispatcher
 *
 * Fans order lifecycle events out to handlers. Supports multiple handlers
 * per event with error isolation.
 */
export class EventDispatcherImpl implements EventDispatcher {
  private readonly logger = new Logger(EventDispatcherImpl.name);
  private handlers: Map<OrderEvent, Set<EventHandler>> = new Map();
  private globalHandlers: Set<EventHandler> = new Set();
  private subscriptionIdCounter = 0;

  on(eventType: OrderEvent, handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    const existing = this.handlers.get(eventType);
    if (existing) {
      existing.add(handler);
    } else {
      this.handlers.set(eventType, new Set([handler]));
    }

    return {
      id: subscriptionId,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  /**
   * Register a handler for every event
   */
  onAll(handler: EventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;
    this.globalHandlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  off(eventType: OrderEvent, handler: EventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  /**
   * Dispatch an event to all registered handlers. Handler errors are logged,
   * never thrown.
   */
  async dispatch(eventType: OrderEvent, payload: OrderLifecycleEvent): Promise<void> {
    const specificHandlers = this.handlers.get(eventType) ?? new Set<EventHandler>();
    const allHandlers = [...specificHandlers, ...this.globalHandlers];

    const results = await Promise.allSettled(
      allHandlers.map(async (handler) => handler(eventType, payload)),
    );

    for (const [index, result] of results.entries()) {
      if (result.status === 'rejected') {
        const reason: unknown = result.reason;
        this.logger.error(
          `Handler ${allHandlers[index].name || 'anonymous'} failed for ${eventType} on order ${payload.order.id}: ${
            reason instanceof Error ? reason.message : String(reason)
          }`,
        );
      }
    }
  }

  getHandlerCount(eventType?: OrderEvent): number {
    if (eventType) {
      return (this.handlers.get(eventType)?.size ?? 0) + this.globalHandlers.size;
    }
    let total = this.globalHandlers.size;
    for (const handlers of this.handlers.values()) {
      total += handlers.size;
    }
    return total;
  }
}
