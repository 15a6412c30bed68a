import { OrderEvent, OrderStatus, TriggerType } from '../domain/enums';
import { Order } from '../domain/models';

/**
 * Published after every applied order transition
 */
export interface OrderLifecycleEvent {
  event: OrderEvent;
  order: Order;
  fromStatus: OrderStatus;
  toStatus: OrderStatus;
  triggerType: TriggerType;
  occurredAt: Date;
}

export type EventHandler = (
  eventType: OrderEvent,
  payload: OrderLifecycleEvent,
) => Promise<void> | void;

export interface EventSubscription {
  id: string;
  unsubscribe: () => void;
}

/**
 * Event dispatcher interface - fans lifecycle events out to handlers.
 * A failing handler never affects other handlers or the caller.
 */
export interface EventDispatcher {
  on(eventType: OrderEvent, handler: EventHandler): EventSubscription;
  onAll(handler: EventHandler): EventSubscription;
  off(eventType: OrderEvent, handler: EventHandler): void;
  dispatch(eventType: OrderEvent, payload: OrderLifecycleEvent): Promise<void>;
  getHandlerCount(eventType?: OrderEvent): number;
}
