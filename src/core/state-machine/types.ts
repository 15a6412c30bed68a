import { OrderEvent, OrderStatus, TriggerType } from '../domain/enums';
import { JsonObject, Order } from '../domain/models';
import { OrderPatch } from '../interfaces';

/**
 * Work to perform once a transition has been committed
 */
export enum SideEffect {
  NOTIFY_PAYMENT_ACK = 'notify_payment_ack',
  ENQUEUE_FULFILLMENT = 'enqueue_fulfillment',
  NOTIFY_FAILURE = 'notify_failure',
  DELIVER_CONTENT = 'deliver_content',
  CREDIT_AFFILIATE = 'credit_affiliate',
  INITIATE_REFUND = 'initiate_refund',
  NOTIFY_REFUND = 'notify_refund',
}

/**
 * One row of the transition table
 */
export interface TransitionRule {
  event: OrderEvent;
  from: OrderStatus[];
  to: OrderStatus;
  triggers: TriggerType[];
  guards?: TransitionGuard[];
  /**
   * Executed in order after the write commits
   */
  sideEffects: SideEffect[];
  metadata?: {
    description: string;
  };
}

/**
 * Transition guard - can block a transition with a reason
 */
export interface TransitionGuard {
  name: string;
  check: (context: TransitionContext) => GuardResult | Promise<GuardResult>;
}

export interface GuardResult {
  allowed: boolean;
  reason?: string;
}

/**
 * Context for evaluating a transition against the current order snapshot
 */
export interface TransitionContext {
  order: Order;
  event: OrderEvent;
  triggerType: TriggerType;
  /**
   * Fields the caller wants written with the transition
   */
  patch?: OrderPatch;
  metadata?: JsonObject;
}

export type TransitionRejection = 'stale' | 'trigger_not_allowed' | 'guard_rejected';

export type TransitionDecision =
  | {
      allowed: true;
      rule: TransitionRule;
      fromStatus: OrderStatus;
      toStatus: OrderStatus;
      sideEffects: SideEffect[];
    }
  | {
      allowed: false;
      rejection: TransitionRejection;
      fromStatus: OrderStatus;
      reason: string;
      guardFailures?: string[];
    };

export interface StateMachineConfig {
  initialState: OrderStatus;
  rules: TransitionRule[];
}

/**
 * Invalid state error
 */
export class InvalidStateError extends Error {
  constructor(
    message: string,
    public readonly status: string,
    public readonly validStates: OrderStatus[],
  ) {
    super(message);
    this.name = 'InvalidStateError';
  }
}
