import { OrderEvent, OrderStatus, TriggerType } from '../domain/enums';
import {
  RefundSettlementGuard,
  RequireCapturedPaymentGuard,
  RequireGeneratedContentGuard,
  RequirePaymentReferenceGuard,
} from './guards';
import { SideEffect, TransitionRule } from './types';

/**
 * Order lifecycle transition table
 *
 * - One linear path: pending_payment → paid → generating → completed
 * - One compensation path: paid|generating → failed → refunded
 * - States only move forward
 */
export const TRANSITION_RULES: TransitionRule[] = [
  // ============ Payment Outcomes ============

  {
    event: OrderEvent.PAYMENT_CONFIRMED,
    from: [OrderStatus.PENDING_PAYMENT],
    to: OrderStatus.PAID,
    triggers: [TriggerType.WEBHOOK],
    guards: [RequirePaymentReferenceGuard],
    sideEffects: [SideEffect.NOTIFY_PAYMENT_ACK, SideEffect.ENQUEUE_FULFILLMENT],
    metadata: { description: 'Provider confirmed capture' },
  },
  {
    event: OrderEvent.PAYMENT_FAILED,
    from: [OrderStatus.PENDING_PAYMENT],
    to: OrderStatus.FAILED,
    triggers: [TriggerType.WEBHOOK, TriggerType.SWEEPER],
    sideEffects: [SideEffect.NOTIFY_FAILURE],
    metadata: { description: 'Payment failed, cancelled or timed out' },
  },

  // ============ Fulfillment ============

  {
    event: OrderEvent.ENRICHMENT_DONE,
    from: [OrderStatus.PAID],
    to: OrderStatus.GENERATING,
    triggers: [TriggerType.ORCHESTRATOR],
    sideEffects: [],
    metadata: { description: 'Enrichment data stored or not required' },
  },
  {
    event: OrderEvent.GENERATION_DONE,
    from: [OrderStatus.GENERATING],
    to: OrderStatus.COMPLETED,
    triggers: [TriggerType.ORCHESTRATOR],
    guards: [RequireGeneratedContentGuard],
    sideEffects: [SideEffect.DELIVER_CONTENT, SideEffect.CREDIT_AFFILIATE],
    metadata: { description: 'Report generated and stored' },
  },

  // ============ Compensation ============

  {
    event: OrderEvent.PIPELINE_ERROR,
    from: [OrderStatus.PAID, OrderStatus.GENERATING],
    to: OrderStatus.FAILED,
    triggers: [TriggerType.ORCHESTRATOR],
    sideEffects: [SideEffect.NOTIFY_FAILURE, SideEffect.INITIATE_REFUND],
    metadata: { description: 'Fulfillment step exhausted its retries' },
  },
  {
    event: OrderEvent.REFUND_DONE,
    from: [OrderStatus.FAILED],
    to: OrderStatus.REFUNDED,
    triggers: [TriggerType.ORCHESTRATOR, TriggerType.OPERATOR],
    guards: [RequireCapturedPaymentGuard, RefundSettlementGuard],
    sideEffects: [SideEffect.NOTIFY_REFUND],
    metadata: { description: 'Captured payment returned to the user' },
  },
];

export function getInitialState(): OrderStatus {
  return OrderStatus.PENDING_PAYMENT;
}

export function getTerminalStates(): OrderStatus[] {
  return [OrderStatus.COMPLETED, OrderStatus.REFUNDED];
}

export function findRuleForEvent(
  event: OrderEvent,
  rules: TransitionRule[] = TRANSITION_RULES,
): TransitionRule | undefined {
  return rules.find((rule) => rule.event === event);
}
