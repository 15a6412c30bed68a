import { RefundStatus, TriggerType } from '../domain/enums';
import { GuardResult, TransitionContext, TransitionGuard } from './types';

/**
 * Predefined guards for the order transition table
 */

/**
 * payment_confirmed must carry the provider's payment reference, and an
 * order's reference is never overwritten
 */
export const RequirePaymentReferenceGuard: TransitionGuard = {
  name: 'RequirePaymentReference',
  check: (context: TransitionContext): GuardResult => {
    const reference = context.patch?.paymentReference;
    if (!reference || reference.trim() === '') {
      return {
        allowed: false,
        reason: 'A payment reference is required to confirm payment',
      };
    }
    if (
      context.order.paymentReference !== null &&
      context.order.paymentReference !== reference
    ) {
      return {
        allowed: false,
        reason: `Order already linked to payment ${context.order.paymentReference}`,
      };
    }
    return { allowed: true };
  },
};

export const RequireGeneratedContentGuard: TransitionGuard = {
  name: 'RequireGeneratedContent',
  check: (context: TransitionContext): GuardResult => {
    const content = context.patch?.generatedContent;
    if (content === undefined || content.length === 0) {
      return { allowed: false, reason: 'Generated content is empty' };
    }
    return { allowed: true };
  },
};

/**
 * Only money that was actually captured can be refunded
 */
export const RequireCapturedPaymentGuard: TransitionGuard = {
  name: 'RequireCapturedPayment',
  check: (context: TransitionContext): GuardResult => {
    if (!context.order.isPaymentCaptured()) {
      return {
        allowed: false,
        reason: 'Order has no captured payment to refund',
      };
    }
    return { allowed: true };
  },
};

/**
 * The orchestrator settles the refund it claimed; an operator settles one
 * left for manual handling
 */
export const RefundSettlementGuard: TransitionGuard = {
  name: 'RefundSettlement',
  check: (context: TransitionContext): GuardResult => {
    const expected =
      context.triggerType === TriggerType.OPERATOR
        ? RefundStatus.PENDING_MANUAL
        : RefundStatus.IN_FLIGHT;

    if (context.order.refundStatus !== expected) {
      return {
        allowed: false,
        reason: `Refund status is ${context.order.refundStatus}, expected ${expected}`,
      };
    }
    return { allowed: true };
  },
};
