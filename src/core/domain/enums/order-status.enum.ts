/**
 * Order lifecycle states
 * Transitions are enforced by the order state machine
 */
export enum OrderStatus {
  /**
   * Order created, waiting for the payment provider to confirm capture
   */
  PENDING_PAYMENT = 'pending_payment',

  /**
   * Payment captured; fulfillment not started or enrichment in progress
   */
  PAID = 'paid',

  /**
   * Enrichment finished (or skipped); content generation in progress
   */
  GENERATING = 'generating',

  /**
   * Content generated and stored (terminal state)
   */
  COMPLETED = 'completed',

  /**
   * Payment failed or fulfillment gave up
   */
  FAILED = 'failed',

  /**
   * Captured payment returned to the user (terminal state)
   */
  REFUNDED = 'refunded',
}

/**
 * Statuses from which no further transition is possible.
 * `failed` is not terminal: a captured order may still move to `refunded`.
 */
export function isTerminalStatus(status: OrderStatus): boolean {
  return status === OrderStatus.COMPLETED || status === OrderStatus.REFUNDED;
}

/**
 * Statuses in which the fulfillment pipeline still has work to do
 */
export function isInFlightStatus(status: OrderStatus): boolean {
  return status === OrderStatus.PAID || status === OrderStatus.GENERATING;
}
