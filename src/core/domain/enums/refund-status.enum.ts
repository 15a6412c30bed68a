/**
 * Compensation progress for an order that failed after capture
 */
export enum RefundStatus {
  /**
   * No refund owed (never captured, or zero amount)
   */
  NOT_REQUIRED = 'not_required',

  /**
   * Refund owed and not yet attempted
   */
  SCHEDULED = 'scheduled',

  /**
   * Refund call claimed by a worker; outcome not yet recorded
   */
  IN_FLIGHT = 'in_flight',

  /**
   * Provider accepted the refund
   */
  COMPLETED = 'completed',

  /**
   * Refund failed or its outcome is unknown; waiting for an operator
   */
  PENDING_MANUAL = 'pending_manual',
}
