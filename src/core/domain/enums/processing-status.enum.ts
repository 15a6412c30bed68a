/**
 * Webhook processing outcomes - every inbound delivery gets classified
 */
export enum ProcessingStatus {
  /**
   * Full pipeline completed; state transition applied
   */
  PROCESSED = 'processed',

  /**
   * Event id already admitted for this order
   */
  DUPLICATE = 'duplicate',

  /**
   * Order is no longer in a state the event applies to
   */
  STALE = 'stale',

  /**
   * Signature verification failed
   */
  SIGNATURE_FAILED = 'signature_failed',

  /**
   * Signature valid but payload could not be mapped to a payment event
   */
  NORMALIZATION_FAILED = 'normalization_failed',

  /**
   * Valid event but no order with that id exists
   */
  UNMATCHED = 'unmatched',

  /**
   * Reported amount or currency differs from the stored order
   */
  AMOUNT_MISMATCH = 'amount_mismatch',

  /**
   * A guard or trigger check refused the transition
   */
  TRANSITION_REJECTED = 'transition_rejected',

  /**
   * Processing failed on our side; nothing was committed and the provider should retry
   */
  INTERNAL_ERROR = 'internal_error',
}

/**
 * Fates the provider should not retry
 */
export function isAcknowledgedFate(status: ProcessingStatus): boolean {
  return (
    status !== ProcessingStatus.SIGNATURE_FAILED &&
    status !== ProcessingStatus.INTERNAL_ERROR
  );
}
