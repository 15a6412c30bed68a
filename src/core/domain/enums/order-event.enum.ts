/**
 * Named events that drive order transitions
 */
export enum OrderEvent {
  PAYMENT_CONFIRMED = 'payment_confirmed',
  PAYMENT_FAILED = 'payment_failed',
  ENRICHMENT_DONE = 'enrichment_done',
  GENERATION_DONE = 'generation_done',
  PIPELINE_ERROR = 'pipeline_error',
  REFUND_DONE = 'refund_done',
}
