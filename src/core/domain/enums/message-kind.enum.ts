/**
 * User notification kinds sent through the notifier
 */
export enum MessageKind {
  PAYMENT_ACK = 'payment_ack',
  REPORT_READY = 'report_ready',
  FAILURE = 'failure',
  REFUND_DONE = 'refund_done',
}
