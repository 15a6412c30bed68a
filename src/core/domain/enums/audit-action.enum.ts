/**
 * What caused an audit log entry
 */
export enum AuditAction {
  ORDER_CREATED = 'order_created',
  STATE_TRANSITION = 'state_transition',
  REFUND_STATUS_CHANGED = 'refund_status_changed',
  DELIVERY_STATUS_CHANGED = 'delivery_status_changed',
  MANUAL_REFUND_RESOLVED = 'manual_refund_resolved',
}
