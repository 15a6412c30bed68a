/**
 * Who or what requested a state transition
 * Recorded in audit logs and checked against each transition rule
 */
export enum TriggerType {
  /**
   * Verified payment provider callback
   */
  WEBHOOK = 'webhook',

  /**
   * Fulfillment orchestrator step
   */
  ORCHESTRATOR = 'orchestrator',

  /**
   * Periodic maintenance sweep (payment timeouts)
   */
  SWEEPER = 'sweeper',

  /**
   * Manual operator action
   */
  OPERATOR = 'operator',
}
