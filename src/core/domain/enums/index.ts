export * from './order-status.enum';
export * from './order-event.enum';
export * from './processing-status.enum';
export * from './trigger-type.enum';
export * from './audit-action.enum';
export * from './refund-status.enum';
export * from './delivery-status.enum';
export * from './message-kind.enum';
