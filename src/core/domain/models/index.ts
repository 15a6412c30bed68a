export * from './order.model';
export * from './processed-event.model';
export * from './affiliate-ledger-entry.model';
export * from './audit-log.model';
