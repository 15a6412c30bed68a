export { OrderEntity } from './order.entity';
export { AuditLogEntity } from './audit-log.entity';
export { ProcessedEventEntity } from './processed-event.entity';
export { AffiliateLedgerEntity } from './affiliate-ledger.entity';
