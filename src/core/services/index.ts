export * from './order.service';
export * from './event-deduplicator';
export * from './notification.service';
