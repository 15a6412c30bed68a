export * from './webhook.controller';
export * from './orders.controller';
export * from './affiliates.controller';
export * from './health.controller';
