export * from './errors';
export * from './retry';
export * from './policies';
export * from './commission';
export * from './fulfillment-queue';
export * from './fulfillment-orchestrator';
export * from './recovery';
