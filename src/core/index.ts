/**
 * Core - order lifecycle, webhook pipeline and fulfillment logic.
 * Independent of the database and the payment provider.
 */

// Domain
export * from './domain';

// Interfaces and contracts
export * from './interfaces';

// Webhook signatures
export * from './security';

// State machine
export * from './state-machine';

// Webhook processing pipeline
export * from './pipeline';

// Core services
export * from './services';

// Fulfillment, compensation and recovery
export * from './fulfillment';

// Event system
export * from './events';
