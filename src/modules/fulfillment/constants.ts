/**
 * Injection tokens for the fulfillment module
 */

export const FULFILLMENT_CONFIG = Symbol('FULFILLMENT_CONFIG');
export const STORAGE_ADAPTER = Symbol('STORAGE_ADAPTER');
export const PAYMENT_PROVIDER = Symbol('PAYMENT_PROVIDER');
export const EVENT_DISPATCHER = Symbol('EVENT_DISPATCHER');
export const PRODUCT_CATALOG = Symbol('PRODUCT_CATALOG');
export const ORDER_STATE_MACHINE = Symbol('ORDER_STATE_MACHINE');
export const ORDER_SERVICE = Symbol('ORDER_SERVICE');
export const EVENT_DEDUPLICATOR = Symbol('EVENT_DEDUPLICATOR');
export const FULFILLMENT_QUEUE = Symbol('FULFILLMENT_QUEUE');
export const FULFILLMENT_ORCHESTRATOR = Symbol('FULFILLMENT_ORCHESTRATOR');
export const FULFILLMENT_RECOVERY = Symbol('FULFILLMENT_RECOVERY');
export const WEBHOOK_PROCESSOR = Symbol('WEBHOOK_PROCESSOR');
