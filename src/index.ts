/**
 * Paid-order fulfillment engine
 *
 * Turns signed payment webhooks into exactly-once order transitions and drives
 * paid orders through enrichment, report generation and delivery, refunding
 * when fulfillment fails.
 */

// Export all core components
export * from './core';

// Export adapters
export * from './adapters/storage/mock';
export * from './adapters/storage/typeorm';
export * from './adapters/providers/hmac';
export * from './adapters/providers/mock';
export * from './adapters/collaborators';

// Export NestJS module
export * from './modules';

// Environment and catalog loading
export * from './config';

// Export testing utilities from _shared
export { MockWebhookFactory } from './_shared/testing/mock-webhook-factory';
export type { WebhookOptions, WebhookPayload } from './_shared/testing/mock-webhook-factory';

// HTTP application setup
export { configureHttpApp } from './app.setup';
