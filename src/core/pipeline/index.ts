/**
 * Webhook Processing Pipeline
 *
 * 1. Verification - Validate webhook signature
 * 2. Normalization - Map to an order event
 * 3. Order Match - Find the order, check the amount
 * 4. Deduplication - Admit each event once
 * 5. State Engine - Apply state transitions
 * 6. Dispatch - Schedule side effects
 */

// Main processor
export { WebhookProcessor } from './webhook-processor';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { VerificationStage } from './stages/verification.stage';
export { NormalizationStage } from './stages/normalization.stage';
export { OrderMatchStage } from './stages/order-match.stage';
export { DeduplicationStage } from './stages/deduplication.stage';
export { StateEngineStage } from './stages/state-engine.stage';
export { DispatchStage } from './stages/dispatch.stage';
