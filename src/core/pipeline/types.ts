import { ProcessingStatus } from '../domain/enums';
import { JsonObject, Order } from '../domain/models';
import { LifecycleHooks, NormalizedPaymentEvent, PaymentProviderAdapter, StorageAdapter } from '../interfaces';
import { EventDeduplicator } from '../services/event-deduplicator';
import { OrderService, TransitionOutcome } from '../services/order.service';
import { SideEffect } from '../state-machine';

/**
 * Webhook processing context passed through the pipeline
 */
export interface WebhookContext {
  // Raw input
  provider: string;
  rawBody: Buffer;
  headers: Record<string, string>;
  receivedAt: Date;

  // Processing metadata
  processingId: string;
  startTime: Date;

  // Verification results
  signatureValid?: boolean;
  signatureError?: string;

  // Normalized data
  payload?: JsonObject;
  normalizedEvent?: NormalizedPaymentEvent;
  normalizationError?: string;

  // Matching and admission
  order?: Order;
  admitted?: boolean;

  // State engine
  outcome?: TransitionOutcome;

  // Processing outcome
  processingStatus?: ProcessingStatus;
  error?: Error;
  processingDurationMs?: number;

  metadata: JsonObject;
}

export interface StageResult {
  success: boolean;
  context: WebhookContext;
  error?: Error;
  shouldContinue: boolean;
  metadata?: JsonObject;
}

export interface PipelineStage {
  name: string;
  execute(context: WebhookContext): Promise<StageResult>;
}

/**
 * Receives the side effects of a transition committed by a webhook
 */
export interface SideEffectScheduler {
  schedule(orderId: string, effects: SideEffect[]): void;
}

export interface PipelineConfig {
  providerAdapter: PaymentProviderAdapter;
  /**
   * Webhook secrets, newest first
   */
  secrets: string[];
  storageAdapter: StorageAdapter;
  orderService: OrderService;
  deduplicator: EventDeduplicator;
  scheduler?: SideEffectScheduler;

  skipSignatureVerification?: boolean; // DANGEROUS: only for testing

  hooks?: LifecycleHooks;

  /**
   * Throw PipelineError instead of returning an internal_error result
   */
  throwOnError?: boolean;
  timeoutMs?: number;
}

export interface ProcessingResult {
  success: boolean;
  orderId?: string;
  eventId?: string;
  processingStatus: ProcessingStatus;
  error?: Error;
  context: WebhookContext;
  metrics: ProcessingMetrics;
}

export interface ProcessingMetrics {
  totalDurationMs: number;
  stageDurations: Map<string, number>;
  signatureVerified: boolean;
  normalized: boolean;
  admitted: boolean;
  transitionApplied: boolean;
  dispatched: boolean;
}

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly context: WebhookContext,
    public readonly underlying?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

export class SignatureVerificationError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
  ) {
    super(message);
    this.name = 'SignatureVerificationError';
  }
}
