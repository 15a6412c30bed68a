import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ProcessingStatus } from '../domain/enums';
import { ErrorContext, LifecycleHooks, WebhookFateEvent } from '../interfaces';
import { toError } from '../fulfillment/errors';
import { withTimeout } from '../fulfillment/retry';
import {
  PipelineConfig,
  PipelineStage,
  WebhookContext,
  ProcessingResult,
  ProcessingMetrics,
  PipelineError,
} from './types';
import { VerificationStage } from './stages/verification.stage';
import { NormalizationStage } from './stages/normalization.stage';
import { OrderMatchStage } from './stages/order-match.stage';
import { DeduplicationStage } from './stages/deduplication.stage';
import { StateEngineStage } from './stages/state-engine.stage';
import { DispatchStage } from './stages/dispatch.stage';

const DEFAULT_TIMEOUT_MS = 30000;

/**
 * WebhookProcessor runs an inbound payment webhook through its stages:
 *
 * 1. Verification - authenticate the raw body
 * 2. Normalization - map the payload to an order event
 * 3. Order Match - find the order and check the amount
 * 4. Deduplication - admit the event exactly once
 * 5. State Engine - apply the transition
 * 6. Dispatch - schedule side effects
 *
 * Every webhook ends with exactly one processing status.
 */
export class WebhookProcessor {
  private readonly logger = new Logger(WebhookProcessor.name);
  private readonly stages: PipelineStage[];
  private readonly hooks?: LifecycleHooks;
  private readonly throwOnError: boolean;
  private readonly timeoutMs: number;

  constructor(private readonly config: PipelineConfig) {
    this.hooks = config.hooks;
    this.throwOnError = config.throwOnError ?? false;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.stages = this.initializeStages();
  }

  get providerName(): string {
    return this.config.providerAdapter.providerName;
  }

  async processWebhook(
    rawBody: Buffer,
    headers: Record<string, string | string[] | undefined>,
  ): Promise<ProcessingResult> {
    const startTime = Date.now();

    const context: WebhookContext = {
      provider: this.providerName,
      rawBody,
      headers: this.normalizeHeaders(headers),
      receivedAt: new Date(),
      processingId: uuidv4(),
      startTime: new Date(startTime),
      metadata: {},
    };

    const metrics: ProcessingMetrics = {
      totalDurationMs: 0,
      stageDurations: new Map(),
      signatureVerified: false,
      normalized: false,
      admitted: false,
      transitionApplied: false,
      dispatched: false,
    };

    try {
      await withTimeout(
        () => this.executePipeline(context, metrics),
        this.timeoutMs,
        'webhook-pipeline',
      );
    } catch (error) {
      context.error = toError(error);
      context.processingStatus = ProcessingStatus.INTERNAL_ERROR;
      this.logger.error(
        `Webhook ${context.processingId} from ${context.provider} failed: ${context.error.message}`,
        context.error.stack,
      );
      await this.invokeErrorHook(context.error, {
        operation: 'webhook-processing',
        orderId: context.normalizedEvent?.orderId,
        stage: error instanceof PipelineError ? error.stage : undefined,
      });
    }

    context.processingDurationMs = Date.now() - startTime;
    metrics.totalDurationMs = context.processingDurationMs;

    const processingStatus = context.processingStatus ?? ProcessingStatus.INTERNAL_ERROR;
    await this.invokeFateHook({
      provider: context.provider,
      processingStatus,
      orderId: context.normalizedEvent?.orderId,
      eventId: context.normalizedEvent?.eventId,
      latencyMs: context.processingDurationMs,
      error: context.error,
    });

    if (context.error && this.throwOnError) {
      throw context.error instanceof PipelineError
        ? context.error
        : new PipelineError(`Pipeline failed: ${context.error.message}`, 'pipeline', context, context.error);
    }

    this.logger.log(
      `Webhook ${context.processingId} ${processingStatus} in ${context.processingDurationMs}ms`,
    );

    return {
      success: !context.error,
      orderId: context.normalizedEvent?.orderId,
      eventId: context.normalizedEvent?.eventId,
      processingStatus,
      error: context.error,
      context,
      metrics,
    };
  }

  /**
   * Execute the pipeline stages sequentially until one stops it
   */
  private async executePipeline(
    context: WebhookContext,
    metrics: ProcessingMetrics,
  ): Promise<void> {
    for (const stage of this.stages) {
      const stageStartTime = Date.now();

      try {
        const result = await stage.execute(context);
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);

        if (!result.success) {
          throw result.error ?? new Error(`Stage '${stage.name}' reported failure`);
        }

        this.updateMetrics(stage.name, result.context, metrics);

        if (!result.shouldContinue) {
          break;
        }
      } catch (error) {
        metrics.stageDurations.set(stage.name, Date.now() - stageStartTime);
        const underlying = toError(error);

        throw new PipelineError(
          `Stage '${stage.name}' failed: ${underlying.message}`,
          stage.name,
          context,
          underlying,
        );
      }
    }
  }

  private initializeStages(): PipelineStage[] {
    return [
      new VerificationStage(
        this.config.providerAdapter,
        this.config.secrets,
        this.config.skipSignatureVerification ?? false,
      ),
      new NormalizationStage(this.config.providerAdapter),
      new OrderMatchStage(this.config.storageAdapter),
      new DeduplicationStage(this.config.deduplicator),
      new StateEngineStage(this.config.orderService, this.config.deduplicator),
      new DispatchStage(this.config.scheduler),
    ];
  }

  /**
   * Normalize headers to lowercase keys; repeated headers keep the first value
   */
  private normalizeHeaders(
    headers: Record<string, string | string[] | undefined>,
  ): Record<string, string> {
    const normalized: Record<string, string> = {};
    for (const [key, value] of Object.entries(headers)) {
      const single = Array.isArray(value) ? value[0] : value;
      if (single !== undefined) {
        normalized[key.toLowerCase()] = single;
      }
    }
    return normalized;
  }

  private updateMetrics(
    stageName: string,
    context: WebhookContext,
    metrics: ProcessingMetrics,
  ): void {
    switch (stageName) {
      case 'verification':
        metrics.signatureVerified = context.signatureValid === true;
        break;
      case 'normalization':
        metrics.normalized = context.normalizedEvent !== undefined;
        break;
      case 'deduplication':
        metrics.admitted = context.admitted === true;
        break;
      case 'state-engine':
        metrics.transitionApplied = context.outcome?.kind === 'applied';
        break;
      case 'dispatch':
        metrics.dispatched = context.outcome?.kind === 'applied';
        break;
    }
  }

  private async invokeFateHook(event: WebhookFateEvent): Promise<void> {
    if (!this.hooks?.onWebhookFate) {
      return;
    }
    try {
      await this.hooks.onWebhookFate(event);
    } catch (error) {
      this.logger.warn(`onWebhookFate hook failed: ${toError(error).message}`);
    }
  }

  private async invokeErrorHook(error: Error, context: ErrorContext): Promise<void> {
    if (!this.hooks?.onError) {
      return;
    }
    try {
      await this.hooks.onError(error, context);
    } catch (hookError) {
      this.logger.warn(`onError hook failed: ${toError(hookError).message}`);
    }
  }

  getStatistics(): { stages: string[]; configuration: { skipVerification: boolean; timeoutMs: number } } {
    return {
      stages: this.stages.map((s) => s.name),
      configuration: {
        skipVerification: this.config.skipSignatureVerification ?? false,
        timeoutMs: this.timeoutMs,
      },
    };
  }
}
