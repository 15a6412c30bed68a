import { Logger } from '@nestjs/common';
import {
  AuditAction,
  DeliveryStatus,
  MessageKind,
  OrderEvent,
  OrderStatus,
  RefundStatus,
  TriggerType,
} from '../domain/enums';
import { ConcurrencyConflictError } from '../domain/errors';
import { Order } from '../domain/models';
import {
  ContentGenerator,
  CreateAuditLogDto,
  EnrichmentProvider,
  FulfillmentPolicies,
  FulfillmentStep,
  LifecycleHooks,
  Notifier,
  OrderPatch,
  PaymentProviderAdapter,
  StorageAdapter,
} from '../interfaces';
import { NotificationService } from '../services/notification.service';
import { OrderService, TransitionOutcome } from '../services/order.service';
import { SideEffect } from '../state-machine';
import { calculateCommission, CommissionSchedule, DEFAULT_COMMISSION_SCHEDULE } from './commission';
import { DownstreamError, RefundFailedError, toError } from './errors';
import { FulfillmentQueue } from './fulfillment-queue';
import { retryWithBackoff, RetryOutcome, withTimeout } from './retry';

/**
 * Upper bound on status advances per run; the linear path needs three
 */
const MAX_ADVANCES = 6;

export interface FulfillmentCollaborators {
  enrichment: EnrichmentProvider;
  contentGenerator: ContentGenerator;
  notifier: Notifier;
  paymentProvider: PaymentProviderAdapter;
}

export interface OrchestratorOptions {
  policies: FulfillmentPolicies;
  commission?: CommissionSchedule;
  hooks?: LifecycleHooks;
  jitterFn?: () => number;
  sleepFn?: (ms: number) => Promise<void>;
}

/**
 * Drives paid orders through enrichment, generation and delivery, and
 * compensates with a refund when a step gives up.
 *
 * Every step starts from a fresh read of the order and acts on the stored
 * status, so a run can be repeated or resumed after a crash at any point.
 */
export class FulfillmentOrchestrator {
  private readonly logger = new Logger(FulfillmentOrchestrator.name);

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly orderService: OrderService,
    private readonly notifications: NotificationService,
    private readonly collaborators: FulfillmentCollaborators,
    private readonly queue: FulfillmentQueue,
    private readonly options: OrchestratorOptions,
  ) {}

  /**
   * Hand the side effects of a committed transition to the queue
   */
  schedule(orderId: string, effects: SideEffect[]): void {
    if (effects.length === 0) {
      return;
    }
    this.queue.enqueue(orderId, `effects[${effects.join(',')}]`, () =>
      this.performSideEffects(orderId, effects),
    );
  }

  /**
   * Queue a run of the pipeline for an order found in flight
   */
  resume(orderId: string): boolean {
    return this.queue.enqueue(orderId, 'resume', () => this.run(orderId));
  }

  /**
   * Whether work for the order is queued or running in this process
   */
  isActive(orderId: string): boolean {
    return this.queue.isActive(orderId);
  }

  /**
   * Advance the order as far as it goes
   */
  async run(orderId: string): Promise<void> {
    for (let i = 0; i < MAX_ADVANCES; i++) {
      const order = await this.storageAdapter.findOrder(orderId);
      if (!order) {
        this.logger.warn(`Order ${orderId} disappeared during fulfillment`);
        return;
      }
      if (!(await this.advance(order))) {
        return;
      }
    }
    this.logger.warn(`Order ${orderId} still advancing after ${MAX_ADVANCES} steps`);
  }

  async performSideEffects(orderId: string, effects: SideEffect[]): Promise<void> {
    for (const effect of effects) {
      const order = await this.storageAdapter.findOrder(orderId);
      if (!order) {
        return;
      }

      switch (effect) {
        case SideEffect.NOTIFY_PAYMENT_ACK:
          await this.notifications.send(order, MessageKind.PAYMENT_ACK);
          break;
        case SideEffect.ENQUEUE_FULFILLMENT:
          await this.run(orderId);
          break;
        case SideEffect.NOTIFY_FAILURE:
          await this.notifications.send(order, MessageKind.FAILURE);
          break;
        case SideEffect.DELIVER_CONTENT:
          await this.deliverReport(order);
          break;
        case SideEffect.CREDIT_AFFILIATE:
          await this.creditAffiliate(order);
          break;
        case SideEffect.INITIATE_REFUND:
          await this.compensate(order);
          break;
        case SideEffect.NOTIFY_REFUND:
          await this.notifications.send(order, MessageKind.REFUND_DONE);
          break;
      }
    }
  }

  /**
   * Operator confirms an out-of-band refund for a `pending_manual` order
   */
  async resolveManualRefund(
    orderId: string,
    operator: string,
    refundReference?: string,
  ): Promise<TransitionOutcome> {
    const outcome = await this.orderService.resolveManualRefund(orderId, operator, refundReference);
    if (outcome.kind === 'applied') {
      this.schedule(orderId, outcome.sideEffects);
    }
    return outcome;
  }

  /**
   * A refund claimed before a restart has an unknown outcome; it is never
   * re-issued automatically
   */
  async flagInterruptedRefund(order: Order): Promise<void> {
    if (order.status !== OrderStatus.FAILED || order.refundStatus !== RefundStatus.IN_FLIGHT) {
      return;
    }
    await this.handOverToOperator(
      order,
      new Error('Refund outcome unknown: process stopped while the refund was in flight'),
    );
  }

  /**
   * @returns true when the order moved and the caller should re-read it
   */
  private async advance(order: Order): Promise<boolean> {
    switch (order.status) {
      case OrderStatus.PAID:
        return this.runEnrichment(order);
      case OrderStatus.GENERATING:
        return this.runGeneration(order);
      case OrderStatus.COMPLETED:
        if (order.deliveryStatus === DeliveryStatus.PENDING) {
          await this.performSideEffects(order.id, [
            SideEffect.DELIVER_CONTENT,
            SideEffect.CREDIT_AFFILIATE,
          ]);
        }
        return false;
      case OrderStatus.FAILED:
        if (order.refundStatus === RefundStatus.SCHEDULED) {
          await this.compensate(order);
        }
        return false;
      default:
        return false;
    }
  }

  private async runEnrichment(order: Order): Promise<boolean> {
    let enrichmentData = order.enrichmentData;

    if (order.requiresEnrichment && enrichmentData === null) {
      const outcome = await this.runStep('enrichment', order, (signal) =>
        this.collaborators.enrichment.fetchEnrichmentData(order.input, { signal }),
      );
      if (!outcome.ok) {
        await this.failOrder(order.id, 'enrichment', outcome.error);
        return false;
      }
      enrichmentData = outcome.value;
    }

    const result = await this.orderService.applyEvent(order.id, OrderEvent.ENRICHMENT_DONE, {
      triggerType: TriggerType.ORCHESTRATOR,
      patch: { enrichmentData },
      metadata: { enriched: enrichmentData !== null },
    });
    return this.afterTransition(result);
  }

  private async runGeneration(order: Order): Promise<boolean> {
    const outcome = await this.runStep('generation', order, (signal) =>
      this.collaborators.contentGenerator.generateContent(order.input, order.enrichmentData, {
        signal,
      }),
    );
    if (!outcome.ok) {
      await this.failOrder(order.id, 'generation', outcome.error);
      return false;
    }

    const result = await this.orderService.applyEvent(order.id, OrderEvent.GENERATION_DONE, {
      triggerType: TriggerType.ORCHESTRATOR,
      patch: { generatedContent: outcome.value },
      metadata: { contentLength: outcome.value.length },
    });
    return this.afterTransition(result);
  }

  private async afterTransition(result: TransitionOutcome): Promise<boolean> {
    switch (result.kind) {
      case 'applied':
        await this.performSideEffects(result.order.id, result.sideEffects);
        return true;
      case 'stale':
        // Another worker moved the order; re-read and continue from there
        return true;
      case 'rejected':
        this.logger.error(
          `Transition rejected for order ${result.order.id}: ${result.reason} ${result.guardFailures.join('; ')}`,
        );
        return false;
      case 'not_found':
        return false;
    }
  }

  private async failOrder(orderId: string, step: FulfillmentStep, error: Error): Promise<void> {
    const order = await this.storageAdapter.findOrder(orderId);
    if (!order) {
      return;
    }

    this.logger.error(`Fulfillment step ${step} failed for order ${orderId}: ${error.message}`);

    const owesRefund = order.isPaymentCaptured() && !order.money.isZero();
    const result = await this.orderService.applyEvent(orderId, OrderEvent.PIPELINE_ERROR, {
      triggerType: TriggerType.ORCHESTRATOR,
      patch: {
        failureReason: `${step} failed: ${error.message}`,
        refundStatus: owesRefund ? RefundStatus.SCHEDULED : RefundStatus.NOT_REQUIRED,
      },
      metadata: { step, error: error.message },
    });

    if (result.kind === 'applied') {
      await this.performSideEffects(orderId, result.sideEffects);
    }
  }

  private async deliverReport(order: Order): Promise<void> {
    if (order.deliveryStatus !== DeliveryStatus.PENDING || order.status !== OrderStatus.COMPLETED) {
      return;
    }

    const payload = this.notifications.buildPayload(order, MessageKind.REPORT_READY);
    const outcome = await this.runStep('delivery', order, async (signal) => {
      const result = await this.collaborators.notifier.notify(
        order.userId,
        MessageKind.REPORT_READY,
        payload,
        { signal },
      );
      if (result !== 'delivered') {
        throw new DownstreamError('Notifier reported the report as undelivered', 'delivery');
      }
      return result;
    });

    const deliveryStatus = outcome.ok ? DeliveryStatus.DELIVERED : DeliveryStatus.FAILED;
    if (!outcome.ok) {
      // The report stays retrievable through the order status endpoint
      this.logger.error(`Report delivery for order ${order.id} failed: ${outcome.error.message}`);
    }

    await this.updateQuietly(order, { deliveryStatus }, AuditAction.DELIVERY_STATUS_CHANGED);
  }

  private async creditAffiliate(order: Order): Promise<void> {
    if (!order.affiliateCode || order.status !== OrderStatus.COMPLETED) {
      return;
    }

    try {
      const totals = await this.storageAdapter.getAffiliateTotals(order.affiliateCode);
      const quote = calculateCommission(
        order.money,
        totals.totalSales,
        this.options.commission ?? DEFAULT_COMMISSION_SCHEDULE,
      );

      const { entry, created } = await this.storageAdapter.appendLedgerEntry({
        affiliateCode: order.affiliateCode,
        orderId: order.id,
        orderAmount: order.amount,
        currency: order.currency,
        commissionRate: quote.rate,
        commissionAmount: quote.commission.amount,
        bonusAmount: quote.bonus.amount,
      });

      if (created) {
        this.logger.log(
          `Credited ${entry.totalCredit().format()} to affiliate ${entry.affiliateCode} for order ${order.id}`,
        );
      }
    } catch (error) {
      const err = toError(error);
      this.logger.error(`Affiliate credit for order ${order.id} failed: ${err.message}`);
      await this.invokeHook(() =>
        this.options.hooks?.onError?.(err, { operation: 'credit_affiliate', orderId: order.id }),
      );
    }
  }

  /**
   * Claim the scheduled refund, call the provider once, then settle the order
   * or hand it to an operator
   */
  private async compensate(order: Order): Promise<void> {
    if (order.status !== OrderStatus.FAILED || order.refundStatus !== RefundStatus.SCHEDULED) {
      return;
    }

    const paymentReference = order.paymentReference;
    if (paymentReference === null) {
      await this.handOverToOperator(order, new Error('No payment reference to refund against'));
      return;
    }

    let claimed: Order;
    try {
      claimed = await this.storageAdapter.updateOrder(
        order.id,
        order.version,
        { refundStatus: RefundStatus.IN_FLIGHT },
        this.auditEntry(order, AuditAction.REFUND_STATUS_CHANGED, { refundStatus: RefundStatus.IN_FLIGHT }),
      );
    } catch (error) {
      if (error instanceof ConcurrencyConflictError) {
        this.logger.log(`Refund for order ${order.id} already claimed elsewhere`);
        return;
      }
      throw error;
    }

    let refundReference: string;
    try {
      const result = await withTimeout(
        (signal) =>
          this.collaborators.paymentProvider.issueRefund(
            paymentReference,
            {
              orderId: order.id,
              amount: order.money,
              reason: order.failureReason ?? 'Order could not be fulfilled',
            },
            { signal },
          ),
        this.options.policies.refundTimeoutMs,
        `refund for ${order.id}`,
      );
      refundReference = result.refundReference;
    } catch (error) {
      await this.handOverToOperator(claimed, toError(error));
      return;
    }

    const outcome = await this.orderService.applyEvent(order.id, OrderEvent.REFUND_DONE, {
      triggerType: TriggerType.ORCHESTRATOR,
      patch: { refundStatus: RefundStatus.COMPLETED, refundReference },
      metadata: { refundReference },
    });

    if (outcome.kind === 'applied') {
      this.logger.log(`Refunded order ${order.id} (${refundReference})`);
      await this.performSideEffects(order.id, outcome.sideEffects);
      return;
    }

    const err = new Error(`Refund ${refundReference} issued but order ${order.id} not settled: ${outcome.kind}`);
    this.logger.error(err.message);
    await this.invokeHook(() =>
      this.options.hooks?.onError?.(err, { operation: 'refund', orderId: order.id }),
    );
  }

  private async handOverToOperator(order: Order, cause: Error): Promise<void> {
    const error = new RefundFailedError(order.id, cause);
    this.logger.error(`${error.message}; manual refund required`);

    const updated = await this.updateQuietly(
      order,
      { refundStatus: RefundStatus.PENDING_MANUAL },
      AuditAction.REFUND_STATUS_CHANGED,
      { error: cause.message },
    );

    await this.invokeHook(() =>
      this.options.hooks?.onRefundFailed?.({ order: updated ?? order, error }),
    );
  }

  /**
   * Conditional non-status write; a lost race is logged, not thrown
   */
  private async updateQuietly(
    order: Order,
    patch: OrderPatch,
    action: AuditAction,
    metadata: Record<string, unknown> = {},
  ): Promise<Order | null> {
    try {
      return await this.storageAdapter.updateOrder(
        order.id,
        order.version,
        patch,
        this.auditEntry(order, action, { ...patch, ...metadata }),
      );
    } catch (error) {
      if (error instanceof ConcurrencyConflictError) {
        this.logger.warn(`Order ${order.id} changed concurrently; skipped ${action}`);
        return null;
      }
      throw error;
    }
  }

  private auditEntry(
    order: Order,
    action: AuditAction,
    metadata: Record<string, unknown>,
  ): CreateAuditLogDto {
    return {
      orderId: order.id,
      action,
      stateBefore: order.status,
      stateAfter: order.status,
      triggerType: TriggerType.ORCHESTRATOR,
      metadata,
    };
  }

  private runStep<T>(
    step: FulfillmentStep,
    order: Order,
    operation: (signal: AbortSignal) => Promise<T>,
  ): Promise<RetryOutcome<T>> {
    return retryWithBackoff((signal) => operation(signal), {
      policy: this.options.policies.steps[step],
      label: `${step} for ${order.id}`,
      jitterFn: this.options.jitterFn,
      sleepFn: this.options.sleepFn,
      onRetry: (attempt, error, delayMs) =>
        this.logger.warn(
          `${step} attempt ${attempt} for order ${order.id} failed (${error.message}); retrying in ${delayMs}ms`,
        ),
    });
  }

  private async invokeHook(call: () => void | Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      this.logger.error(`Lifecycle hook failed: ${toError(error).message}`);
    }
  }
}
