import { Logger } from '@nestjs/common';
import { DeliveryStatus, OrderEvent, OrderStatus, RefundStatus, TriggerType } from '../domain/enums';
import { Order } from '../domain/models';
import { StorageAdapter } from '../interfaces';
import { EventDeduplicator } from '../services/event-deduplicator';
import { OrderService } from '../services/order.service';
import { FulfillmentOrchestrator } from './fulfillment-orchestrator';

export interface RecoverySummary {
  resumed: string[];
  flaggedForOperator: string[];
}

export const PAYMENT_TIMEOUT_REASON = 'Payment timeout';

/**
 * Startup recovery and periodic housekeeping
 */
export class FulfillmentRecovery {
  private readonly logger = new Logger(FulfillmentRecovery.name);

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly orderService: OrderService,
    private readonly orchestrator: FulfillmentOrchestrator,
    private readonly deduplicator: EventDeduplicator,
  ) {}

  /**
   * Re-queue every order a previous process left mid-flight. Refunds that were
   * in flight are handed to an operator instead of being re-issued.
   */
  async recoverAll(): Promise<RecoverySummary> {
    const { resumable, interrupted } = await this.findUnfinishedOrders();
    const summary = await this.takeOver(resumable, interrupted);

    if (summary.resumed.length > 0 || summary.flaggedForOperator.length > 0) {
      this.logger.log(
        `Recovery: resumed ${summary.resumed.length} order(s), flagged ${summary.flaggedForOperator.length} refund(s) for review`,
      );
    }
    return summary;
  }

  /**
   * Pick up unfinished orders whose fulfillment job died, e.g. on a storage
   * error. Orders with queued work in this process, or written within the
   * grace window, are left alone.
   */
  async resumeStalledOrders(graceMs: number, now: Date = new Date()): Promise<RecoverySummary> {
    const cutoff = now.getTime() - graceMs;
    const isStalled = (order: Order): boolean =>
      order.updatedAt.getTime() <= cutoff && !this.orchestrator.isActive(order.id);

    const { resumable, interrupted } = await this.findUnfinishedOrders();
    const summary = await this.takeOver(resumable.filter(isStalled), interrupted.filter(isStalled));

    if (summary.resumed.length > 0 || summary.flaggedForOperator.length > 0) {
      this.logger.warn(
        `Stalled orders: resumed ${summary.resumed.length}, flagged ${summary.flaggedForOperator.length} refund(s) for review`,
      );
    }
    return summary;
  }

  private async findUnfinishedOrders(): Promise<{ resumable: Order[]; interrupted: Order[] }> {
    const [inFlight, undelivered, refundsOwed, interrupted] = await Promise.all([
      this.storageAdapter.findOrders({ statuses: [OrderStatus.PAID, OrderStatus.GENERATING] }),
      this.storageAdapter.findOrders({
        statuses: [OrderStatus.COMPLETED],
        deliveryStatus: DeliveryStatus.PENDING,
      }),
      this.storageAdapter.findOrders({
        statuses: [OrderStatus.FAILED],
        refundStatus: RefundStatus.SCHEDULED,
      }),
      this.storageAdapter.findOrders({
        statuses: [OrderStatus.FAILED],
        refundStatus: RefundStatus.IN_FLIGHT,
      }),
    ]);
    return { resumable: [...inFlight, ...undelivered, ...refundsOwed], interrupted };
  }

  private async takeOver(resumable: Order[], interrupted: Order[]): Promise<RecoverySummary> {
    const resumed: string[] = [];
    for (const order of resumable) {
      if (this.orchestrator.resume(order.id)) {
        resumed.push(order.id);
      }
    }

    const flaggedForOperator: string[] = [];
    for (const order of interrupted) {
      await this.orchestrator.flagInterruptedRefund(order);
      flaggedForOperator.push(order.id);
    }

    return { resumed, flaggedForOperator };
  }

  /**
   * Fail orders that stayed unpaid past the timeout
   * @returns ids of the expired orders
   */
  async expireUnpaidOrders(timeoutMinutes: number, now: Date = new Date()): Promise<string[]> {
    const cutoff = new Date(now.getTime() - timeoutMinutes * 60_000);
    const stale = await this.storageAdapter.findOrders({
      statuses: [OrderStatus.PENDING_PAYMENT],
      createdBefore: cutoff,
    });

    const expired: string[] = [];
    for (const order of stale) {
      const outcome = await this.orderService.applyEvent(order.id, OrderEvent.PAYMENT_FAILED, {
        triggerType: TriggerType.SWEEPER,
        patch: { failureReason: PAYMENT_TIMEOUT_REASON },
        metadata: { timeoutMinutes },
      });
      if (outcome.kind === 'applied') {
        expired.push(order.id);
        this.orchestrator.schedule(order.id, outcome.sideEffects);
      }
    }

    if (expired.length > 0) {
      this.logger.log(`Expired ${expired.length} unpaid order(s)`);
    }
    return expired;
  }

  async purgeProcessedEvents(retentionDays: number, now: Date = new Date()): Promise<number> {
    const cutoff = new Date(now.getTime() - retentionDays * 24 * 60 * 60_000);
    const purged = await this.deduplicator.purgeOlderThan(cutoff);
    if (purged > 0) {
      this.logger.log(`Purged ${purged} processed-event record(s) older than ${retentionDays} days`);
    }
    return purged;
  }
}
