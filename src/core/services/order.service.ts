import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { AuditAction, OrderEvent, OrderStatus, RefundStatus, TriggerType } from '../domain/enums';
import { ConcurrencyConflictError, OrderNotFoundError } from '../domain/errors';
import { AuditLog, JsonObject, Order } from '../domain/models';
import { ProductCatalog } from '../domain/product-catalog';
import {
  AffiliateTotals,
  EventDispatcher,
  OrderPatch,
  StorageAdapter,
} from '../interfaces';
import { OrderStateMachine, SideEffect } from '../state-machine';

const MAX_CONFLICT_RETRIES = 3;

export interface CreateOrderRequest {
  userId: string;
  productKind: string;
  input: JsonObject;
  affiliateCode?: string | null;
  createdBy?: string;
}

export interface ApplyEventOptions {
  triggerType: TriggerType;
  performedBy?: string;
  /**
   * Provider event id; recorded as the order's last processed event
   */
  eventId?: string;
  patch?: OrderPatch;
  metadata?: JsonObject;
}

export type TransitionOutcome =
  | {
      kind: 'applied';
      order: Order;
      fromStatus: OrderStatus;
      toStatus: OrderStatus;
      sideEffects: SideEffect[];
    }
  | { kind: 'stale'; order: Order; reason: string }
  | {
      kind: 'rejected';
      order: Order;
      reason: string;
      guardFailures: string[];
    }
  | { kind: 'not_found'; orderId: string };

export interface OrderStatusView {
  orderId: string;
  userId: string;
  productKind: string;
  status: OrderStatus;
  amount: number;
  currency: string;
  paymentReference: string | null;
  refundStatus: RefundStatus;
  refundPending: boolean;
  deliveryStatus: string;
  report: string | null;
  failureReason: string | null;
  createdAt: Date;
  updatedAt: Date;
  auditTrail?: AuditLog[];
}

/**
 * Order identifiers: ORD_<unix seconds>_<8 upper-case hex>
 */
export function generateOrderId(now: Date = new Date()): string {
  const seconds = Math.floor(now.getTime() / 1000);
  const suffix = uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase();
  return `ORD_${seconds}_${suffix}`;
}

/**
 * Query-first Order Service
 *
 * Every status change goes through applyEvent: read the order, let the state
 * machine decide, write conditionally, and on a lost race re-read and decide
 * again.
 */
export class OrderService {
  private readonly logger = new Logger(OrderService.name);

  constructor(
    private readonly storageAdapter: StorageAdapter,
    private readonly stateMachine: OrderStateMachine,
    private readonly catalog: ProductCatalog,
    private readonly eventDispatcher?: EventDispatcher,
  ) {}

  /**
   * Create an order in pending_payment. Price and enrichment requirement come
   * from the product catalog.
   */
  async createOrder(request: CreateOrderRequest): Promise<Order> {
    const product = this.catalog.get(request.productKind);

    const order = await this.storageAdapter.createOrder({
      id: generateOrderId(),
      userId: request.userId,
      productKind: product.kind,
      input: request.input,
      amount: product.amount,
      currency: product.currency,
      requiresEnrichment: product.requiresEnrichment,
      affiliateCode: request.affiliateCode ?? null,
      createdBy: request.createdBy,
    });

    this.logger.log(`Order ${order.id} created for ${product.kind} (${order.money.format()})`);
    return order;
  }

  async getOrder(orderId: string): Promise<Order | null> {
    return this.storageAdapter.findOrder(orderId);
  }

  /**
   * Status snapshot for the front-end; the report is included once completed
   */
  async getOrderStatus(
    orderId: string,
    options: { includeAuditTrail?: boolean } = {},
  ): Promise<OrderStatusView | null> {
    const order = await this.storageAdapter.findOrder(orderId);
    if (!order) {
      return null;
    }

    const view: OrderStatusView = {
      orderId: order.id,
      userId: order.userId,
      productKind: order.productKind,
      status: order.status,
      amount: order.amount,
      currency: order.currency,
      paymentReference: order.paymentReference,
      refundStatus: order.refundStatus,
      refundPending: order.isRefundPending(),
      deliveryStatus: order.deliveryStatus,
      report: order.status === OrderStatus.COMPLETED ? order.generatedContent : null,
      failureReason: order.failureReason,
      createdAt: order.createdAt,
      updatedAt: order.updatedAt,
    };

    if (options.includeAuditTrail) {
      view.auditTrail = await this.storageAdapter.getAuditTrail(order.id);
    }

    return view;
  }

  /**
   * Apply a named event to an order.
   *
   * Outcomes other than `applied` leave the order untouched. A conditional
   * write that loses a race is retried from a fresh read; if the winner moved
   * the order on, the retry reports `stale`.
   */
  async applyEvent(
    orderId: string,
    event: OrderEvent,
    options: ApplyEventOptions,
  ): Promise<TransitionOutcome> {
    for (let attempt = 1; ; attempt++) {
      const order = await this.storageAdapter.findOrder(orderId);
      if (!order) {
        return { kind: 'not_found', orderId };
      }

      const decision = await this.stateMachine.decide({
        order,
        event,
        triggerType: options.triggerType,
        patch: options.patch,
        metadata: options.metadata,
      });

      if (!decision.allowed) {
        if (decision.rejection === 'stale') {
          this.logger.debug(`Stale ${event} for order ${orderId}: ${decision.reason}`);
          return { kind: 'stale', order, reason: decision.reason };
        }
        this.logger.warn(`Rejected ${event} for order ${orderId}: ${decision.reason}`);
        return {
          kind: 'rejected',
          order,
          reason: decision.reason,
          guardFailures: decision.guardFailures ?? [],
        };
      }

      const patch: OrderPatch = { ...options.patch };
      if (options.eventId) {
        patch.lastProcessedEventId = options.eventId;
      }

      let updated: Order;
      try {
        updated = await this.storageAdapter.transitionOrder(orderId, {
          expectedStatus: order.status,
          expectedVersion: order.version,
          toStatus: decision.toStatus,
          patch,
          audit: {
            event,
            triggerType: options.triggerType,
            performedBy: options.performedBy,
            metadata: options.metadata,
          },
        });
      } catch (error) {
        if (error instanceof OrderNotFoundError) {
          return { kind: 'not_found', orderId };
        }
        if (error instanceof ConcurrencyConflictError && attempt < MAX_CONFLICT_RETRIES) {
          this.logger.debug(`Conflict applying ${event} to ${orderId}, re-reading (attempt ${attempt})`);
          continue;
        }
        throw error;
      }

      this.logger.log(`Order ${orderId}: ${decision.fromStatus} -> ${decision.toStatus} (${event})`);

      await this.eventDispatcher?.dispatch(event, {
        event,
        order: updated,
        fromStatus: decision.fromStatus,
        toStatus: decision.toStatus,
        triggerType: options.triggerType,
        occurredAt: new Date(),
      });

      return {
        kind: 'applied',
        order: updated,
        fromStatus: decision.fromStatus,
        toStatus: decision.toStatus,
        sideEffects: decision.sideEffects,
      };
    }
  }

  /**
   * Record that an operator refunded a `pending_manual` order out of band
   */
  async resolveManualRefund(
    orderId: string,
    operator: string,
    refundReference?: string,
  ): Promise<TransitionOutcome> {
    return this.applyEvent(orderId, OrderEvent.REFUND_DONE, {
      triggerType: TriggerType.OPERATOR,
      performedBy: operator,
      patch: {
        refundStatus: RefundStatus.COMPLETED,
        ...(refundReference ? { refundReference } : {}),
      },
      metadata: { action: AuditAction.MANUAL_REFUND_RESOLVED },
    });
  }

  async getAuditTrail(orderId: string): Promise<AuditLog[]> {
    return this.storageAdapter.getAuditTrail(orderId);
  }

  async getAffiliateSummary(affiliateCode: string): Promise<AffiliateTotals> {
    return this.storageAdapter.getAffiliateTotals(affiliateCode);
  }
}
