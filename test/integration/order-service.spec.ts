import {
  AuditAction,
  ConcurrencyConflictError,
  OrderEvent,
  OrderStatus,
  RefundStatus,
  TriggerType,
  UnknownProductError,
} from '../../src';
import { createHarness, FulfillmentHarness } from './harness';

describe('OrderService Integration Tests', () => {
  let harness: FulfillmentHarness;

  beforeEach(() => {
    harness = createHarness();
  });

  describe('createOrder', () => {
    it('should price the order from the catalog', async () => {
      const order = await harness.orderService.createOrder({
        userId: 'user-42',
        productKind: 'detailed_profile',
        input: { name: 'Grace Hopper' },
        affiliateCode: 'AFF1',
        createdBy: 'user:user-42',
      });

      expect(order.id).toMatch(/^ORD_\d+_[0-9A-F]{8}$/);
      expect(order.status).toBe(OrderStatus.PENDING_PAYMENT);
      expect(order.amount).toBe(2999);
      expect(order.currency).toBe('USD');
      expect(order.requiresEnrichment).toBe(true);
      expect(order.affiliateCode).toBe('AFF1');
      expect(order.refundStatus).toBe(RefundStatus.NOT_REQUIRED);

      const trail = await harness.orderService.getAuditTrail(order.id);
      expect(trail).toHaveLength(1);
      expect(trail[0].action).toBe(AuditAction.ORDER_CREATED);
      expect(trail[0].performedBy).toBe('user:user-42');
    });

    it('should refuse an unknown product', async () => {
      await expect(
        harness.orderService.createOrder({ userId: 'user-1', productKind: 'horoscope', input: {} }),
      ).rejects.toThrow(UnknownProductError);
    });
  });

  describe('applyEvent', () => {
    it('should apply an allowed transition and bump the version', async () => {
      const order = await harness.createOrder();

      const outcome = await harness.orderService.applyEvent(order.id, OrderEvent.PAYMENT_CONFIRMED, {
        triggerType: TriggerType.WEBHOOK,
        eventId: 'evt_1',
        patch: { paymentReference: 'pay_1' },
      });

      expect(outcome.kind).toBe('applied');
      if (outcome.kind !== 'applied') return;
      expect(outcome.fromStatus).toBe(OrderStatus.PENDING_PAYMENT);
      expect(outcome.toStatus).toBe(OrderStatus.PAID);
      expect(outcome.order.version).toBe(order.version + 1);
      expect(outcome.order.lastProcessedEventId).toBe('evt_1');

      const trail = await harness.orderService.getAuditTrail(order.id);
      expect(trail[1]).toMatchObject({
        action: AuditAction.STATE_TRANSITION,
        stateBefore: OrderStatus.PENDING_PAYMENT,
        stateAfter: OrderStatus.PAID,
        triggerType: TriggerType.WEBHOOK,
        event: OrderEvent.PAYMENT_CONFIRMED,
      });
    });

    it('should reject a confirmation without a payment reference', async () => {
      const order = await harness.createOrder();

      const outcome = await harness.orderService.applyEvent(order.id, OrderEvent.PAYMENT_CONFIRMED, {
        triggerType: TriggerType.WEBHOOK,
      });

      expect(outcome).toMatchObject({
        kind: 'rejected',
        reason: 'Transition blocked by guards',
        guardFailures: ['A payment reference is required to confirm payment'],
      });
      expect((await harness.reload(order.id)).version).toBe(order.version);
    });

    it('should reject an event raised by a trigger that may not raise it', async () => {
      const order = await harness.createOrder();

      const outcome = await harness.orderService.applyEvent(order.id, OrderEvent.PAYMENT_CONFIRMED, {
        triggerType: TriggerType.ORCHESTRATOR,
        patch: { paymentReference: 'pay_1' },
      });

      expect(outcome).toMatchObject({
        kind: 'rejected',
        reason: `Trigger ${TriggerType.ORCHESTRATOR} may not raise ${OrderEvent.PAYMENT_CONFIRMED}`,
      });
    });

    it('should report an event that no longer applies as stale', async () => {
      const order = await harness.createOrder();
      await harness.orderService.applyEvent(order.id, OrderEvent.PAYMENT_FAILED, {
        triggerType: TriggerType.WEBHOOK,
        patch: { failureReason: 'Card declined' },
      });

      const outcome = await harness.orderService.applyEvent(order.id, OrderEvent.PAYMENT_CONFIRMED, {
        triggerType: TriggerType.WEBHOOK,
        patch: { paymentReference: 'pay_1' },
      });

      expect(outcome.kind).toBe('stale');
      expect((await harness.reload(order.id)).status).toBe(OrderStatus.FAILED);
    });

    it('should report a missing order', async () => {
      const outcome = await harness.orderService.applyEvent('ORD_0_MISSING', OrderEvent.PAYMENT_FAILED, {
        triggerType: TriggerType.SWEEPER,
      });

      expect(outcome).toEqual({ kind: 'not_found', orderId: 'ORD_0_MISSING' });
    });

    it('should re-read and retry after a lost conditional write', async () => {
      const order = await harness.createOrder();
      harness.storage.injectFailure(
        'transitionOrder',
        new ConcurrencyConflictError(order.id, OrderStatus.PENDING_PAYMENT, order.version),
      );

      const outcome = await harness.orderService.applyEvent(order.id, OrderEvent.PAYMENT_FAILED, {
        triggerType: TriggerType.WEBHOOK,
      });

      expect(outcome.kind).toBe('applied');
    });

    it('should give up after repeated conflicts', async () => {
      const order = await harness.createOrder();
      harness.storage.injectFailure(
        'transitionOrder',
        new ConcurrencyConflictError(order.id, OrderStatus.PENDING_PAYMENT, order.version),
        3,
      );

      await expect(
        harness.orderService.applyEvent(order.id, OrderEvent.PAYMENT_FAILED, { triggerType: TriggerType.WEBHOOK }),
      ).rejects.toThrow(ConcurrencyConflictError);
    });

    it('should let exactly one of two racing transitions win', async () => {
      const order = await harness.createOrder();

      const outcomes = await Promise.all([
        harness.orderService.applyEvent(order.id, OrderEvent.PAYMENT_CONFIRMED, {
          triggerType: TriggerType.WEBHOOK,
          patch: { paymentReference: 'pay_1' },
        }),
        harness.orderService.applyEvent(order.id, OrderEvent.PAYMENT_FAILED, {
          triggerType: TriggerType.SWEEPER,
        }),
      ]);

      expect(outcomes.map((o) => o.kind).sort()).toEqual(['applied', 'stale']);
    });
  });

  describe('getOrderStatus', () => {
    it('should hide the report until the order completes', async () => {
      const order = await harness.createOrder();
      await harness.deliver(harness.paidWebhook(order));

      await harness.queue.drain();
      const view = await harness.orderService.getOrderStatus(order.id, { includeAuditTrail: true });

      expect(view?.status).toBe(OrderStatus.COMPLETED);
      expect(view?.report).toContain('Ada Lovelace');
      expect(view?.refundPending).toBe(false);
      expect(view?.auditTrail?.map((entry) => entry.stateAfter)).toEqual([
        OrderStatus.PENDING_PAYMENT,
        OrderStatus.PAID,
        OrderStatus.GENERATING,
        OrderStatus.COMPLETED,
        OrderStatus.COMPLETED,
      ]);
    });

    it('should return no report for an unpaid order', async () => {
      const order = await harness.createOrder();

      const view = await harness.orderService.getOrderStatus(order.id);

      expect(view?.report).toBeNull();
      expect(view?.auditTrail).toBeUndefined();
      expect(await harness.orderService.getOrderStatus('ORD_0_MISSING')).toBeNull();
    });
  });

  describe('resolveManualRefund', () => {
    it('should refund an order awaiting a manual refund', async () => {
      const order = await harness.createOrder();
      harness.storage.injectOrder(
        order.with({
          status: OrderStatus.FAILED,
          paymentReference: 'pay_1',
          refundStatus: RefundStatus.PENDING_MANUAL,
        }),
      );

      const outcome = await harness.orderService.resolveManualRefund(order.id, 'ops@example.com', 'manual_re_1');

      expect(outcome.kind).toBe('applied');
      const refunded = await harness.reload(order.id);
      expect(refunded.status).toBe(OrderStatus.REFUNDED);
      expect(refunded.refundStatus).toBe(RefundStatus.COMPLETED);
      expect(refunded.refundReference).toBe('manual_re_1');
    });

    it('should refuse while the automatic refund is still in flight', async () => {
      const order = await harness.createOrder();
      harness.storage.injectOrder(
        order.with({
          status: OrderStatus.FAILED,
          paymentReference: 'pay_1',
          refundStatus: RefundStatus.IN_FLIGHT,
        }),
      );

      const outcome = await harness.orderService.resolveManualRefund(order.id, 'ops@example.com');

      expect(outcome).toMatchObject({
        kind: 'rejected',
        guardFailures: [`Refund status is ${RefundStatus.IN_FLIGHT}, expected ${RefundStatus.PENDING_MANUAL}`],
      });
    });
  });
});
