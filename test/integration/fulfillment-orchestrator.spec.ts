import {
  DEFAULT_FULFILLMENT_POLICIES,
  DeliveryStatus,
  DownstreamError,
  MessageKind,
  Order,
  OrderStatus,
  RefundStatus,
  SideEffect,
} from '../../src';
import { createHarness, FulfillmentHarness, HarnessOptions } from './harness';

describe('FulfillmentOrchestrator Integration Tests', () => {
  let harness: FulfillmentHarness;

  const setup = (options: HarnessOptions = {}) => {
    harness = createHarness(options);
  };

  /**
   * An order whose payment was confirmed, as the webhook pipeline leaves it
   */
  const paidOrder = async (productKind = 'name_analysis', affiliateCode?: string): Promise<Order> => {
    const order = await harness.createOrder(productKind, affiliateCode);
    const paid = order.with({ status: OrderStatus.PAID, paymentReference: 'pay_1' });
    harness.storage.injectOrder(paid);
    return paid;
  };

  beforeEach(() => setup());

  afterEach(async () => {
    await harness.queue.close();
  });

  describe('Happy path', () => {
    it('should enrich, generate, deliver and credit the affiliate', async () => {
      const order = await paidOrder('detailed_profile', 'AFF1');

      await harness.orchestrator.run(order.id);

      const completed = await harness.reload(order.id);
      expect(completed.status).toBe(OrderStatus.COMPLETED);
      expect(completed.enrichmentData).toEqual({ numerology: 7 });
      expect(completed.deliveryStatus).toBe(DeliveryStatus.DELIVERED);
      expect(harness.enrichment.calls).toHaveLength(1);
      expect(harness.contentGenerator.calls[0].enrichmentData).toEqual({ numerology: 7 });
      expect(harness.notifier.kinds(order.id)).toEqual([MessageKind.REPORT_READY]);

      expect(await harness.orderService.getAffiliateSummary('AFF1')).toEqual({
        affiliateCode: 'AFF1',
        totalSales: 2999,
        totalCommission: 600,
        totalBonus: 0,
        entryCount: 1,
      });
    });

    it('should skip enrichment for products that do not need it', async () => {
      const order = await paidOrder('name_analysis');

      await harness.orchestrator.run(order.id);

      const completed = await harness.reload(order.id);
      expect(completed.status).toBe(OrderStatus.COMPLETED);
      expect(completed.enrichmentData).toBeNull();
      expect(harness.enrichment.calls).toHaveLength(0);
      expect(harness.contentGenerator.calls[0].enrichmentData).toBeNull();
    });

    it('should credit an affiliate once per order', async () => {
      const order = await paidOrder('name_analysis', 'AFF1');
      await harness.orchestrator.run(order.id);

      await harness.orchestrator.performSideEffects(order.id, [SideEffect.CREDIT_AFFILIATE]);

      const summary = await harness.orderService.getAffiliateSummary('AFF1');
      expect(summary.entryCount).toBe(1);
      expect(summary.totalCommission).toBe(200);
    });

    it('should be a no-op when run again on a completed order', async () => {
      const order = await paidOrder();
      await harness.orchestrator.run(order.id);
      const completed = await harness.reload(order.id);

      await harness.orchestrator.run(order.id);

      expect((await harness.reload(order.id)).version).toBe(completed.version);
      expect(harness.contentGenerator.calls).toHaveLength(1);
    });
  });

  describe('Retries', () => {
    it('should retry a failing step until it succeeds', async () => {
      const order = await paidOrder();
      harness.contentGenerator.behavior.failNext(undefined, 2);

      await harness.orchestrator.run(order.id);

      expect((await harness.reload(order.id)).status).toBe(OrderStatus.COMPLETED);
      expect(harness.contentGenerator.calls).toHaveLength(3);
    });

    it('should not retry a non-retryable failure', async () => {
      const order = await paidOrder();
      harness.contentGenerator.behavior.failNext(new DownstreamError('HTTP 400', 'generation', false, 400));

      await harness.orchestrator.run(order.id);

      const failed = await harness.reload(order.id);
      expect(failed.status).toBe(OrderStatus.REFUNDED);
      expect(failed.failureReason).toBe('generation failed: HTTP 400');
      expect(harness.contentGenerator.calls).toHaveLength(1);
    });

    it('should fail a step whose every attempt times out', async () => {
      setup({
        policies: {
          steps: {
            ...DEFAULT_FULFILLMENT_POLICIES.steps,
            enrichment: { ...DEFAULT_FULFILLMENT_POLICIES.steps.enrichment, maxAttempts: 2, timeoutMs: 20 },
          },
        },
      });
      const order = await paidOrder('detailed_profile');
      harness.enrichment.behavior.setDelay(1_000);

      await harness.orchestrator.run(order.id);

      const failed = await harness.reload(order.id);
      expect(failed.failureReason).toMatch(/^enrichment failed: /);
      expect(harness.enrichment.calls).toHaveLength(2);
      expect(harness.contentGenerator.calls).toHaveLength(0);
    });
  });

  describe('Compensation', () => {
    it('should refund the payment when generation gives up', async () => {
      const order = await paidOrder();
      harness.contentGenerator.behavior.failNext(undefined, 3);

      await harness.orchestrator.run(order.id);

      const refunded = await harness.reload(order.id);
      expect(refunded.status).toBe(OrderStatus.REFUNDED);
      expect(refunded.refundStatus).toBe(RefundStatus.COMPLETED);
      expect(refunded.refundReference).toBe('mock_refund_1');
      expect(refunded.failureReason).toBe('generation failed: generation failed');

      expect(harness.provider.refundCalls).toHaveLength(1);
      expect(harness.provider.refundCalls[0].paymentReference).toBe('pay_1');
      expect(harness.provider.refundCalls[0].request.amount.amount).toBe(999);

      expect(harness.notifier.kinds(order.id)).toEqual([MessageKind.FAILURE, MessageKind.REFUND_DONE]);
      expect(harness.notifier.sent[0].payload.text).toBe(
        `We could not complete order ${order.id}. A refund of 9.99 USD is on its way.`,
      );
    });

    it('should hand a rejected refund to an operator', async () => {
      const order = await paidOrder();
      harness.contentGenerator.behavior.failNext(undefined, 3);
      harness.provider.failNextRefund();

      await harness.orchestrator.run(order.id);

      const failed = await harness.reload(order.id);
      expect(failed.status).toBe(OrderStatus.FAILED);
      expect(failed.refundStatus).toBe(RefundStatus.PENDING_MANUAL);
      expect(harness.refundFailures).toHaveLength(1);
      expect(harness.refundFailures[0].order.refundStatus).toBe(RefundStatus.PENDING_MANUAL);
      expect(harness.refundFailures[0].error.message).toBe(
        `Refund for order ${order.id} failed: Refund rejected`,
      );
      expect(harness.notifier.kinds(order.id)).toEqual([MessageKind.FAILURE]);

      const view = await harness.orderService.getOrderStatus(order.id);
      expect(view?.refundPending).toBe(true);
    });

    it('should hand a refund that times out to an operator', async () => {
      setup({ policies: { refundTimeoutMs: 20 } });
      const order = await paidOrder();
      harness.contentGenerator.behavior.failNext(undefined, 3);
      harness.provider.setRefundDelay(1_000);

      await harness.orchestrator.run(order.id);

      expect((await harness.reload(order.id)).refundStatus).toBe(RefundStatus.PENDING_MANUAL);
      expect(harness.refundFailures).toHaveLength(1);
    });

    it('should not refund a free order', async () => {
      const order = await paidOrder('daily_card');
      harness.contentGenerator.behavior.failNext(undefined, 3);

      await harness.orchestrator.run(order.id);

      const failed = await harness.reload(order.id);
      expect(failed.status).toBe(OrderStatus.FAILED);
      expect(failed.refundStatus).toBe(RefundStatus.NOT_REQUIRED);
      expect(harness.provider.refundCalls).toHaveLength(0);
      expect(harness.notifier.sent[0].payload.text).toBe(
        `Order ${order.id} could not be completed: generation failed: generation failed`,
      );
    });

    it('should settle a manual refund confirmed by an operator', async () => {
      const order = await paidOrder();
      harness.contentGenerator.behavior.failNext(undefined, 3);
      harness.provider.failNextRefund();
      await harness.orchestrator.run(order.id);

      const outcome = await harness.orchestrator.resolveManualRefund(order.id, 'ops@example.com', 'manual_re_1');
      await harness.queue.drain();

      expect(outcome.kind).toBe('applied');
      expect((await harness.reload(order.id)).status).toBe(OrderStatus.REFUNDED);
      expect(harness.notifier.kinds(order.id)).toEqual([MessageKind.FAILURE, MessageKind.REFUND_DONE]);
    });
  });

  describe('Delivery', () => {
    it('should keep the order completed when delivery fails', async () => {
      const order = await paidOrder('name_analysis', 'AFF1');
      harness.notifier.reportFailedDelivery(3);

      await harness.orchestrator.run(order.id);

      const completed = await harness.reload(order.id);
      expect(completed.status).toBe(OrderStatus.COMPLETED);
      expect(completed.deliveryStatus).toBe(DeliveryStatus.FAILED);
      expect(harness.notifier.sent.map((message) => message.result)).toEqual(['failed', 'failed', 'failed']);
      expect((await harness.orderService.getAffiliateSummary('AFF1')).entryCount).toBe(1);

      const view = await harness.orderService.getOrderStatus(order.id);
      expect(view?.report).toBe(completed.generatedContent);
    });

    it('should not let a stalled notifier hold up fulfillment', async () => {
      setup({
        policies: {
          steps: {
            ...DEFAULT_FULFILLMENT_POLICIES.steps,
            delivery: { ...DEFAULT_FULFILLMENT_POLICIES.steps.delivery, timeoutMs: 20 },
          },
          notificationTimeoutMs: 20,
        },
      });
      const order = await harness.createOrder();
      harness.notifier.behavior.setDelay(60_000);

      await harness.deliver(harness.paidWebhook(order));
      await harness.queue.drain();

      const completed = await harness.reload(order.id);
      expect(completed.status).toBe(OrderStatus.COMPLETED);
      expect(completed.deliveryStatus).toBe(DeliveryStatus.FAILED);
      expect(harness.contentGenerator.calls).toHaveLength(1);
      expect(harness.notifier.sent).toHaveLength(0);
    });
  });

  describe('Recovery', () => {
    it('should resume an order left mid-generation', async () => {
      const order = await harness.createOrder();
      harness.storage.injectOrder(order.with({ status: OrderStatus.GENERATING, paymentReference: 'pay_1' }));

      const summary = await harness.recovery.recoverAll();
      await harness.queue.drain();

      expect(summary).toEqual({ resumed: [order.id], flaggedForOperator: [] });
      expect((await harness.reload(order.id)).status).toBe(OrderStatus.COMPLETED);
    });

    it('should deliver a completed order whose delivery never ran', async () => {
      const order = await harness.createOrder();
      harness.storage.injectOrder(
        order.with({
          status: OrderStatus.COMPLETED,
          paymentReference: 'pay_1',
          generatedContent: 'Your report',
        }),
      );

      await harness.recovery.recoverAll();
      await harness.queue.drain();

      expect((await harness.reload(order.id)).deliveryStatus).toBe(DeliveryStatus.DELIVERED);
      expect(harness.notifier.sent[0].payload.text).toBe(`Your report for order ${order.id} is ready.\n\nYour report`);
    });

    it('should issue a refund that was scheduled but never claimed', async () => {
      const order = await harness.createOrder();
      harness.storage.injectOrder(
        order.with({
          status: OrderStatus.FAILED,
          paymentReference: 'pay_1',
          refundStatus: RefundStatus.SCHEDULED,
        }),
      );

      await harness.recovery.recoverAll();
      await harness.queue.drain();

      expect((await harness.reload(order.id)).status).toBe(OrderStatus.REFUNDED);
      expect(harness.provider.refundCalls).toHaveLength(1);
    });

    it('should flag a refund interrupted in flight instead of re-issuing it', async () => {
      const order = await harness.createOrder();
      harness.storage.injectOrder(
        order.with({
          status: OrderStatus.FAILED,
          paymentReference: 'pay_1',
          refundStatus: RefundStatus.IN_FLIGHT,
        }),
      );

      const summary = await harness.recovery.recoverAll();

      expect(summary).toEqual({ resumed: [], flaggedForOperator: [order.id] });
      expect((await harness.reload(order.id)).refundStatus).toBe(RefundStatus.PENDING_MANUAL);
      expect(harness.provider.refundCalls).toHaveLength(0);
      expect(harness.refundFailures[0].error.message).toBe(
        `Refund for order ${order.id} failed: Refund outcome unknown: process stopped while the refund was in flight`,
      );
    });

    it('should leave settled and unpaid orders alone', async () => {
      await harness.createOrder();
      const done = await harness.createOrder();
      harness.storage.injectOrder(done.with({ status: OrderStatus.REFUNDED, refundStatus: RefundStatus.COMPLETED }));

      expect(await harness.recovery.recoverAll()).toEqual({ resumed: [], flaggedForOperator: [] });
    });
  });
});
