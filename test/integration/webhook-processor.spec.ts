import {
  MessageKind,
  MockWebhookFactory,
  OrderEvent,
  OrderLifecycleEvent,
  OrderStatus,
  ProcessingStatus,
  WebhookFateEvent,
} from '../../src';
import { createHarness, FulfillmentHarness } from './harness';

describe('WebhookProcessor Integration Tests', () => {
  let harness: FulfillmentHarness;
  let fates: WebhookFateEvent[];

  beforeEach(() => {
    fates = [];
    harness = createHarness({
      hooks: {
        onWebhookFate: (event) => {
          fates.push(event);
        },
      },
    });
  });

  afterEach(async () => {
    await harness.queue.close();
  });

  describe('End-to-End Processing', () => {
    it('should mark the order paid and run fulfillment to completion', async () => {
      const order = await harness.createOrder();
      const webhook = harness.paidWebhook(order, { eventId: 'evt_paid_1', paymentReference: 'pay_1' });

      const result = await harness.deliver(webhook);

      expect(result.success).toBe(true);
      expect(result.processingStatus).toBe(ProcessingStatus.PROCESSED);
      expect(result.orderId).toBe(order.id);
      expect(result.eventId).toBe('evt_paid_1');
      expect(result.metrics.signatureVerified).toBe(true);
      expect(result.metrics.admitted).toBe(true);
      expect(result.metrics.dispatched).toBe(true);

      await harness.queue.drain();

      const completed = await harness.reload(order.id);
      expect(completed.status).toBe(OrderStatus.COMPLETED);
      expect(completed.paymentReference).toBe('pay_1');
      expect(completed.lastProcessedEventId).toBe('evt_paid_1');
      expect(completed.generatedContent).toContain('Ada Lovelace');
      expect(harness.notifier.kinds(order.id)).toEqual([
        MessageKind.PAYMENT_ACK,
        MessageKind.REPORT_READY,
      ]);
    });

    it('should fail the order on a failed payment and notify the user', async () => {
      const order = await harness.createOrder();
      const webhook = MockWebhookFactory.paymentFailed({
        orderId: order.id,
        amount: 9.99,
        errorMessage: 'Card declined',
      });

      const result = await harness.deliver(webhook);
      await harness.queue.drain();

      expect(result.processingStatus).toBe(ProcessingStatus.PROCESSED);
      const failed = await harness.reload(order.id);
      expect(failed.status).toBe(OrderStatus.FAILED);
      expect(failed.failureReason).toBe('Card declined');
      expect(harness.notifier.kinds(order.id)).toEqual([MessageKind.FAILURE]);
      expect(harness.contentGenerator.calls).toHaveLength(0);
    });

    it('should publish lifecycle events for applied transitions', async () => {
      const order = await harness.createOrder();
      const events: OrderLifecycleEvent[] = [];
      harness.dispatcher.on(OrderEvent.PAYMENT_CONFIRMED, (_, payload) => {
        events.push(payload);
      });

      await harness.deliver(harness.paidWebhook(order));

      expect(events).toHaveLength(1);
      expect(events[0].fromStatus).toBe(OrderStatus.PENDING_PAYMENT);
      expect(events[0].toStatus).toBe(OrderStatus.PAID);
      expect(events[0].order.id).toBe(order.id);
    });
  });

  describe('Idempotency', () => {
    it('should acknowledge a redelivered event without reprocessing it', async () => {
      const order = await harness.createOrder();
      const webhook = harness.paidWebhook(order, { eventId: 'evt_dup' });

      const first = await harness.deliver(webhook);
      const second = await harness.deliver(webhook);
      await harness.queue.drain();

      expect(first.processingStatus).toBe(ProcessingStatus.PROCESSED);
      expect(second.processingStatus).toBe(ProcessingStatus.DUPLICATE);
      expect(harness.notifier.kinds(order.id)).toEqual([
        MessageKind.PAYMENT_ACK,
        MessageKind.REPORT_READY,
      ]);
      expect(harness.contentGenerator.calls).toHaveLength(1);
    });

    it('should admit exactly one of two concurrent deliveries', async () => {
      const order = await harness.createOrder();
      const webhook = harness.paidWebhook(order, { eventId: 'evt_race' });

      const results = await Promise.all([harness.deliver(webhook), harness.deliver(webhook)]);

      expect(results.map((r) => r.processingStatus).sort()).toEqual([
        ProcessingStatus.DUPLICATE,
        ProcessingStatus.PROCESSED,
      ]);
    });

    it('should derive the event id from the body when the provider omits it', async () => {
      const order = await harness.createOrder();
      const webhook = harness.paidWebhook(order, { eventId: null });

      const first = await harness.deliver(webhook);
      const second = await harness.deliver(webhook);

      expect(first.eventId).toMatch(/^derived_[0-9a-f]{64}$/);
      expect(second.processingStatus).toBe(ProcessingStatus.DUPLICATE);
    });

    it('should fulfil an enriched order once when its payment event is delivered twice', async () => {
      const order = await harness.createOrder('detailed_profile');
      expect(order.money.toMajorUnits()).toBe(29.99);
      const webhook = harness.paidWebhook(order, { eventId: 'E1' });

      const first = await harness.deliver(webhook);
      const second = await harness.deliver(webhook);
      await harness.queue.drain();

      expect(first.processingStatus).toBe(ProcessingStatus.PROCESSED);
      expect(second.processingStatus).toBe(ProcessingStatus.DUPLICATE);
      expect(harness.enrichment.calls).toHaveLength(1);
      expect(harness.contentGenerator.calls).toHaveLength(1);
      expect((await harness.reload(order.id)).status).toBe(OrderStatus.COMPLETED);
      expect(
        harness.notifier.kinds(order.id).filter((kind) => kind === MessageKind.REPORT_READY),
      ).toHaveLength(1);
    });
  });

  describe('Concurrency', () => {
    it('should not hold up one order behind a slow order', async () => {
      const slow = await harness.createOrder('detailed_profile');
      const fast = await harness.createOrder('name_analysis');
      const generated: string[] = [];
      harness.dispatcher.on(OrderEvent.GENERATION_DONE, (_, payload) => {
        generated.push(payload.order.id);
      });
      harness.enrichment.behavior.setDelay(200);

      await harness.deliver(harness.paidWebhook(slow));
      await harness.deliver(harness.paidWebhook(fast));
      await harness.queue.drain();

      expect(generated).toEqual([fast.id, slow.id]);
      expect((await harness.reload(slow.id)).status).toBe(OrderStatus.COMPLETED);
      expect((await harness.reload(fast.id)).status).toBe(OrderStatus.COMPLETED);
    });
  });

  describe('Ordering', () => {
    it('should treat a failure arriving after payment as stale', async () => {
      const order = await harness.createOrder();
      await harness.deliver(harness.paidWebhook(order, { eventId: 'evt_paid' }));

      const late = await harness.deliver(
        MockWebhookFactory.paymentFailed({ orderId: order.id, amount: 9.99, eventId: 'evt_failed' }),
      );

      expect(late.processingStatus).toBe(ProcessingStatus.STALE);
      const current = await harness.reload(order.id);
      expect(current.status).not.toBe(OrderStatus.FAILED);
      expect(current.lastProcessedEventId).toBe('evt_paid');
    });

    it('should reject a second payment reference for a paid order as stale', async () => {
      const order = await harness.createOrder();
      await harness.deliver(harness.paidWebhook(order, { paymentReference: 'pay_1' }));

      const second = await harness.deliver(harness.paidWebhook(order, { paymentReference: 'pay_2' }));

      expect(second.processingStatus).toBe(ProcessingStatus.STALE);
      expect((await harness.reload(order.id)).paymentReference).toBe('pay_1');
    });
  });

  describe('Rejections', () => {
    it('should reject a webhook signed with the wrong secret', async () => {
      const order = await harness.createOrder();

      const result = await harness.deliver(MockWebhookFactory.invalidSignature({ orderId: order.id, amount: 9.99 }));

      expect(result.processingStatus).toBe(ProcessingStatus.SIGNATURE_FAILED);
      expect(result.context.signatureValid).toBe(false);
      expect((await harness.reload(order.id)).status).toBe(OrderStatus.PENDING_PAYMENT);
    });

    it('should reject a body modified after signing', async () => {
      const order = await harness.createOrder();
      const webhook = harness.paidWebhook(order);
      const tampered = Buffer.concat([webhook.body, Buffer.from(' ')]);

      const result = await harness.processor.processWebhook(tampered, webhook.headers);

      expect(result.processingStatus).toBe(ProcessingStatus.SIGNATURE_FAILED);
    });

    it('should match the signature header case-insensitively', async () => {
      const order = await harness.createOrder();
      const webhook = harness.paidWebhook(order);

      const result = await harness.processor.processWebhook(webhook.body, {
        'X-Signature': webhook.headers['x-signature'],
      });

      expect(result.processingStatus).toBe(ProcessingStatus.PROCESSED);
    });

    it('should acknowledge a payload that cannot be normalized', async () => {
      const result = await harness.deliver(MockWebhookFactory.malformedPayload());

      expect(result.processingStatus).toBe(ProcessingStatus.NORMALIZATION_FAILED);
      expect(result.context.normalizationError).toBe('Invalid JSON payload');
    });

    it('should acknowledge an event id too long to record', async () => {
      const order = await harness.createOrder();

      const result = await harness.deliver(harness.paidWebhook(order, { eventId: 'e'.repeat(129) }));

      expect(result.processingStatus).toBe(ProcessingStatus.NORMALIZATION_FAILED);
      expect(await harness.storage.findProcessedEvents(order.id)).toEqual([]);
      expect((await harness.reload(order.id)).status).toBe(OrderStatus.PENDING_PAYMENT);
    });

    it('should acknowledge an amount too large to represent', async () => {
      const order = await harness.createOrder();

      const result = await harness.deliver(harness.paidWebhook(order, { amount: 1e308 }));

      expect(result.processingStatus).toBe(ProcessingStatus.NORMALIZATION_FAILED);
      expect(result.context.normalizationError).toBe('Amount out of range: 1e+308');
    });

    it('should report an event for an unknown order as unmatched', async () => {
      const result = await harness.deliver(MockWebhookFactory.paymentSuccessful({ orderId: 'ORD_0_MISSING' }));

      expect(result.processingStatus).toBe(ProcessingStatus.UNMATCHED);
      expect(result.orderId).toBe('ORD_0_MISSING');
    });

    it('should refuse an amount that differs from the order', async () => {
      const order = await harness.createOrder();

      const result = await harness.deliver(harness.paidWebhook(order, { amount: 1.0 }));

      expect(result.processingStatus).toBe(ProcessingStatus.AMOUNT_MISMATCH);
      expect((await harness.reload(order.id)).status).toBe(OrderStatus.PENDING_PAYMENT);
      expect(await harness.storage.findProcessedEvents(order.id)).toEqual([]);
    });

    it('should refuse a currency that differs from the order', async () => {
      const order = await harness.createOrder();

      const result = await harness.deliver(harness.paidWebhook(order, { currency: 'EUR' }));

      expect(result.processingStatus).toBe(ProcessingStatus.AMOUNT_MISMATCH);
    });
  });

  describe('Failures', () => {
    it('should release the admission when the transition write fails', async () => {
      const order = await harness.createOrder();
      const webhook = harness.paidWebhook(order, { eventId: 'evt_retry' });
      harness.storage.injectFailure('transitionOrder', new Error('database unavailable'));

      const failed = await harness.deliver(webhook);

      expect(failed.success).toBe(false);
      expect(failed.processingStatus).toBe(ProcessingStatus.INTERNAL_ERROR);
      expect(failed.error?.message).toBe("Stage 'state-engine' failed: database unavailable");
      expect(await harness.storage.findProcessedEvents(order.id)).toEqual([]);
      expect(harness.errors.map((e) => e.message)).toEqual([
        "Stage 'state-engine' failed: database unavailable",
      ]);

      const retried = await harness.deliver(webhook);

      expect(retried.processingStatus).toBe(ProcessingStatus.PROCESSED);
      await harness.queue.drain();
      expect((await harness.reload(order.id)).status).toBe(OrderStatus.COMPLETED);
    });

    it('should report every webhook exactly once to the fate hook', async () => {
      const order = await harness.createOrder();
      const webhook = harness.paidWebhook(order);

      await harness.deliver(webhook);
      await harness.deliver(webhook);
      await harness.deliver(MockWebhookFactory.invalidSignature());

      expect(fates.map((fate) => fate.processingStatus)).toEqual([
        ProcessingStatus.PROCESSED,
        ProcessingStatus.DUPLICATE,
        ProcessingStatus.SIGNATURE_FAILED,
      ]);
      expect(fates[0].orderId).toBe(order.id);
    });
  });

  it('should describe its stages', () => {
    expect(harness.processor.getStatistics()).toEqual({
      stages: ['verification', 'normalization', 'order-match', 'deduplication', 'state-engine', 'dispatch'],
      configuration: { skipVerification: false, timeoutMs: 30000 },
    });
  });
});
