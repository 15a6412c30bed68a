import {
  HmacProviderAdapter,
  Money,
  MockWebhookFactory,
  NormalizationError,
  OrderEvent,
  ProviderError,
} from '../../src';

describe('HmacProviderAdapter', () => {
  const adapter = new HmacProviderAdapter({ apiBaseUrl: 'http://payments.test', apiKey: 'test-key' });
  const secrets = ['test-secret'];

  describe('verifySignature', () => {
    it('accepts a body signed with a configured secret', () => {
      const webhook = MockWebhookFactory.paymentSuccessful();
      expect(adapter.verifySignature(webhook.body, webhook.headers, secrets)).toBe(true);
    });

    it('accepts a body signed with an older secret during rotation', () => {
      const webhook = MockWebhookFactory.paymentSuccessful({ secret: 'old-secret' });
      expect(adapter.verifySignature(webhook.body, webhook.headers, ['new-secret', 'old-secret'])).toBe(true);
    });

    it('rejects a wrong secret and a missing header', () => {
      const webhook = MockWebhookFactory.invalidSignature();
      expect(adapter.verifySignature(webhook.body, webhook.headers, secrets)).toBe(false);
      expect(adapter.verifySignature(webhook.body, {}, secrets)).toBe(false);
    });

    it('reads the configured header name in lower case', () => {
      const custom = new HmacProviderAdapter({ signatureHeader: 'X-Payment-Signature' });
      const webhook = MockWebhookFactory.paymentSuccessful({ signatureHeader: 'x-payment-signature' });

      expect(custom.config.signatureHeader).toBe('x-payment-signature');
      expect(custom.verifySignature(webhook.body, webhook.headers, secrets)).toBe(true);
    });
  });

  describe('parsePayload', () => {
    it('rejects a body that is not JSON', () => {
      expect(() => adapter.parsePayload(Buffer.from('{"order_id": '))).toThrow(NormalizationError);
      expect(() => adapter.parsePayload(Buffer.from('{"order_id": '))).toThrow('Invalid JSON payload');
    });

    it('rejects JSON that is not an object', () => {
      expect(() => adapter.parsePayload(Buffer.from('[1,2]'))).toThrow('Payload must be a JSON object');
    });
  });

  describe('normalize', () => {
    it('maps a paid webhook to PAYMENT_CONFIRMED', async () => {
      const webhook = MockWebhookFactory.paymentSuccessful({
        orderId: 'ORD_1',
        eventId: 'evt_1',
        paymentReference: 'pay_1',
        amount: 29.99,
        extra: { timestamp: '2024-01-01T12:00:00Z', payment_method: 'card' },
      });

      const event = await adapter.normalize(adapter.parsePayload(webhook.body), webhook.body);

      expect(event).toEqual({
        eventId: 'evt_1',
        eventIdSource: 'provider',
        orderId: 'ORD_1',
        event: OrderEvent.PAYMENT_CONFIRMED,
        providerStatus: 'paid',
        paymentReference: 'pay_1',
        money: new Money(2999, 'USD'),
        failureReason: undefined,
        paymentMethod: 'card',
        occurredAt: new Date('2024-01-01T12:00:00Z'),
      });
    });

    it('maps failed and cancelled webhooks to PAYMENT_FAILED', async () => {
      const failed = MockWebhookFactory.paymentFailed({ errorMessage: 'Insufficient funds' });
      const cancelled = MockWebhookFactory.paymentCancelled();

      const failedEvent = await adapter.normalize(failed.payload, failed.body);
      const cancelledEvent = await adapter.normalize(cancelled.payload, cancelled.body);

      expect(failedEvent.event).toBe(OrderEvent.PAYMENT_FAILED);
      expect(failedEvent.failureReason).toBe('Insufficient funds');
      expect(cancelledEvent.event).toBe(OrderEvent.PAYMENT_FAILED);
      expect(cancelledEvent.failureReason).toBe('Payment cancelled');
    });

    it('derives the event id from the raw body when the provider sends none', async () => {
      const body = Buffer.from('{"order_id":"ORD_1","status":"failed","amount":9.99,"currency":"USD"}');

      const event = await adapter.normalize(adapter.parsePayload(body), body);

      expect(event.eventIdSource).toBe('derived');
      expect(event.eventId).toBe(
        'derived_88b5db0094c0c1b85d1799774363dcd25f0f315b8fd3c273f57c07d829353bfb',
      );
    });

    it('accepts payment_id in place of payment_reference', async () => {
      const webhook = MockWebhookFactory.sign({
        order_id: 'ORD_1',
        status: 'paid',
        payment_id: 'pay_alias',
        amount: 1,
        currency: 'USD',
      });

      const event = await adapter.normalize(webhook.payload, webhook.body);
      expect(event.paymentReference).toBe('pay_alias');
    });

    it('rejects a paid webhook without a payment reference', async () => {
      const webhook = MockWebhookFactory.sign({
        order_id: 'ORD_1',
        status: 'paid',
        amount: 1,
        currency: 'USD',
      });

      await expect(adapter.normalize(webhook.payload, webhook.body)).rejects.toThrow(NormalizationError);
    });

    it('rejects an unknown status and a missing amount', async () => {
      const unknownStatus = MockWebhookFactory.sign({
        order_id: 'ORD_1',
        status: 'refunded',
        amount: 1,
        currency: 'USD',
      });
      const noAmount = MockWebhookFactory.sign({ order_id: 'ORD_1', status: 'failed', currency: 'USD' });

      await expect(adapter.normalize(unknownStatus.payload, unknownStatus.body)).rejects.toThrow(
        'status must be one of the following values',
      );
      await expect(adapter.normalize(noAmount.payload, noAmount.body)).rejects.toThrow('amount must be a number');
    });

    it('rejects an event id longer than the processed-event key', async () => {
      const webhook = MockWebhookFactory.paymentSuccessful({ orderId: 'ORD_1', eventId: 'e'.repeat(129) });

      await expect(adapter.normalize(webhook.payload, webhook.body)).rejects.toThrow(
        'Invalid webhook payload: event_id: event_id must be shorter than or equal to 128 characters',
      );
    });

    it('accepts an event id of exactly 128 characters', async () => {
      const webhook = MockWebhookFactory.paymentSuccessful({ orderId: 'ORD_1', eventId: 'e'.repeat(128) });

      const event = await adapter.normalize(webhook.payload, webhook.body);
      expect(event.eventId).toHaveLength(128);
    });

    it('rejects an amount that has no exact minor-unit value', async () => {
      const webhook = MockWebhookFactory.paymentSuccessful({ orderId: 'ORD_1', amount: 1e308 });

      const normalizing = adapter.normalize(webhook.payload, webhook.body);
      await expect(normalizing).rejects.toThrow(NormalizationError);
      await expect(normalizing).rejects.toThrow('Amount out of range: 1e+308');
    });
  });

  describe('issueRefund', () => {
    const request = { orderId: 'ORD_1', amount: new Money(2999, 'USD'), reason: 'Generation failed' };

    afterEach(() => {
      jest.restoreAllMocks();
    });

    it('posts the refund and returns the provider reference', async () => {
      const fetchSpy = jest
        .spyOn(global, 'fetch')
        .mockResolvedValue(new Response(JSON.stringify({ id: 're_1', status: 'success' }), { status: 200 }));

      const result = await adapter.issueRefund('pay_1', request);

      expect(result).toMatchObject({ refundReference: 're_1', amount: 2999, currency: 'USD', status: 'success' });
      expect(fetchSpy).toHaveBeenCalledWith(
        'http://payments.test/refunds',
        expect.objectContaining({
          method: 'POST',
          body: JSON.stringify({
            payment_reference: 'pay_1',
            order_id: 'ORD_1',
            amount: 29.99,
            currency: 'USD',
            reason: 'Generation failed',
          }),
        }),
      );
    });

    it('throws ProviderError on a non-2xx response', async () => {
      jest.spyOn(global, 'fetch').mockResolvedValue(new Response('{}', { status: 502, statusText: 'Bad Gateway' }));

      await expect(adapter.issueRefund('pay_1', request)).rejects.toThrow('Refund API error: 502 Bad Gateway');
    });

    it('throws ProviderError when the body has no refund id', async () => {
      jest.spyOn(global, 'fetch').mockResolvedValue(new Response(JSON.stringify({ status: 'pending' }), { status: 200 }));

      await expect(adapter.issueRefund('pay_1', request)).rejects.toThrow(ProviderError);
    });

    it('fails without a configured API', async () => {
      await expect(new HmacProviderAdapter().issueRefund('pay_1', request)).rejects.toThrow(
        'Refund API is not configured',
      );
    });
  });
});
