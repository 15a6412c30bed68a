import {
  CallOptions,
  DeliveryResult,
  MessageKind,
  Money,
  NotificationPayload,
  NotificationService,
  Notifier,
  Order,
  OrderStatus,
  RefundStatus,
} from '../../src';

/**
 * Never settles; records the signal each call received
 */
class HangingNotifier implements Notifier {
  readonly name = 'hanging';
  readonly signals: Array<AbortSignal | undefined> = [];

  notify(
    _userRef: string,
    _kind: MessageKind,
    _payload: NotificationPayload,
    options: CallOptions = {},
  ): Promise<DeliveryResult> {
    this.signals.push(options.signal);
    return new Promise<DeliveryResult>(() => undefined);
  }
}

const order = (overrides: Partial<ConstructorParameters<typeof Order>[0]> = {}): Order =>
  new Order({
    id: 'ORD_1',
    userId: 'user-1',
    productKind: 'name_analysis',
    input: {},
    status: OrderStatus.PAID,
    money: new Money(999, 'USD'),
    requiresEnrichment: false,
    ...overrides,
  });

describe('NotificationService', () => {
  const noSleep = async (): Promise<void> => undefined;

  it('should give up on a notifier that never answers', async () => {
    const notifier = new HangingNotifier();
    const service = new NotificationService(notifier, {
      attempts: 3,
      retryDelayMs: 0,
      timeoutMs: 20,
      sleepFn: noSleep,
    });

    const result = await service.send(order(), MessageKind.PAYMENT_ACK);

    expect(result).toBe('failed');
    expect(notifier.signals).toHaveLength(3);
    expect(notifier.signals.map((signal) => signal?.aborted)).toEqual([true, true, true]);
  });

  it('should send failure notices once', async () => {
    const notifier = new HangingNotifier();
    const service = new NotificationService(notifier, {
      attempts: 3,
      retryDelayMs: 0,
      timeoutMs: 20,
      sleepFn: noSleep,
    });

    const result = await service.send(order({ status: OrderStatus.FAILED }), MessageKind.FAILURE);

    expect(result).toBe('failed');
    expect(notifier.signals).toHaveLength(1);
  });

  it('should mention the refund in a failure notice for a captured order', () => {
    const service = new NotificationService(new HangingNotifier(), {
      attempts: 1,
      retryDelayMs: 0,
      timeoutMs: 20,
    });

    const payload = service.buildPayload(
      order({ status: OrderStatus.FAILED, refundStatus: RefundStatus.SCHEDULED }),
      MessageKind.FAILURE,
    );

    expect(payload.text).toBe('We could not complete order ORD_1. A refund of 9.99 USD is on its way.');
  });
});
