import {
  createFulfillmentPolicies,
  EventDeduplicator,
  EventDispatcherImpl,
  FulfillmentOrchestrator,
  FulfillmentPolicyOverrides,
  FulfillmentQueue,
  FulfillmentRecovery,
  LifecycleHooks,
  MockContentGenerator,
  MockEnrichmentProvider,
  MockNotifier,
  MockProviderAdapter,
  MockStorageAdapter,
  MockWebhookFactory,
  noJitter,
  NotificationService,
  Order,
  OrderService,
  OrderStateMachine,
  ProcessingResult,
  ProductCatalog,
  ProductDefinition,
  RefundFailedEvent,
  WebhookOptions,
  WebhookPayload,
  WebhookProcessor,
} from '../../src';

export const TEST_SECRET = 'test-secret';

export const TEST_CATALOG: ProductDefinition[] = [
  { kind: 'name_analysis', name: 'Name Analysis', amount: 999, currency: 'USD', requiresEnrichment: false },
  { kind: 'detailed_profile', name: 'Detailed Profile', amount: 2999, currency: 'USD', requiresEnrichment: true },
  { kind: 'daily_card', name: 'Daily Card', amount: 0, currency: 'USD', requiresEnrichment: false },
];

const noSleep = async (): Promise<void> => undefined;

export interface FulfillmentHarness {
  storage: MockStorageAdapter;
  provider: MockProviderAdapter;
  enrichment: MockEnrichmentProvider;
  contentGenerator: MockContentGenerator;
  notifier: MockNotifier;
  dispatcher: EventDispatcherImpl;
  queue: FulfillmentQueue;
  orderService: OrderService;
  deduplicator: EventDeduplicator;
  orchestrator: FulfillmentOrchestrator;
  recovery: FulfillmentRecovery;
  processor: WebhookProcessor;
  refundFailures: RefundFailedEvent[];
  errors: Error[];
  createOrder(productKind?: string, affiliateCode?: string): Promise<Order>;
  paidWebhook(order: Order, options?: WebhookOptions): WebhookPayload;
  deliver(webhook: WebhookPayload): Promise<ProcessingResult>;
  reload(orderId: string): Promise<Order>;
}

export interface HarnessOptions {
  policies?: FulfillmentPolicyOverrides;
  hooks?: LifecycleHooks;
}

/**
 * Full in-memory wiring: mock storage, mock provider and mock collaborators,
 * no backoff sleeps
 */
export function createHarness(options: HarnessOptions = {}): FulfillmentHarness {
  const storage = new MockStorageAdapter();
  const provider = new MockProviderAdapter();
  const enrichment = new MockEnrichmentProvider({ numerology: 7 });
  const contentGenerator = new MockContentGenerator();
  const notifier = new MockNotifier();
  const dispatcher = new EventDispatcherImpl();
  const refundFailures: RefundFailedEvent[] = [];
  const errors: Error[] = [];

  const hooks: LifecycleHooks = {
    onRefundFailed: (event) => {
      refundFailures.push(event);
    },
    onError: (error) => {
      errors.push(error);
    },
    ...options.hooks,
  };

  const policies = createFulfillmentPolicies(options.policies);
  const queue = new FulfillmentQueue((error) => errors.push(error));
  const orderService = new OrderService(storage, new OrderStateMachine(), new ProductCatalog(TEST_CATALOG), dispatcher);
  const deduplicator = new EventDeduplicator(storage);
  const notifications = new NotificationService(notifier, {
    attempts: policies.notificationAttempts,
    retryDelayMs: 0,
    timeoutMs: policies.notificationTimeoutMs,
    sleepFn: noSleep,
  });
  const orchestrator = new FulfillmentOrchestrator(
    storage,
    orderService,
    notifications,
    { enrichment, contentGenerator, notifier, paymentProvider: provider },
    queue,
    { policies, hooks, jitterFn: noJitter, sleepFn: noSleep },
  );
  const recovery = new FulfillmentRecovery(storage, orderService, orchestrator, deduplicator);
  const processor = new WebhookProcessor({
    providerAdapter: provider,
    secrets: [TEST_SECRET],
    storageAdapter: storage,
    orderService,
    deduplicator,
    scheduler: orchestrator,
    hooks,
  });

  return {
    storage,
    provider,
    enrichment,
    contentGenerator,
    notifier,
    dispatcher,
    queue,
    orderService,
    deduplicator,
    orchestrator,
    recovery,
    processor,
    refundFailures,
    errors,
    createOrder: (productKind = 'name_analysis', affiliateCode) =>
      orderService.createOrder({
        userId: 'user-1',
        productKind,
        input: { name: 'Ada Lovelace', birthDate: '1815-12-10' },
        affiliateCode,
      }),
    paidWebhook: (order, webhookOptions = {}) =>
      MockWebhookFactory.paymentSuccessful({
        orderId: order.id,
        amount: order.money.toMajorUnits(),
        currency: order.currency,
        ...webhookOptions,
      }),
    deliver: (webhook) => processor.processWebhook(webhook.body, webhook.headers),
    reload: async (orderId) => {
      const order = await storage.findOrder(orderId);
      if (!order) {
        throw new Error(`Order ${orderId} not found`);
      }
      return order;
    },
  };
}
