import { DynamicModule, Global, Logger, Module, Provider } from '@nestjs/common';
import {
  createFulfillmentPolicies,
  EventDeduplicator,
  EventDispatcher,
  EventDispatcherImpl,
  FulfillmentOrchestrator,
  FulfillmentQueue,
  FulfillmentRecovery,
  LoggingEventHandler,
  NotificationService,
  OrderService,
  OrderStateMachine,
  PaymentProviderAdapter,
  ProductCatalog,
  StorageAdapter,
  toError,
  WebhookProcessor,
} from '../../core';
import { MockStorageAdapter } from '../../adapters/storage/mock';
import { createDataSource, TypeORMStorageAdapter } from '../../adapters/storage/typeorm';
import { MockProviderAdapter } from '../../adapters/providers/mock';
import {
  MockContentGenerator,
  MockEnrichmentProvider,
  MockNotifier,
} from '../../adapters/collaborators/mock';
import {
  FulfillmentModuleAsyncConfig,
  FulfillmentModuleConfig,
  mergeFulfillmentConfig,
  resolveWebhookSettings,
} from './fulfillment.config';
import {
  EVENT_DEDUPLICATOR,
  EVENT_DISPATCHER,
  FULFILLMENT_CONFIG,
  FULFILLMENT_ORCHESTRATOR,
  FULFILLMENT_QUEUE,
  FULFILLMENT_RECOVERY,
  ORDER_SERVICE,
  ORDER_STATE_MACHINE,
  PAYMENT_PROVIDER,
  PRODUCT_CATALOG,
  STORAGE_ADAPTER,
  WEBHOOK_PROCESSOR,
} from './constants';
import { WebhookController } from './controllers/webhook.controller';
import { OrdersController } from './controllers/orders.controller';
import { AffiliatesController } from './controllers/affiliates.controller';
import { HealthController } from './controllers/health.controller';
import { MaintenanceService } from './services/maintenance.service';
import { BodySizeGuard } from './middleware/body-size.guard';

const EXPORTED_TOKENS = [
  FULFILLMENT_CONFIG,
  STORAGE_ADAPTER,
  PAYMENT_PROVIDER,
  EVENT_DISPATCHER,
  ORDER_SERVICE,
  FULFILLMENT_ORCHESTRATOR,
  FULFILLMENT_QUEUE,
  FULFILLMENT_RECOVERY,
  WEBHOOK_PROCESSOR,
];

const CONTROLLERS = [WebhookController, OrdersController, AffiliatesController, HealthController];

/**
 * Fulfillment Module - Main NestJS Module
 *
 * Wires the order store, the webhook pipeline and the fulfillment
 * orchestrator, and exposes them over HTTP.
 */
@Global()
@Module({})
export class FulfillmentModule {
  /**
   * Configure the module synchronously
   */
  static forRoot(config: FulfillmentModuleConfig): DynamicModule {
    return {
      module: FulfillmentModule,
      providers: [
        {
          provide: FULFILLMENT_CONFIG,
          useValue: mergeFulfillmentConfig(config),
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Configure the module asynchronously, e.g. from ConfigService
   */
  static forRootAsync(options: FulfillmentModuleAsyncConfig): DynamicModule {
    return {
      module: FulfillmentModule,
      imports: options.imports || [],
      providers: [
        {
          provide: FULFILLMENT_CONFIG,
          useFactory: async (...args: unknown[]) =>
            mergeFulfillmentConfig(await options.useFactory(...args)),
          inject: options.inject || [],
        },
        ...this.createProviders(),
      ],
      controllers: CONTROLLERS,
      exports: EXPORTED_TOKENS,
    };
  }

  /**
   * Providers built from the resolved configuration
   */
  private static createProviders(): Provider[] {
    const providers: Provider[] = [];

    // Storage Adapter
    providers.push({
      provide: STORAGE_ADAPTER,
      useFactory: async (config: FulfillmentModuleConfig): Promise<StorageAdapter> => {
        switch (config.storage.type) {
          case 'mock':
            return new MockStorageAdapter();

          case 'typeorm': {
            const dataSource = createDataSource(config.storage.options);
            await dataSource.initialize();
            return new TypeORMStorageAdapter(dataSource);
          }

          case 'custom':
            if (!config.storage.adapter) {
              throw new Error('Custom storage adapter not provided');
            }
            return config.storage.adapter;

          default:
            throw new Error(`Unknown storage type: ${String(config.storage.type)}`);
        }
      },
      inject: [FULFILLMENT_CONFIG],
    });

    // Payment Provider
    providers.push({
      provide: PAYMENT_PROVIDER,
      useFactory: (config: FulfillmentModuleConfig): PaymentProviderAdapter =>
        config.provider.adapter ?? new MockProviderAdapter(),
      inject: [FULFILLMENT_CONFIG],
    });

    // Event Dispatcher
    providers.push({
      provide: EVENT_DISPATCHER,
      useFactory: (config: FulfillmentModuleConfig): EventDispatcher => {
        const dispatcher = config.events?.dispatcher || new EventDispatcherImpl();

        if (config.events?.enableLogging) {
          dispatcher.onAll(new LoggingEventHandler().getHandler());
        }

        for (const { eventType, handler } of config.events?.handlers ?? []) {
          dispatcher.on(eventType, handler);
        }

        return dispatcher;
      },
      inject: [FULFILLMENT_CONFIG],
    });

    providers.push({
      provide: PRODUCT_CATALOG,
      useFactory: (config: FulfillmentModuleConfig) => new ProductCatalog(config.catalog),
      inject: [FULFILLMENT_CONFIG],
    });

    providers.push({
      provide: ORDER_STATE_MACHINE,
      useFactory: () => new OrderStateMachine(),
    });

    // Order Service
    providers.push({
      provide: ORDER_SERVICE,
      useFactory: (
        storageAdapter: StorageAdapter,
        stateMachine: OrderStateMachine,
        catalog: ProductCatalog,
        eventDispatcher: EventDispatcher,
      ) => new OrderService(storageAdapter, stateMachine, catalog, eventDispatcher),
      inject: [STORAGE_ADAPTER, ORDER_STATE_MACHINE, PRODUCT_CATALOG, EVENT_DISPATCHER],
    });

    providers.push({
      provide: EVENT_DEDUPLICATOR,
      useFactory: (storageAdapter: StorageAdapter) => new EventDeduplicator(storageAdapter),
      inject: [STORAGE_ADAPTER],
    });

    // Fulfillment Queue
    providers.push({
      provide: FULFILLMENT_QUEUE,
      useFactory: (config: FulfillmentModuleConfig) => {
        const logger = new Logger(FulfillmentModule.name);
        return new FulfillmentQueue((error, orderId, label) => {
          const onError = config.hooks?.onError;
          if (!onError) {
            return;
          }
          void Promise.resolve(onError(error, { operation: label, orderId })).catch(
            (hookError: unknown) => {
              logger.warn(`onError hook failed: ${toError(hookError).message}`);
            },
          );
        });
      },
      inject: [FULFILLMENT_CONFIG],
    });

    // Fulfillment Orchestrator
    providers.push({
      provide: FULFILLMENT_ORCHESTRATOR,
      useFactory: (
        config: FulfillmentModuleConfig,
        storageAdapter: StorageAdapter,
        orderService: OrderService,
        paymentProvider: PaymentProviderAdapter,
        queue: FulfillmentQueue,
      ) => {
        const policies = createFulfillmentPolicies(config.policies);
        const notifier = config.collaborators?.notifier ?? new MockNotifier();
        const notifications = new NotificationService(notifier, {
          attempts: policies.notificationAttempts,
          retryDelayMs: policies.notificationRetryDelayMs,
          timeoutMs: policies.notificationTimeoutMs,
        });

        return new FulfillmentOrchestrator(
          storageAdapter,
          orderService,
          notifications,
          {
            enrichment: config.collaborators?.enrichment ?? new MockEnrichmentProvider(),
            contentGenerator: config.collaborators?.contentGenerator ?? new MockContentGenerator(),
            notifier,
            paymentProvider,
          },
          queue,
          {
            policies,
            commission: config.commission,
            hooks: config.hooks,
          },
        );
      },
      inject: [FULFILLMENT_CONFIG, STORAGE_ADAPTER, ORDER_SERVICE, PAYMENT_PROVIDER, FULFILLMENT_QUEUE],
    });

    providers.push({
      provide: FULFILLMENT_RECOVERY,
      useFactory: (
        storageAdapter: StorageAdapter,
        orderService: OrderService,
        orchestrator: FulfillmentOrchestrator,
        deduplicator: EventDeduplicator,
      ) => new FulfillmentRecovery(storageAdapter, orderService, orchestrator, deduplicator),
      inject: [STORAGE_ADAPTER, ORDER_SERVICE, FULFILLMENT_ORCHESTRATOR, EVENT_DEDUPLICATOR],
    });

    // Webhook Processor
    providers.push({
      provide: WEBHOOK_PROCESSOR,
      useFactory: (
        config: FulfillmentModuleConfig,
        storageAdapter: StorageAdapter,
        paymentProvider: PaymentProviderAdapter,
        orderService: OrderService,
        deduplicator: EventDeduplicator,
        orchestrator: FulfillmentOrchestrator,
      ) => {
        const webhooks = resolveWebhookSettings(config);
        return new WebhookProcessor({
          providerAdapter: paymentProvider,
          secrets: config.provider.secrets,
          storageAdapter,
          orderService,
          deduplicator,
          scheduler: orchestrator,
          skipSignatureVerification: webhooks.skipSignatureVerification,
          hooks: config.hooks,
          timeoutMs: webhooks.timeoutMs,
        });
      },
      inject: [
        FULFILLMENT_CONFIG,
        STORAGE_ADAPTER,
        PAYMENT_PROVIDER,
        ORDER_SERVICE,
        EVENT_DEDUPLICATOR,
        FULFILLMENT_ORCHESTRATOR,
      ],
    });

    providers.push(BodySizeGuard, MaintenanceService);

    return providers;
  }
}
