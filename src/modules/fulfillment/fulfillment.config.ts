import { DataSourceOptions } from 'typeorm';
import { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import {
  CommissionSchedule,
  ContentGenerator,
  EnrichmentProvider,
  EventDispatcher,
  EventHandler,
  FulfillmentPolicyOverrides,
  LifecycleHooks,
  Notifier,
  OrderEvent,
  PaymentProviderAdapter,
  ProductDefinition,
  StorageAdapter,
} from '../../core';

/**
 * Fulfillment Module Configuration
 */
export interface FulfillmentModuleConfig {
  /**
   * Storage configuration
   */
  storage: {
    type: 'mock' | 'typeorm' | 'custom';
    options?: DataSourceOptions;
    adapter?: StorageAdapter;
  };

  /**
   * Payment provider: webhook authentication and the refund API
   */
  provider: {
    adapter?: PaymentProviderAdapter;
    /**
     * Webhook secrets, newest first. Every secret is tried, so an old one can
     * stay here while the provider rotates.
     */
    secrets: string[];
  };

  /**
   * Downstream services driven by the fulfillment pipeline.
   * Missing collaborators fall back to the in-memory mocks.
   */
  collaborators?: {
    enrichment?: EnrichmentProvider;
    contentGenerator?: ContentGenerator;
    notifier?: Notifier;
  };

  /**
   * Products orders can be created for
   */
  catalog: ProductDefinition[];

  policies?: FulfillmentPolicyOverrides;

  commission?: CommissionSchedule;

  hooks?: LifecycleHooks;

  events?: {
    enableLogging?: boolean;
    dispatcher?: EventDispatcher;
    handlers?: Array<{ eventType: OrderEvent; handler: EventHandler }>;
  };

  webhooks?: {
    /**
     * Upper bound for synchronous webhook processing
     */
    timeoutMs?: number;
    /**
     * Larger bodies are answered with 413
     */
    maxBodyBytes?: number;
    skipSignatureVerification?: boolean; // DANGEROUS: only for testing
  };

  maintenance?: {
    recoverOnStartup?: boolean;
    /**
     * 0 disables the periodic sweep
     */
    sweepIntervalMs?: number;
    paymentTimeoutMinutes?: number;
    eventRetentionDays?: number;
    /**
     * Unfinished orders untouched for this long, with no work queued in this
     * process, are resumed by the sweep
     */
    stalledOrderGraceMs?: number;
  };
}

/**
 * Async configuration for the fulfillment module
 */
export interface FulfillmentModuleAsyncConfig extends Pick<ModuleMetadata, 'imports'> {
  useFactory: FactoryProvider<FulfillmentModuleConfig>['useFactory'];
  inject?: FactoryProvider<FulfillmentModuleConfig>['inject'];
}

export interface ResolvedWebhookSettings {
  timeoutMs: number;
  maxBodyBytes: number;
  skipSignatureVerification: boolean;
}

export interface ResolvedMaintenanceSettings {
  recoverOnStartup: boolean;
  sweepIntervalMs: number;
  paymentTimeoutMinutes: number;
  eventRetentionDays: number;
  stalledOrderGraceMs: number;
}

export const DEFAULT_WEBHOOK_SETTINGS: ResolvedWebhookSettings = {
  timeoutMs: 30_000,
  maxBodyBytes: 1_048_576,
  skipSignatureVerification: false,
};

export const DEFAULT_MAINTENANCE_SETTINGS: ResolvedMaintenanceSettings = {
  recoverOnStartup: true,
  sweepIntervalMs: 60_000,
  paymentTimeoutMinutes: 30,
  eventRetentionDays: 30,
  stalledOrderGraceMs: 5 * 60_000,
};

/**
 * Default configuration
 */
export const defaultFulfillmentConfig: Partial<FulfillmentModuleConfig> = {
  storage: {
    type: 'mock',
  },
  events: {
    enableLogging: true,
  },
  webhooks: DEFAULT_WEBHOOK_SETTINGS,
  maintenance: DEFAULT_MAINTENANCE_SETTINGS,
};

/**
 * Merge a configuration over the defaults, section by section
 */
export function mergeFulfillmentConfig(config: FulfillmentModuleConfig): FulfillmentModuleConfig {
  return {
    ...defaultFulfillmentConfig,
    ...config,
    events: { ...defaultFulfillmentConfig.events, ...config.events },
    webhooks: { ...DEFAULT_WEBHOOK_SETTINGS, ...config.webhooks },
    maintenance: { ...DEFAULT_MAINTENANCE_SETTINGS, ...config.maintenance },
  };
}

export function resolveWebhookSettings(config: FulfillmentModuleConfig): ResolvedWebhookSettings {
  return { ...DEFAULT_WEBHOOK_SETTINGS, ...config.webhooks };
}

export function resolveMaintenanceSettings(
  config: FulfillmentModuleConfig,
): ResolvedMaintenanceSettings {
  return { ...DEFAULT_MAINTENANCE_SETTINGS, ...config.maintenance };
}
