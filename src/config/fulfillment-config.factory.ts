import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { createTypeORMConfig } from '../adapters/storage/typeorm';
import { HmacProviderAdapter } from '../adapters/providers/hmac';
import { HttpContentGenerator, HttpEnrichmentProvider } from '../adapters/collaborators/http';
import { TelegramNotifier } from '../adapters/collaborators/telegram';
import {
  MockContentGenerator,
  MockEnrichmentProvider,
  MockNotifier,
} from '../adapters/collaborators/mock';
import { FulfillmentModuleConfig } from '../modules/fulfillment/fulfillment.config';
import { EnvironmentVariables, parseSecrets } from './environment';
import { loadProductDefinitions } from './product-catalog.loader';

/**
 * Build the module configuration from validated environment variables.
 * A collaborator without a URL or token is replaced by its in-memory mock.
 */
export function createFulfillmentConfig(
  config: ConfigService<EnvironmentVariables, true>,
): FulfillmentModuleConfig {
  const logger = new Logger('FulfillmentConfig');

  const enrichmentUrl = config.get('ENRICHMENT_API_URL', { infer: true });
  const contentUrl = config.get('CONTENT_API_URL', { infer: true });
  const botToken = config.get('TELEGRAM_BOT_TOKEN', { infer: true });

  for (const [name, value] of [
    ['ENRICHMENT_API_URL', enrichmentUrl],
    ['CONTENT_API_URL', contentUrl],
    ['TELEGRAM_BOT_TOKEN', botToken],
  ]) {
    if (!value) {
      logger.warn(`${name} not set; using the mock collaborator`);
    }
  }

  const storageType = config.get('STORAGE_TYPE', { infer: true });

  return {
    storage:
      storageType === 'typeorm'
        ? {
            type: 'typeorm',
            options: createTypeORMConfig({
              host: config.get('DB_HOST', { infer: true }),
              port: config.get('DB_PORT', { infer: true }),
              username: config.get('DB_USERNAME', { infer: true }),
              password: config.get('DB_PASSWORD', { infer: true }),
              database: config.get('DB_NAME', { infer: true }),
              synchronize: config.get('DB_SYNCHRONIZE', { infer: true }),
            }),
          }
        : { type: 'mock' },
    provider: {
      adapter: new HmacProviderAdapter({
        signatureHeader: config.get('PAYMENT_SIGNATURE_HEADER', { infer: true }),
        apiBaseUrl: config.get('PAYMENT_API_URL', { infer: true }),
        apiKey: config.get('PAYMENT_API_KEY', { infer: true }),
      }),
      secrets: parseSecrets(config.get('PAYMENT_WEBHOOK_SECRETS', { infer: true })),
    },
    collaborators: {
      enrichment: enrichmentUrl
        ? new HttpEnrichmentProvider({
            baseUrl: enrichmentUrl,
            apiKey: config.get('ENRICHMENT_API_KEY', { infer: true }),
          })
        : new MockEnrichmentProvider(),
      contentGenerator: contentUrl
        ? new HttpContentGenerator({
            baseUrl: contentUrl,
            apiKey: config.get('CONTENT_API_KEY', { infer: true }),
          })
        : new MockContentGenerator(),
      notifier: botToken ? new TelegramNotifier({ botToken }) : new MockNotifier(),
    },
    catalog: loadProductDefinitions(config.get('PRODUCT_CATALOG_PATH', { infer: true })),
    policies: {
      stepMaxAttempts: config.get('STEP_MAX_ATTEMPTS', { infer: true }),
    },
    events: {
      enableLogging: true,
    },
    maintenance: {
      recoverOnStartup: true,
      sweepIntervalMs: config.get('SWEEP_INTERVAL_MS', { infer: true }),
      paymentTimeoutMinutes: config.get('PAYMENT_TIMEOUT_MINUTES', { infer: true }),
      eventRetentionDays: config.get('EVENT_RETENTION_DAYS', { infer: true }),
    },
  };
}
