import { Controller, Get, Inject, ServiceUnavailableException } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { FulfillmentQueue, StorageAdapter, StorageStatistics, WebhookProcessor } from '../../../core';
import { ApiHealthCheck, ApiReadinessCheck, ApiServiceStatistics } from '../../../_shared';
import { FULFILLMENT_QUEUE, STORAGE_ADAPTER, WEBHOOK_PROCESSOR } from '../constants';

interface ReadinessReport {
  status: 'ready' | 'not_ready';
  checks: { storage: boolean };
}

/**
 * Health Controller
 */
@ApiTags('Health')
@Controller('health')
export class HealthController {
  constructor(
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
    @Inject(WEBHOOK_PROCESSOR)
    private readonly webhookProcessor: WebhookProcessor,
    @Inject(FULFILLMENT_QUEUE)
    private readonly queue: FulfillmentQueue,
  ) {}

  @Get()
  @ApiHealthCheck()
  health(): { status: string; timestamp: string; uptime: number } {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
  }

  @Get('ready')
  @ApiReadinessCheck()
  async readiness(): Promise<ReadinessReport> {
    const storageHealthy = await this.storageAdapter.isHealthy();
    const report: ReadinessReport = {
      status: storageHealthy ? 'ready' : 'not_ready',
      checks: { storage: storageHealthy },
    };
    if (!storageHealthy) {
      throw new ServiceUnavailableException(report);
    }
    return report;
  }

  @Get('stats')
  @ApiServiceStatistics()
  async statistics(): Promise<{
    storage: StorageStatistics;
    pipeline: ReturnType<WebhookProcessor['getStatistics']>;
    queue: { activeOrders: number };
  }> {
    return {
      storage: await this.storageAdapter.getStatistics(),
      pipeline: this.webhookProcessor.getStatistics(),
      queue: { activeOrders: this.queue.activeCount() },
    };
  }
}
