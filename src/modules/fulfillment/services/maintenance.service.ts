import {
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import {
  FulfillmentQueue,
  FulfillmentRecovery,
  RecoverySummary,
  StorageAdapter,
  toError,
} from '../../../core';
import { TypeORMStorageAdapter } from '../../../adapters/storage/typeorm';
import {
  FulfillmentModuleConfig,
  ResolvedMaintenanceSettings,
  resolveMaintenanceSettings,
} from '../fulfillment.config';
import {
  FULFILLMENT_CONFIG,
  FULFILLMENT_QUEUE,
  FULFILLMENT_RECOVERY,
  STORAGE_ADAPTER,
} from '../constants';

export interface SweepSummary {
  expiredOrders: string[];
  purgedEvents: number;
  resumedOrders: string[];
  flaggedForOperator: string[];
}

const EMPTY_SWEEP: SweepSummary = {
  expiredOrders: [],
  purgedEvents: 0,
  resumedOrders: [],
  flaggedForOperator: [],
};

/**
 * Maintenance Service
 *
 * Resumes work a previous process left unfinished, periodically expires
 * unpaid orders, picks up stalled ones and purges old processed-event
 * records, and lets queued fulfillment finish on shutdown.
 */
@Injectable()
export class MaintenanceService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(MaintenanceService.name);
  private readonly settings: ResolvedMaintenanceSettings;
  private intervalId?: NodeJS.Timeout;
  private isSweeping = false;

  constructor(
    @Inject(FULFILLMENT_CONFIG)
    config: FulfillmentModuleConfig,
    @Inject(FULFILLMENT_RECOVERY)
    private readonly recovery: FulfillmentRecovery,
    @Inject(FULFILLMENT_QUEUE)
    private readonly queue: FulfillmentQueue,
    @Inject(STORAGE_ADAPTER)
    private readonly storageAdapter: StorageAdapter,
  ) {
    this.settings = resolveMaintenanceSettings(config);
  }

  async onApplicationBootstrap(): Promise<void> {
    if (this.settings.recoverOnStartup) {
      await this.recover();
    }
    if (this.settings.sweepIntervalMs > 0) {
      this.startSweeping(this.settings.sweepIntervalMs);
    }
  }

  async onApplicationShutdown(signal?: string): Promise<void> {
    this.stopSweeping();
    this.logger.log(
      `Shutting down${signal ? ` (${signal})` : ''}; waiting for ${this.queue.activeCount()} order(s) in progress`,
    );
    await this.queue.close();

    if (this.storageAdapter instanceof TypeORMStorageAdapter) {
      await this.storageAdapter.close();
    }
  }

  async recover(): Promise<RecoverySummary> {
    return this.recovery.recoverAll();
  }

  /**
   * One housekeeping pass. Overlapping calls return an empty summary.
   */
  async sweep(now: Date = new Date()): Promise<SweepSummary> {
    if (this.isSweeping) {
      return { ...EMPTY_SWEEP };
    }

    this.isSweeping = true;
    try {
      const expiredOrders = await this.recovery.expireUnpaidOrders(
        this.settings.paymentTimeoutMinutes,
        now,
      );
      const purgedEvents = await this.recovery.purgeProcessedEvents(
        this.settings.eventRetentionDays,
        now,
      );
      const stalled = await this.recovery.resumeStalledOrders(
        this.settings.stalledOrderGraceMs,
        now,
      );
      return {
        expiredOrders,
        purgedEvents,
        resumedOrders: stalled.resumed,
        flaggedForOperator: stalled.flaggedForOperator,
      };
    } finally {
      this.isSweeping = false;
    }
  }

  startSweeping(intervalMs: number): void {
    this.stopSweeping();
    this.logger.log(`Starting maintenance sweep (interval: ${intervalMs}ms)`);

    this.intervalId = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        const err = toError(error);
        this.logger.error(`Maintenance sweep failed: ${err.message}`, err.stack);
      });
    }, intervalMs);
    this.intervalId.unref();
  }

  stopSweeping(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = undefined;
      this.logger.log('Stopped maintenance sweep');
    }
  }
}
