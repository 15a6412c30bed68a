import { Logger } from '@nestjs/common';
import {
  DataSource,
  Repository,
  EntityManager,
  SelectQueryBuilder,
  QueryFailedError,
} from 'typeorm';
import {
  StorageAdapter,
  LedgerAppendResult,
  Order,
  OrderStatus,
  ProcessedEvent,
  AffiliateLedgerEntry,
  AuditLog,
  AuditAction,
  TriggerType,
  Money,
  JsonObject,
  OrderQuery,
  OrderPatch,
  OrderTransitionWrite,
  CreateOrderDto,
  CreateAuditLogDto,
  CreateLedgerEntryDto,
  RecordProcessedEventDto,
  AdmissionResult,
  AffiliateTotals,
  StorageStatistics,
  OrderNotFoundError,
  ConcurrencyConflictError,
} from '../../../core';
import {
  OrderEntity,
  AuditLogEntity,
  ProcessedEventEntity,
  AffiliateLedgerEntity,
} from './entities';

const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
]);

/**
 * True when a query failed on a unique or primary key constraint
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError !== 'object' || driverError === null || !('code' in driverError)) {
    return false;
  }
  return typeof driverError.code === 'string' && UNIQUE_VIOLATION_CODES.has(driverError.code);
}

function toJsonObject(value: object): JsonObject {
  return Object.fromEntries(Object.entries(value));
}

interface AffiliateTotalsRow {
  totalSales: string | number | null;
  totalCommission: string | number | null;
  totalBonus: string | number | null;
  entryCount: string | number | null;
}

/**
 * TypeORM implementation of StorageAdapter (PostgreSQL in production, SQLite in tests)
 */
export class TypeORMStorageAdapter implements StorageAdapter {
  private readonly logger = new Logger(TypeORMStorageAdapter.name);
  private orderRepo: Repository<OrderEntity>;
  private auditLogRepo: Repository<AuditLogEntity>;
  private processedEventRepo: Repository<ProcessedEventEntity>;
  private ledgerRepo: Repository<AffiliateLedgerEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.orderRepo = dataSource.getRepository(OrderEntity);
    this.auditLogRepo = dataSource.getRepository(AuditLogEntity);
    this.processedEventRepo = dataSource.getRepository(ProcessedEventEntity);
    this.ledgerRepo = dataSource.getRepository(AffiliateLedgerEntity);
  }

  /**
   * Order Management
   */

  async createOrder(dto: CreateOrderDto): Promise<Order> {
    return await this.withTransaction(async (manager) => {
      const now = new Date();
      await manager.insert(OrderEntity, {
        id: dto.id,
        userId: dto.userId,
        productKind: dto.productKind,
        input: dto.input,
        status: OrderStatus.PENDING_PAYMENT,
        amount: dto.amount,
        currency: dto.currency,
        requiresEnrichment: dto.requiresEnrichment,
        affiliateCode: dto.affiliateCode ?? null,
        paymentReference: null,
        enrichmentData: null,
        generatedContent: null,
        lastProcessedEventId: null,
        refundReference: null,
        failureReason: null,
        createdAt: now,
        updatedAt: now,
      });

      await this.insertAuditLog(manager, {
        orderId: dto.id,
        action: AuditAction.ORDER_CREATED,
        stateBefore: null,
        stateAfter: OrderStatus.PENDING_PAYMENT,
        triggerType: TriggerType.OPERATOR,
        performedBy: dto.createdBy ?? 'system',
        metadata: { productKind: dto.productKind, amount: dto.amount, currency: dto.currency },
        performedAt: now,
      });

      const entity = await manager.findOneOrFail(OrderEntity, { where: { id: dto.id } });
      return this.mapOrderEntityToDomain(entity);
    });
  }

  async findOrder(orderId: string): Promise<Order | null> {
    const entity = await this.orderRepo.findOne({ where: { id: orderId } });
    return entity ? this.mapOrderEntityToDomain(entity) : null;
  }

  async findOrders(query: OrderQuery): Promise<Order[]> {
    const qb = this.orderRepo.createQueryBuilder('o');
    this.applyOrderQuery(qb, query);
    qb.orderBy('o.createdAt', 'DESC');

    const entities = await qb.getMany();
    return entities.map((e) => this.mapOrderEntityToDomain(e));
  }

  async transitionOrder(orderId: string, write: OrderTransitionWrite): Promise<Order> {
    return await this.withTransaction(async (manager) => {
      const now = new Date();
      const result = await manager
        .createQueryBuilder()
        .update(OrderEntity)
        .set({
          ...this.toEntityPatch(write.patch ?? {}),
          status: write.toStatus,
          version: () => 'version + 1',
          updatedAt: now,
        })
        .where('id = :id AND status = :status AND version = :version', {
          id: orderId,
          status: write.expectedStatus,
          version: write.expectedVersion,
        })
        .execute();

      if (!result.affected) {
        await this.throwWriteConflict(manager, orderId, write.expectedStatus, write.expectedVersion);
      }

      await this.insertAuditLog(manager, {
        orderId,
        action: AuditAction.STATE_TRANSITION,
        stateBefore: write.expectedStatus,
        stateAfter: write.toStatus,
        triggerType: write.audit.triggerType,
        event: write.audit.event,
        performedBy: write.audit.performedBy,
        metadata: write.audit.metadata,
        performedAt: now,
      });

      const entity = await manager.findOneOrFail(OrderEntity, { where: { id: orderId } });
      return this.mapOrderEntityToDomain(entity);
    });
  }

  async updateOrder(
    orderId: string,
    expectedVersion: number,
    patch: OrderPatch,
    auditEntry?: CreateAuditLogDto,
  ): Promise<Order> {
    return await this.withTransaction(async (manager) => {
      const result = await manager
        .createQueryBuilder()
        .update(OrderEntity)
        .set({
          ...this.toEntityPatch(patch),
          version: () => 'version + 1',
          updatedAt: new Date(),
        })
        .where('id = :id AND version = :version', {
          id: orderId,
          version: expectedVersion,
        })
        .execute();

      if (!result.affected) {
        await this.throwWriteConflict(manager, orderId, null, expectedVersion);
      }

      if (auditEntry) {
        await this.insertAuditLog(manager, auditEntry);
      }

      const entity = await manager.findOneOrFail(OrderEntity, { where: { id: orderId } });
      return this.mapOrderEntityToDomain(entity);
    });
  }

  /**
   * Processed Events
   */

  async recordProcessedEvent(dto: RecordProcessedEventDto): Promise<AdmissionResult> {
    try {
      await this.processedEventRepo.insert({
        orderId: dto.orderId,
        eventId: dto.eventId,
        eventType: dto.eventType,
        receivedAt: dto.receivedAt ?? new Date(),
      });
      return 'accepted';
    } catch (error) {
      if (isUniqueViolation(error)) {
        return 'duplicate';
      }
      throw error;
    }
  }

  async deleteProcessedEvent(orderId: string, eventId: string): Promise<void> {
    await this.processedEventRepo.delete({ orderId, eventId });
  }

  async findProcessedEvents(orderId: string): Promise<ProcessedEvent[]> {
    const entities = await this.processedEventRepo.find({
      where: { orderId },
      order: { receivedAt: 'ASC' },
    });
    return entities.map(
      (e) => new ProcessedEvent(e.orderId, e.eventId, e.eventType, e.receivedAt),
    );
  }

  async purgeProcessedEvents(olderThan: Date): Promise<number> {
    const result = await this.processedEventRepo
      .createQueryBuilder()
      .delete()
      .where('received_at < :olderThan', { olderThan })
      .execute();

    return result.affected || 0;
  }

  /**
   * Affiliate Ledger
   */

  async appendLedgerEntry(dto: CreateLedgerEntryDto): Promise<LedgerAppendResult> {
    let created = true;
    try {
      await this.ledgerRepo.insert({
        affiliateCode: dto.affiliateCode,
        orderId: dto.orderId,
        orderAmount: dto.orderAmount,
        currency: dto.currency,
        commissionRate: dto.commissionRate,
        commissionAmount: dto.commissionAmount,
        bonusAmount: dto.bonusAmount,
      });
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
      created = false;
    }

    const entity = await this.ledgerRepo.findOneOrFail({ where: { orderId: dto.orderId } });
    return { entry: this.mapLedgerEntityToDomain(entity), created };
  }

  async findLedgerEntries(affiliateCode: string): Promise<AffiliateLedgerEntry[]> {
    const entities = await this.ledgerRepo.find({
      where: { affiliateCode },
      order: { createdAt: 'ASC' },
    });
    return entities.map((e) => this.mapLedgerEntityToDomain(e));
  }

  async getAffiliateTotals(affiliateCode: string): Promise<AffiliateTotals> {
    const row = await this.ledgerRepo
      .createQueryBuilder('l')
      .select('SUM(l.orderAmount)', 'totalSales')
      .addSelect('SUM(l.commissionAmount)', 'totalCommission')
      .addSelect('SUM(l.bonusAmount)', 'totalBonus')
      .addSelect('COUNT(*)', 'entryCount')
      .where('l.affiliateCode = :affiliateCode', { affiliateCode })
      .getRawOne<AffiliateTotalsRow>();

    return {
      affiliateCode,
      totalSales: Number(row?.totalSales ?? 0),
      totalCommission: Number(row?.totalCommission ?? 0),
      totalBonus: Number(row?.totalBonus ?? 0),
      entryCount: Number(row?.entryCount ?? 0),
    };
  }

  /**
   * Audit Log Management
   */

  async getAuditTrail(orderId: string): Promise<AuditLog[]> {
    const entities = await this.auditLogRepo.find({
      where: { orderId },
      order: { performedAt: 'ASC', createdAt: 'ASC' },
    });
    return entities.map((e) => this.mapAuditLogEntityToDomain(e));
  }

  /**
   * Transaction Support
   */

  async withTransaction<T>(
    callback: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await callback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Close the connection pool; later calls are no-ops
   */
  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  /**
   * Health Check
   */

  async isHealthy(): Promise<boolean> {
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(
        `Health check query failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async getStatistics(): Promise<StorageStatistics> {
    const statuses = Object.values(OrderStatus);
    const [orderCount, processedEventCount, ledgerEntryCount, auditLogCount, statusCounts] =
      await Promise.all([
        this.orderRepo.count(),
        this.processedEventRepo.count(),
        this.ledgerRepo.count(),
        this.auditLogRepo.count(),
        Promise.all(statuses.map((status) => this.orderRepo.count({ where: { status } }))),
      ]);

    const ordersByStatus: Partial<Record<OrderStatus, number>> = {};
    statuses.forEach((status, index) => {
      if (statusCounts[index] > 0) {
        ordersByStatus[status] = statusCounts[index];
      }
    });

    return {
      orderCount,
      ordersByStatus,
      processedEventCount,
      ledgerEntryCount,
      auditLogCount,
    };
  }

  /**
   * Private Helpers
   */

  private async throwWriteConflict(
    manager: EntityManager,
    orderId: string,
    expectedStatus: OrderStatus | null,
    expectedVersion: number,
  ): Promise<never> {
    const exists = await manager.exists(OrderEntity, { where: { id: orderId } });
    if (!exists) {
      throw new OrderNotFoundError(orderId);
    }
    throw new ConcurrencyConflictError(orderId, expectedStatus, expectedVersion);
  }

  private async insertAuditLog(
    manager: EntityManager,
    dto: CreateAuditLogDto,
  ): Promise<AuditLog> {
    const entity = manager.create(AuditLogEntity, {
      orderId: dto.orderId,
      action: dto.action,
      stateBefore: dto.stateBefore,
      stateAfter: dto.stateAfter,
      triggerType: dto.triggerType,
      event: dto.event ?? null,
      performedBy: dto.performedBy ?? 'system',
      performedAt: dto.performedAt ?? new Date(),
      metadata: dto.metadata ?? {},
    });
    const saved = await manager.save(entity);
    return this.mapAuditLogEntityToDomain(saved);
  }

  private toEntityPatch(patch: OrderPatch): Partial<OrderEntity> {
    const values: Partial<OrderEntity> = {};
    if (patch.paymentReference !== undefined) values.paymentReference = patch.paymentReference;
    if (patch.enrichmentData !== undefined) values.enrichmentData = patch.enrichmentData;
    if (patch.generatedContent !== undefined) values.generatedContent = patch.generatedContent;
    if (patch.lastProcessedEventId !== undefined) values.lastProcessedEventId = patch.lastProcessedEventId;
    if (patch.refundStatus !== undefined) values.refundStatus = patch.refundStatus;
    if (patch.refundReference !== undefined) values.refundReference = patch.refundReference;
    if (patch.deliveryStatus !== undefined) values.deliveryStatus = patch.deliveryStatus;
    if (patch.failureReason !== undefined) values.failureReason = patch.failureReason;
    return values;
  }

  private mapOrderEntityToDomain(entity: OrderEntity): Order {
    return new Order({
      id: entity.id,
      userId: entity.userId,
      productKind: entity.productKind,
      input: toJsonObject(entity.input),
      status: entity.status,
      money: new Money(Number(entity.amount), entity.currency),
      requiresEnrichment: entity.requiresEnrichment,
      affiliateCode: entity.affiliateCode,
      paymentReference: entity.paymentReference,
      enrichmentData: entity.enrichmentData ? toJsonObject(entity.enrichmentData) : null,
      generatedContent: entity.generatedContent,
      lastProcessedEventId: entity.lastProcessedEventId,
      refundStatus: entity.refundStatus,
      refundReference: entity.refundReference,
      deliveryStatus: entity.deliveryStatus,
      failureReason: entity.failureReason,
      version: entity.version,
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    });
  }

  private mapLedgerEntityToDomain(entity: AffiliateLedgerEntity): AffiliateLedgerEntry {
    return new AffiliateLedgerEntry(
      entity.id,
      entity.affiliateCode,
      entity.orderId,
      new Money(Number(entity.orderAmount), entity.currency),
      Number(entity.commissionRate),
      new Money(Number(entity.commissionAmount), entity.currency),
      new Money(Number(entity.bonusAmount), entity.currency),
      entity.createdAt,
    );
  }

  private mapAuditLogEntityToDomain(entity: AuditLogEntity): AuditLog {
    return new AuditLog(
      entity.id,
      entity.orderId,
      entity.action,
      entity.stateBefore,
      entity.stateAfter,
      entity.triggerType,
      entity.event,
      entity.performedBy,
      toJsonObject(entity.metadata),
      entity.performedAt,
    );
  }

  private applyOrderQuery(
    qb: SelectQueryBuilder<OrderEntity>,
    query: OrderQuery,
  ): void {
    if (query.statuses && query.statuses.length > 0) {
      qb.andWhere('o.status IN (:...statuses)', { statuses: query.statuses });
    }
    if (query.refundStatus) {
      qb.andWhere('o.refundStatus = :refundStatus', { refundStatus: query.refundStatus });
    }
    if (query.deliveryStatus) {
      qb.andWhere('o.deliveryStatus = :deliveryStatus', {
        deliveryStatus: query.deliveryStatus,
      });
    }
    if (query.userId) {
      qb.andWhere('o.userId = :userId', { userId: query.userId });
    }
    if (query.affiliateCode) {
      qb.andWhere('o.affiliateCode = :affiliateCode', { affiliateCode: query.affiliateCode });
    }
    if (query.createdAfter) {
      qb.andWhere('o.createdAt > :after', { after: query.createdAfter });
    }
    if (query.createdBefore) {
      qb.andWhere('o.createdAt < :before', { before: query.createdBefore });
    }
  }
}
