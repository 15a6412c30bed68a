import {
  StorageAdapter,
  LedgerAppendResult,
  Order,
  OrderRecord,
  OrderStatus,
  ProcessedEvent,
  AffiliateLedgerEntry,
  AuditLog,
  AuditAction,
  TriggerType,
  Money,
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

export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
}

export type MockStorageOperation =
  | 'createOrder'
  | 'transitionOrder'
  | 'updateOrder'
  | 'recordProcessedEvent'
  | 'appendLedgerEntry';

interface StoredLedgerEntry extends CreateLedgerEntryDto {
  id: string;
  createdAt: Date;
}

/**
 * Mock storage adapter for testing
 * Provides in-memory storage with the same conditional-write semantics as the
 * database adapter. Every read returns a fresh copy.
 */
export class MockStorageAdapter implements StorageAdapter {
  private orders: Map<string, OrderRecord> = new Map();
  private processedEvents: Map<string, ProcessedEvent> = new Map();
  private ledger: Map<string, StoredLedgerEntry> = new Map();
  private auditLogs: AuditLog[] = [];

  private injectedFailures: Map<MockStorageOperation, Error[]> = new Map();
  private idCounter = 0;
  private healthy = true;
  private readonly options: Required<MockStorageOptions>;

  constructor(options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      ...options,
    };
  }

  private generateId(prefix: string): string {
    return `${prefix}-${++this.idCounter}`;
  }

  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.options.latencyMs));
    }
  }

  private takeInjectedFailure(operation: MockStorageOperation): void {
    const queue = this.injectedFailures.get(operation);
    const error = queue?.shift();
    if (error) {
      throw error;
    }
  }

  // ==================== Order Operations ====================

  async createOrder(dto: CreateOrderDto): Promise<Order> {
    await this.simulateLatency();
    this.takeInjectedFailure('createOrder');

    if (this.orders.has(dto.id)) {
      throw new Error(`Order already exists: ${dto.id}`);
    }

    const now = new Date();
    const order = new Order({
      id: dto.id,
      userId: dto.userId,
      productKind: dto.productKind,
      input: { ...dto.input },
      status: OrderStatus.PENDING_PAYMENT,
      money: new Money(dto.amount, dto.currency),
      requiresEnrichment: dto.requiresEnrichment,
      affiliateCode: dto.affiliateCode ?? null,
      createdAt: now,
      updatedAt: now,
    });

    this.orders.set(order.id, order.toPlainObject());
    this.recordAudit({
      orderId: order.id,
      action: AuditAction.ORDER_CREATED,
      stateBefore: null,
      stateAfter: OrderStatus.PENDING_PAYMENT,
      triggerType: TriggerType.OPERATOR,
      performedBy: dto.createdBy ?? 'system',
      metadata: { productKind: dto.productKind, amount: dto.amount, currency: dto.currency },
      performedAt: now,
    });

    return Order.fromPlainObject(order.toPlainObject());
  }

  async findOrder(orderId: string): Promise<Order | null> {
    await this.simulateLatency();
    const record = this.orders.get(orderId);
    return record ? Order.fromPlainObject(record) : null;
  }

  async findOrders(query: OrderQuery): Promise<Order[]> {
    await this.simulateLatency();
    return this.queryOrders(query).map((record) => Order.fromPlainObject(record));
  }

  async transitionOrder(orderId: string, write: OrderTransitionWrite): Promise<Order> {
    await this.simulateLatency();
    this.takeInjectedFailure('transitionOrder');

    const current = this.orders.get(orderId);
    if (!current) {
      throw new OrderNotFoundError(orderId);
    }
    if (current.status !== write.expectedStatus || current.version !== write.expectedVersion) {
      throw new ConcurrencyConflictError(orderId, write.expectedStatus, write.expectedVersion);
    }

    const now = new Date();
    const next: OrderRecord = {
      ...this.applyPatch(current, write.patch ?? {}),
      status: write.toStatus,
      version: current.version + 1,
      updatedAt: now,
    };
    this.orders.set(orderId, next);

    this.recordAudit({
      orderId,
      action: AuditAction.STATE_TRANSITION,
      stateBefore: current.status,
      stateAfter: write.toStatus,
      triggerType: write.audit.triggerType,
      event: write.audit.event,
      performedBy: write.audit.performedBy,
      metadata: write.audit.metadata,
      performedAt: now,
    });

    return Order.fromPlainObject(next);
  }

  async updateOrder(
    orderId: string,
    expectedVersion: number,
    patch: OrderPatch,
    auditEntry?: CreateAuditLogDto,
  ): Promise<Order> {
    await this.simulateLatency();
    this.takeInjectedFailure('updateOrder');

    const current = this.orders.get(orderId);
    if (!current) {
      throw new OrderNotFoundError(orderId);
    }
    if (current.version !== expectedVersion) {
      throw new ConcurrencyConflictError(orderId, null, expectedVersion);
    }

    const next: OrderRecord = {
      ...this.applyPatch(current, patch),
      version: current.version + 1,
      updatedAt: new Date(),
    };
    this.orders.set(orderId, next);

    if (auditEntry) {
      this.recordAudit(auditEntry);
    }

    return Order.fromPlainObject(next);
  }

  // ==================== Processed Events ====================

  async recordProcessedEvent(dto: RecordProcessedEventDto): Promise<AdmissionResult> {
    await this.simulateLatency();
    this.takeInjectedFailure('recordProcessedEvent');

    const key = this.eventKey(dto.orderId, dto.eventId);
    if (this.processedEvents.has(key)) {
      return 'duplicate';
    }

    this.processedEvents.set(
      key,
      new ProcessedEvent(dto.orderId, dto.eventId, dto.eventType, dto.receivedAt ?? new Date()),
    );
    return 'accepted';
  }

  async deleteProcessedEvent(orderId: string, eventId: string): Promise<void> {
    await this.simulateLatency();
    this.processedEvents.delete(this.eventKey(orderId, eventId));
  }

  async findProcessedEvents(orderId: string): Promise<ProcessedEvent[]> {
    await this.simulateLatency();
    return Array.from(this.processedEvents.values())
      .filter((event) => event.orderId === orderId)
      .sort((a, b) => a.receivedAt.getTime() - b.receivedAt.getTime());
  }

  async purgeProcessedEvents(olderThan: Date): Promise<number> {
    await this.simulateLatency();
    let purged = 0;
    for (const [key, event] of this.processedEvents.entries()) {
      if (event.isOlderThan(olderThan)) {
        this.processedEvents.delete(key);
        purged++;
      }
    }
    return purged;
  }

  // ==================== Affiliate Ledger ====================

  async appendLedgerEntry(dto: CreateLedgerEntryDto): Promise<LedgerAppendResult> {
    await this.simulateLatency();
    this.takeInjectedFailure('appendLedgerEntry');

    const existing = this.ledger.get(dto.orderId);
    if (existing) {
      return { entry: this.toLedgerEntry(existing), created: false };
    }

    const stored: StoredLedgerEntry = {
      ...dto,
      id: this.generateId('ledger'),
      createdAt: new Date(),
    };
    this.ledger.set(dto.orderId, stored);
    return { entry: this.toLedgerEntry(stored), created: true };
  }

  async findLedgerEntries(affiliateCode: string): Promise<AffiliateLedgerEntry[]> {
    await this.simulateLatency();
    return Array.from(this.ledger.values())
      .filter((entry) => entry.affiliateCode === affiliateCode)
      .map((entry) => this.toLedgerEntry(entry));
  }

  async getAffiliateTotals(affiliateCode: string): Promise<AffiliateTotals> {
    await this.simulateLatency();
    const totals: AffiliateTotals = {
      affiliateCode,
      totalSales: 0,
      totalCommission: 0,
      totalBonus: 0,
      entryCount: 0,
    };

    for (const entry of this.ledger.values()) {
      if (entry.affiliateCode !== affiliateCode) continue;
      totals.totalSales += entry.orderAmount;
      totals.totalCommission += entry.commissionAmount;
      totals.totalBonus += entry.bonusAmount;
      totals.entryCount++;
    }

    return totals;
  }

  // ==================== Audit Log Operations ====================

  private recordAudit(dto: CreateAuditLogDto): AuditLog {
    const auditLog = new AuditLog(
      this.generateId('audit'),
      dto.orderId,
      dto.action,
      dto.stateBefore,
      dto.stateAfter,
      dto.triggerType,
      dto.event ?? null,
      dto.performedBy ?? 'system',
      { ...(dto.metadata ?? {}) },
      dto.performedAt ?? new Date(),
    );

    this.auditLogs.push(auditLog);
    return auditLog;
  }

  async getAuditTrail(orderId: string): Promise<AuditLog[]> {
    await this.simulateLatency();
    return this.auditLogs.filter((log) => log.orderId === orderId);
  }

  // ==================== Health & Monitoring ====================

  async isHealthy(): Promise<boolean> {
    return this.healthy;
  }

  async getStatistics(): Promise<StorageStatistics> {
    const ordersByStatus: Partial<Record<OrderStatus, number>> = {};
    for (const order of this.orders.values()) {
      ordersByStatus[order.status] = (ordersByStatus[order.status] ?? 0) + 1;
    }

    return {
      orderCount: this.orders.size,
      ordersByStatus,
      processedEventCount: this.processedEvents.size,
      ledgerEntryCount: this.ledger.size,
      auditLogCount: this.auditLogs.length,
    };
  }

  // ==================== Test Utilities ====================

  /**
   * Make the next call(s) to an operation throw the given error
   */
  injectFailure(operation: MockStorageOperation, error: Error, times = 1): void {
    const queue = this.injectedFailures.get(operation) ?? [];
    for (let i = 0; i < times; i++) {
      queue.push(error);
    }
    this.injectedFailures.set(operation, queue);
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  /**
   * Overwrite a stored order; bypasses version checks
   */
  injectOrder(order: Order): void {
    this.orders.set(order.id, order.toPlainObject());
  }

  clear(): void {
    this.orders.clear();
    this.processedEvents.clear();
    this.ledger.clear();
    this.auditLogs = [];
    this.injectedFailures.clear();
    this.idCounter = 0;
    this.healthy = true;
  }

  // ==================== Private Helpers ====================

  private queryOrders(query: OrderQuery): OrderRecord[] {
    return Array.from(this.orders.values())
      .filter((order) => {
        if (query.statuses && !query.statuses.includes(order.status)) return false;
        if (query.refundStatus && order.refundStatus !== query.refundStatus) return false;
        if (query.deliveryStatus && order.deliveryStatus !== query.deliveryStatus) return false;
        if (query.userId && order.userId !== query.userId) return false;
        if (query.affiliateCode && order.affiliateCode !== query.affiliateCode) return false;
        if (query.createdBefore && order.createdAt >= query.createdBefore) return false;
        if (query.createdAfter && order.createdAt <= query.createdAfter) return false;
        return true;
      })
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  private applyPatch(record: OrderRecord, patch: OrderPatch): OrderRecord {
    const next: OrderRecord = { ...record };
    if (patch.paymentReference !== undefined) next.paymentReference = patch.paymentReference;
    if (patch.enrichmentData !== undefined) next.enrichmentData = patch.enrichmentData;
    if (patch.generatedContent !== undefined) next.generatedContent = patch.generatedContent;
    if (patch.lastProcessedEventId !== undefined) next.lastProcessedEventId = patch.lastProcessedEventId;
    if (patch.refundStatus !== undefined) next.refundStatus = patch.refundStatus;
    if (patch.refundReference !== undefined) next.refundReference = patch.refundReference;
    if (patch.deliveryStatus !== undefined) next.deliveryStatus = patch.deliveryStatus;
    if (patch.failureReason !== undefined) next.failureReason = patch.failureReason;
    return next;
  }

  private eventKey(orderId: string, eventId: string): string {
    return `${orderId}:${eventId}`;
  }

  private toLedgerEntry(stored: StoredLedgerEntry): AffiliateLedgerEntry {
    return new AffiliateLedgerEntry(
      stored.id,
      stored.affiliateCode,
      stored.orderId,
      new Money(stored.orderAmount, stored.currency),
      stored.commissionRate,
      new Money(stored.commissionAmount, stored.currency),
      new Money(stored.bonusAmount, stored.currency),
      stored.createdAt,
    );
  }
}
