import {
  AffiliateLedgerEntry,
  AuditLog,
  Order,
  ProcessedEvent,
} from '../domain/models';
import {
  AdmissionResult,
  AffiliateTotals,
  CreateAuditLogDto,
  CreateLedgerEntryDto,
  CreateOrderDto,
  OrderPatch,
  OrderQuery,
  OrderTransitionWrite,
  RecordProcessedEventDto,
  StorageStatistics,
} from './common.types';

export interface LedgerAppendResult {
  entry: AffiliateLedgerEntry;
  /**
   * false when the order had already been credited
   */
  created: boolean;
}

/**
 * Storage adapter interface - durable orders, processed events, the affiliate
 * ledger and the audit trail.
 *
 * Order writes are compare-and-set on (status, version). A write whose
 * expectation no longer holds throws ConcurrencyConflictError and changes nothing.
 */
export interface StorageAdapter {
  // ==================== Order Operations ====================

  /**
   * Create an order in pending_payment, with its creation audit entry
   */
  createOrder(dto: CreateOrderDto): Promise<Order>;

  findOrder(orderId: string): Promise<Order | null>;

  /**
   * Orders matching every given criterion, newest first
   */
  findOrders(query: OrderQuery): Promise<Order[]>;

  /**
   * Atomically change status, apply the patch, bump the version and append
   * the audit entry. MUST be atomic - all succeed or nothing is written.
   *
   * @throws OrderNotFoundError when the order does not exist
   * @throws ConcurrencyConflictError when status or version no longer match
   */
  transitionOrder(orderId: string, write: OrderTransitionWrite): Promise<Order>;

  /**
   * Conditional update of non-status fields (refund and delivery progress)
   *
   * @throws OrderNotFoundError when the order does not exist
   * @throws ConcurrencyConflictError when the version no longer matches
   */
  updateOrder(
    orderId: string,
    expectedVersion: number,
    patch: OrderPatch,
    auditEntry?: CreateAuditLogDto,
  ): Promise<Order>;

  // ==================== Processed Events ====================

  /**
   * Insert the (orderId, eventId) marker. Returns 'duplicate' when it exists.
   * Two concurrent calls for the same key: exactly one is accepted.
   */
  recordProcessedEvent(dto: RecordProcessedEventDto): Promise<AdmissionResult>;

  /**
   * Remove a marker whose processing failed before any effect was committed
   */
  deleteProcessedEvent(orderId: string, eventId: string): Promise<void>;

  findProcessedEvents(orderId: string): Promise<ProcessedEvent[]>;

  /**
   * Delete markers received before the cutoff; returns how many were removed
   */
  purgeProcessedEvents(olderThan: Date): Promise<number>;

  // ==================== Affiliate Ledger ====================

  /**
   * Append a commission credit. Idempotent per order.
   */
  appendLedgerEntry(dto: CreateLedgerEntryDto): Promise<LedgerAppendResult>;

  findLedgerEntries(affiliateCode: string): Promise<AffiliateLedgerEntry[]>;

  getAffiliateTotals(affiliateCode: string): Promise<AffiliateTotals>;

  // ==================== Audit Log Operations ====================

  /**
   * Complete audit trail for an order, oldest first
   */
  getAuditTrail(orderId: string): Promise<AuditLog[]>;

  // ==================== Health & Monitoring ====================

  isHealthy(): Promise<boolean>;

  getStatistics(): Promise<StorageStatistics>;
}
