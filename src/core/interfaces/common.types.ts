import {
  AuditAction,
  DeliveryStatus,
  OrderEvent,
  OrderStatus,
  RefundStatus,
  TriggerType,
} from '../domain/enums';
import { JsonObject } from '../domain/models';

/**
 * Common types used across adapters
 */

/**
 * Order query options. All given criteria must match.
 */
export interface OrderQuery {
  statuses?: OrderStatus[];
  refundStatus?: RefundStatus;
  deliveryStatus?: DeliveryStatus;
  userId?: string;
  affiliateCode?: string;
  createdBefore?: Date;
  createdAfter?: Date;
}

export interface CreateOrderDto {
  id: string;
  userId: string;
  productKind: string;
  input: JsonObject;
  amount: number;
  currency: string;
  requiresEnrichment: boolean;
  affiliateCode?: string | null;
  createdBy?: string;
}

/**
 * Fields a transition or follow-up write may set alongside the status
 */
export interface OrderPatch {
  paymentReference?: string;
  enrichmentData?: JsonObject | null;
  generatedContent?: string;
  lastProcessedEventId?: string;
  refundStatus?: RefundStatus;
  refundReference?: string;
  deliveryStatus?: DeliveryStatus;
  failureReason?: string | null;
}

/**
 * Conditional status change. Applies only while the stored order still has
 * `expectedStatus` and `expectedVersion`.
 */
export interface OrderTransitionWrite {
  expectedStatus: OrderStatus;
  expectedVersion: number;
  toStatus: OrderStatus;
  patch?: OrderPatch;
  audit: TransitionAuditEntry;
}

export interface TransitionAuditEntry {
  event: OrderEvent;
  triggerType: TriggerType;
  performedBy?: string;
  metadata?: JsonObject;
}

export interface CreateAuditLogDto {
  orderId: string;
  action: AuditAction;
  stateBefore: OrderStatus | null;
  stateAfter: OrderStatus;
  triggerType: TriggerType;
  event?: OrderEvent | null;
  performedBy?: string;
  metadata?: JsonObject;
  performedAt?: Date;
}

export interface RecordProcessedEventDto {
  orderId: string;
  eventId: string;
  eventType: OrderEvent;
  receivedAt?: Date;
}

export type AdmissionResult = 'accepted' | 'duplicate';

export interface CreateLedgerEntryDto {
  affiliateCode: string;
  orderId: string;
  orderAmount: number;
  currency: string;
  commissionRate: number;
  commissionAmount: number;
  bonusAmount: number;
}

/**
 * Sums over an affiliate's ledger, in minor units
 */
export interface AffiliateTotals {
  affiliateCode: string;
  totalSales: number;
  totalCommission: number;
  totalBonus: number;
  entryCount: number;
}

export interface StorageStatistics {
  orderCount: number;
  ordersByStatus: Partial<Record<OrderStatus, number>>;
  processedEventCount: number;
  ledgerEntryCount: number;
  auditLogCount: number;
}
