import {
  DeliveryStatus,
  OrderStatus,
  RefundStatus,
  isInFlightStatus,
  isTerminalStatus,
} from '../enums';
import { Money } from '../value-objects/money.vo';

export type JsonObject = Record<string, unknown>;

export interface OrderProps {
  id: string;
  userId: string;
  productKind: string;
  input: JsonObject;
  status: OrderStatus;
  money: Money;
  requiresEnrichment: boolean;
  affiliateCode?: string | null;
  paymentReference?: string | null;
  enrichmentData?: JsonObject | null;
  generatedContent?: string | null;
  lastProcessedEventId?: string | null;
  refundStatus?: RefundStatus;
  refundReference?: string | null;
  deliveryStatus?: DeliveryStatus;
  failureReason?: string | null;
  version?: number;
  createdAt?: Date;
  updatedAt?: Date;
}

/**
 * Plain, serializable form of an order (storage rows, API responses, audit snapshots)
 */
export interface OrderRecord {
  id: string;
  userId: string;
  productKind: string;
  input: JsonObject;
  status: OrderStatus;
  amount: number;
  currency: string;
  requiresEnrichment: boolean;
  affiliateCode: string | null;
  paymentReference: string | null;
  enrichmentData: JsonObject | null;
  generatedContent: string | null;
  lastProcessedEventId: string | null;
  refundStatus: RefundStatus;
  refundReference: string | null;
  deliveryStatus: DeliveryStatus;
  failureReason: string | null;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Order domain model - the unit of work tracked from payment to delivery.
 * Instances are snapshots: every mutation goes through the storage adapter's
 * conditional writes, never through setters on this class.
 */
export class Order {
  readonly id: string;
  readonly userId: string;
  readonly productKind: string;
  readonly input: JsonObject;
  readonly status: OrderStatus;
  readonly money: Money;
  readonly requiresEnrichment: boolean;
  readonly affiliateCode: string | null;
  readonly paymentReference: string | null;
  readonly enrichmentData: JsonObject | null;
  readonly generatedContent: string | null;
  readonly lastProcessedEventId: string | null;
  readonly refundStatus: RefundStatus;
  readonly refundReference: string | null;
  readonly deliveryStatus: DeliveryStatus;
  readonly failureReason: string | null;
  readonly version: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;

  constructor(props: OrderProps) {
    this.id = props.id;
    this.userId = props.userId;
    this.productKind = props.productKind;
    this.input = props.input;
    this.status = props.status;
    this.money = props.money;
    this.requiresEnrichment = props.requiresEnrichment;
    this.affiliateCode = props.affiliateCode ?? null;
    this.paymentReference = props.paymentReference ?? null;
    this.enrichmentData = props.enrichmentData ?? null;
    this.generatedContent = props.generatedContent ?? null;
    this.lastProcessedEventId = props.lastProcessedEventId ?? null;
    this.refundStatus = props.refundStatus ?? RefundStatus.NOT_REQUIRED;
    this.refundReference = props.refundReference ?? null;
    this.deliveryStatus = props.deliveryStatus ?? DeliveryStatus.PENDING;
    this.failureReason = props.failureReason ?? null;
    this.version = props.version ?? 1;
    this.createdAt = props.createdAt ?? new Date();
    this.updatedAt = props.updatedAt ?? new Date();
  }

  get amount(): number {
    return this.money.amount;
  }

  get currency(): string {
    return this.money.currency;
  }

  isTerminal(): boolean {
    return isTerminalStatus(this.status);
  }

  /**
   * Paid or generating: the pipeline has not finished with this order
   */
  isInFlight(): boolean {
    return isInFlightStatus(this.status);
  }

  /**
   * Money was taken from the user at some point
   */
  isPaymentCaptured(): boolean {
    return this.paymentReference !== null;
  }

  /**
   * Refund failed or its outcome is unknown
   */
  isRefundPending(): boolean {
    return this.refundStatus === RefundStatus.PENDING_MANUAL;
  }

  /**
   * Copy with the given fields replaced; used by storage adapters after a write
   */
  with(changes: Partial<OrderProps>): Order {
    return new Order({ ...this.toProps(), ...changes });
  }

  toAuditSnapshot(): JsonObject {
    return {
      id: this.id,
      status: this.status,
      amount: this.amount,
      currency: this.currency,
      paymentReference: this.paymentReference,
      refundStatus: this.refundStatus,
      deliveryStatus: this.deliveryStatus,
      lastProcessedEventId: this.lastProcessedEventId,
      version: this.version,
    };
  }

  toPlainObject(): OrderRecord {
    return {
      id: this.id,
      userId: this.userId,
      productKind: this.productKind,
      input: this.input,
      status: this.status,
      amount: this.amount,
      currency: this.currency,
      requiresEnrichment: this.requiresEnrichment,
      affiliateCode: this.affiliateCode,
      paymentReference: this.paymentReference,
      enrichmentData: this.enrichmentData,
      generatedContent: this.generatedContent,
      lastProcessedEventId: this.lastProcessedEventId,
      refundStatus: this.refundStatus,
      refundReference: this.refundReference,
      deliveryStatus: this.deliveryStatus,
      failureReason: this.failureReason,
      version: this.version,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  static fromPlainObject(data: OrderRecord): Order {
    return new Order({
      ...data,
      input: { ...data.input },
      enrichmentData: data.enrichmentData ? { ...data.enrichmentData } : null,
      money: new Money(data.amount, data.currency),
      createdAt: new Date(data.createdAt),
      updatedAt: new Date(data.updatedAt),
    });
  }

  private toProps(): OrderProps {
    return { ...this.toPlainObject(), money: this.money };
  }
}
