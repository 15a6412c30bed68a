import { Money } from '../value-objects/money.vo';

/**
 * Append-only commission credit. At most one entry exists per order.
 */
export class AffiliateLedgerEntry {
  constructor(
    public readonly id: string,
    public readonly affiliateCode: string,
    public readonly orderId: string,
    public readonly orderAmount: Money,
    public readonly commissionRate: number,
    public readonly commissionAmount: Money,
    public readonly bonusAmount: Money,
    public readonly createdAt: Date = new Date(),
  ) {}

  get currency(): string {
    return this.orderAmount.currency;
  }

  /**
   * Commission plus any one-time bonus awarded with this order
   */
  totalCredit(): Money {
    return this.commissionAmount.add(this.bonusAmount);
  }
}
