import { Money } from '../domain/value-objects/money.vo';

export interface CommissionTier {
  /**
   * Cumulative prior sales (minor units) at which this tier starts
   */
  minSales: number;
  rate: number;
}

export interface CommissionSchedule {
  tiers: CommissionTier[];
  /**
   * Cumulative sales (minor units) that unlock the one-time bonus
   */
  bonusThreshold: number;
  bonusAmount: number;
}

/**
 * 20% up to 1000, 25% up to 3000, 30% up to 5000, 35% beyond; a 500 bonus
 * the first time cumulative sales reach 8000 (major units)
 */
export const DEFAULT_COMMISSION_SCHEDULE: CommissionSchedule = {
  tiers: [
    { minSales: 0, rate: 0.2 },
    { minSales: 100_000, rate: 0.25 },
    { minSales: 300_000, rate: 0.3 },
    { minSales: 500_000, rate: 0.35 },
  ],
  bonusThreshold: 800_000,
  bonusAmount: 50_000,
};

export interface CommissionQuote {
  rate: number;
  commission: Money;
  bonus: Money;
}

/**
 * The rate is chosen by the affiliate's sales before this order, so an order
 * that crosses a tier boundary is paid at the lower tier.
 */
export function calculateCommission(
  orderAmount: Money,
  priorSales: number,
  schedule: CommissionSchedule = DEFAULT_COMMISSION_SCHEDULE,
): CommissionQuote {
  const rate = rateFor(priorSales, schedule);
  const totalAfter = priorSales + orderAmount.amount;
  const crossesBonus =
    priorSales < schedule.bonusThreshold && totalAfter >= schedule.bonusThreshold;

  return {
    rate,
    commission: orderAmount.percentage(rate),
    bonus: new Money(crossesBonus ? schedule.bonusAmount : 0, orderAmount.currency),
  };
}

export function rateFor(priorSales: number, schedule: CommissionSchedule): number {
  let rate = 0;
  for (const tier of [...schedule.tiers].sort((a, b) => a.minSales - b.minSales)) {
    if (priorSales >= tier.minSales) {
      rate = tier.rate;
    }
  }
  return rate;
}
