import { calculateCommission, DEFAULT_COMMISSION_SCHEDULE, Money, rateFor } from '../../src';

describe('Commission', () => {
  const usd = (amount: number) => new Money(amount, 'USD');

  it.each([
    [0, 0.2],
    [99_999, 0.2],
    [100_000, 0.25],
    [299_999, 0.25],
    [300_000, 0.3],
    [500_000, 0.35],
    [2_000_000, 0.35],
  ])('prior sales of %i minor units earn rate %d', (priorSales, rate) => {
    expect(rateFor(priorSales, DEFAULT_COMMISSION_SCHEDULE)).toBe(rate);
  });

  it('rounds the commission to the minor unit', () => {
    const quote = calculateCommission(usd(999), 0);

    expect(quote.rate).toBe(0.2);
    expect(quote.commission.amount).toBe(200);
    expect(quote.bonus.amount).toBe(0);
  });

  it('pays an order that crosses a tier boundary at the lower tier', () => {
    const quote = calculateCommission(usd(2999), 99_000);

    expect(quote.rate).toBe(0.2);
    expect(quote.commission.amount).toBe(600);
  });

  it('grants the bonus once, on the order that reaches the threshold', () => {
    const crossing = calculateCommission(usd(999), 799_500);
    const after = calculateCommission(usd(999), 800_499);
    const exactlyAtThreshold = calculateCommission(usd(500), 799_500);

    expect(crossing.bonus.amount).toBe(50_000);
    expect(crossing.rate).toBe(0.35);
    expect(after.bonus.amount).toBe(0);
    expect(exactlyAtThreshold.bonus.amount).toBe(50_000);
  });

  it('keeps the order currency', () => {
    const quote = calculateCommission(new Money(1000, 'EUR'), 0);
    expect(quote.commission.currency).toBe('EUR');
    expect(quote.bonus.currency).toBe('EUR');
  });
});
