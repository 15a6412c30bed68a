import { Money } from '../../src';

describe('Money', () => {
  it('stores integer minor units and upper-cases the currency', () => {
    const money = new Money(2999, 'usd');
    expect(money.amount).toBe(2999);
    expect(money.currency).toBe('USD');
  });

  it('rejects fractional, negative and malformed values', () => {
    expect(() => new Money(10.5, 'USD')).toThrow('Amount must be an integer');
    expect(() => new Money(-1, 'USD')).toThrow('Amount cannot be negative');
    expect(() => new Money(100, 'US')).toThrow('3-letter');
  });

  it('converts from major units with rounding', () => {
    expect(Money.fromMajorUnits(29.99, 'USD').amount).toBe(2999);
    expect(Money.fromMajorUnits(0.1 + 0.2, 'USD').amount).toBe(30);
    expect(Money.fromMajorUnits(0, 'USD').isZero()).toBe(true);
  });

  it('compares by amount and currency', () => {
    expect(new Money(500, 'USD').equals(new Money(500, 'USD'))).toBe(true);
    expect(new Money(500, 'USD').equals(new Money(500, 'EUR'))).toBe(false);
    expect(new Money(500, 'USD').equals(new Money(501, 'USD'))).toBe(false);
  });

  it('refuses arithmetic across currencies', () => {
    expect(() => new Money(1, 'USD').add(new Money(1, 'EUR'))).toThrow(
      'Cannot add different currencies: USD and EUR',
    );
    expect(new Money(100, 'USD').add(new Money(250, 'USD')).amount).toBe(350);
  });

  it('applies a rate rounded to the minor unit', () => {
    expect(new Money(999, 'USD').percentage(0.25).amount).toBe(250);
    expect(new Money(2999, 'USD').percentage(0.2).amount).toBe(600);
  });

  it('formats for user messages', () => {
    expect(new Money(2999, 'USD').format()).toBe('29.99 USD');
    expect(new Money(0, 'USD').format()).toBe('0.00 USD');
    expect(new Money(2999, 'USD').toJSON()).toEqual({ amount: 2999, currency: 'USD' });
  });
});
