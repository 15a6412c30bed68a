export interface MoneyJSON {
  amount: number;
  currency: string;
}

/**
 * Immutable monetary amount in the smallest currency unit (cents for USD).
 * Order prices, ledger amounts and refunds all go through this type.
 */
export class Money {
  private readonly _amount: number;
  private readonly _currency: string;

  constructor(amount: number, currency: string) {
    if (!Number.isInteger(amount)) {
      throw new Error('Amount must be an integer (smallest currency unit)');
    }
    if (amount < 0) {
      throw new Error('Amount cannot be negative');
    }
    if (!currency || currency.length !== 3) {
      throw new Error('Currency must be a 3-letter ISO 4217 code');
    }

    this._amount = amount;
    this._currency = currency.toUpperCase();
  }

  static zero(currency: string): Money {
    return new Money(0, currency);
  }

  /**
   * Create from major units (29.99 USD -> 2999)
   */
  static fromMajorUnits(amount: number, currency: string, decimalPlaces = 2): Money {
    return new Money(Math.round(amount * Math.pow(10, decimalPlaces)), currency);
  }

  get amount(): number {
    return this._amount;
  }

  get currency(): string {
    return this._currency;
  }

  equals(other: Money): boolean {
    return this._amount === other._amount && this._currency === other._currency;
  }

  add(other: Money): Money {
    this.assertSameCurrency(other, 'add');
    return new Money(this._amount + other._amount, this._currency);
  }

  isGreaterThanOrEqual(other: Money): boolean {
    this.assertSameCurrency(other, 'compare');
    return this._amount >= other._amount;
  }

  isZero(): boolean {
    return this._amount === 0;
  }

  /**
   * Apply a fractional rate, rounding half away from zero to the minor unit
   */
  percentage(rate: number): Money {
    if (rate < 0) {
      throw new Error('Rate cannot be negative');
    }
    return new Money(Math.round(this._amount * rate), this._currency);
  }

  toMajorUnits(decimalPlaces = 2): number {
    return this._amount / Math.pow(10, decimalPlaces);
  }

  /**
   * Human-readable form used in user messages, e.g. "29.99 USD"
   */
  format(decimalPlaces = 2): string {
    return `${this.toMajorUnits(decimalPlaces).toFixed(decimalPlaces)} ${this._currency}`;
  }

  toString(): string {
    return `${this._currency} ${this._amount}`;
  }

  toJSON(): MoneyJSON {
    return {
      amount: this._amount,
      currency: this._currency,
    };
  }

  private assertSameCurrency(other: Money, operation: string): void {
    if (this._currency !== other._currency) {
      throw new Error(
        `Cannot ${operation} different currencies: ${this._currency} and ${other._currency}`,
      );
    }
  }
}
