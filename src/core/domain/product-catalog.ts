import { UnknownProductError } from './errors';
import { Money } from './value-objects/money.vo';

export interface ProductDefinition {
  kind: string;
  name: string;
  /**
   * Price in minor units
   */
  amount: number;
  currency: string;
  requiresEnrichment: boolean;
}

/**
 * Products an order can be created for. Prices are fixed here, never taken
 * from the caller.
 */
export class ProductCatalog {
  private readonly products = new Map<string, ProductDefinition>();

  constructor(definitions: ProductDefinition[]) {
    for (const definition of definitions) {
      if (this.products.has(definition.kind)) {
        throw new Error(`Duplicate product kind: ${definition.kind}`);
      }
      // Validates amount and currency
      new Money(definition.amount, definition.currency);
      this.products.set(definition.kind, { ...definition });
    }
  }

  has(kind: string): boolean {
    return this.products.has(kind);
  }

  /**
   * @throws UnknownProductError
   */
  get(kind: string): ProductDefinition {
    const product = this.products.get(kind);
    if (!product) {
      throw new UnknownProductError(kind);
    }
    return product;
  }

  priceOf(kind: string): Money {
    const product = this.get(kind);
    return new Money(product.amount, product.currency);
  }

  list(): ProductDefinition[] {
    return Array.from(this.products.values());
  }
}
