import { OrderStatus } from './enums';

export class OrderNotFoundError extends Error {
  constructor(public readonly orderId: string) {
    super(`Order not found: ${orderId}`);
    this.name = 'OrderNotFoundError';
  }
}

/**
 * A conditional write lost: the stored status or version changed since it was read
 */
export class ConcurrencyConflictError extends Error {
  constructor(
    public readonly orderId: string,
    public readonly expectedStatus: OrderStatus | null,
    public readonly expectedVersion: number,
  ) {
    super(
      `Concurrent modification of order ${orderId} (expected ${expectedStatus ?? 'any status'} at version ${expectedVersion})`,
    );
    this.name = 'ConcurrencyConflictError';
  }
}

export class UnknownProductError extends Error {
  constructor(public readonly productKind: string) {
    super(`Unknown product kind: ${productKind}`);
    this.name = 'UnknownProductError';
  }
}
