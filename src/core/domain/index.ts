export * from './enums';
export * from './models';
export * from './value-objects/money.vo';
export * from './errors';
export * from './product-catalog';
