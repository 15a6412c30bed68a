export * from './environment';
export * from './product-catalog.loader';
export * from './fulfillment-config.factory';
