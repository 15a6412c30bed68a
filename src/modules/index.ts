export * from './fulfillment';
