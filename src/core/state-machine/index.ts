/**
 * Order state machine
 * Decides which events apply to an order; persistence lives in the storage adapter
 */

export * from './order-state-machine';
export * from './types';
export * from './transition-rules';
export * from './guards';
export * from './validator';
