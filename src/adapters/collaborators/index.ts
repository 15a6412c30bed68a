export * from './http';
export * from './telegram';
export * from './mock';
