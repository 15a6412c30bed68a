/**
 * Shared resources for the HTTP layer
 */

// DTOs for validation and type safety
export * from './dto';

// Swagger decorators for clean controllers
export * from './swagger';

// Testing utilities
export * from './testing/mock-webhook-factory';
