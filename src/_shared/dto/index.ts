/**
 * Request and response DTOs for the HTTP API
 */

export * from './order.dto';
export * from './webhook.dto';
