import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for the liveness check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Liveness check',
      description: 'Answers as long as the process is up; never touches the store',
    }),
    ApiResponse({
      status: 200,
      description: 'Process is alive',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'healthy' },
          timestamp: { type: 'string', format: 'date-time' },
          uptime: { type: 'number', description: 'Uptime in seconds' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for the readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check',
      description: 'Reports whether the order store is reachable',
    }),
    ApiResponse({
      status: 200,
      description: 'Store reachable',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', enum: ['ready', 'not_ready'], example: 'ready' },
          checks: {
            type: 'object',
            properties: {
              storage: { type: 'boolean', example: true },
            },
          },
        },
      },
    }),
    ApiResponse({ status: 503, description: 'Store unreachable' }),
  );
};

/**
 * Swagger decorator for service statistics
 */
export const ApiServiceStatistics = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Service statistics',
      description: 'Order counts by status, pipeline stages and queued fulfillment work',
    }),
    ApiResponse({
      status: 200,
      description: 'Service statistics',
      schema: {
        type: 'object',
        properties: {
          storage: {
            type: 'object',
            properties: {
              orderCount: { type: 'number' },
              ordersByStatus: { type: 'object', additionalProperties: { type: 'number' } },
              processedEventCount: { type: 'number' },
              ledgerEntryCount: { type: 'number' },
              auditLogCount: { type: 'number' },
            },
          },
          pipeline: {
            type: 'object',
            properties: {
              stages: { type: 'array', items: { type: 'string' } },
              configuration: {
                type: 'object',
                properties: {
                  skipVerification: { type: 'boolean' },
                  timeoutMs: { type: 'number' },
                },
              },
            },
          },
          queue: {
            type: 'object',
            properties: {
              activeOrders: { type: 'number' },
            },
          },
        },
      },
    }),
  );
};
