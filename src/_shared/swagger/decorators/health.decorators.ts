import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiResponse } from '@nestjs/swagger';

/**
 * Swagger decorator for basic health check
 */
export const ApiHealthCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Basic health check',
      description: 'Succeeds whenever the process is serving requests',
    }),
    ApiResponse({
      status: 200,
      description: 'Service is up',
      schema: {
        type: 'object',
        properties: {
          status: { type: 'string', example: 'ok' },
        },
      },
    }),
  );
};

/**
 * Swagger decorator for readiness check
 */
export const ApiReadinessCheck = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'Readiness check with payload store status',
      description: 'Reports whether the payload store can accept writes',
    }),
    ApiResponse({
      status: 200,
      description: 'Service readiness status',
      schema: {
        type: 'object',
        properties: {
          status: {
            type: 'string',
            enum: ['ready', 'not_ready'],
            example: 'ready',
          },
          checks: {
            type: 'object',
            properties: {
              store: { type: 'boolean', example: true },
            },
          },
          details: {
            type: 'object',
            properties: {
              storage: {
                type: 'string',
                enum: ['filesystem', 'memory', 'typeorm', 'custom'],
                example: 'filesystem',
              },
            },
          },
        },
      },
    }),
  );
};
