import { applyDecorators } from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse } from '@nestjs/swagger';

const STORED_RECORD_SCHEMA = {
  type: 'object',
  properties: {
    id: { type: 'string', example: 'ups_3' },
    endpoint: { type: 'string', example: 'create_ups' },
    sequence: { type: 'number', example: 3 },
    location: { type: 'string', example: '/data/ups_3.json' },
    receivedAt: { type: 'string', format: 'date-time' },
    payload: { type: 'object', additionalProperties: true },
  },
};

/**
 * Swagger decorator for listing stored records
 */
export const ApiListRecords = () => {
  return applyDecorators(
    ApiOperation({
      summary: 'List stored records',
      description: 'Stored payloads in arrival order, optionally for one webhook',
    }),
    ApiResponse({
      status: 200,
      description: 'Page of stored records',
      schema: {
        type: 'object',
        properties: {
          total: { type: 'number' },
          limit: { type: 'number' },
          offset: { type: 'number' },
          records: { type: 'array', items: STORED_RECORD_SCHEMA },
        },
      },
    }),
    ApiResponse({ status: 400, description: 'Invalid query parameters' }),
  );
};

/**
 * Swagger decorator for fetching one stored record
 */
export const ApiGetRecord = () => {
  return applyDecorators(
    ApiOperation({ summary: 'Get a stored record by id' }),
    ApiParam({ name: 'id', example: 'ups_3' }),
    ApiResponse({
      status: 200,
      description: 'Stored record',
      schema: STORED_RECORD_SCHEMA,
    }),
    ApiResponse({ status: 404, description: 'No record with this id' }),
  );
};
