import { applyDecorators } from '@nestjs/common';
import {
  ApiBody,
  ApiHeader,
  ApiOperation,
  ApiResponse,
} from '@nestjs/swagger';
import { ENDPOINT_DEFINITIONS, WebhookEndpoint } from '../../../core';
import { IngestResponseDto } from '../../dto';

const BODY_EXAMPLES: Record<WebhookEndpoint, Record<string, unknown>> = {
  [WebhookEndpoint.RECEIVE_IAN]: {
    ian_id: 'IAN-0001',
    source: 'ORTHANC',
    sop_instance_uids: ['1.2.3.4.5.1'],
    availability_status: 'Available',
  },
  [WebhookEndpoint.CREATE_PPS]: {
    pps_uid: 'MPPS-0001',
    sps_uid: 'SPS-0001',
    actor: 'CT-1',
    status: 'completed',
  },
  [WebhookEndpoint.CREATE_UPS]: {
    patient_id: 'P001',
    study_uid: '1.2.3',
  },
};

/**
 * Swagger decorator for the ingestion webhooks
 */
export const ApiIngestEndpoint = (endpoint: WebhookEndpoint) => {
  const { description, kind } = ENDPOINT_DEFINITIONS[endpoint];

  return applyDecorators(
    ApiOperation({
      summary: `Receive ${kind} webhook`,
      description: `Accepts a ${description} as any JSON object and stores it unchanged as a new record. Identical payloads are stored again.`,
    }),
    ApiHeader({
      name: 'x-signature',
      description:
        'sha256=<hex HMAC-SHA256 of the body>, required only when a webhook secret is configured',
      required: false,
    }),
    ApiBody({
      description: `${description} payload`,
      required: true,
      schema: {
        type: 'object',
        additionalProperties: true,
        example: BODY_EXAMPLES[endpoint],
      },
    }),
    ApiResponse({
      status: 201,
      description: 'Payload stored',
      type: IngestResponseDto,
    }),
    ApiResponse({
      status: 400,
      description: 'Body is empty, not JSON, or not a JSON object',
    }),
    ApiResponse({ status: 403, description: 'Webhook signature missing or wrong' }),
    ApiResponse({ status: 500, description: 'Payload could not be stored' }),
  );
};
