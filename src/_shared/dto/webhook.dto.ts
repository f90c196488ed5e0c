import { ApiProperty } from '@nestjs/swagger';
import { WebhookEndpoint } from '../../core';

/**
 * Response DTO for an accepted webhook
 */
export class IngestResponseDto {
  @ApiProperty({
    description: 'Acknowledgement marker',
    enum: ['received'],
    example: 'received',
  })
  status!: 'received';

  @ApiProperty({
    description: 'Where the payload was stored',
    example: '/data/ups_3.json',
  })
  saved!: string;

  @ApiProperty({
    description: 'Stored record id',
    example: 'ups_3',
  })
  id!: string;

  @ApiProperty({
    description: 'Webhook that accepted the payload',
    enum: WebhookEndpoint,
    example: WebhookEndpoint.CREATE_UPS,
  })
  endpoint!: WebhookEndpoint;

  @ApiProperty({
    description: 'Per-request id, also written to the service log',
    format: 'uuid',
    example: '550e8400-e29b-41d4-a716-446655440000',
  })
  receiptId!: string;
}
