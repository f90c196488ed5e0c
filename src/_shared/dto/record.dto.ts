import { IsEnum, IsInt, IsOptional, Max, Min } from 'class-validator';
import { ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { StoredRecordView, WebhookEndpoint } from '../../core';

/**
 * DTO for listing stored records
 */
export class ListRecordsDto {
  @ApiPropertyOptional({
    description: 'Only records received by this webhook',
    enum: WebhookEndpoint,
  })
  @IsOptional()
  @IsEnum(WebhookEndpoint)
  endpoint?: WebhookEndpoint;

  @ApiPropertyOptional({
    description: 'Number of results per page',
    default: 100,
    minimum: 1,
    maximum: 500,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit: number = 100;

  @ApiPropertyOptional({
    description: 'Number of results to skip',
    default: 0,
    minimum: 0,
  })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset: number = 0;
}

export interface RecordListDto {
  total: number;
  limit: number;
  offset: number;
  records: StoredRecordView[];
}
