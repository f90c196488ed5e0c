import {
  Controller,
  Post,
  Body,
  HttpCode,
  HttpStatus,
  UseGuards,
  UseInterceptors,
  Inject,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { WebhookEndpoint, endpointRoutes } from '../../../core';
import { ApiIngestEndpoint, IngestResponseDto } from '../../../_shared';
import { RawBodyInterceptor } from '../interceptors/raw-body.interceptor';
import { WebhookSignatureGuard } from '../middleware';
import { IngestService } from '../services/ingest.service';

/**
 * Webhook Controller
 *
 * The IAN, MPPS and UPS ingestion webhooks. Each is served on its Frappe
 * method path and on the short path of the standalone mock.
 */
@ApiTags('Ingest')
@Controller()
@UseGuards(WebhookSignatureGuard)
@UseInterceptors(RawBodyInterceptor)
export class WebhookController {
  constructor(
    @Inject(IngestService)
    private readonly ingestService: IngestService,
  ) {}

  @Post(endpointRoutes(WebhookEndpoint.RECEIVE_IAN))
  @HttpCode(HttpStatus.CREATED)
  @ApiIngestEndpoint(WebhookEndpoint.RECEIVE_IAN)
  receiveIan(@Body() rawBody: Buffer): Promise<IngestResponseDto> {
    return this.ingestService.ingest(WebhookEndpoint.RECEIVE_IAN, rawBody);
  }

  @Post(endpointRoutes(WebhookEndpoint.CREATE_PPS))
  @HttpCode(HttpStatus.CREATED)
  @ApiIngestEndpoint(WebhookEndpoint.CREATE_PPS)
  createPps(@Body() rawBody: Buffer): Promise<IngestResponseDto> {
    return this.ingestService.ingest(WebhookEndpoint.CREATE_PPS, rawBody);
  }

  @Post(endpointRoutes(WebhookEndpoint.CREATE_UPS))
  @HttpCode(HttpStatus.CREATED)
  @ApiIngestEndpoint(WebhookEndpoint.CREATE_UPS)
  createUps(@Body() rawBody: Buffer): Promise<IngestResponseDto> {
    return this.ingestService.ingest(WebhookEndpoint.CREATE_UPS, rawBody);
  }
}
