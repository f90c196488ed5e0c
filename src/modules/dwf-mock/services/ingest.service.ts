import {
  Injectable,
  Inject,
  Logger,
  BadRequestException,
  InternalServerErrorException,
} from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  ENDPOINT_DEFINITIONS,
  MalformedPayloadError,
  ParsedPayload,
  StoredRecord,
  WebhookEndpoint,
  createPayloadDocument,
  describeError,
  parsePayload,
} from '../../../core';
import type { PayloadStore } from '../../../core';
import type { IngestResponseDto } from '../../../_shared/dto';
import { PAYLOAD_STORE } from '../constants';
import { ConfigurationService } from './configuration.service';

/**
 * IngestService
 *
 * The one algorithm behind all three webhooks: parse the body, persist it,
 * acknowledge with where it went
 */
@Injectable()
export class IngestService {
  private readonly logger = new Logger(IngestService.name);

  constructor(
    @Inject(PAYLOAD_STORE)
    private readonly store: PayloadStore,
    private readonly configuration: ConfigurationService,
  ) {}

  async ingest(
    endpoint: WebhookEndpoint,
    rawBody: Buffer,
  ): Promise<IngestResponseDto> {
    const receiptId = uuidv4();
    const { kind } = ENDPOINT_DEFINITIONS[endpoint];
    this.logger.log(
      `Received ${kind} webhook ${receiptId} (${rawBody.length} bytes)`,
    );

    let parsed: ParsedPayload;
    try {
      parsed = parsePayload(rawBody);
    } catch (error) {
      if (error instanceof MalformedPayloadError) {
        this.logger.warn(`Rejected ${kind} webhook ${receiptId}: ${error.message}`);
        throw new BadRequestException(error.message);
      }
      throw error;
    }

    const document = createPayloadDocument(
      parsed,
      this.configuration.isRawPayloadStorageEnabled(),
    );

    let record: StoredRecord;
    try {
      record = await this.store.save(endpoint, document);
    } catch (error) {
      const { message, stack } = describeError(error);
      this.logger.error(
        `Failed to persist ${kind} webhook ${receiptId}: ${message}`,
        stack,
      );
      throw new InternalServerErrorException('Failed to persist payload');
    }

    this.logger.log(
      `Stored ${kind} webhook ${receiptId} as ${record.id} at ${record.location}`,
    );

    return {
      status: 'received',
      saved: record.location,
      id: record.id,
      endpoint,
      receiptId,
    };
  }
}
