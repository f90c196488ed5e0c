import {
  Controller,
  Get,
  Param,
  Query,
  Inject,
  Logger,
  NotFoundException,
  InternalServerErrorException,
  ValidationPipe,
} from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { describeError } from '../../../core';
import type {
  PayloadStore,
  StoredRecord,
  StoredRecordView,
} from '../../../core';
import {
  ApiGetRecord,
  ApiListRecords,
  ListRecordsDto,
  RecordListDto,
} from '../../../_shared';
import { PAYLOAD_STORE } from '../constants';

/**
 * Record Controller
 *
 * Read-only view of the payload store for test harnesses that cannot
 * reach its directory
 */
@ApiTags('Records')
@Controller('records')
export class RecordController {
  private readonly logger = new Logger(RecordController.name);

  constructor(
    @Inject(PAYLOAD_STORE)
    private readonly store: PayloadStore,
  ) {}

  @Get()
  @ApiListRecords()
  async listRecords(
    @Query(new ValidationPipe({ transform: true }))
    query: ListRecordsDto,
  ): Promise<RecordListDto> {
    const filter = { endpoint: query.endpoint };

    try {
      const total = await this.store.count(filter);
      const records = await this.store.list(filter, {
        limit: query.limit,
        offset: query.offset,
      });

      return {
        total,
        limit: query.limit,
        offset: query.offset,
        records: records.map((record) => record.toJSON()),
      };
    } catch (error) {
      throw this.readFailure('list stored records', error);
    }
  }

  @Get(':id')
  @ApiGetRecord()
  async getRecord(@Param('id') id: string): Promise<StoredRecordView> {
    let record: StoredRecord | null;
    try {
      record = await this.store.get(id);
    } catch (error) {
      throw this.readFailure(`read stored record ${id}`, error);
    }

    if (!record) {
      throw new NotFoundException(`Stored record ${id} not found`);
    }
    return record.toJSON();
  }

  private readFailure(action: string, error: unknown): InternalServerErrorException {
    const { message, stack } = describeError(error);
    this.logger.error(`Failed to ${action}: ${message}`, stack);
    return new InternalServerErrorException(`Failed to ${action}`);
  }
}
