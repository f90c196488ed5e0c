import { DataSource, Repository, FindOptionsWhere } from 'typeorm';
import {
  PayloadStore,
  PayloadDocument,
  Pagination,
  RecordFilter,
  StoredRecord,
  WebhookEndpoint,
  PayloadStoreError,
  formatRecordId,
  parseRecordId,
  readPayloadDocument,
} from '../../../core';
import { StoredRecordEntity } from './entities';

/**
 * TypeORM implementation of PayloadStore
 * The auto-increment key doubles as the record sequence.
 */
export class TypeORMPayloadStore implements PayloadStore {
  private readonly repository: Repository<StoredRecordEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.repository = dataSource.getRepository(StoredRecordEntity);
  }

  async save(
    endpoint: WebhookEndpoint,
    document: PayloadDocument,
  ): Promise<StoredRecord> {
    const entity = this.repository.create({
      endpoint,
      content: document.content,
      receivedAt: new Date(),
    });

    try {
      const saved = await this.repository.save(entity);
      return this.mapEntityToDomain(saved);
    } catch (error) {
      if (error instanceof PayloadStoreError) {
        throw error;
      }
      throw new PayloadStoreError(`Failed to insert ${endpoint} record`, {
        cause: error,
      });
    }
  }

  async get(id: string): Promise<StoredRecord | null> {
    const parsed = parseRecordId(id);
    if (!parsed) {
      return null;
    }

    const entity = await this.query(() =>
      this.repository.findOneBy({
        sequence: parsed.sequence,
        endpoint: parsed.endpoint,
      }),
    );
    return entity ? this.mapEntityToDomain(entity) : null;
  }

  async list(
    filter: RecordFilter = {},
    pagination?: Pagination,
  ): Promise<StoredRecord[]> {
    const entities = await this.query(() =>
      this.repository.find({
        where: this.buildWhere(filter),
        order: { sequence: 'ASC' },
        skip: pagination?.offset,
        take: pagination?.limit,
      }),
    );
    return entities.map((entity) => this.mapEntityToDomain(entity));
  }

  async count(filter: RecordFilter = {}): Promise<number> {
    return this.query(() =>
      this.repository.count({ where: this.buildWhere(filter) }),
    );
  }

  async isHealthy(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  private buildWhere(
    filter: RecordFilter,
  ): FindOptionsWhere<StoredRecordEntity> {
    return filter.endpoint ? { endpoint: filter.endpoint } : {};
  }

  private async query<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw new PayloadStoreError('Failed to query stored records', {
        cause: error,
      });
    }
  }

  private mapEntityToDomain(entity: StoredRecordEntity): StoredRecord {
    const id = formatRecordId(entity.endpoint, entity.sequence);

    try {
      return new StoredRecord(
        id,
        entity.endpoint,
        entity.sequence,
        `db://stored_records/${id}`,
        entity.receivedAt,
        readPayloadDocument(entity.content),
      );
    } catch (error) {
      throw new PayloadStoreError(`Stored record ${id} is corrupt`, {
        cause: error,
      });
    }
  }
}
