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

/**
 * In-memory payload store for testing
 * Keeps the stored document text so reads go through the same decoding
 * as the other stores
 */
export class MemoryPayloadStore implements PayloadStore {
  private records: Map<number, { record: StoredRecord; content: string }> =
    new Map();

  private sequenceCounter = 0;

  private readonly options: Required<MemoryPayloadStoreOptions>;

  constructor(options: MemoryPayloadStoreOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      throwOnError: false,
      ...options,
    };
  }

  /**
   * Simulate I/O latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  async save(
    endpoint: WebhookEndpoint,
    document: PayloadDocument,
  ): Promise<StoredRecord> {
    await this.simulateLatency();

    if (this.options.throwOnError) {
      throw new PayloadStoreError('Memory store is failing writes');
    }

    const sequence = ++this.sequenceCounter;
    const id = formatRecordId(endpoint, sequence);
    const record = new StoredRecord(
      id,
      endpoint,
      sequence,
      `memory://${id}`,
      new Date(),
      readPayloadDocument(document.content),
    );

    this.records.set(sequence, { record, content: document.content });
    return record;
  }

  async get(id: string): Promise<StoredRecord | null> {
    await this.simulateLatency();

    const parsed = parseRecordId(id);
    if (!parsed) {
      return null;
    }

    const entry = this.records.get(parsed.sequence);
    return entry && entry.record.endpoint === parsed.endpoint
      ? entry.record
      : null;
  }

  async list(
    filter: RecordFilter = {},
    pagination?: Pagination,
  ): Promise<StoredRecord[]> {
    await this.simulateLatency();

    const matching = this.matching(filter);
    return pagination
      ? matching.slice(pagination.offset, pagination.offset + pagination.limit)
      : matching;
  }

  async count(filter: RecordFilter = {}): Promise<number> {
    await this.simulateLatency();
    return this.matching(filter).length;
  }

  async isHealthy(): Promise<boolean> {
    await this.simulateLatency();
    return !this.options.throwOnError;
  }

  async close(): Promise<void> {
    this.clear();
  }

  // ==================== Testing Utilities ====================

  /**
   * Stored document text of a record (for testing)
   */
  getContent(id: string): string | undefined {
    const parsed = parseRecordId(id);
    return parsed ? this.records.get(parsed.sequence)?.content : undefined;
  }

  /**
   * Toggle write failures (for testing)
   */
  setThrowOnError(throwOnError: boolean): void {
    this.options.throwOnError = throwOnError;
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.records.clear();
    this.sequenceCounter = 0;
  }

  private matching(filter: RecordFilter): StoredRecord[] {
    return [...this.records.values()]
      .map((entry) => entry.record)
      .filter((record) => !filter.endpoint || record.endpoint === filter.endpoint)
      .sort((a, b) => a.sequence - b.sequence);
  }
}

export interface MemoryPayloadStoreOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  throwOnError?: boolean;
}
