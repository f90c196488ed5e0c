import { WebhookEndpoint } from '../domain/enums';
import { StoredRecord } from '../domain/models';
import { PayloadDocument } from '../codec';

/**
 * Pagination parameters
 */
export interface Pagination {
  limit: number;
  offset: number;
}

/**
 * Record filter options
 */
export interface RecordFilter {
  endpoint?: WebhookEndpoint;
}

/**
 * Payload store interface - append-only persistence of received payloads
 *
 * Implementations must resolve `save` only once the record is written and
 * must never reuse a sequence, so every call yields a new record.
 * Read and write failures reject with PayloadStoreError.
 */
export interface PayloadStore {
  /**
   * Persist one payload as a new record
   */
  save(endpoint: WebhookEndpoint, document: PayloadDocument): Promise<StoredRecord>;

  /**
   * Find a record by id, null when the id is unknown or malformed
   */
  get(id: string): Promise<StoredRecord | null>;

  /**
   * List records in arrival order
   */
  list(filter?: RecordFilter, pagination?: Pagination): Promise<StoredRecord[]>;

  count(filter?: RecordFilter): Promise<number>;

  /**
   * Whether the store can currently accept writes. Never rejects.
   */
  isHealthy(): Promise<boolean>;

  /**
   * Release connections or handles held by the store
   */
  close(): Promise<void>;
}
