import { WebhookEndpoint } from '../enums';
import { JsonObject } from '../json';

/**
 * StoredRecord domain model - one persisted webhook payload
 * Created once on receipt and never mutated afterwards
 */
export class StoredRecord {
  constructor(
    public readonly id: string,
    public readonly endpoint: WebhookEndpoint,
    public readonly sequence: number,
    public readonly location: string,
    public readonly receivedAt: Date,
    public readonly payload: JsonObject,
  ) {}

  toJSON(): StoredRecordView {
    return {
      id: this.id,
      endpoint: this.endpoint,
      sequence: this.sequence,
      location: this.location,
      receivedAt: this.receivedAt.toISOString(),
      payload: this.payload,
    };
  }
}

/**
 * Wire shape of a stored record
 */
export interface StoredRecordView {
  id: string;
  endpoint: WebhookEndpoint;
  sequence: number;
  location: string;
  receivedAt: string;
  payload: JsonObject;
}
