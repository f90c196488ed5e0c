import { JsonObject, isJsonObject } from '../domain/json';
import { MalformedPayloadError } from '../errors';

/**
 * A request body that parsed as a JSON object, along with the text it
 * was parsed from
 */
export interface ParsedPayload {
  payload: JsonObject;
  text: string;
}

/**
 * What a payload store writes for one record
 */
export interface PayloadDocument {
  payload: JsonObject;
  content: string;
}

/**
 * Coerce whatever the body parser left on the request into bytes.
 * Without a body the raw parser leaves an empty object behind.
 */
export function toRawBody(body: unknown): Buffer {
  if (Buffer.isBuffer(body)) {
    return body;
  }
  if (typeof body === 'string') {
    return Buffer.from(body, 'utf8');
  }
  if (typeof body === 'object' && body !== null && Object.keys(body).length > 0) {
    // Already parsed by a JSON body parser upstream
    return Buffer.from(JSON.stringify(body), 'utf8');
  }
  return Buffer.alloc(0);
}

/**
 * Decode a request body into a JSON object. The body must be UTF-8;
 * a leading byte order mark is dropped.
 */
export function parsePayload(raw: Buffer): ParsedPayload {
  let text: string;
  try {
    text = new TextDecoder('utf-8', { fatal: true }).decode(raw);
  } catch (error) {
    throw new MalformedPayloadError('Request body is not valid UTF-8', {
      cause: error,
    });
  }

  if (text.trim().length === 0) {
    throw new MalformedPayloadError('Request body is empty');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MalformedPayloadError('Request body is not valid JSON', {
      cause: error,
    });
  }

  if (!isJsonObject(parsed)) {
    throw new MalformedPayloadError('Request body must be a JSON object');
  }

  return { payload: parsed, text };
}

/**
 * Build the stored document. Raw storage keeps the body text exactly as
 * received; otherwise the payload is re-serialized with two-space indent.
 */
export function createPayloadDocument(
  parsed: ParsedPayload,
  storeRawPayload: boolean,
): PayloadDocument {
  return {
    payload: parsed.payload,
    content: storeRawPayload
      ? parsed.text
      : JSON.stringify(parsed.payload, null, 2),
  };
}

/**
 * Read a stored document back into its payload
 */
export function readPayloadDocument(content: string): JsonObject {
  return parsePayload(Buffer.from(content, 'utf8')).payload;
}
