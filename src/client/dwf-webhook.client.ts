import {
  FRAPPE_METHOD_PREFIX,
  JsonObject,
  JsonValue,
  WebhookEndpoint,
  computeSignature,
} from '../core';

export interface DwfWebhookClientOptions {
  /**
   * Base URL of the mock, e.g. http://localhost:5000
   */
  baseUrl: string;

  /**
   * Per-request timeout in milliseconds
   * Default: 5000
   */
  timeoutMs?: number;

  /**
   * Shared secret; when set, POST bodies are signed with X-Signature
   */
  secret?: string;
}

export interface DwfClientResponse {
  status: number;
  /**
   * Body parsed as JSON, null when empty or not JSON
   */
  body: JsonValue | null;
  text: string;
}

export interface ListRecordsQuery {
  endpoint?: WebhookEndpoint;
  limit?: number;
  offset?: number;
}

/**
 * Raised when the mock cannot be reached at all. HTTP error statuses are
 * returned as responses, not raised.
 */
export class DwfClientError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DwfClientError';
  }
}

/**
 * HTTP client for the DWF webhook mock
 * No retries: the caller waits for readiness through `health()`.
 */
export class DwfWebhookClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly secret?: string;

  constructor(options: DwfWebhookClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.secret = options.secret;
  }

  health(): Promise<DwfClientResponse> {
    return this.request('GET', '/health');
  }

  ready(): Promise<DwfClientResponse> {
    return this.request('GET', '/health/ready');
  }

  receiveIan(payload: JsonObject): Promise<DwfClientResponse> {
    return this.post(WebhookEndpoint.RECEIVE_IAN, payload);
  }

  createPps(payload: JsonObject): Promise<DwfClientResponse> {
    return this.post(WebhookEndpoint.CREATE_PPS, payload);
  }

  createUps(payload: JsonObject): Promise<DwfClientResponse> {
    return this.post(WebhookEndpoint.CREATE_UPS, payload);
  }

  post(endpoint: WebhookEndpoint, payload: JsonObject): Promise<DwfClientResponse> {
    return this.postRaw(endpoint, JSON.stringify(payload));
  }

  /**
   * Send a body exactly as given, for malformed-input scenarios
   */
  postRaw(
    endpoint: WebhookEndpoint,
    body: string,
    contentType = 'application/json',
  ): Promise<DwfClientResponse> {
    const headers: Record<string, string> = { 'Content-Type': contentType };
    if (this.secret) {
      headers['X-Signature'] = `sha256=${computeSignature(
        Buffer.from(body, 'utf8'),
        this.secret,
      )}`;
    }

    return this.request('POST', `/${FRAPPE_METHOD_PREFIX}${endpoint}`, {
      headers,
      body,
    });
  }

  listRecords(query: ListRecordsQuery = {}): Promise<DwfClientResponse> {
    const params = new URLSearchParams();
    if (query.endpoint) params.set('endpoint', query.endpoint);
    if (query.limit !== undefined) params.set('limit', String(query.limit));
    if (query.offset !== undefined) params.set('offset', String(query.offset));

    const search = params.toString();
    return this.request('GET', search ? `/records?${search}` : '/records');
  }

  getRecord(id: string): Promise<DwfClientResponse> {
    return this.request('GET', `/records/${encodeURIComponent(id)}`);
  }

  private async request(
    method: 'GET' | 'POST',
    path: string,
    init: { headers?: Record<string, string>; body?: string } = {},
  ): Promise<DwfClientResponse> {
    const url = `${this.baseUrl}${path}`;

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: init.headers,
        body: init.body,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      throw new DwfClientError(`${method} ${url} failed`, url, {
        cause: error,
      });
    }

    return { status: response.status, body: parseJson(text), text };
  }
}

function parseJson(text: string): JsonValue | null {
  if (text.length === 0) {
    return null;
  }
  try {
    const value: JsonValue = JSON.parse(text);
    return value;
  } catch {
    return null;
  }
}
