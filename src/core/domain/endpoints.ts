import { WebhookEndpoint } from './enums';

export interface EndpointDefinition {
  /** File and record id prefix */
  prefix: string;
  /** Short message kind used in logs */
  kind: string;
  description: string;
}

export const ENDPOINT_DEFINITIONS: Record<WebhookEndpoint, EndpointDefinition> = {
  [WebhookEndpoint.RECEIVE_IAN]: {
    prefix: 'ian',
    kind: 'IAN',
    description: 'Imaging Availability Notification',
  },
  [WebhookEndpoint.CREATE_PPS]: {
    prefix: 'pps',
    kind: 'MPPS',
    description: 'Modality Performed Procedure Step',
  },
  [WebhookEndpoint.CREATE_UPS]: {
    prefix: 'ups',
    kind: 'UPS',
    description: 'Unified Procedure Step',
  },
};

export const WEBHOOK_ENDPOINTS: readonly WebhookEndpoint[] = [
  WebhookEndpoint.RECEIVE_IAN,
  WebhookEndpoint.CREATE_PPS,
  WebhookEndpoint.CREATE_UPS,
];

/**
 * Route prefix of Frappe whitelisted methods
 */
export const FRAPPE_METHOD_PREFIX = 'api/method/frappe_dwf.api.';

const RECORD_ID_PATTERN = /^(ian|pps|ups)_([1-9]\d*)$/;

export function isWebhookEndpoint(value: string): value is WebhookEndpoint {
  return WEBHOOK_ENDPOINTS.some((endpoint) => endpoint === value);
}

/**
 * Both paths an endpoint answers on: the Frappe method path and the
 * short path of the standalone mock
 */
export function endpointRoutes(endpoint: WebhookEndpoint): string[] {
  return [`${FRAPPE_METHOD_PREFIX}${endpoint}`, endpoint];
}

export function formatRecordId(
  endpoint: WebhookEndpoint,
  sequence: number,
): string {
  return `${ENDPOINT_DEFINITIONS[endpoint].prefix}_${sequence}`;
}

/**
 * Split a record id such as `ups_3` into endpoint and sequence.
 * Returns null for anything that is not a well-formed record id.
 */
export function parseRecordId(
  id: string,
): { endpoint: WebhookEndpoint; sequence: number } | null {
  const match = RECORD_ID_PATTERN.exec(id);
  if (!match) {
    return null;
  }

  const endpoint = WEBHOOK_ENDPOINTS.find(
    (candidate) => ENDPOINT_DEFINITIONS[candidate].prefix === match[1],
  );
  if (!endpoint) {
    return null;
  }

  return { endpoint, sequence: parseInt(match[2], 10) };
}
