import {
  ENDPOINT_DEFINITIONS,
  WebhookEndpoint,
  endpointRoutes,
  formatRecordId,
  isWebhookEndpoint,
  parseRecordId,
} from '../../src';

describe('Webhook endpoints', () => {
  it('should map each endpoint to its record prefix', () => {
    expect(ENDPOINT_DEFINITIONS[WebhookEndpoint.RECEIVE_IAN].prefix).toBe('ian');
    expect(ENDPOINT_DEFINITIONS[WebhookEndpoint.CREATE_PPS].prefix).toBe('pps');
    expect(ENDPOINT_DEFINITIONS[WebhookEndpoint.CREATE_UPS].prefix).toBe('ups');
  });

  it('should serve each endpoint on the Frappe method path and the short path', () => {
    expect(endpointRoutes(WebhookEndpoint.CREATE_UPS)).toEqual([
      'api/method/frappe_dwf.api.create_ups',
      'create_ups',
    ]);
  });

  it('should recognise endpoint names', () => {
    expect(isWebhookEndpoint('receive_ian')).toBe(true);
    expect(isWebhookEndpoint('get_worklist')).toBe(false);
  });

  describe('record ids', () => {
    it('should format ids from prefix and sequence', () => {
      expect(formatRecordId(WebhookEndpoint.CREATE_PPS, 12)).toBe('pps_12');
    });

    it('should parse well-formed ids', () => {
      expect(parseRecordId('ups_3')).toEqual({
        endpoint: WebhookEndpoint.CREATE_UPS,
        sequence: 3,
      });
      expect(parseRecordId('ian_1')).toEqual({
        endpoint: WebhookEndpoint.RECEIVE_IAN,
        sequence: 1,
      });
    });

    it.each([['ups_0'], ['ups_03'], ['mpps_1'], ['ups-1'], ['../ups_1'], ['']])(
      'should reject %p',
      (id) => {
        expect(parseRecordId(id)).toBeNull();
      },
    );
  });
});
