import { DwfWebhookClient, WebhookEndpoint } from '../../src';

/**
 * Smoke checks against a running mock, run with `npm run test:live`.
 * MOCK_URL points at the mock; set DWF_API_SECRET when it requires
 * signatures.
 */
describe('DWF mock (live)', () => {
  const client = new DwfWebhookClient({
    baseUrl: process.env.MOCK_URL ?? 'http://localhost:5000',
    secret: process.env.DWF_API_SECRET,
  });

  const scenarios: Array<[WebhookEndpoint, Record<string, string>]> = [
    [WebhookEndpoint.CREATE_UPS, { patient_id: 'P001', study_uid: '1.2.3' }],
    [WebhookEndpoint.CREATE_PPS, { status: 'completed' }],
    [WebhookEndpoint.RECEIVE_IAN, { sop_instance_uid: '1.2.3.4' }],
  ];

  it('should be healthy', async () => {
    const response = await client.health();

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'ok' });
  });

  it.each(scenarios)('should store a %s payload', async (endpoint, payload) => {
    const response = await client.post(endpoint, payload);
    expect(response.status).toBe(201);

    const body = response.body;
    const id =
      body !== null && typeof body === 'object' && !Array.isArray(body)
        ? body.id
        : undefined;
    expect(typeof id).toBe('string');

    const record = await client.getRecord(String(id));
    expect(record.status).toBe(200);
    expect(record.body).toMatchObject({ payload });
  });

  it('should reject a body that is not JSON', async () => {
    const response = await client.postRaw(
      WebhookEndpoint.CREATE_UPS,
      'not-json',
      'text/plain',
    );

    expect(response.status).toBe(400);
  });
});
