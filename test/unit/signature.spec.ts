import * as crypto from 'crypto';
import {
  computeSignature,
  readSignatureHeader,
  verifySignature,
} from '../../src';

describe('Webhook signatures', () => {
  const secret = 'test-secret';
  const body = Buffer.from('{"ian_id":"IAN-1"}');
  const expected = crypto.createHmac('sha256', secret).update(body).digest('hex');

  it('should compute a hex HMAC-SHA256 of the body', () => {
    expect(computeSignature(body, secret)).toBe(expected);
  });

  it('should accept a sha256= prefixed signature', () => {
    expect(verifySignature(body, `sha256=${expected}`, secret)).toBe(true);
  });

  it('should accept a bare hex signature in either case', () => {
    expect(verifySignature(body, expected, secret)).toBe(true);
    expect(verifySignature(body, expected.toUpperCase(), secret)).toBe(true);
  });

  it('should reject a signature made with another secret', () => {
    const other = computeSignature(body, 'other-secret');
    expect(verifySignature(body, `sha256=${other}`, secret)).toBe(false);
  });

  it('should reject a signature over a different body', () => {
    const signature = computeSignature(Buffer.from('{"ian_id":"IAN-2"}'), secret);
    expect(verifySignature(body, signature, secret)).toBe(false);
  });

  it('should reject missing and truncated signatures', () => {
    expect(verifySignature(body, undefined, secret)).toBe(false);
    expect(verifySignature(body, '', secret)).toBe(false);
    expect(verifySignature(body, expected.slice(0, 10), secret)).toBe(false);
  });

  describe('readSignatureHeader', () => {
    it('should prefer X-Signature over X-Hub-Signature', () => {
      expect(
        readSignatureHeader({
          'x-signature': 'sha256=aaa',
          'x-hub-signature': 'sha256=bbb',
        }),
      ).toBe('sha256=aaa');
    });

    it('should fall back to X-Hub-Signature', () => {
      expect(readSignatureHeader({ 'x-hub-signature': 'sha256=bbb' })).toBe(
        'sha256=bbb',
      );
    });

    it('should take the first of repeated headers', () => {
      expect(
        readSignatureHeader({ 'x-hub-signature': ['sha256=ccc', 'sha256=ddd'] }),
      ).toBe('sha256=ccc');
    });

    it('should return undefined when absent', () => {
      expect(
        readSignatureHeader({ 'content-type': 'application/json' }),
      ).toBeUndefined();
    });
  });
});
