import * as crypto from 'crypto';
import type { IncomingHttpHeaders } from 'http';

/**
 * Headers checked for a webhook signature, in order of preference
 */
export const SIGNATURE_HEADERS = ['x-signature', 'x-hub-signature'] as const;

const SIGNATURE_PREFIX = 'sha256=';

/**
 * HMAC-SHA256 of the raw body, hex encoded
 */
export function computeSignature(body: Buffer, secret: string): string {
  return crypto.createHmac('sha256', secret).update(body).digest('hex');
}

export function readSignatureHeader(
  headers: IncomingHttpHeaders,
): string | undefined {
  for (const name of SIGNATURE_HEADERS) {
    const value = headers[name];
    const first = Array.isArray(value) ? value[0] : value;
    if (first) {
      return first;
    }
  }
  return undefined;
}

/**
 * Accepts `sha256=<hex>` or bare hex
 */
export function verifySignature(
  body: Buffer,
  signature: string | undefined,
  secret: string,
): boolean {
  if (!signature) {
    return false;
  }

  const provided = signature.startsWith(SIGNATURE_PREFIX)
    ? signature.slice(SIGNATURE_PREFIX.length)
    : signature;
  const expected = computeSignature(body, secret);

  const providedBuffer = Buffer.from(provided.toLowerCase(), 'utf8');
  const expectedBuffer = Buffer.from(expected, 'utf8');
  if (providedBuffer.length !== expectedBuffer.length) {
    return false;
  }

  return crypto.timingSafeEqual(providedBuffer, expectedBuffer);
}
