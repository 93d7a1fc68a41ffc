import crypto from 'crypto';

export const SIGNATURE_HEADER = 'x-kling-signature';

export function signPayload(payload: Buffer | string, secret: string): string {
  return crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

/** Constant-time check of a hex HMAC-SHA256 signature over the raw body. */
export function isValidSignature(payload: Buffer | string, signature: string, secret: string): boolean {
  const expected = Buffer.from(signPayload(payload, secret), 'utf8');
  const received = Buffer.from(signature.trim().toLowerCase(), 'utf8');
  return expected.length === received.length && crypto.timingSafeEqual(expected, received);
}
