import crypto from 'node:crypto';

/**
 * Compute the X-Line-Signature value for a webhook body:
 * base64(HMAC-SHA256(channelSecret, rawBody)).
 */
export function signLineBody(rawBody: string, channelSecret: string): string {
  return crypto.createHmac('sha256', channelSecret).update(rawBody, 'utf8').digest('base64');
}

export function verifyLineSignature(rawBody: string, signature: string, channelSecret: string): boolean {
  const expected = Buffer.from(signLineBody(rawBody, channelSecret));
  const actual = Buffer.from(signature);
  if (expected.length !== actual.length) return false;
  return crypto.timingSafeEqual(expected, actual);
}
