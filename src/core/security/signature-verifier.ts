import * as crypto from 'crypto';

export type SignatureAlgorithm = 'sha256' | 'sha512';

export interface SignatureOptions {
  algorithm?: SignatureAlgorithm;
}

/**
 * Keyed MAC of the raw request body, lowercase hex
 */
export function computeSignature(
  rawBody: Buffer,
  secret: string,
  options: SignatureOptions = {},
): string {
  return crypto
    .createHmac(options.algorithm ?? 'sha256', secret)
    .update(rawBody)
    .digest('hex');
}

/**
 * Verify a webhook signature over the exact bytes received.
 * Fails closed: an empty secret, a missing or malformed header, or a length
 * mismatch all return false. The comparison is constant-time.
 */
export function verifySignature(
  rawBody: Buffer,
  signatureHeader: string | undefined,
  secret: string,
  options: SignatureOptions = {},
): boolean {
  if (!secret || !signatureHeader) {
    return false;
  }

  const provided = signatureHeader.trim().toLowerCase();
  if (!/^[0-9a-f]+$/.test(provided)) {
    return false;
  }

  const expected = computeSignature(rawBody, secret, options);
  return timingSafeEqual(expected, provided);
}

/**
 * Try each secret in order; supports rotation windows with two live secrets
 */
export function verifyWithAnySecret(
  rawBody: Buffer,
  signatureHeader: string | undefined,
  secrets: string[],
  options: SignatureOptions = {},
): boolean {
  return secrets.some((secret) => verifySignature(rawBody, signatureHeader, secret, options));
}

function timingSafeEqual(a: string, b: string): boolean {
  const bufferA = Buffer.from(a, 'utf8');
  const bufferB = Buffer.from(b, 'utf8');
  if (bufferA.length !== bufferB.length) {
    return false;
  }
  return crypto.timingSafeEqual(bufferA, bufferB);
}
