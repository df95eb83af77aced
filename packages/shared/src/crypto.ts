import { createHmac } from 'node:crypto';

export type HmacAlgorithm = 'sha1' | 'sha256';

/** Hex HMAC over the exact bytes given; callers must sign what they send. */
export function signPayload(secret: string, body: string | Buffer, algorithm: HmacAlgorithm = 'sha1'): string {
  return createHmac(algorithm, secret).update(body).digest('hex');
}

