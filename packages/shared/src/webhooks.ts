import { CONSENT_CHECK } from './constants.js';
import { signPayload, type HmacAlgorithm } from './crypto.js';

export type SignedPostResult =
  | { kind: 'response'; status: number; body: string }
  | { kind: 'timeout'; error: string }
  | { kind: 'transport_error'; error: string };

export interface SignedPostOptions {
  secret: string;
  timeoutMs?: number;
  signatureHeader?: string;
  algorithm?: HmacAlgorithm;
}

/**
 * POST a JSON payload signed with an HMAC of the serialized body.
 * Uses native fetch. Never rejects: failures come back as result variants,
 * and there is no retry.
 */
export async function postSignedJson(
  url: string,
  payload: unknown,
  options: SignedPostOptions,
): Promise<SignedPostResult> {
  const timeoutMs = options.timeoutMs ?? CONSENT_CHECK.TIMEOUT_MS;
  const header = options.signatureHeader ?? CONSENT_CHECK.SIGNATURE_HEADER;

  const body = JSON.stringify(payload);
  const signature = signPayload(options.secret, body, options.algorithm ?? CONSENT_CHECK.SIGNATURE_ALGORITHM);

  try {
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        [header]: signature,
      },
      body,
      signal: AbortSignal.timeout(timeoutMs),
    });
    const text = await response.text();
    return { kind: 'response', status: response.status, body: text };
  } catch (err: unknown) {
    if (err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')) {
      return { kind: 'timeout', error: err.message };
    }
    return { kind: 'transport_error', error: err instanceof Error ? err.message : 'Unknown error' };
  }
}
