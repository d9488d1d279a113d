/**
 * API-Sports request helper: key rotation, per-attempt timeout and
 * exponential backoff on transient failures.
 * Tries the primary key first, falls back to backups on 401/403/429.
 */

import { LookupTransportError, errorMessage } from '../errors.ts';

export interface RetryPolicy {
  retries: number;        // attempts after the first one
  baseDelayMs: number;    // delay before retry n is baseDelayMs * 2^n
  timeoutMs: number;      // per attempt
}

export interface ProviderFetchOptions {
  apiKeys: string[];
  retry: RetryPolicy;
  context?: string;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
}

const ROTATE_STATUSES = new Set([401, 403, 429]);

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** attempt;
}

/**
 * GET a provider URL and return the parsed JSON body.
 * Throws LookupTransportError once keys and retries are exhausted, or on a
 * non-retryable status.
 */
export async function fetchWithKeyRotation(url: string, options: ProviderFetchOptions): Promise<unknown> {
  const { apiKeys, retry } = options;
  const context = options.context ?? 'api-sports';
  const doFetch = options.fetchImpl ?? fetch;
  const wait = options.sleep ?? sleep;

  if (apiKeys.length === 0) {
    throw new LookupTransportError('No API_SPORTS_KEY configured');
  }

  let keyIndex = 0;
  let attempt = 0;

  const retryOrGiveUp = async (error: LookupTransportError): Promise<void> => {
    if (attempt >= retry.retries) throw error;
    const delay = backoffDelay(retry.baseDelayMs, attempt);
    attempt++;
    console.warn(`[${context}] ${error.message}; retry ${attempt}/${retry.retries} in ${delay}ms`);
    await wait(delay);
  };

  for (;;) {
    let response: Response;
    try {
      response = await doFetch(url, {
        headers: { 'x-apisports-key': apiKeys[keyIndex] },
        signal: AbortSignal.timeout(retry.timeoutMs),
      });
    } catch (err) {
      await retryOrGiveUp(new LookupTransportError(`Request failed: ${errorMessage(err)}`));
      continue;
    }

    if (response.ok) {
      if (keyIndex > 0) {
        console.log(`[${context}] ✅ Key #${keyIndex + 1} succeeded (primary exhausted)`);
      }
      const remaining = response.headers.get('x-ratelimit-requests-remaining');
      if (remaining) {
        console.log(`[${context}] Requests remaining: ${remaining}`);
      }
      try {
        return await response.json();
      } catch (err) {
        throw new LookupTransportError(`Invalid JSON from provider: ${errorMessage(err)}`, response.status);
      }
    }

    // Rotate on auth failure or rate limit
    if (ROTATE_STATUSES.has(response.status) && keyIndex < apiKeys.length - 1) {
      console.warn(`[${context}] ⚠️ Key #${keyIndex + 1} failed (${response.status}), trying next...`);
      keyIndex++;
      continue;
    }

    if (response.status === 429 || response.status >= 500) {
      await retryOrGiveUp(new LookupTransportError(`Provider returned ${response.status}`, response.status));
      continue;
    }

    throw new LookupTransportError(`Provider returned ${response.status}`, response.status);
  }
}
