import { fetchWithRetry, FetchRetryOptions } from './fetchWithRetry';
import logger from '../logger';
import { CONFIG } from '../config';
import type { FetchResult } from '../tld/types';

const DEFAULT_HEADERS = { 'User-Agent': 'tld-similar-domains/0.1' };

/**
 * GET a URL and hand back its body as text.
 * `content` is null for network errors, non-2xx responses and empty bodies;
 * `error` carries the reason. Never throws.
 */
export async function fetchUrl(url: string, opts?: FetchRetryOptions): Promise<FetchResult> {
  const retryOpts: FetchRetryOptions = {
    retries: opts?.retries ?? 2,
    backoffMs: opts?.backoffMs ?? 200,
    timeoutMs: opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS,
    ...(opts?.signal ? { signal: opts.signal } : {}),
  };

  const { response, attempts, error } = await fetchWithRetry(
    url,
    { headers: DEFAULT_HEADERS, redirect: 'follow' },
    retryOpts,
  );
  if (!response) {
    logger.debug({ url, attempts, error }, 'fetchUrl got no response');
    return { content: null, error: error ?? 'no response' };
  }
  if (!response.ok) {
    return { content: null, status: response.status, error: `HTTP ${response.status}` };
  }

  try {
    const text = await response.text();
    if (!text) return { content: null, status: response.status, error: 'empty body' };
    return { content: text, status: response.status };
  } catch (err) {
    logger.debug({ err, url }, 'fetchUrl failed reading body');
    return { content: null, status: response.status, error: err instanceof Error ? err.message : String(err) };
  }
}

export default fetchUrl;
