import pLimit from 'p-limit';
import { CONFIG } from '../config';
import logger from '../logger';

const hostLimitMap = new Map<string, ReturnType<typeof pLimit>>();

function getHostFromUrl(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return 'default';
  }
}

function getLimitForHost(host: string): ReturnType<typeof pLimit> {
  let limit = hostLimitMap.get(host);
  if (!limit) {
    limit = pLimit(CONFIG.CONCURRENCY.HTTP_PER_HOST);
    hostLimitMap.set(host, limit);
  }
  return limit;
}

export interface FetchRetryOptions {
  retries?: number; // total attempts
  backoffMs?: number; // base backoff
  timeoutMs?: number; // per-request timeout
  /** Caller cancellation; stops the current attempt and any further retries. */
  signal?: AbortSignal;
}

/**
 * Outcome of a retried GET. `response` is the last one received (possibly a
 * 429/5xx once attempts run out) or null when no attempt got a response.
 */
export interface RetryResult {
  response: Response | null;
  attempts: number;
  error?: string;
}

/**
 * Fetch with a per-host concurrency cap, retrying 429 (honouring Retry-After),
 * 5xx and network errors with exponential backoff. Never throws.
 */
export async function fetchWithRetry(url: string, init?: RequestInit, opts?: FetchRetryOptions): Promise<RetryResult> {
  const retries = Math.max(1, opts?.retries ?? 3);
  const base = opts?.backoffMs ?? 200;
  const timeoutMs = opts?.timeoutMs ?? CONFIG.HTTP_TIMEOUT_MS;
  const limit = getLimitForHost(getHostFromUrl(url));

  return limit(() => execWithRetry(url, init, { retries, base, timeoutMs, signal: opts?.signal }));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

async function execWithRetry(
  url: string,
  init: RequestInit | undefined,
  cfg: { retries: number; base: number; timeoutMs: number; signal?: AbortSignal },
): Promise<RetryResult> {
  let attempt = 0;
  let last: RetryResult = { response: null, attempts: 0 };

  while (attempt < cfg.retries) {
    if (cfg.signal?.aborted) return { ...last, error: 'aborted' };
    attempt++;

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    cfg.signal?.addEventListener('abort', onAbort, { once: true });
    const id = setTimeout(() => controller.abort(), cfg.timeoutMs);

    let delay = cfg.base * Math.pow(2, attempt - 1);
    try {
      const res = await globalThis.fetch(url, { ...(init || {}), signal: controller.signal });
      if (res.status !== 429 && res.status < 500) return { response: res, attempts: attempt };

      last = { response: res, attempts: attempt, error: `HTTP ${res.status}` };
      if (res.status === 429) {
        const ra = res.headers.get('retry-after');
        if (ra) delay = parseRetryAfter(ra);
      }
      logger.debug({ url, attempt, status: res.status, delay }, 'fetchWithRetry retryable status');
    } catch (err) {
      const aborted = err instanceof Error && err.name === 'AbortError';
      last = { response: null, attempts: attempt, error: aborted ? 'timeout or aborted' : errorMessage(err) };
      logger.debug({ url, attempt, err }, aborted ? 'fetchWithRetry request aborted' : 'fetchWithRetry network error');
    } finally {
      clearTimeout(id);
      cfg.signal?.removeEventListener('abort', onAbort);
    }

    if (attempt < cfg.retries && !cfg.signal?.aborted) await delayMs(delay);
  }
  return last;
}

function delayMs(ms: number): Promise<void> {
  return new Promise((res) => setTimeout(res, Math.max(0, Math.floor(ms))));
}

function parseRetryAfter(val: string): number {
  // numeric -> seconds
  const n = Number(val);
  if (!Number.isNaN(n)) return n * 1000;
  const t = Date.parse(val);
  if (!Number.isNaN(t)) return Math.max(0, t - Date.now());
  return 1000;
}
