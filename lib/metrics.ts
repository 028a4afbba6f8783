/**
 * Prometheus metrics using `prom-client`.
 *
 * Metrics:
 * - `tld_search_requests_total` (Counter)
 * - `tld_search_rate_limited_total` (Counter)
 * - `tld_search_wildcard_cache_hit_ratio` (Gauge)
 * - `tld_search_candidates_checked_total` (Counter, label `resolved`)
 * - `tld_search_similar_domains_total` (Counter)
 * - `tld_search_batch_seconds` (Histogram)
 *
 * Expose `register.metrics()` via an HTTP endpoint for Prometheus scraping.
 */

import { Counter, Gauge, Histogram, register } from 'prom-client';

export const requestsTotal = new Counter({
  name: 'tld_search_requests_total',
  help: 'Total number of search requests received',
});

export const rateLimitedTotal = new Counter({
  name: 'tld_search_rate_limited_total',
  help: 'Total number of requests that were rate limited',
});

export const cacheHitRatio = new Gauge({
  name: 'tld_search_wildcard_cache_hit_ratio',
  help: 'Hit ratio (0.0 - 1.0) of the wildcard zone cache',
});

export const candidatesChecked = new Counter({
  name: 'tld_search_candidates_checked_total',
  help: 'Candidate domains looked up in DNS',
  labelNames: ['resolved'] as const,
});

export const similarDomainsFound = new Counter({
  name: 'tld_search_similar_domains_total',
  help: 'Similar domains reported to listeners',
});

export const batchLatency = new Histogram({
  name: 'tld_search_batch_seconds',
  help: 'Time to resolve one candidate batch, in seconds',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
});

export function incRequests(count = 1): void {
  requestsTotal.inc(count);
}

export function incRateLimited(count = 1): void {
  rateLimitedTotal.inc(count);
}

/**
 * Set cache hit ratio (0..1). `null` or NaN is a no-op.
 */
export function setCacheHitRatio(ratio: number | null): void {
  if (ratio == null || Number.isNaN(ratio)) return;
  cacheHitRatio.set(Math.max(0, Math.min(1, ratio)));
}

export function recordLookups(resolved: number, unresolved: number): void {
  if (resolved > 0) candidatesChecked.inc({ resolved: 'true' }, resolved);
  if (unresolved > 0) candidatesChecked.inc({ resolved: 'false' }, unresolved);
}

export function incSimilarDomains(count = 1): void {
  similarDomainsFound.inc(count);
}

export function observeBatchLatency(seconds: number): void {
  if (!isFinite(seconds) || seconds < 0) return;
  batchLatency.observe(seconds);
}

export { register };
