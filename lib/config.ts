// Centralized runtime configuration for timeouts, concurrency and search defaults.
// Values are read from env with sane defaults and can be overridden per run.

import { ConfigError } from './errors';
import type { SearchOptions } from './tld/types';

function envInt(name: string, fallback: number): number {
  const v = process.env[name];
  if (!v) return fallback;
  const n = Number(v);
  return Number.isFinite(n) && n >= 0 ? Math.floor(n) : fallback;
}

function envBool(name: string, fallback: boolean): boolean {
  const v = process.env[name]?.trim().toLowerCase();
  if (!v) return fallback;
  if (v === 'true' || v === '1' || v === 'yes') return true;
  if (v === 'false' || v === '0' || v === 'no') return false;
  return fallback;
}

function envList(name: string, fallback: string[]): string[] {
  const v = process.env[name];
  if (!v) return fallback;
  const items = v.split(',').map((s) => s.trim().toLowerCase()).filter(Boolean);
  return items.length ? items : fallback;
}

export const CONFIG = {
  HTTP_TIMEOUT_MS: envInt('HTTP_TIMEOUT_MS', 5000),
  DNS_TIMEOUT_MS: envInt('DNS_TIMEOUT_MS', 3000),
  DNS_RETRIES: envInt('DNS_RETRIES', 0),

  CONCURRENCY: {
    // per-host limit for outgoing HTTP
    HTTP_PER_HOST: envInt('HTTP_CONCURRENCY_PER_HOST', 10),
  },

  WILDCARD: {
    PROBES: envInt('WILDCARD_PROBES', 2) || 2,
    CACHE_MAX: envInt('WILDCARD_CACHE_MAX', 20000) || 20000,
  },

  RATE_LIMIT_PER_MIN: envInt('RATE_LIMIT_PER_MIN', 30) || 30,

  SEARCH: {
    ACTIVE_ONLY: envBool('TLD_ACTIVE_ONLY', true),
    CHECK_COMMON: envBool('TLD_CHECK_COMMON', true),
    COMMON_TLDS: envList('TLD_COMMON', ['com', 'info', 'net', 'org', 'biz', 'co', 'edu', 'gov', 'mil']),
    SKIP_WILDCARDS: envBool('TLD_SKIP_WILDCARDS', true),
    MAX_CONCURRENCY: envInt('TLD_MAX_CONCURRENCY', 100) || 100,
    TLD_LIST_URL: process.env.TLD_LIST_URL || 'https://data.iana.org/TLD/tlds-alpha-by-domain.txt',
  },
};

export const OPTION_DESCRIPTIONS: Record<keyof SearchOptions, string> = {
  activeOnly: 'Only report domains that have content (try to fetch the page)?',
  checkCommon: 'For every TLD, also prepend each common sub-TLD (com, net, ...)',
  commonTlds: 'Common sub-TLDs to try when iterating through all Internet TLDs.',
  skipWildcards: 'Skip TLDs and sub-TLDs that have wildcard DNS.',
  maxConcurrency: 'Number of simultaneous DNS resolutions to perform at once.',
  tldListUrl: 'The list of all Internet TLDs.',
};

export function defaultSearchOptions(): SearchOptions {
  return {
    activeOnly: CONFIG.SEARCH.ACTIVE_ONLY,
    checkCommon: CONFIG.SEARCH.CHECK_COMMON,
    commonTlds: [...CONFIG.SEARCH.COMMON_TLDS],
    skipWildcards: CONFIG.SEARCH.SKIP_WILDCARDS,
    maxConcurrency: CONFIG.SEARCH.MAX_CONCURRENCY,
    tldListUrl: CONFIG.SEARCH.TLD_LIST_URL,
  };
}

const LABEL = /^[a-z0-9]([a-z0-9-]*[a-z0-9])?$/;

/**
 * Merge caller overrides onto the defaults and validate the result.
 * Throws `ConfigError` on the first invalid option.
 */
export function resolveSearchOptions(overrides: Partial<Record<keyof SearchOptions, unknown>> = {}): SearchOptions {
  const base = defaultSearchOptions();

  const bool = (field: 'activeOnly' | 'checkCommon' | 'skipWildcards'): boolean => {
    const v = overrides[field];
    if (v === undefined) return base[field];
    if (typeof v !== 'boolean') throw new ConfigError(field, 'expected a boolean');
    return v;
  };

  let maxConcurrency = base.maxConcurrency;
  if (overrides.maxConcurrency !== undefined) {
    const v = overrides.maxConcurrency;
    if (typeof v !== 'number' || !Number.isInteger(v) || v < 1) {
      throw new ConfigError('maxConcurrency', 'expected a positive integer');
    }
    maxConcurrency = v;
  }

  let commonTlds: string[] = [...base.commonTlds];
  if (overrides.commonTlds !== undefined) {
    const v = overrides.commonTlds;
    if (!Array.isArray(v)) throw new ConfigError('commonTlds', 'expected a list of labels');
    commonTlds = v.map((item: unknown) => {
      if (typeof item !== 'string') throw new ConfigError('commonTlds', 'expected a list of labels');
      const label = item.trim().toLowerCase();
      if (!label.split('.').every((part) => LABEL.test(part))) {
        throw new ConfigError('commonTlds', `invalid label "${item}"`);
      }
      return label;
    });
  }

  let tldListUrl = base.tldListUrl;
  if (overrides.tldListUrl !== undefined) {
    const v = overrides.tldListUrl;
    if (typeof v !== 'string') throw new ConfigError('tldListUrl', 'expected an http(s) URL');
    tldListUrl = v;
  }
  try {
    const u = new URL(tldListUrl);
    if (u.protocol !== 'http:' && u.protocol !== 'https:') throw new Error('protocol');
  } catch {
    throw new ConfigError('tldListUrl', 'expected an http(s) URL');
  }

  return Object.freeze({
    activeOnly: bool('activeOnly'),
    checkCommon: bool('checkCommon'),
    commonTlds: Object.freeze(commonTlds),
    skipWildcards: bool('skipWildcards'),
    maxConcurrency,
    tldListUrl,
  });
}

export default CONFIG;
