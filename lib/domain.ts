import { toASCII } from 'punycode/';
import { parse } from 'psl';

/**
 * Normalize an input string to a host (ASCII/punycode), lowercase, stripped of protocol/path/port.
 * Returns the ASCII host or throws Error if can't parse.
 */
export function normalizeDomain(input: string): string {
  if (!input || typeof input !== 'string') {
    throw new Error('Invalid input');
  }

  let s = input.trim();

  try {
    // If missing protocol, add dummy so URL parses
    if (!/^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(s)) {
      s = 'http://' + s;
    }
    const hostname = new URL(s).hostname;
    const ascii = toASCII(hostname).toLowerCase();
    return ascii.replace(/^\.+|\.+$/g, '');
  } catch {
    // Fallback: treat as bare host, dropping a possible port/path
    const m = input.trim().match(/^([^/ :]+)(?::\d+)?(?:\/.*)?$/);
    if (m) {
      return toASCII(m[1]).toLowerCase().replace(/^\.+|\.+$/g, '');
    }
    throw new Error('Unable to normalize domain');
  }
}

/**
 * Basic host validation: must sit under a known public suffix.
 */
export function isValidHost(host: string): boolean {
  if (!host || typeof host !== 'string') return false;
  const cleaned = host.trim().toLowerCase();
  if (/\s/.test(cleaned)) return false;
  let ascii: string;
  try {
    ascii = toASCII(cleaned);
  } catch {
    return false;
  }
  if (ascii.length > 255) return false;

  const parsed = parse(ascii);
  if ('error' in parsed) return false;
  return !!parsed.domain;
}

/**
 * The label a domain is known by, without its public suffix or subdomains:
 * `www.acme.co.uk` -> `acme`. Hosts with no registrable domain fall back to
 * their first label.
 */
export function domainKeyword(host: string): string {
  const ascii = normalizeDomain(host);
  const fallback = ascii.split('.')[0];
  const parsed = parse(ascii);
  if ('error' in parsed) return fallback;
  return parsed.sld ?? fallback;
}
