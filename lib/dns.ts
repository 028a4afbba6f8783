import { promises as dnsPromises, Resolver } from 'dns';
import { withTimeout } from './net/timeout';
import logger from './logger';
import { CONFIG } from './config';
import type { ResolveResult } from './tld/types';

const PUBLIC_RESOLVERS = [
  ['8.8.8.8', '8.8.4.4'],       // Google
  ['1.1.1.1', '1.0.0.1'],       // Cloudflare
  ['9.9.9.9', '149.112.112.112'], // Quad9
];

type RecordKind = 'A' | 'AAAA';

// Answers that are final: asking another resolver will not change them.
const AUTHORITATIVE_MISS = new Set(['ENOTFOUND', 'ENODATA']);

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

function systemLookup(kind: RecordKind, host: string): Promise<string[]> {
  return kind === 'A' ? dnsPromises.resolve4(host) : dnsPromises.resolve6(host);
}

function publicLookup(kind: RecordKind, host: string, servers: string[]): Promise<string[]> {
  const resolver = new Resolver();
  resolver.setServers(servers);
  return new Promise<string[]>((resolve, reject) => {
    const done = (err: NodeJS.ErrnoException | null, addresses: string[]) => {
      if (err) reject(err);
      else resolve(addresses);
    };
    if (kind === 'A') resolver.resolve4(host, done);
    else resolver.resolve6(host, done);
  });
}

/**
 * Resolve one record type, system resolver first, then Google, Cloudflare, Quad9.
 * Public resolvers are only consulted when the system resolver failed without
 * a definite NXDOMAIN/NODATA answer. Throws the last error when nothing answers.
 */
async function resolveWithFallback(kind: RecordKind, host: string, timeoutMs: number): Promise<string[]> {
  let lastErr: unknown;
  try {
    return await withTimeout(systemLookup(kind, host), timeoutMs);
  } catch (err) {
    if (AUTHORITATIVE_MISS.has(errorCode(err) ?? '')) throw err;
    lastErr = err;
  }

  for (const servers of PUBLIC_RESOLVERS) {
    try {
      return await withTimeout(publicLookup(kind, host, servers), timeoutMs);
    } catch (err) {
      lastErr = err;
      if (AUTHORITATIVE_MISS.has(errorCode(err) ?? '')) break;
    }
  }
  throw lastErr;
}

/**
 * Forward lookup: A first, AAAA when there is no A record.
 * NXDOMAIN short-circuits the AAAA query. Never throws; failures are
 * reported through `error` with an empty address list.
 */
export async function resolveHost(name: string, timeoutMs?: number): Promise<ResolveResult> {
  const timeout = timeoutMs ?? CONFIG.DNS_TIMEOUT_MS;
  try {
    const a = await resolveWithFallback('A', name, timeout);
    if (a.length > 0) return { addresses: a };
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOTFOUND') return { addresses: [], error: code };
    logger.debug({ err, name }, 'A lookup failed, trying AAAA');
  }

  try {
    const aaaa = await resolveWithFallback('AAAA', name, timeout);
    return { addresses: aaaa };
  } catch (err) {
    return { addresses: [], error: errorCode(err) ?? (err instanceof Error ? err.message : String(err)) };
  }
}
