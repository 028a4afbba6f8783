import { InMemoryLRUAdapter } from '../cache';
import { CONFIG } from '../config';
import { createModuleLogger } from '../logger';
import type { ResolveHost, WildcardCheck } from './types';

const log = createModuleLogger('wildcard');

export interface WildcardDetectorOptions {
  /** Random labels tried per zone. */
  probes?: number;
  /** Zone -> is-wildcard; defaults to a fresh in-memory LRU. */
  cache?: InMemoryLRUAdapter<boolean>;
  /** Label generator, swappable for tests. */
  randomLabel?: () => string;
}

export function randomProbeLabel(): string {
  return `xzq-${Math.random().toString(36).slice(2, 12)}`;
}

/**
 * Build a zone check for one run.
 *
 * A zone is a wildcard when any implausible random label under it resolves.
 * A failed probe lookup counts as "did not resolve", so only errors on every
 * probe make the answer "not a wildcard". Answers are cached per zone and
 * concurrent checks of the same zone share a single probe.
 */
export function createWildcardDetector(resolveHost: ResolveHost, opts: WildcardDetectorOptions = {}): WildcardCheck {
  const probes = Math.max(1, opts.probes ?? CONFIG.WILDCARD.PROBES);
  const cache = opts.cache ?? new InMemoryLRUAdapter<boolean>({ max: CONFIG.WILDCARD.CACHE_MAX });
  const label = opts.randomLabel ?? randomProbeLabel;
  const inFlight = new Map<string, Promise<boolean>>();

  async function probe(zone: string): Promise<boolean> {
    try {
      const hosts = Array.from({ length: probes }, () => `${label()}.${zone}`);
      const answers = await Promise.allSettled(hosts.map((h) => resolveHost(h)));
      const wildcard = answers.some((a) => a.status === 'fulfilled' && a.value.addresses.length > 0);
      const failed = answers.filter((a): a is PromiseRejectedResult => a.status === 'rejected');
      if (failed.length) log.debug({ zone, failed: failed.length, err: failed[0].reason }, 'wildcard probe lookups failed');
      if (wildcard) log.debug({ zone }, 'wildcard DNS detected');
      return wildcard;
    } catch (err) {
      log.debug({ err, zone }, 'wildcard probe failed, treating zone as not wildcard');
      return false;
    }
  }

  return async (zone: string): Promise<boolean> => {
    const key = zone.toLowerCase();
    const cached = await cache.get(key);
    if (cached !== undefined) return cached;

    let pending = inFlight.get(key);
    if (!pending) {
      pending = probe(key).then(async (wildcard) => {
        await cache.set(key, wildcard);
        inFlight.delete(key);
        return wildcard;
      });
      inFlight.set(key, pending);
    }
    return pending;
  };
}
