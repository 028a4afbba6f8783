import { settleAll } from '../net/pool';
import { CONFIG } from '../config';
import { createModuleLogger } from '../logger';
import { recordLookups } from '../metrics';
import type { Batch, ResolutionOutcome, ResolveHost } from './types';

const log = createModuleLogger('batch-resolver');

export interface ResolveBatchOptions {
  maxConcurrency: number;
  retries?: number;
}

/**
 * Look up every candidate of a batch with at most `maxConcurrency` lookups in
 * flight and return once all of them have settled.
 *
 * A candidate resolves when its forward lookup yields at least one address.
 * Errors, timeouts and empty answers all map to `false` for that candidate
 * alone. The returned map is new for each call and keyed in batch order.
 *
 * No deadline is applied here: a pool slot is held until `resolveHost`
 * settles, and the resolver owns its own timeout policy.
 */
export async function resolveBatch(
  batch: Batch,
  resolveHost: ResolveHost,
  opts: ResolveBatchOptions,
): Promise<ResolutionOutcome> {
  const settled = await settleAll(
    batch.map((candidate) => async () => {
      const res = await resolveHost(candidate);
      if (res.addresses.length === 0) {
        throw new Error(res.error ?? 'no addresses');
      }
      return res.addresses;
    }),
    { concurrency: opts.maxConcurrency, retries: opts.retries ?? CONFIG.DNS_RETRIES },
  );

  const outcome: ResolutionOutcome = new Map();
  let resolved = 0;
  settled.forEach((s, i) => {
    const candidate = batch[i];
    if (s.ok) {
      resolved++;
      log.debug({ candidate, addresses: s.value }, 'candidate resolved');
    }
    // a repeated candidate counts as resolved if any of its lookups did
    outcome.set(candidate, outcome.get(candidate) === true || s.ok);
  });
  recordLookups(resolved, batch.length - resolved);
  return outcome;
}
