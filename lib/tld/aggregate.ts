import type { Batch, Candidate, ResolutionOutcome } from './types';

function sameHost(a: string, b: string): boolean {
  return a.toLowerCase().replace(/\.$/, '') === b.toLowerCase().replace(/\.$/, '');
}

/**
 * Resolved candidates of one batch, in batch order, without the target itself
 * and without repeats.
 */
export function selectResolved(batch: Batch, outcome: ResolutionOutcome, target: string): Candidate[] {
  const seen = new Set<Candidate>();
  const out: Candidate[] = [];
  for (const candidate of batch) {
    if (outcome.get(candidate) !== true) continue;
    if (sameHost(candidate, target)) continue;
    if (seen.has(candidate)) continue;
    seen.add(candidate);
    out.push(candidate);
  }
  return out;
}
