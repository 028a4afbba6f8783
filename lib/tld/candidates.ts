import type { Candidate, SearchOptions, WildcardCheck } from './types';

export interface GeneratorDeps {
  isWildcardZone: WildcardCheck;
  signal?: AbortSignal;
}

type GeneratorOptions = Pick<SearchOptions, 'checkCommon' | 'commonTlds' | 'skipWildcards'>;

/**
 * Lazily yield `keyword.tld` and, with `checkCommon`, `keyword.sub.tld` for
 * every TLD in list order.
 *
 * A wildcard TLD only suppresses the bare `keyword.tld`; its sub-TLD
 * combinations are still judged zone by zone. Cancellation is checked before
 * each TLD and before each sub-TLD; once set, nothing more is yielded.
 */
export async function* generateCandidates(
  keyword: string,
  tlds: Iterable<string>,
  options: GeneratorOptions,
  deps: GeneratorDeps,
): AsyncGenerator<Candidate, void, undefined> {
  const cancelled = () => deps.signal?.aborted === true;

  for (const tld of tlds) {
    if (cancelled()) return;

    if (!(options.skipWildcards && (await deps.isWildcardZone(tld)))) {
      yield `${keyword}.${tld}`;
    }

    if (!options.checkCommon) continue;

    for (const sub of options.commonTlds) {
      if (cancelled()) return;
      const zone = `${sub}.${tld}`;
      if (options.skipWildcards && (await deps.isWildcardZone(zone))) continue;
      yield `${keyword}.${zone}`;
    }
  }
}
