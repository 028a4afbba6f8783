import { performance } from 'perf_hooks';
import { domainKeyword, normalizeDomain } from '../domain';
import { TldListUnavailableError } from '../errors';
import { createModuleLogger } from '../logger';
import { incSimilarDomains, observeBatchLatency } from '../metrics';
import { selectResolved } from './aggregate';
import { resolveBatch } from './batchResolver';
import { generateCandidates } from './candidates';
import { hasContent } from './contentVerifier';
import { fetchTldList } from './tldList';
import { createWildcardDetector } from './wildcard';
import {
  SIMILAR_DOMAIN,
  type Batch,
  type Candidate,
  type RunReport,
  type SearchCapabilities,
  type SearchOptions,
  type SearchState,
  type WildcardCheck,
} from './types';

export const SEARCH_SOURCE = 'tld-search';

const log = createModuleLogger(SEARCH_SOURCE);

const TERMINAL: ReadonlySet<SearchState> = new Set(['done', 'cancelled']);

/**
 * Searches every TLD for domains sharing the target's keyword.
 *
 * One instance is one run:
 * idle -> fetching-tld-list -> generating <-> batch-in-flight -> draining -> done,
 * with `cancelled` reachable from any non-terminal state. Batches are resolved
 * strictly one after another and flushed as soon as they hold
 * `maxConcurrency` candidates.
 */
export class TldSearch {
  private _state: SearchState = 'idle';
  private started = false;
  private readonly target: string;
  private readonly keyword: string;
  private readonly isWildcardZone: WildcardCheck;
  private readonly results: Candidate[] = [];
  private candidates = 0;
  private batches = 0;

  constructor(
    target: string,
    private readonly options: SearchOptions,
    private readonly caps: SearchCapabilities,
  ) {
    this.target = normalizeDomain(target);
    this.keyword = domainKeyword(this.target);
    this.isWildcardZone = caps.isWildcardZone ?? createWildcardDetector(caps.resolveHost);
  }

  get state(): SearchState {
    return this._state;
  }

  private transition(next: SearchState): void {
    if (TERMINAL.has(this._state)) return;
    log.debug({ target: this.target, from: this._state, to: next }, 'state change');
    this._state = next;
  }

  private cancelled(): boolean {
    return this.caps.signal?.aborted === true;
  }

  private report(error?: string): RunReport {
    return {
      target: this.target,
      keyword: this.keyword,
      results: [...this.results],
      candidates: this.candidates,
      batches: this.batches,
      state: this._state,
      ...(error ? { error } : {}),
    };
  }

  async start(): Promise<RunReport> {
    if (this.started) throw new Error('TldSearch.start() may only be called once per instance');
    this.started = true;

    log.info({ target: this.target, keyword: this.keyword }, 'searching all TLDs for keyword');
    if (this.cancelled()) {
      this.transition('cancelled');
      return this.report();
    }

    this.transition('fetching-tld-list');
    const { tlds, error } = await fetchTldList(this.options.tldListUrl, this.caps.fetchUrl);
    if (!tlds && this.cancelled()) {
      this.transition('cancelled');
      return this.report();
    }
    if (!tlds) {
      const err = new TldListUnavailableError(this.options.tldListUrl, error);
      log.error({ err, target: this.target }, err.message);
      this.transition('done');
      return this.report(err.message);
    }

    this.transition('generating');
    let batch: Batch = [];
    const candidates = generateCandidates(this.keyword, tlds, this.options, {
      isWildcardZone: this.isWildcardZone,
      signal: this.caps.signal,
    });

    for await (const candidate of candidates) {
      this.candidates++;
      batch.push(candidate);
      if (batch.length >= this.options.maxConcurrency) {
        await this.flush(batch);
        batch = [];
        this.transition('generating');
      }
    }

    if (this.cancelled()) {
      if (batch.length) log.debug({ discarded: batch.length }, 'cancelled, dropping unresolved batch');
      this.transition('cancelled');
    } else {
      this.transition('draining');
      if (batch.length) await this.flush(batch);
      this.transition(this.cancelled() ? 'cancelled' : 'done');
    }

    log.info(
      { target: this.target, found: this.results.length, candidates: this.candidates, batches: this.batches, state: this._state },
      'TLD search finished',
    );
    return this.report();
  }

  /** resolve -> aggregate -> verify -> emit, for one batch. */
  private async flush(batch: Batch): Promise<void> {
    if (this._state !== 'draining') this.transition('batch-in-flight');
    this.batches++;
    log.debug({ size: batch.length, batch: this.batches }, 'resolving batch');

    const t0 = performance.now();
    const outcome = await resolveBatch(batch, this.caps.resolveHost, { maxConcurrency: this.options.maxConcurrency });
    observeBatchLatency((performance.now() - t0) / 1000);

    for (const domain of selectResolved(batch, outcome, this.target)) {
      log.info({ domain }, "found a TLD with the target's name");
      if (this.options.activeOnly) {
        if (this.cancelled()) return;
        if (!(await hasContent(domain, this.caps.fetchUrl, this.caps.signal))) {
          log.debug({ domain }, 'no content served, skipping');
          continue;
        }
      }
      await this.emit(domain);
    }
  }

  private async emit(domain: Candidate): Promise<void> {
    this.results.push(domain);
    incSimilarDomains();
    try {
      await this.caps.emit({ kind: SIMILAR_DOMAIN, value: domain, source: SEARCH_SOURCE });
    } catch (err) {
      log.warn({ err, domain }, 'event listener failed');
    }
  }
}

/**
 * Convenience wrapper: build a run and start it.
 */
export function searchTlds(target: string, options: SearchOptions, caps: SearchCapabilities): Promise<RunReport> {
  return new TldSearch(target, options, caps).start();
}
