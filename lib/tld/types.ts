/** A fully-qualified name under test: `keyword.tld` or `keyword.sub.tld`. */
export type Candidate = string;

/** Candidates resolved together; never longer than `maxConcurrency`. */
export type Batch = Candidate[];

/** Per-batch lookup result, keyed in batch order. */
export type ResolutionOutcome = Map<Candidate, boolean>;

export interface SearchOptions {
  /** Only report domains that serve content over HTTP. */
  activeOnly: boolean;
  /** Also try `keyword.<common>.<tld>` for every TLD. */
  checkCommon: boolean;
  commonTlds: readonly string[];
  skipWildcards: boolean;
  maxConcurrency: number;
  tldListUrl: string;
}

export interface FetchResult {
  content: string | null;
  status?: number;
  error?: string;
}

export interface ResolveResult {
  addresses: string[];
  error?: string;
}

export type FetchUrl = (url: string) => Promise<FetchResult>;
export type ResolveHost = (name: string) => Promise<ResolveResult>;
export type WildcardCheck = (zone: string) => Promise<boolean>;

export const SIMILAR_DOMAIN = 'SIMILARDOMAIN' as const;

export interface SimilarDomainEvent {
  kind: typeof SIMILAR_DOMAIN;
  value: Candidate;
  source: string;
}

export type EventSink = (event: SimilarDomainEvent) => void | Promise<void>;

/**
 * Everything a search run talks to. Injected at construction; nothing is
 * read from module state.
 */
export interface SearchCapabilities {
  fetchUrl: FetchUrl;
  resolveHost: ResolveHost;
  /** Defaults to random-label probing over `resolveHost`. */
  isWildcardZone?: WildcardCheck;
  /** `signal.aborted` is the cooperative cancellation check. */
  signal?: AbortSignal;
  emit: EventSink;
}

export type SearchState =
  | 'idle'
  | 'fetching-tld-list'
  | 'generating'
  | 'batch-in-flight'
  | 'draining'
  | 'done'
  | 'cancelled';

export interface RunReport {
  target: string;
  keyword: string;
  results: Candidate[];
  /** Candidates produced by the generator, flushed or not. */
  candidates: number;
  batches: number;
  state: SearchState;
  error?: string;
}
