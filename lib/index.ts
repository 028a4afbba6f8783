export { CONFIG, OPTION_DESCRIPTIONS, defaultSearchOptions, resolveSearchOptions } from './config';
export { ConfigError, TldListUnavailableError } from './errors';
export { domainKeyword, normalizeDomain, isValidHost } from './domain';
export { resolveHost } from './dns';
export { fetchUrl } from './net/fetchUrl';
export { TldSearch, searchTlds, SEARCH_SOURCE } from './tld/tldSearch';
export { generateCandidates } from './tld/candidates';
export { resolveBatch } from './tld/batchResolver';
export { selectResolved } from './tld/aggregate';
export { hasContent } from './tld/contentVerifier';
export { createWildcardDetector } from './tld/wildcard';
export { parseTldList, fetchTldList } from './tld/tldList';
export { createDefaultCapabilities } from './tld/capabilities';
export { SIMILAR_DOMAIN } from './tld/types';
export type {
  Batch,
  Candidate,
  EventSink,
  FetchResult,
  FetchUrl,
  ResolutionOutcome,
  ResolveHost,
  ResolveResult,
  RunReport,
  SearchCapabilities,
  SearchOptions,
  SearchState,
  SimilarDomainEvent,
  WildcardCheck,
} from './tld/types';
