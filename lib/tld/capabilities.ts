import { resolveHost } from '../dns';
import { fetchUrl } from '../net/fetchUrl';
import type { EventSink, SearchCapabilities } from './types';

/**
 * Capabilities backed by Node's resolver and global fetch. The wildcard check
 * is left to `TldSearch`, which builds a run-scoped one over `resolveHost`.
 * Aborting `signal` also aborts HTTP requests still in flight.
 */
export function createDefaultCapabilities(emit: EventSink, signal?: AbortSignal): SearchCapabilities {
  return {
    fetchUrl: (url) => fetchUrl(url, { signal }),
    resolveHost: (name) => resolveHost(name),
    emit,
    signal,
  };
}
