import { createModuleLogger } from '../logger';
import type { Candidate, FetchUrl } from './types';

const log = createModuleLogger('content-verifier');

/**
 * Whether `http://<candidate>/` returns a non-empty body.
 * Skipped (false) once cancellation is requested.
 */
export async function hasContent(candidate: Candidate, fetchUrl: FetchUrl, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    const res = await fetchUrl(`http://${candidate}/`);
    return res.content !== null && res.content.length > 0;
  } catch (err) {
    log.debug({ err, candidate }, 'content fetch failed');
    return false;
  }
}
