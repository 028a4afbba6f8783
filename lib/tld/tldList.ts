import type { FetchUrl } from './types';

/**
 * One TLD per line, lower-cased. Blank lines and `#` comments are dropped.
 */
export function parseTldList(content: string): string[] {
  return content
    .toLowerCase()
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));
}

/**
 * Fetch and parse the TLD list. `null` when the list is unreachable or empty.
 */
export async function fetchTldList(url: string, fetchUrl: FetchUrl): Promise<{ tlds: string[] | null; error?: string }> {
  const res = await fetchUrl(url);
  if (res.content === null) return { tlds: null, error: res.error };
  const tlds = parseTldList(res.content);
  if (!tlds.length) return { tlds: null, error: 'no TLDs in list' };
  return { tlds };
}
