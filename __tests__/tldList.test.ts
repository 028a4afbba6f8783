import { fetchTldList, parseTldList } from '../lib/tld/tldList';
import type { FetchResult } from '../lib/tld/types';

describe('parseTldList', () => {
  test('lower-cases and drops comments and blank lines', () => {
    const content = '# Version 2026101900, Last Updated Mon Oct 19\nCOM\nXYZ\n\n#comment\n  Biz  \r\n';
    expect(parseTldList(content)).toEqual(['com', 'xyz', 'biz']);
  });

  test('returns an empty list for comment-only content', () => {
    expect(parseTldList('# nothing here\n')).toEqual([]);
  });
});

describe('fetchTldList', () => {
  test('returns parsed TLDs', async () => {
    const fetchUrl = jest.fn(async (): Promise<FetchResult> => ({ content: 'com\nnet' }));
    const res = await fetchTldList('https://tlds.test/list.txt', fetchUrl);
    expect(res).toEqual({ tlds: ['com', 'net'] });
    expect(fetchUrl).toHaveBeenCalledWith('https://tlds.test/list.txt');
  });

  test('returns null when the fetch has no content', async () => {
    const fetchUrl = jest.fn(async (): Promise<FetchResult> => ({ content: null, error: 'HTTP 503' }));
    const res = await fetchTldList('https://tlds.test/list.txt', fetchUrl);
    expect(res).toEqual({ tlds: null, error: 'HTTP 503' });
  });

  test('returns null when the list holds no TLDs', async () => {
    const fetchUrl = jest.fn(async (): Promise<FetchResult> => ({ content: '# only a header\n' }));
    const res = await fetchTldList('https://tlds.test/list.txt', fetchUrl);
    expect(res).toEqual({ tlds: null, error: 'no TLDs in list' });
  });
});
