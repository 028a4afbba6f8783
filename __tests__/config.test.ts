import { OPTION_DESCRIPTIONS, resolveSearchOptions } from '../lib/config';
import { ConfigError } from '../lib/errors';

describe('resolveSearchOptions', () => {
  test('falls back to the defaults', () => {
    const opts = resolveSearchOptions();
    expect(opts).toEqual({
      activeOnly: true,
      checkCommon: true,
      commonTlds: ['com', 'info', 'net', 'org', 'biz', 'co', 'edu', 'gov', 'mil'],
      skipWildcards: true,
      maxConcurrency: 100,
      tldListUrl: 'https://data.iana.org/TLD/tlds-alpha-by-domain.txt',
    });
    expect(Object.isFrozen(opts)).toBe(true);
  });

  test('applies overrides and normalizes labels', () => {
    const opts = resolveSearchOptions({
      activeOnly: false,
      commonTlds: ['Com', ' NET '],
      maxConcurrency: 5,
      tldListUrl: 'http://tlds.test/list.txt',
    });
    expect(opts.activeOnly).toBe(false);
    expect(opts.commonTlds).toEqual(['com', 'net']);
    expect(opts.maxConcurrency).toBe(5);
    expect(opts.tldListUrl).toBe('http://tlds.test/list.txt');
  });

  test.each([0, -3, 1.5, '10'])('rejects maxConcurrency %p', (value) => {
    expect(() => resolveSearchOptions({ maxConcurrency: value })).toThrow(
      new ConfigError('maxConcurrency', 'expected a positive integer'),
    );
  });

  test('rejects non-boolean flags', () => {
    expect(() => resolveSearchOptions({ activeOnly: 'yes' })).toThrow('activeOnly: expected a boolean');
  });

  test('rejects bad sub-TLD labels', () => {
    expect(() => resolveSearchOptions({ commonTlds: ['co', 'bad label'] })).toThrow('commonTlds: invalid label "bad label"');
    expect(() => resolveSearchOptions({ commonTlds: 'com' })).toThrow('commonTlds: expected a list of labels');
  });

  test('rejects non-http TLD list URLs', () => {
    expect(() => resolveSearchOptions({ tldListUrl: 'ftp://tlds.test/list.txt' })).toThrow('tldListUrl: expected an http(s) URL');
    expect(() => resolveSearchOptions({ tldListUrl: 'not a url' })).toThrow('tldListUrl: expected an http(s) URL');
  });

  test('ConfigError records the field', () => {
    try {
      resolveSearchOptions({ checkCommon: 1 });
      throw new Error('expected ConfigError');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) expect(err.field).toBe('checkCommon');
    }
  });

  test('every option is described', () => {
    expect(Object.keys(OPTION_DESCRIPTIONS).sort()).toEqual(
      ['activeOnly', 'checkCommon', 'commonTlds', 'maxConcurrency', 'skipWildcards', 'tldListUrl'],
    );
  });
});
