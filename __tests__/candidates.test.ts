import { generateCandidates } from '../lib/tld/candidates';

async function collect(gen: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const c of gen) out.push(c);
  return out;
}

const notWildcard = jest.fn(async (_zone: string) => false);

describe('generateCandidates', () => {
  beforeEach(() => notWildcard.mockClear());

  test('yields exactly one candidate per TLD without common sub-TLDs', async () => {
    const tlds = ['com', 'xyz', 'biz'];
    const out = await collect(
      generateCandidates('acme', tlds, { checkCommon: false, commonTlds: ['co'], skipWildcards: false }, { isWildcardZone: notWildcard }),
    );
    expect(out).toEqual(['acme.com', 'acme.xyz', 'acme.biz']);
    expect(notWildcard).not.toHaveBeenCalled();
  });

  test('adds common sub-TLDs in configured order after each bare TLD', async () => {
    const out = await collect(
      generateCandidates('acme', ['uk', 'io'], { checkCommon: true, commonTlds: ['co', 'net'], skipWildcards: false }, { isWildcardZone: notWildcard }),
    );
    expect(out).toEqual(['acme.uk', 'acme.co.uk', 'acme.net.uk', 'acme.io', 'acme.co.io', 'acme.net.io']);
  });

  test('a wildcard TLD skips only the bare candidate', async () => {
    const isWildcardZone = jest.fn(async (zone: string) => zone === 'biz');
    const out = await collect(
      generateCandidates('acme', ['com', 'biz'], { checkCommon: true, commonTlds: ['com'], skipWildcards: true }, { isWildcardZone }),
    );
    expect(out).toEqual(['acme.com', 'acme.com.com', 'acme.com.biz']);
    expect(isWildcardZone.mock.calls.map((c) => c[0])).toEqual(['com', 'com.com', 'biz', 'com.biz']);
  });

  test('a wildcard sub-TLD zone skips only that combination', async () => {
    const isWildcardZone = jest.fn(async (zone: string) => zone === 'co.uk');
    const out = await collect(
      generateCandidates('acme', ['uk'], { checkCommon: true, commonTlds: ['co', 'org'], skipWildcards: true }, { isWildcardZone }),
    );
    expect(out).toEqual(['acme.uk', 'acme.org.uk']);
  });

  test('stops at the next checkpoint once cancelled', async () => {
    const controller = new AbortController();
    const out: string[] = [];
    const gen = generateCandidates(
      'acme',
      ['uk', 'io'],
      { checkCommon: true, commonTlds: ['co'], skipWildcards: false },
      { isWildcardZone: notWildcard, signal: controller.signal },
    );
    for await (const c of gen) {
      out.push(c);
      if (out.length === 2) controller.abort();
    }
    expect(out).toEqual(['acme.uk', 'acme.co.uk']);
  });

  test('yields nothing when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const out = await collect(
      generateCandidates('acme', ['com'], { checkCommon: true, commonTlds: ['co'], skipWildcards: false }, { isWildcardZone: notWildcard, signal: controller.signal }),
    );
    expect(out).toEqual([]);
  });

  test('each call starts a fresh sequence', async () => {
    const opts = { checkCommon: true, commonTlds: ['co'], skipWildcards: false };
    const first = await collect(generateCandidates('acme', ['uk'], opts, { isWildcardZone: notWildcard }));
    const second = await collect(generateCandidates('acme', ['uk'], opts, { isWildcardZone: notWildcard }));
    expect(second).toEqual(first);
  });
});
