import { selectResolved } from '../lib/tld/aggregate';

describe('selectResolved', () => {
  test('keeps resolved candidates in batch order', () => {
    const batch = ['acme.com', 'acme.xyz', 'acme.co.uk', 'acme.biz'];
    const outcome = new Map([
      ['acme.biz', true],
      ['acme.com', false],
      ['acme.co.uk', true],
      ['acme.xyz', true],
    ]);
    expect(selectResolved(batch, outcome, 'example.org')).toEqual(['acme.xyz', 'acme.co.uk', 'acme.biz']);
  });

  test('never returns the target domain', () => {
    const outcome = new Map([
      ['acme.com', true],
      ['acme.net', true],
    ]);
    expect(selectResolved(['acme.com', 'acme.net'], outcome, 'ACME.com.')).toEqual(['acme.net']);
  });

  test('drops repeated candidates and those missing from the outcome', () => {
    const outcome = new Map([['acme.io', true]]);
    expect(selectResolved(['acme.io', 'acme.dev', 'acme.io'], outcome, 'acme.com')).toEqual(['acme.io']);
  });
});
