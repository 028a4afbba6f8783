import { InMemoryLRUAdapter } from '../lib/cache';

describe('InMemoryLRUAdapter', () => {
  test('set/get/del', async () => {
    const cache = new InMemoryLRUAdapter<boolean>({ max: 10, ttl: 1000 });
    await cache.set('biz', true, 500);
    await expect(cache.get('biz')).resolves.toBe(true);
    await cache.del('biz');
    await expect(cache.get('biz')).resolves.toBeUndefined();
  });

  test('keeps false values distinct from misses', async () => {
    const cache = new InMemoryLRUAdapter<boolean>();
    await cache.set('com', false);
    await expect(cache.get('com')).resolves.toBe(false);
    await expect(cache.get('net')).resolves.toBeUndefined();
  });

  test('evicts the least recently used entry past max', async () => {
    const cache = new InMemoryLRUAdapter<boolean>({ max: 2 });
    await cache.set('a', true);
    await cache.set('b', true);
    await cache.get('a');
    await cache.set('c', true);
    expect(cache.size).toBe(2);
    await expect(cache.get('b')).resolves.toBeUndefined();
    await expect(cache.get('a')).resolves.toBe(true);
  });
});
