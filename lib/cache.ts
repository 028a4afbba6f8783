import { LRUCache } from 'lru-cache';
import { setCacheHitRatio } from './metrics';

export type CacheKey = string;

let _cacheHits = 0;
let _cacheMisses = 0;

function trackCacheAccess(hit: boolean) {
  if (hit) _cacheHits++; else _cacheMisses++;
  const total = _cacheHits + _cacheMisses;
  if (total > 0) setCacheHitRatio(_cacheHits / total);
}

export interface CacheAdapter<K = CacheKey, V = unknown> {
  get(key: K): Promise<V | undefined>;
  set(key: K, value: V, ttlMillis?: number): Promise<void>;
  del(key: K): Promise<void>;
}

/**
 * In-memory LRU adapter on `lru-cache` v10+. Lives as long as its owner;
 * nothing is persisted.
 */
export class InMemoryLRUAdapter<V extends {}> implements CacheAdapter<CacheKey, V> {
  private cache: LRUCache<CacheKey, V>;

  constructor(opts?: { max?: number; ttl?: number }) {
    this.cache = new LRUCache<CacheKey, V>({
      max: opts?.max ?? 5000,
      ttl: opts?.ttl ?? 1000 * 60 * 60, // 1 hour default
    });
  }

  async get(key: CacheKey): Promise<V | undefined> {
    const val = this.cache.get(key);
    trackCacheAccess(val !== undefined);
    return val;
  }

  async set(key: CacheKey, value: V, ttlMillis?: number): Promise<void> {
    if (typeof ttlMillis === 'number') {
      this.cache.set(key, value, { ttl: ttlMillis });
    } else {
      this.cache.set(key, value);
    }
  }

  async del(key: CacheKey): Promise<void> {
    this.cache.delete(key);
  }

  get size(): number {
    return this.cache.size;
  }
}
