/**
 * Request rate limiting for the search endpoint.
 *
 * With Redis (`REDIS_URL`) a fixed-window counter (`INCR` + `EXPIRE`) is
 * shared between instances; otherwise each process keeps its own token
 * buckets keyed by `${key}:${ip}`.
 */

import { getRedisClient } from './redisAdapter';
import { incRateLimited, incRequests } from './metrics';
import logger from './logger';
import { CONFIG } from './config';

type Bucket = {
  tokens: number;
  lastRefill: number; // epoch ms
};

const DEFAULT_WINDOW_MS = 60_000;

const buckets = new Map<string, Bucket>();

const BUCKET_CLEANUP_INTERVAL_MS = 60_000;
let cleanupTimer: ReturnType<typeof setInterval> | null = null;

function ensureCleanupTimer() {
  if (cleanupTimer) return;
  cleanupTimer = setInterval(() => {
    const now = Date.now();
    for (const [k, b] of buckets) {
      if (now - b.lastRefill > DEFAULT_WINDOW_MS * 2) buckets.delete(k);
    }
  }, BUCKET_CLEANUP_INTERVAL_MS);
  // don't hold the process open
  cleanupTimer.unref();
}

function consumeFromBucket(bucketKey: string, limit: number, windowMs: number): boolean {
  ensureCleanupTimer();
  const now = Date.now();
  const b = buckets.get(bucketKey) ?? { tokens: limit, lastRefill: now };

  const refill = Math.max(0, now - b.lastRefill) * (limit / windowMs);
  b.tokens = Math.min(limit, b.tokens + refill);
  b.lastRefill = now;

  const allowed = b.tokens >= 1;
  if (allowed) b.tokens -= 1;
  buckets.set(bucketKey, b);
  return allowed;
}

/**
 * Returns `true` when the request may proceed.
 */
export async function rateLimit(
  ip: string,
  key: string,
  limit = CONFIG.RATE_LIMIT_PER_MIN,
  windowMs = DEFAULT_WINDOW_MS,
): Promise<boolean> {
  incRequests();

  const redisClient = await getRedisClient();
  if (redisClient) {
    const windowIndex = Math.floor(Date.now() / windowMs);
    const redisKey = `rl:${key}:${ip}:${windowIndex}`;
    try {
      const cnt = await redisClient.incr(redisKey);
      if (cnt === 1) {
        // expire slightly after the window closes
        await redisClient.expire(redisKey, Math.ceil(windowMs / 1000) + 1);
      }
      const allowed = cnt <= limit;
      if (!allowed) incRateLimited();
      return allowed;
    } catch (err) {
      logger.warn({ err, key }, 'Redis rate limit check failed, falling back to local limiter');
    }
  }

  const allowed = consumeFromBucket(`${key}:${ip}`, limit, windowMs);
  if (!allowed) incRateLimited();
  return allowed;
}
