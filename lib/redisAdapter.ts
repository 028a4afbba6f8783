/**
 * Optional Redis connection via `ioredis`, used for shared rate-limit counters.
 *
 * `getRedisClient()` returns `null` when `REDIS_URL` is unset or the server
 * does not answer a ping; callers fall back to in-process state.
 */

import Redis from 'ioredis';
import logger from './logger';

let client: Redis | null = null;

export async function getRedisClient(): Promise<Redis | null> {
  if (client) return client;

  const url = process.env.REDIS_URL;
  if (!url) return null;

  const candidate = new Redis(url, {
    password: process.env.REDIS_PASSWORD || undefined,
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });

  try {
    await candidate.connect();
    await candidate.ping();
    client = candidate;
    return client;
  } catch (err) {
    candidate.disconnect();
    logger.warn({ err }, 'Redis not available, falling back to in-process state');
    return null;
  }
}
