import Redis from 'ioredis';
import { errorMessage } from './errors';
import { log } from './logger';

/** `null` when no REDIS_URL is configured; callers fall back to in-memory or skip. */
export function createRedis(url: string | undefined): Redis | null {
  if (!url) return null;
  const client = new Redis(url, { maxRetriesPerRequest: 2, lazyConnect: false });
  client.on('error', (err) => log.warn({ err: errorMessage(err) }, 'redis-error'));
  return client;
}
