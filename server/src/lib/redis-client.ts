import { Redis } from 'ioredis';
import logger from './logger.js';

const clients = new Map<string, Redis>();

/**
 * Returns the named Redis connection, creating it lazily on first call.
 *
 * Returns null when no URL is configured; callers then fall back to the
 * in-memory store and queue. Store connections use maxRetriesPerRequest=1 so
 * an unreachable Redis surfaces as a store failure quickly instead of hanging
 * a job. Blocking consumers (XREADGROUP BLOCK) need their own connection, hence
 * the `name` parameter.
 */
export function getRedisClient(redisUrl: string | null, name = 'store'): Redis | null {
  if (!redisUrl) return null;
  const existing = clients.get(name);
  if (existing) return existing;

  const client = new Redis(redisUrl, {
    maxRetriesPerRequest: name === 'store' ? 1 : null,
    connectTimeout: 3000,
    lazyConnect: true,
    connectionName: `answer-pipeline:${name}`,
  });

  client.on('error', (err: Error) => {
    logger.warn({ connection: name, err: err.message }, 'Redis connection error');
  });

  clients.set(name, client);
  return client;
}

/**
 * Gracefully closes every Redis connection. Safe to call when none were opened.
 */
export async function shutdownRedis(): Promise<void> {
  const entries = Array.from(clients.entries());
  clients.clear();
  await Promise.all(entries.map(async ([name, client]) => {
    try {
      await client.quit();
    } catch (err) {
      logger.warn({ connection: name, err: err instanceof Error ? err.message : String(err) }, 'Redis quit failed');
      client.disconnect();
    }
  }));
}
