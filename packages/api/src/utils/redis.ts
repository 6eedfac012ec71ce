import { createHash } from 'node:crypto';
import Redis, { type RedisOptions } from 'ioredis';
import type { AppConfig } from '../config';
import { logger } from './logger';

/**
 * Redis client for the query-embedding cache.
 *
 * Identical questions skip the embedding worker for 24h (default TTL).
 * Connection is lazy so building the client never blocks startup.
 */

const baseOptions: RedisOptions = {
  retryStrategy: (times: number) => Math.min(times * 50, 2000),
  maxRetriesPerRequest: 3,
  connectTimeout: 10000,
  lazyConnect: true,
};

export function createRedis(redisConfig: AppConfig['redis']): Redis {
  logger.info(
    { redisUrl: !!redisConfig.url, host: redisConfig.host },
    'Initializing Redis connection'
  );

  const redis = redisConfig.url
    ? new Redis(redisConfig.url, baseOptions)
    : new Redis({
        ...baseOptions,
        host: redisConfig.host,
        port: redisConfig.port,
        password: redisConfig.password,
      });

  redis.on('error', (err) => {
    logger.error({ err }, 'Redis connection error');
  });

  redis.on('connect', () => {
    logger.info('Redis connected');
  });

  return redis;
}

/**
 * Health check: verify Redis connectivity.
 */
export async function checkRedisHealth(redis: Redis): Promise<boolean> {
  try {
    await redis.ping();
    return true;
  } catch {
    return false;
  }
}

/**
 * Minimal cache surface the embedding client needs.
 * Satisfied by an ioredis client.
 */
export interface EmbeddingCacheBackend {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
}

export function embeddingCacheKey(text: string): string {
  return `embed:${createHash('sha256').update(text).digest('hex').slice(0, 32)}`;
}

/**
 * Cache embedding vector.
 */
export async function cacheEmbedding(
  cache: EmbeddingCacheBackend,
  text: string,
  embedding: number[],
  ttl: number = 86400
): Promise<void> {
  await cache.setex(embeddingCacheKey(text), ttl, JSON.stringify(embedding));
}

/**
 * Retrieve cached embedding, or null if not cached or unreadable.
 */
export async function getCachedEmbedding(
  cache: EmbeddingCacheBackend,
  text: string
): Promise<number[] | null> {
  const cached = await cache.get(embeddingCacheKey(text));
  if (!cached) return null;

  const parsed: unknown = JSON.parse(cached);
  if (Array.isArray(parsed) && parsed.every((v) => typeof v === 'number')) {
    return parsed;
  }
  return null;
}
