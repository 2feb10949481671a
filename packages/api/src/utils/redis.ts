import { createHash } from 'node:crypto';
import Redis from 'ioredis';
import type { RedisOptions } from 'ioredis';
import type { RedisConfig } from '../config';
import type { EmbeddingCache } from './embeddings';
import type { Logger } from './logger';

/**
 * Redis client for caching.
 *
 * Caching strategy:
 * - Query embeddings: repeated questions skip the embedding round-trip
 *
 * Document embeddings are never cached; ingestion is idempotent by id.
 */

export function createRedis(config: RedisConfig, logger: Logger): Redis {
  const shared: RedisOptions = {
    retryStrategy: (times: number) => {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
  };

  // Use REDIS_URL if available, otherwise individual settings
  const redis = config.url
    ? new Redis(config.url, shared)
    : new Redis({ ...shared, host: config.host, port: config.port, password: config.password });

  logger.info({ redisUrl: !!config.url, host: config.host }, 'Initializing Redis connection');

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

export class RedisEmbeddingCache implements EmbeddingCache {
  constructor(
    private readonly redis: Redis,
    private readonly ttlSeconds: number
  ) {}

  async get(model: string, text: string): Promise<number[] | null> {
    const cached = await this.redis.get(cacheKey(model, text));
    if (!cached) return null;

    const parsed: unknown = JSON.parse(cached);
    return Array.isArray(parsed) && parsed.every((value) => typeof value === 'number') ? parsed : null;
  }

  async set(model: string, text: string, embedding: number[]): Promise<void> {
    await this.redis.setex(cacheKey(model, text), this.ttlSeconds, JSON.stringify(embedding));
  }
}

/**
 * Cache key: model + sha256 of the normalized text.
 */
export function cacheKey(model: string, text: string): string {
  return `embed:${model}:${createHash('sha256').update(text).digest('hex')}`;
}
