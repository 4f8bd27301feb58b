import Redis from 'ioredis';
import { z } from 'zod';
import type { Logger } from './logger';

/**
 * Redis client for caching query embeddings.
 *
 * Optional: only created when REDIS_URL is set. Shared across API
 * instances; entries expire by TTL.
 */

export interface EmbeddingCache {
  get(key: string): Promise<number[] | null>;
  set(key: string, embedding: number[], ttlSeconds: number): Promise<void>;
}

const CachedEmbeddingSchema = z.array(z.number()).min(1);

export class RedisEmbeddingCache implements EmbeddingCache {
  constructor(
    private readonly redis: Redis,
    private readonly logger: Logger
  ) {}

  async get(key: string): Promise<number[] | null> {
    const cached = await this.redis.get(key);
    if (!cached) return null;

    const parsed = CachedEmbeddingSchema.safeParse(JSON.parse(cached));
    if (!parsed.success) {
      this.logger.warn({ key }, 'Discarding malformed cached embedding');
      await this.redis.del(key);
      return null;
    }
    return parsed.data;
  }

  async set(key: string, embedding: number[], ttlSeconds: number): Promise<void> {
    await this.redis.setex(key, ttlSeconds, JSON.stringify(embedding));
  }
}

export function createRedisClient(url: string, commandTimeoutMs: number, logger: Logger): Redis {
  logger.info('Initializing Redis connection');

  const redis = new Redis(url, {
    retryStrategy: (times: number) => Math.min(times * 50, 2000),
    maxRetriesPerRequest: 3,
    connectTimeout: 10000,
    commandTimeout: commandTimeoutMs,
    lazyConnect: true,
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
