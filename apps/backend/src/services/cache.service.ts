import type { Redis as RedisClient } from 'ioredis';
import type { ICacheService, ILogger } from '@event-suite/types';

/**
 * CacheService
 *
 * Redis-backed cache with time-to-live expiration and tag-based invalidation.
 *
 * Each tag is a Redis set holding the keys stored under it. `invalidate()`
 * deletes those keys together with the set itself. The client's `keyPrefix`
 * applies to both entry keys and tag sets.
 */
export class CacheService implements ICacheService {
  private readonly TAG_PREFIX = 'tag:';

  /**
   * @param redis - Redis client for key-value access
   * @param logger - Logger for invalidation traces
   */
  constructor(
    private readonly redis: RedisClient,
    private readonly logger: ILogger
  ) {}

  /**
   * Retrieve a cached value by key.
   *
   * @returns Parsed value if present, null otherwise
   */
  async get<T>(key: string): Promise<T | null> {
    const cached = await this.redis.get(key);
    if (cached === null) {
      return null;
    }
    const value: T = JSON.parse(cached);
    return value;
  }

  /**
   * Store a value with optional TTL and tags.
   *
   * Tag sets receive the same TTL as the entry so they do not outlive it.
   */
  async set<T>(key: string, value: T, ttlSeconds?: number, tags?: string[]): Promise<void> {
    const payload = JSON.stringify(value);
    const transaction = this.redis.multi();

    if (ttlSeconds) {
      transaction.set(key, payload, 'EX', ttlSeconds);
    } else {
      transaction.set(key, payload);
    }

    for (const tag of tags ?? []) {
      const tagKey = this.tagKey(tag);
      transaction.sadd(tagKey, key);
      if (ttlSeconds) {
        transaction.expire(tagKey, ttlSeconds);
      }
    }

    await transaction.exec();
  }

  /**
   * Invalidate all cache entries stored under a tag.
   */
  async invalidate(tag: string): Promise<void> {
    const tagKey = this.tagKey(tag);
    const keys = await this.redis.smembers(tagKey);
    await this.redis.del(...keys, tagKey);
    this.logger.debug({ tag, keys: keys.length }, 'Cache invalidated');
  }

  /**
   * Delete a specific cache entry by key.
   *
   * @returns Number of keys removed (0 or 1)
   */
  async del(key: string): Promise<number> {
    return await this.redis.del(key);
  }

  private tagKey(tag: string): string {
    return `${this.TAG_PREFIX}${tag}`;
  }
}
