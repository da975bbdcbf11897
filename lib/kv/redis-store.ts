import { StorageError, errorMessage } from '@/lib/storage/errors';
import type { KeyValueStore } from './types';

/** Subset of the Upstash client we use; lets tests pass a fake. */
export type RedisLike = {
  get: (key: string) => Promise<unknown>;
  set: (key: string, value: string, opts?: { ex: number }) => Promise<unknown>;
  del: (...keys: string[]) => Promise<number>;
};

/**
 * KeyValueStore on Upstash Redis. Keys are namespaced with `prefix`.
 * Expiry is Redis' own (EX); a TTL below one second is stored with EX 1.
 */
export class RedisKeyValueStore implements KeyValueStore {
  constructor(
    private readonly redis: RedisLike,
    private readonly prefix = 'gads:'
  ) {}

  async get(key: string): Promise<string | null> {
    try {
      const value = await this.redis.get(this.prefix + key);
      if (value == null) return null;
      return typeof value === 'string' ? value : JSON.stringify(value);
    } catch (err) {
      throw new StorageError(`Redis get failed: ${errorMessage(err)}`, 'kv.get', err);
    }
  }

  async set(key: string, value: string, opts?: { ttlSeconds?: number }): Promise<void> {
    try {
      const ttl = opts?.ttlSeconds;
      if (ttl === undefined) {
        await this.redis.set(this.prefix + key, value);
      } else {
        await this.redis.set(this.prefix + key, value, { ex: Math.max(1, Math.floor(ttl)) });
      }
    } catch (err) {
      throw new StorageError(`Redis set failed: ${errorMessage(err)}`, 'kv.set', err);
    }
  }

  async del(key: string): Promise<void> {
    try {
      await this.redis.del(this.prefix + key);
    } catch (err) {
      throw new StorageError(`Redis del failed: ${errorMessage(err)}`, 'kv.del', err);
    }
  }
}
