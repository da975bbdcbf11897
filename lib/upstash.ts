import { Redis } from '@upstash/redis';
import { logWarn } from '@/lib/logging/logger';
import type { RedisLike } from '@/lib/kv/redis-store';

let _redis: Redis | null = null;

function missingCredsError(): Error {
  return new Error('upstash_missing_credentials');
}

// Lazy: avoid constructing the Upstash client with empty config (it emits noisy warnings).
function getRedis(): Redis {
  if (!_redis) {
    const url = process.env.UPSTASH_REDIS_REST_URL?.trim();
    const token = process.env.UPSTASH_REDIS_REST_TOKEN?.trim();
    if (!url || !token) {
      logWarn('UPSTASH redis credentials missing in environment variables');
      throw missingCredsError();
    }
    // Access tokens are opaque strings; never let the client JSON-parse them.
    _redis = new Redis({ url, token, automaticDeserialization: false });
  }
  return _redis;
}

/** Upstash client narrowed to the commands the key-value store uses. */
export const redis: RedisLike = {
  get: (key) => getRedis().get<string>(key),
  set: (key, value, opts) => (opts ? getRedis().set(key, value, { ex: opts.ex }) : getRedis().set(key, value)),
  del: (...keys) => getRedis().del(...keys),
};
