import type { KeyValueStore } from './types';

type Entry = { value: string; expiresAtMs: number | null };

/**
 * Process-local store with TTL enforced on read. Used by tests and as the
 * fallback when Upstash is not configured.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async set(key: string, value: string, opts?: { ttlSeconds?: number }): Promise<void> {
    const ttl = opts?.ttlSeconds;
    this.entries.set(key, {
      value,
      expiresAtMs: ttl === undefined ? null : this.now() + ttl * 1000,
    });
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key);
  }
}
