/**
 * Small key-value store used for the access-token cache and the
 * credential-error flag. A missing ttlSeconds means the entry never expires.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: { ttlSeconds?: number }): Promise<void>;
  del(key: string): Promise<void>;
}
