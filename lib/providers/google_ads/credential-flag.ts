import type { KeyValueStore } from '@/lib/kv/types';

export type CredentialErrorReason = 'missing' | 'token_refresh_failed';

const FLAG_KEY = 'credential_error';

function isReason(value: string): value is CredentialErrorReason {
  return value === 'missing' || value === 'token_refresh_failed';
}

/**
 * Persistent marker read by the admin credential notice. No expiry: it stays
 * until an upload succeeds or settings are saved.
 */
export class CredentialErrorFlag {
  constructor(private readonly store: KeyValueStore) {}

  async get(): Promise<CredentialErrorReason | null> {
    const value = await this.store.get(FLAG_KEY);
    return value !== null && isReason(value) ? value : null;
  }

  set(reason: CredentialErrorReason): Promise<void> {
    return this.store.set(FLAG_KEY, reason);
  }

  clear(): Promise<void> {
    return this.store.del(FLAG_KEY);
  }
}
