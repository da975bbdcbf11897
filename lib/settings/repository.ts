/**
 * Settings repository: the only way the reporter, client and logger read or
 * write configuration. Injected everywhere so tests can use the in-memory one.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { StorageError } from '@/lib/storage/errors';
import type { GoogleAdsSettings, SettingsKey } from './types';
import { REQUIRED_SETTINGS, SETTINGS_DEFAULTS, isSettingsKey, withDefaults } from './types';

export interface SettingsRepository {
  /** Every known key, defaults merged in. */
  getAll(): Promise<GoogleAdsSettings>;
  get(key: SettingsKey): Promise<string>;
  /** Merges values into the stored record; unknown keys are discarded. Returns the new record. */
  update(values: Partial<GoogleAdsSettings>): Promise<GoogleAdsSettings>;
  /** True when every required credential is non-empty. */
  isConfigured(): Promise<boolean>;
}

export function isConfiguredSettings(settings: GoogleAdsSettings): boolean {
  return REQUIRED_SETTINGS.every((field) => settings[field] !== '');
}

function pickKnown(values: Partial<GoogleAdsSettings>): Partial<GoogleAdsSettings> {
  const out: Partial<GoogleAdsSettings> = {};
  for (const [key, value] of Object.entries(values)) {
    if (isSettingsKey(key) && typeof value === 'string') out[key] = value;
  }
  return out;
}

/** Shared read-merge-write logic; subclasses only move the raw record. */
abstract class BaseSettingsRepository implements SettingsRepository {
  protected abstract readRaw(): Promise<unknown>;
  protected abstract writeRaw(value: GoogleAdsSettings): Promise<void>;

  async getAll(): Promise<GoogleAdsSettings> {
    return withDefaults(await this.readRaw());
  }

  async get(key: SettingsKey): Promise<string> {
    const all = await this.getAll();
    return all[key];
  }

  async update(values: Partial<GoogleAdsSettings>): Promise<GoogleAdsSettings> {
    const current = await this.getAll();
    const merged: GoogleAdsSettings = { ...current, ...pickKnown(values) };
    await this.writeRaw(merged);
    return merged;
  }

  async isConfigured(): Promise<boolean> {
    return isConfiguredSettings(await this.getAll());
  }
}

/** Settings held in process memory. Used by tests and local development. */
export class InMemorySettingsRepository extends BaseSettingsRepository {
  private stored: unknown;

  constructor(initial: Partial<GoogleAdsSettings> = {}) {
    super();
    this.stored = { ...SETTINGS_DEFAULTS, ...initial };
  }

  protected async readRaw(): Promise<unknown> {
    return this.stored;
  }

  protected async writeRaw(value: GoogleAdsSettings): Promise<void> {
    this.stored = { ...value };
  }
}

const SETTINGS_ROW_ID = 'default';

/**
 * Settings stored as one row (id = 'default') with a JSONB `value` column.
 * See supabase/migrations for the table definition.
 */
export class SupabaseSettingsRepository extends BaseSettingsRepository {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string
  ) {
    super();
  }

  protected async readRaw(): Promise<unknown> {
    const { data, error } = await this.client
      .from(this.table)
      .select('value')
      .eq('id', SETTINGS_ROW_ID)
      .maybeSingle();
    if (error) {
      throw new StorageError(`Failed to read settings: ${error.message}`, 'settings.read');
    }
    const row: { value?: unknown } | null = data;
    return row?.value ?? {};
  }

  protected async writeRaw(value: GoogleAdsSettings): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .upsert({ id: SETTINGS_ROW_ID, value, updated_at: new Date().toISOString() }, { onConflict: 'id' });
    if (error) {
      throw new StorageError(`Failed to write settings: ${error.message}`, 'settings.write');
    }
  }
}
