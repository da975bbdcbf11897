/**
 * Google Ads reporter settings: one typed record, every field a string.
 *
 * Stored as a single JSON value; read with defaults merged in so a missing key
 * never surfaces as absent.
 */

import { z } from 'zod';

export interface GoogleAdsSettings {
  /** Target Google Ads customer ID, digits only (e.g. 5254299323). */
  customer_id: string;
  /** Numeric conversion action ID uploads are attributed to. */
  conversion_action_id: string;
  /** Display name of the conversion action, filled in by lookup or creation. */
  conversion_action_name: string;
  /** ConversionActionCategory enum value. Default: SUBMIT_LEAD_FORM. */
  conversion_action_category: string;
  developer_token: string;
  /** OAuth2 client ID (Google Cloud Console). */
  client_id: string;
  client_secret: string;
  /** OAuth2 refresh token from the one-time consent flow. */
  refresh_token: string;
  /** MCC (manager) account ID, sent as the login-customer-id header when set. */
  login_customer_id: string;
  /** Value of a whole conversion, as a numeric string. Default: "0". */
  conversion_value: string;
  /** ISO 4217 currency code. Default: SEK. */
  currency_code: string;
  /** '1' enables the diagnostic log file; '', '0' and 'false' disable it. */
  enable_logging: string;
}

export type SettingsKey = keyof GoogleAdsSettings;

export const SETTINGS_DEFAULTS: Readonly<GoogleAdsSettings> = Object.freeze({
  customer_id: '',
  conversion_action_id: '',
  conversion_action_name: '',
  conversion_action_category: 'SUBMIT_LEAD_FORM',
  developer_token: '',
  client_id: '',
  client_secret: '',
  refresh_token: '',
  login_customer_id: '',
  conversion_value: '0',
  currency_code: 'SEK',
  enable_logging: '',
});

export const SETTINGS_KEYS: readonly SettingsKey[] = [
  'customer_id',
  'conversion_action_id',
  'conversion_action_name',
  'conversion_action_category',
  'developer_token',
  'client_id',
  'client_secret',
  'refresh_token',
  'login_customer_id',
  'conversion_value',
  'currency_code',
  'enable_logging',
];

/** Fields that must be non-empty for uploads to be possible. */
export const REQUIRED_SETTINGS: readonly SettingsKey[] = [
  'customer_id',
  'conversion_action_id',
  'developer_token',
  'client_id',
  'client_secret',
  'refresh_token',
];

/** Values that must never appear unmasked in logs or API responses. */
export const SECRET_SETTINGS: readonly SettingsKey[] = ['developer_token', 'client_secret', 'refresh_token'];

/** enable_logging as a boolean. */
export function isLoggingEnabled(value: string): boolean {
  const v = value.trim().toLowerCase();
  return v !== '' && v !== '0' && v !== 'false';
}

export function isSettingsKey(key: string): key is SettingsKey {
  return Object.prototype.hasOwnProperty.call(SETTINGS_DEFAULTS, key);
}

/**
 * Merge a stored value with the defaults. Unknown keys are discarded; known
 * keys with a non-string value are stringified (numbers, booleans) or dropped.
 */
export function withDefaults(stored: unknown): GoogleAdsSettings {
  const merged: GoogleAdsSettings = { ...SETTINGS_DEFAULTS };
  if (!stored || typeof stored !== 'object' || Array.isArray(stored)) return merged;

  for (const [key, value] of Object.entries(stored)) {
    if (!isSettingsKey(key)) continue;
    if (typeof value === 'string') merged[key] = value;
    else if (typeof value === 'number' || typeof value === 'boolean') merged[key] = String(value);
  }
  return merged;
}

const settingValue = z.union([z.string(), z.number(), z.boolean()]).optional();

/** Admin API input: any subset of known keys. Unknown keys are stripped by zod. */
export const SettingsUpdateSchema = z.object({
  customer_id: settingValue,
  conversion_action_id: settingValue,
  conversion_action_name: settingValue,
  conversion_action_category: settingValue,
  developer_token: settingValue,
  client_id: settingValue,
  client_secret: settingValue,
  refresh_token: settingValue,
  login_customer_id: settingValue,
  conversion_value: settingValue,
  currency_code: settingValue,
  enable_logging: settingValue,
} satisfies Record<SettingsKey, typeof settingValue>);

export type SettingsUpdateInput = z.infer<typeof SettingsUpdateSchema>;
