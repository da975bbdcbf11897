import type { GoogleAdsSettings, SettingsUpdateInput } from './types';
import { isSettingsKey } from './types';

/**
 * Normalize admin input before it is written.
 * - trims every value
 * - strips dashes from customer IDs (users paste "123-456-7890")
 * - conversion_value must be a non-negative number, else "0"
 */
export function sanitizeSettingsInput(input: SettingsUpdateInput): Partial<GoogleAdsSettings> {
  const clean: Partial<GoogleAdsSettings> = {};

  for (const [key, value] of Object.entries(input)) {
    if (!isSettingsKey(key) || value === undefined) continue;
    clean[key] = typeof value === 'string' ? value.trim() : String(value);
  }

  if (clean.customer_id !== undefined) {
    clean.customer_id = clean.customer_id.replace(/-/g, '');
  }
  if (clean.login_customer_id !== undefined) {
    clean.login_customer_id = clean.login_customer_id.replace(/-/g, '');
  }

  if (clean.conversion_value !== undefined) {
    const raw = clean.conversion_value;
    const value = raw === '' ? Number.NaN : Number(raw);
    clean.conversion_value = Number.isFinite(value) && value >= 0 ? String(value) : '0';
  }

  return clean;
}
