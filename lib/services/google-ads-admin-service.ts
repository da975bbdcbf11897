/**
 * Admin operations behind the settings screen: connection test, conversion
 * action creation and lookup. Each builds a client from the stored settings.
 */

import { DiagnosticLogger } from '@/lib/diagnostics/diagnostic-logger';
import type { KeyValueStore } from '@/lib/kv/types';
import { logInfo } from '@/lib/logging/logger';
import { credentialsFromSettings, GoogleAdsClient } from '@/lib/providers/google_ads/client';
import type { GoogleAdsCredentials } from '@/lib/providers/google_ads/types';
import { isConfiguredSettings, type SettingsRepository } from '@/lib/settings/repository';
import type { GoogleAdsSettings } from '@/lib/settings/types';

export const NOT_CONFIGURED_MESSAGE = 'Please fill in all required credentials first.';

export type AdminClient = Pick<
  GoogleAdsClient,
  'testConnection' | 'createConversionAction' | 'fetchConversionActionDetails'
>;

export interface GoogleAdsAdminServiceDeps {
  settings: SettingsRepository;
  tokenCache: KeyValueStore;
  logger: DiagnosticLogger;
  /** Test seam. */
  createClient?: (creds: GoogleAdsCredentials) => AdminClient;
}

export type AdminResult<T extends object = object> =
  | ({ ok: true; message: string } & T)
  | { ok: false; code: 'NOT_CONFIGURED' | 'GOOGLE_ADS_ERROR'; message: string; credentialError: boolean };

export interface CreateConversionActionInput {
  name: string;
  category?: string;
}

/** Everything except the conversion action itself, which creation produces. */
function hasApiCredentials(s: GoogleAdsSettings): boolean {
  return Boolean(s.customer_id && s.developer_token && s.client_id && s.client_secret && s.refresh_token);
}

function diagnostics(s: GoogleAdsSettings, debug: string): string {
  const mask = DiagnosticLogger.mask;
  return (
    `\n\nDiagnostics: client_id=${s.client_id} | client_secret=${mask(s.client_secret)} | ` +
    `refresh_token=${mask(s.refresh_token)} | customer_id=${s.customer_id} | ` +
    `developer_token=${mask(s.developer_token)} | login_customer_id=${s.login_customer_id || '(empty)'} | ` +
    `conversion_action_id=${s.conversion_action_id}\n\nGoogle response: ${debug || 'N/A'}`
  );
}

export class GoogleAdsAdminService {
  private readonly createClient: (creds: GoogleAdsCredentials) => AdminClient;

  constructor(private readonly deps: GoogleAdsAdminServiceDeps) {
    this.createClient =
      deps.createClient ??
      ((creds) => new GoogleAdsClient(creds, { tokenCache: deps.tokenCache, logger: deps.logger }));
  }

  /** Failure messages carry masked settings and Google's raw response. */
  async testConnection(): Promise<AdminResult> {
    const settings = await this.deps.settings.getAll();
    if (!isConfiguredSettings(settings)) {
      return { ok: false, code: 'NOT_CONFIGURED', message: NOT_CONFIGURED_MESSAGE, credentialError: false };
    }

    const result = await this.createClient(credentialsFromSettings(settings)).testConnection();
    if (!result.success) {
      return {
        ok: false,
        code: 'GOOGLE_ADS_ERROR',
        message: result.error + diagnostics(settings, result.debug),
        credentialError: result.credentialError,
      };
    }

    const message =
      result.conversionActionName !== ''
        ? `Connection successful! All credentials verified. Conversion action: ${result.conversionActionName}`
        : 'Connection successful! OAuth2 token refresh succeeded.';
    return { ok: true, message };
  }

  /**
   * Creates an UPLOAD_CLICKS action valued at the configured conversion value
   * and currency, then stores its id, name and category in settings.
   */
  async createConversionAction(input: CreateConversionActionInput): Promise<AdminResult<{ conversionActionId: string }>> {
    const settings = await this.deps.settings.getAll();
    if (!hasApiCredentials(settings)) {
      return { ok: false, code: 'NOT_CONFIGURED', message: NOT_CONFIGURED_MESSAGE, credentialError: false };
    }

    const name = input.name.trim();
    const category = input.category?.trim() || settings.conversion_action_category;
    const defaultValue = Number.parseFloat(settings.conversion_value);

    const result = await this.createClient(credentialsFromSettings(settings)).createConversionAction(
      name,
      Number.isFinite(defaultValue) ? defaultValue : 0,
      settings.currency_code,
      category
    );
    if (!result.success) {
      return { ok: false, code: 'GOOGLE_ADS_ERROR', message: result.error, credentialError: result.credentialError };
    }

    await this.deps.settings.update({
      conversion_action_id: result.conversionActionId,
      conversion_action_name: name,
      conversion_action_category: category,
    });
    logInfo('GADS_CONVERSION_ACTION_CREATED', { conversion_action_id: result.conversionActionId });
    return {
      ok: true,
      message: `Conversion action "${name}" created (ID: ${result.conversionActionId}).`,
      conversionActionId: result.conversionActionId,
    };
  }

  async fetchConversionActionDetails(
    conversionActionId: string
  ): Promise<AdminResult<{ name: string; category: string }>> {
    const settings = await this.deps.settings.getAll();
    if (!hasApiCredentials(settings)) {
      return { ok: false, code: 'NOT_CONFIGURED', message: NOT_CONFIGURED_MESSAGE, credentialError: false };
    }

    const result = await this.createClient(credentialsFromSettings(settings)).fetchConversionActionDetails(
      conversionActionId
    );
    if (!result.success) {
      return { ok: false, code: 'GOOGLE_ADS_ERROR', message: result.error, credentialError: false };
    }
    return { ok: true, message: '', name: result.name, category: result.category };
  }
}
