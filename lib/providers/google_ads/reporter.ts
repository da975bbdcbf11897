/**
 * Google Ads conversion reporter: turns attributed click hashes into queue
 * payloads and uploads one payload per queue job.
 */

import type { KeyValueStore } from '@/lib/kv/types';
import type { DiagnosticLogger } from '@/lib/diagnostics/diagnostic-logger';
import { logError, logInfo } from '@/lib/logging/logger';
import type { QueueStore, QueueTrigger } from '@/lib/queue/types';
import type { SettingsRepository } from '@/lib/settings/repository';
import { formatConversionDateTime } from '@/lib/utils/format-google-ads-time';
import { registerReporter } from '../registry';
import {
  attributionEntries,
  type Attributions,
  type CampaignMap,
  type ClickIdMap,
  type ConversionPayload,
  type ConversionReporter,
  type EnqueueContext,
  type ReporterRegistry,
} from '../types';
import { GoogleAdsClient } from './client';
import type { CredentialErrorFlag } from './credential-flag';
import { conversionActionResourceName } from './mapper';
import { PROVIDER_KEY, type GoogleAdsCredentials, type UploadResult } from './types';

export type ConversionUploader = Pick<GoogleAdsClient, 'uploadClickConversion'>;

export interface GoogleAdsReporterDeps {
  settings: SettingsRepository;
  flag: CredentialErrorFlag;
  logger: DiagnosticLogger;
  tokenCache: KeyValueStore;
  queueStore: QueueStore;
  queueTrigger: QueueTrigger;
  /** IANA zone for conversion_datetime. Default: UTC. */
  timezone?: string;
  /** Test seam; defaults to a GoogleAdsClient sharing the token cache and logger. */
  createClient?: (creds: GoogleAdsCredentials) => ConversionUploader;
}

/** Leading number of the value, or 0. */
function toFloat(value: string | number): number {
  const n = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(n) ? n : 0;
}

/** A snapshot value that is blank or zero defers to the current setting. */
function isUnsetValue(value: string): boolean {
  const trimmed = value.trim();
  return trimmed === '' || toFloat(trimmed) === 0;
}

export class GoogleAdsConversionReporter implements ConversionReporter {
  readonly providerKey = PROVIDER_KEY;

  private readonly timezone: string;
  private readonly createClient: (creds: GoogleAdsCredentials) => ConversionUploader;

  constructor(private readonly deps: GoogleAdsReporterDeps) {
    this.timezone = deps.timezone ?? 'UTC';
    this.createClient =
      deps.createClient ??
      ((creds) => new GoogleAdsClient(creds, { tokenCache: deps.tokenCache, logger: deps.logger }));
  }

  /** Registers unconditionally; missing credentials surface at process time. */
  register(existing: ReporterRegistry): ReporterRegistry {
    return registerReporter(existing, this);
  }

  async enqueue(
    attributions: Attributions,
    clickIds: ClickIdMap,
    _campaigns: CampaignMap,
    context: EnqueueContext
  ): Promise<ConversionPayload[]> {
    const settings = await this.deps.settings.getAll();
    const datetime = formatConversionDateTime(context.timestamp, this.timezone);
    const payloads: ConversionPayload[] = [];

    for (const [hash, fraction] of attributionEntries(attributions)) {
      const gclid = clickIds[hash]?.[PROVIDER_KEY];
      if (!gclid) continue;

      // Raw snapshot; the attributed value is derived in process().
      await this.deps.logger.info(`Enqueued gclid: ${gclid}, datetime: ${datetime}, fraction: ${fraction}`);
      payloads.push({
        gclid,
        conversion_datetime: datetime,
        attribution_fraction: fraction,
        customer_id: settings.customer_id,
        conversion_action_id: settings.conversion_action_id,
        conversion_value: settings.conversion_value,
        currency_code: settings.currency_code,
        developer_token: settings.developer_token,
        client_id: settings.client_id,
        client_secret: settings.client_secret,
        refresh_token: settings.refresh_token,
        login_customer_id: settings.login_customer_id,
      });
    }

    return payloads;
  }

  async process(payload: ConversionPayload): Promise<boolean> {
    const settings = await this.deps.settings.getAll();
    const { gclid } = payload;

    // Snapshot first, current settings as fallback. conversion_action_id is the
    // exception: a changed action must apply to jobs already in the queue.
    // A "0" value snapshot also falls back, since "0" is the unconfigured default.
    const creds: GoogleAdsCredentials = {
      customerId: payload.customer_id || settings.customer_id,
      conversionActionId: settings.conversion_action_id || payload.conversion_action_id,
      developerToken: payload.developer_token || settings.developer_token,
      clientId: payload.client_id || settings.client_id,
      clientSecret: payload.client_secret || settings.client_secret,
      refreshToken: payload.refresh_token || settings.refresh_token,
      loginCustomerId: payload.login_customer_id || settings.login_customer_id,
    };
    const conversionValue = isUnsetValue(payload.conversion_value)
      ? settings.conversion_value
      : payload.conversion_value;
    const currencyCode = payload.currency_code || settings.currency_code;
    const actionId = creds.conversionActionId ?? '';

    if (
      !creds.customerId ||
      !actionId ||
      !creds.developerToken ||
      !creds.clientId ||
      !creds.clientSecret ||
      !creds.refreshToken
    ) {
      await this.deps.flag.set('missing');
      await this.deps.logger.error(`Aborted gclid: ${gclid}, missing credentials`);
      logError('GADS_PROCESS_MISSING_CREDENTIALS', { reporter: PROVIDER_KEY, gclid });
      return false;
    }

    await this.deps.logger.info(`Processing gclid: ${gclid}, customer: ${creds.customerId}, action_id: ${actionId}`);

    const conversionAction = conversionActionResourceName(creds.customerId, actionId);
    const attributedValue = toFloat(conversionValue) * toFloat(payload.attribution_fraction);

    const result: UploadResult = await this.createClient(creds).uploadClickConversion(
      gclid,
      conversionAction,
      payload.conversion_datetime,
      attributedValue,
      currencyCode
    );

    if (!result.success) {
      if (result.credentialError) {
        await this.deps.flag.set('token_refresh_failed');
      }
      logError('GADS_UPLOAD_FAILED', {
        reporter: PROVIDER_KEY,
        gclid,
        error: result.error,
        credential_error: result.credentialError,
      });
      return false;
    }

    await this.deps.flag.clear();
    return true;
  }

  /** Hands this reporter's failed jobs back to the queue and asks for an immediate run. */
  async resetFailedJobs(): Promise<number> {
    const count = await this.deps.queueStore.resetFailedJobs(PROVIDER_KEY);
    logInfo('GADS_FAILED_JOBS_RESET', { reporter: PROVIDER_KEY, count });
    await this.deps.queueTrigger.scheduleRun(PROVIDER_KEY, 'credentials_restored');
    return count;
  }
}
