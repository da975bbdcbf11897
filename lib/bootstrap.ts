/**
 * Wiring: builds the Google Ads services from the environment once per process.
 * Routes and the host's queue processor get everything from here.
 */

import * as Sentry from '@sentry/nextjs';
import { getRuntimeEnv } from '@/lib/config/env';
import { DiagnosticLogger } from '@/lib/diagnostics/diagnostic-logger';
import { RedisKeyValueStore } from '@/lib/kv/redis-store';
import type { KeyValueStore } from '@/lib/kv/types';
import { logError } from '@/lib/logging/logger';
import { CredentialErrorFlag } from '@/lib/providers/google_ads/credential-flag';
import { GoogleAdsConversionReporter } from '@/lib/providers/google_ads/reporter';
import { buildReporterRegistry } from '@/lib/providers/registry';
import type { ReporterRegistry } from '@/lib/providers/types';
import { qstash } from '@/lib/qstash/client';
import { QstashQueueTrigger } from '@/lib/queue/qstash-trigger';
import { SupabaseQueueStore } from '@/lib/queue/supabase-queue-store';
import { GoogleAdsAdminService } from '@/lib/services/google-ads-admin-service';
import { SettingsService } from '@/lib/services/settings-service';
import { SupabaseSettingsRepository, type SettingsRepository } from '@/lib/settings/repository';
import { getAdminClient } from '@/lib/supabase/admin';
import { redis } from '@/lib/upstash';
import { errorMessage } from '@/lib/storage/errors';

export interface GoogleAdsServices {
  settings: SettingsRepository;
  tokenCache: KeyValueStore;
  flag: CredentialErrorFlag;
  logger: DiagnosticLogger;
  reporter: GoogleAdsConversionReporter;
  settingsService: SettingsService;
  adminService: GoogleAdsAdminService;
  timezone: string;
}

let services: GoogleAdsServices | null = null;

export function getGoogleAdsServices(): GoogleAdsServices {
  if (services) return services;

  const env = getRuntimeEnv();
  const supabase = getAdminClient();
  const settings = new SupabaseSettingsRepository(supabase, env.settingsTable);
  const tokenCache = new RedisKeyValueStore(redis);
  const flag = new CredentialErrorFlag(tokenCache);
  const logger = new DiagnosticLogger(settings, { uploadsDir: env.uploadsDir, timezone: env.timezone });

  const reporter = new GoogleAdsConversionReporter({
    settings,
    flag,
    logger,
    tokenCache,
    queueStore: new SupabaseQueueStore(supabase, env.queueTable),
    queueTrigger: new QstashQueueTrigger(qstash, env.queueProcessUrl),
    timezone: env.timezone,
  });

  services = {
    settings,
    tokenCache,
    flag,
    logger,
    reporter,
    settingsService: new SettingsService({ settings, flag, reporter }),
    adminService: new GoogleAdsAdminService({ settings, tokenCache, logger }),
    timezone: env.timezone,
  };
  return services;
}

/** Test seam. */
export function _setGoogleAdsServicesForTests(s: GoogleAdsServices | null): void {
  services = s;
}

/**
 * Registry for the host's attribution engine and queue processor.
 * A wiring failure is logged and reported; the host keeps running without the reporter.
 */
export function bootstrapReporters(build: () => GoogleAdsServices = getGoogleAdsServices): ReporterRegistry {
  try {
    const { reporter } = build();
    return buildReporterRegistry([reporter]);
  } catch (err) {
    logError('GADS_BOOTSTRAP_FAILED', { error: errorMessage(err) });
    Sentry.captureException(err, { tags: { component: 'gads-bootstrap' } });
    return {};
  }
}
