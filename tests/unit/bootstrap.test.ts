import test from 'node:test';
import assert from 'node:assert/strict';
import { bootstrapReporters, type GoogleAdsServices } from '@/lib/bootstrap';
import { DiagnosticLogger } from '@/lib/diagnostics/diagnostic-logger';
import { InMemoryKeyValueStore } from '@/lib/kv/memory-store';
import { CredentialErrorFlag } from '@/lib/providers/google_ads/credential-flag';
import { GoogleAdsConversionReporter } from '@/lib/providers/google_ads/reporter';
import { GoogleAdsAdminService } from '@/lib/services/google-ads-admin-service';
import { SettingsService } from '@/lib/services/settings-service';
import { InMemorySettingsRepository } from '@/lib/settings/repository';

function inMemoryServices(): GoogleAdsServices {
  const settings = new InMemorySettingsRepository();
  const tokenCache = new InMemoryKeyValueStore();
  const flag = new CredentialErrorFlag(tokenCache);
  const logger = new DiagnosticLogger(settings, { uploadsDir: '/nonexistent' });
  const reporter = new GoogleAdsConversionReporter({
    settings,
    flag,
    logger,
    tokenCache,
    queueStore: { resetFailedJobs: async () => 0 },
    queueTrigger: { scheduleRun: async () => undefined },
  });
  return {
    settings,
    tokenCache,
    flag,
    logger,
    reporter,
    settingsService: new SettingsService({ settings, flag, reporter }),
    adminService: new GoogleAdsAdminService({ settings, tokenCache, logger }),
    timezone: 'UTC',
  };
}

test('bootstrapReporters registers the Google Ads reporter', () => {
  const services = inMemoryServices();
  const registry = bootstrapReporters(() => services);
  assert.deepEqual(Object.keys(registry), ['google_ads']);
  assert.equal(registry.google_ads, services.reporter);
});

test('bootstrapReporters returns an empty registry when wiring fails', () => {
  const registry = bootstrapReporters(() => {
    throw new Error('Missing env: SUPABASE_URL');
  });
  assert.deepEqual(registry, {});
});
