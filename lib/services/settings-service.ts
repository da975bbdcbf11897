import { DiagnosticLogger } from '@/lib/diagnostics/diagnostic-logger';
import { logInfo } from '@/lib/logging/logger';
import type { CredentialErrorFlag } from '@/lib/providers/google_ads/credential-flag';
import { isConfiguredSettings, type SettingsRepository } from '@/lib/settings/repository';
import { sanitizeSettingsInput } from '@/lib/settings/sanitize';
import { SECRET_SETTINGS, type GoogleAdsSettings, type SettingsUpdateInput } from '@/lib/settings/types';

/** The reporter side the settings service needs. */
export interface FailedJobResetter {
  resetFailedJobs(): Promise<number>;
}

export interface SettingsServiceDeps {
  settings: SettingsRepository;
  flag: CredentialErrorFlag;
  reporter: FailedJobResetter;
}

/** Settings as shown to the admin UI: secrets masked to their last 4 characters. */
export function maskSettings(settings: GoogleAdsSettings): GoogleAdsSettings {
  const masked = { ...settings };
  for (const key of SECRET_SETTINGS) {
    masked[key] = DiagnosticLogger.mask(settings[key]);
  }
  return masked;
}

export class SettingsService {
  constructor(private readonly deps: SettingsServiceDeps) {}

  /**
   * Credential-restore trigger. Always clears the credential flag; when the
   * configuration is complete, failed jobs go back to pending for another run.
   */
  async onSettingsUpdated(settings: GoogleAdsSettings): Promise<number> {
    await this.deps.flag.clear();
    if (!isConfiguredSettings(settings)) {
      logInfo('GADS_SETTINGS_UPDATED', { configured: false });
      return 0;
    }
    const reset = await this.deps.reporter.resetFailedJobs();
    logInfo('GADS_SETTINGS_UPDATED', { configured: true, jobs_reset: reset });
    return reset;
  }

  /**
   * Sanitize, persist, then run the credential-restore trigger. A secret sent
   * back exactly as GET masked it keeps its stored value.
   */
  async saveSettings(input: SettingsUpdateInput): Promise<{ settings: GoogleAdsSettings; jobsReset: number }> {
    const clean = sanitizeSettingsInput(input);
    const current = await this.deps.settings.getAll();
    for (const key of SECRET_SETTINGS) {
      const value = clean[key];
      if (value !== undefined && value !== '' && value === DiagnosticLogger.mask(current[key])) {
        delete clean[key];
      }
    }
    const settings = await this.deps.settings.update(clean);
    const jobsReset = await this.onSettingsUpdated(settings);
    return { settings, jobsReset };
  }
}
