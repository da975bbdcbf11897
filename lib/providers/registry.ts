/**
 * Reporter registry: provider key -> reporter, built once at startup.
 */

import type { ClickIdCapturers, ConversionReporter, ReporterRegistry } from './types';
import { PROVIDER_KEY } from './google_ads/types';

export function buildReporterRegistry(reporters: readonly ConversionReporter[]): ReporterRegistry {
  const registry: Record<string, ConversionReporter> = {};
  for (const reporter of reporters) {
    registry[reporter.providerKey] = reporter;
  }
  return registry;
}

/** Adds or replaces one entry; every other entry is kept. */
export function registerReporter(existing: ReporterRegistry, reporter: ConversionReporter): ReporterRegistry {
  return { ...existing, [reporter.providerKey]: reporter };
}

/**
 * Returns the reporter for the given provider key.
 * @throws Error if no reporter is registered under that key.
 */
export function getReporter(registry: ReporterRegistry, providerKey: string): ConversionReporter {
  const reporter = registry[providerKey];
  if (!reporter) {
    throw new Error(`Unsupported provider: ${providerKey}. Supported: ${Object.keys(registry).join(', ')}.`);
  }
  return reporter;
}

/** Tells the click-id capture step to read `gclid` from landing URLs for google_ads. */
export function registerClickIdCapturer(existing: ClickIdCapturers): ClickIdCapturers {
  return { ...existing, [PROVIDER_KEY]: 'gclid' };
}
