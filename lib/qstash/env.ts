/**
 * QStash runtime environment guard (fail-fast).
 *
 * Required in production:
 * - QSTASH_TOKEN: publisher token for the queue trigger.
 */

function isProductionRuntime(): boolean {
  // Build phase collects route data without secrets.
  if (process.env.NEXT_PHASE === 'phase-production-build' || process.env.IS_BUILDING === 'true') {
    return false;
  }
  return process.env.NODE_ENV === 'production';
}

function requireNonEmptyEnv(name: string): string {
  const v = process.env[name];
  if (v === undefined || v.trim() === '') {
    throw new Error(`[QSTASH] CRITICAL: Missing required env var in production: ${name}`);
  }
  return v.trim();
}

/** Throws in production when the publisher token is missing. */
export function assertQstashEnv(): void {
  if (!isProductionRuntime()) return;
  requireNonEmptyEnv('QSTASH_TOKEN');
}
