/**
 * Next.js instrumentation: register Sentry on the server and capture request errors.
 */
import * as Sentry from '@sentry/nextjs';
import { assertQstashEnv } from '@/lib/qstash/env';

export async function register() {
  if (process.env.NEXT_RUNTIME === 'nodejs') {
    // Fail-fast on server boot in production if QStash env is misconfigured.
    assertQstashEnv();
    await import('./sentry.server.config');
  }
}

export const onRequestError = Sentry.captureRequestError;
