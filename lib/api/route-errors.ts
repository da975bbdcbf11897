import { NextResponse } from 'next/server';
import * as Sentry from '@sentry/nextjs';
import { logError } from '@/lib/logging/logger';
import { errorMessage } from '@/lib/storage/errors';

/** JSON error body used by every admin route: { error, code }. */
export function jsonError(status: number, error: string, code: string, extra?: Record<string, unknown>): NextResponse {
  return NextResponse.json({ error, code, ...(extra ?? {}) }, { status });
}

/** Logs, reports to Sentry and answers 500 for an unexpected failure. */
export function internalError(err: unknown, route: string, requestId?: string): NextResponse {
  logError('GADS_ROUTE_UNHANDLED_ERROR', { route, request_id: requestId, error: errorMessage(err) });
  Sentry.captureException(err, { tags: { route, request_id: requestId } });
  return jsonError(500, 'Internal server error', 'INTERNAL_ERROR');
}

/** Request body as JSON, or null when it is not valid JSON. */
export async function readJson(req: Request): Promise<unknown> {
  try {
    const body: unknown = await req.json();
    return body;
  } catch {
    return null;
  }
}
