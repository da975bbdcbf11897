/**
 * POST with a hard timeout. Transport failures (network, abort) come back as
 * { ok: false } instead of throwing; callers classify them as non-credential.
 */

import type { z } from 'zod';
import { errorMessage } from '@/lib/storage/errors';
import { GOOGLE_ADS } from './types';

export type HttpResult =
  | { ok: true; status: number; body: string }
  | { ok: false; error: string };

export async function postWithTimeout(
  url: string,
  init: { headers: Record<string, string>; body: string },
  timeoutMs: number = GOOGLE_ADS.REQUEST_TIMEOUT_MS
): Promise<HttpResult> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: init.headers,
      body: init.body,
      signal: controller.signal,
    });
    const body = await res.text();
    return { ok: true, status: res.status, body };
  } catch (err) {
    const isAbort = err instanceof Error && err.name === 'AbortError';
    return {
      ok: false,
      error: isAbort ? `Request timed out after ${timeoutMs} ms` : errorMessage(err),
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

/** JSON.parse that yields null for empty or malformed bodies. */
export function parseJson(body: string): unknown {
  if (!body) return null;
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}

/** Parse a response body against a schema; null when it is not JSON or does not match. */
export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: string): T | null {
  const parsed = schema.safeParse(parseJson(body));
  return parsed.success ? parsed.data : null;
}
