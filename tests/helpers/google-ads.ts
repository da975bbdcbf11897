/**
 * Shared test fixtures: fetch stub, settings and payload builders.
 */

import type { ConversionPayload } from '@/lib/providers/types';
import type { GoogleAdsSettings } from '@/lib/settings/types';

export type FetchCall = { url: string; body: string; headers: Headers };
type Handler = (call: FetchCall) => Response | Promise<Response>;

/** Replaces globalThis.fetch; restore() puts the original back. */
export function stubFetch(handler: Handler): { calls: FetchCall[]; restore: () => void } {
  const original = globalThis.fetch;
  const calls: FetchCall[] = [];
  globalThis.fetch = async (input: string | URL | Request, init?: RequestInit) => {
    const call: FetchCall = {
      url: input instanceof Request ? input.url : String(input),
      body: typeof init?.body === 'string' ? init.body : '',
      headers: new Headers(init?.headers),
    };
    calls.push(call);
    return handler(call);
  };
  return {
    calls,
    restore: () => {
      globalThis.fetch = original;
    },
  };
}

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

export const TOKEN_URL = 'https://oauth2.googleapis.com/token';
export const API_BASE = 'https://googleads.googleapis.com/v23/customers/1234567890';

export function tokenOk(accessToken = 'test-access-token', expiresIn = 3600): Response {
  return json({ access_token: accessToken, expires_in: expiresIn, token_type: 'Bearer' });
}

export const CONFIGURED_SETTINGS: Partial<GoogleAdsSettings> = {
  customer_id: '1234567890',
  conversion_action_id: '555',
  developer_token: 'test-dev-token',
  client_id: 'test-client-id',
  client_secret: 'test-client-secret',
  refresh_token: 'test-refresh-token',
  conversion_value: '1000',
  currency_code: 'SEK',
};

export function payload(overrides: Partial<ConversionPayload> = {}): ConversionPayload {
  return {
    gclid: 'test-gclid-1',
    conversion_datetime: '2026-03-01 12:30:00+00:00',
    attribution_fraction: 0.25,
    customer_id: '1234567890',
    conversion_action_id: '555',
    conversion_value: '1000',
    currency_code: 'SEK',
    developer_token: 'test-dev-token',
    client_id: 'test-client-id',
    client_secret: 'test-client-secret',
    refresh_token: 'test-refresh-token',
    login_customer_id: '',
    ...overrides,
  };
}
