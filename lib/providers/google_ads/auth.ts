/**
 * Google Ads OAuth2: refresh token -> access token, with a shared cache.
 *
 * The cached token lives in the injected KeyValueStore with a TTL of
 * expires_in - 300s; the store enforces expiry. Tokens are interchangeable
 * across workers, so concurrent refreshes are harmless (last write wins).
 */

import type { KeyValueStore } from '@/lib/kv/types';
import { DiagnosticLogger } from '@/lib/diagnostics/diagnostic-logger';
import { logDebug } from '@/lib/logging/logger';
import { GOOGLE_ADS, TokenResponseSchema } from './types';
import { parseBody, postWithTimeout } from './http';

export interface OAuthClientCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export class GoogleOAuthTokenSource {
  private _lastRefreshError = '';
  private _lastRefreshDebug = '';

  constructor(
    private readonly creds: OAuthClientCredentials,
    private readonly cache: KeyValueStore,
    private readonly log: DiagnosticLogger | null = null
  ) {}

  /** Human-readable reason for the last failed refresh ('' after a success). */
  get lastRefreshError(): string {
    return this._lastRefreshError;
  }

  /** Raw response of the last failed refresh: "HTTP <status>: <body>" or the transport error. */
  get lastRefreshDebug(): string {
    return this._lastRefreshDebug;
  }

  /** Cached token when present, otherwise a fresh one. Null on failure. */
  async getAccessToken(): Promise<string | null> {
    const cached = await this.cache.get(GOOGLE_ADS.TOKEN_CACHE_KEY);
    if (cached) {
      logDebug('GADS_TOKEN_CACHE_HIT');
      return cached;
    }
    return this.refreshAccessToken();
  }

  /** Always calls the token endpoint. Null on failure; see lastRefreshError. */
  async refreshAccessToken(): Promise<string | null> {
    this._lastRefreshError = '';
    this._lastRefreshDebug = '';

    const body = new URLSearchParams({
      grant_type: 'refresh_token',
      client_id: this.creds.clientId,
      client_secret: this.creds.clientSecret,
      refresh_token: this.creds.refreshToken,
    });

    const res = await postWithTimeout(GOOGLE_ADS.OAUTH_TOKEN_URL, {
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });

    if (!res.ok) {
      this._lastRefreshError = res.error;
      this._lastRefreshDebug = `Transport error: ${res.error}`;
      await this.log?.error(`Token refresh failed: ${res.error}`);
      return null;
    }

    this._lastRefreshDebug = `HTTP ${res.status}: ${res.body}`;
    const data = parseBody(TokenResponseSchema, res.body);
    const accessToken = data?.access_token ?? '';
    const expiresIn = Number(data?.expires_in ?? 0);

    if (!accessToken || !Number.isFinite(expiresIn) || expiresIn <= 0) {
      this._lastRefreshError = data?.error_description || data?.error || 'Unexpected token response.';
      await this.log?.error(
        `Token refresh failed: ${this._lastRefreshError} (client_id: ${this.creds.clientId}, ` +
          `client_secret: ${DiagnosticLogger.mask(this.creds.clientSecret)}, ` +
          `refresh_token: ${DiagnosticLogger.mask(this.creds.refreshToken)})`
      );
      return null;
    }

    // A token that expires within the margin is used once and not cached.
    const ttl = Math.max(0, Math.floor(expiresIn) - GOOGLE_ADS.TOKEN_TTL_MARGIN_S);
    if (ttl > 0) {
      await this.cache.set(GOOGLE_ADS.TOKEN_CACHE_KEY, accessToken, { ttlSeconds: ttl });
    }

    this._lastRefreshDebug = '';
    await this.log?.info(`Token refresh successful: expires_in ${expiresIn}s`);
    return accessToken;
  }
}
