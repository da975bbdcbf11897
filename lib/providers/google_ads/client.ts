/**
 * Google Ads REST client for offline click conversions.
 *
 * Receives every credential through the constructor (no settings access).
 * Methods never throw for API or transport failures: each returns a result
 * object whose `credentialError` tells callers whether the cause is a broken
 * credential (operator must act) or something the queue can simply retry.
 */

import type { KeyValueStore } from '@/lib/kv/types';
import type { DiagnosticLogger } from '@/lib/diagnostics/diagnostic-logger';
import type { GoogleAdsSettings } from '@/lib/settings/types';
import { GoogleOAuthTokenSource } from './auth';
import { parseBody, postWithTimeout, type HttpResult } from './http';
import {
  buildCreateConversionActionRequest,
  buildUploadRequest,
  conversionActionByIdQuery,
  conversionActionByNameQuery,
  extractConversionActionId,
} from './mapper';
import {
  ApiErrorBodySchema,
  GOOGLE_ADS,
  MutateConversionActionsResponseSchema,
  SearchResponseSchema,
  UploadClickConversionsResponseSchema,
  type ConversionActionDetailsResult,
  type CreateConversionActionResult,
  type GoogleAdsCredentials,
  type SearchResponse,
  type TestConnectionResult,
  type UploadResult,
} from './types';

const TOKEN_FAILED = 'Failed to obtain access token.';

export interface GoogleAdsClientDeps {
  /** Shared access-token cache. */
  tokenCache: KeyValueStore;
  logger?: DiagnosticLogger | null;
}

type FoundAction = { id: string; name: string; category: string };

function apiErrorMessage(status: number, body: string): string {
  return parseBody(ApiErrorBodySchema, body)?.error?.message ?? `HTTP ${status}: ${body}`;
}

function firstAction(data: SearchResponse | null): FoundAction | null {
  const row = data?.results?.[0];
  if (!row) return null;
  const action = row.conversionAction ?? {};
  return {
    id: action.id === undefined ? '' : String(action.id),
    name: action.name ?? '',
    category: action.category ?? '',
  };
}

/** Client credentials from the stored settings (admin operations). */
export function credentialsFromSettings(settings: GoogleAdsSettings): GoogleAdsCredentials {
  return {
    customerId: settings.customer_id,
    developerToken: settings.developer_token,
    clientId: settings.client_id,
    clientSecret: settings.client_secret,
    refreshToken: settings.refresh_token,
    loginCustomerId: settings.login_customer_id,
    conversionActionId: settings.conversion_action_id,
  };
}

export class GoogleAdsClient {
  private readonly tokens: GoogleOAuthTokenSource;
  private readonly log: DiagnosticLogger | null;

  constructor(
    private readonly creds: GoogleAdsCredentials,
    deps: GoogleAdsClientDeps
  ) {
    this.log = deps.logger ?? null;
    this.tokens = new GoogleOAuthTokenSource(
      { clientId: creds.clientId, clientSecret: creds.clientSecret, refreshToken: creds.refreshToken },
      deps.tokenCache,
      this.log
    );
  }

  getAccessToken(): Promise<string | null> {
    return this.tokens.getAccessToken();
  }

  refreshAccessToken(): Promise<string | null> {
    return this.tokens.refreshAccessToken();
  }

  /**
   * Verify credentials in two phases.
   * 1. Fresh token refresh (bypasses the cache): client_id, client_secret, refresh_token.
   * 2. Only with a conversionActionId: GAQL read of that action, which checks
   *    developer token, customer id, login customer id and the action id at once.
   */
  async testConnection(): Promise<TestConnectionResult> {
    const result = (
      partial: Partial<TestConnectionResult> & Pick<TestConnectionResult, 'success'>
    ): TestConnectionResult => ({
      error: '',
      credentialError: false,
      debug: '',
      conversionActionName: '',
      conversionActionCategory: '',
      ...partial,
    });

    await this.log?.info('Test connection phase 1: verifying OAuth2 credentials');
    const token = await this.tokens.refreshAccessToken();
    if (token === null) {
      const error = this.tokens.lastRefreshError || TOKEN_FAILED;
      await this.log?.error(`Test connection phase 1 failed: ${error}`);
      return result({ success: false, error, credentialError: true, debug: this.tokens.lastRefreshDebug });
    }
    await this.log?.info('Test connection phase 1 passed: token refresh successful');

    const actionId = this.creds.conversionActionId ?? '';
    if (actionId === '') {
      return result({ success: true });
    }

    await this.log?.info(`Test connection phase 2: verifying Google Ads API access for conversion action ${actionId}`);
    const res = await this.search(token, conversionActionByIdQuery(actionId));

    if (!res.ok) {
      await this.log?.error(`Test connection phase 2 failed: ${res.error}`);
      return result({ success: false, error: res.error });
    }

    // Non-200: invalid developer token, customer id or login customer id.
    if (res.status !== 200) {
      const error = apiErrorMessage(res.status, res.body);
      await this.log?.error(`Test connection phase 2 failed: ${error}`);
      return result({ success: false, error, credentialError: true, debug: `HTTP ${res.status}: ${res.body}` });
    }

    const action = firstAction(parseBody(SearchResponseSchema, res.body));
    if (!action) {
      const error = `Conversion action ${actionId} not found in Google Ads account ${this.creds.customerId}.`;
      await this.log?.error(`Test connection phase 2 failed: ${error}`);
      return result({ success: false, error, credentialError: true, debug: `HTTP 200: ${res.body}` });
    }

    await this.log?.info(`Test connection phase 2 passed: conversion action '${action.name}'`);
    return result({
      success: true,
      conversionActionName: action.name,
      conversionActionCategory: action.category,
    });
  }

  /**
   * Upload one click conversion. Only a token failure is a credential error;
   * HTTP errors and partial failures are plain failures for the queue to retry.
   */
  async uploadClickConversion(
    gclid: string,
    conversionAction: string,
    conversionDateTime: string,
    conversionValue: number,
    currencyCode: string
  ): Promise<UploadResult> {
    await this.log?.info(
      `Uploading conversion: gclid ${gclid}, action ${conversionAction}, value ${conversionValue} ${currencyCode}`
    );

    const token = await this.tokens.getAccessToken();
    if (token === null) {
      const error = this.tokens.lastRefreshError || TOKEN_FAILED;
      await this.log?.error(`Conversion upload failed: gclid ${gclid}, error: ${error}`);
      return { success: false, error, credentialError: true };
    }

    const body = buildUploadRequest({ gclid, conversionAction, conversionDateTime, conversionValue, currencyCode });
    const res = await postWithTimeout(this.customerUrl(':uploadClickConversions'), {
      headers: this.buildApiHeaders(token),
      body: JSON.stringify(body),
    });

    if (!res.ok) {
      await this.log?.error(`Conversion upload failed: gclid ${gclid}, error: ${res.error}`);
      return { success: false, error: res.error, credentialError: false };
    }

    if (res.status !== 200) {
      const error = `HTTP ${res.status}: ${res.body}`;
      await this.log?.error(`Conversion upload failed: gclid ${gclid}, error: ${error}`);
      return { success: false, error, credentialError: false };
    }

    const partialFailure = parseBody(UploadClickConversionsResponseSchema, res.body)?.partialFailureError;
    if (partialFailure && Object.keys(partialFailure).length > 0) {
      const error = partialFailure.message || 'Partial failure error';
      await this.log?.error(`Conversion partial failure: gclid ${gclid}, error: ${error}`);
      return { success: false, error, credentialError: false };
    }

    await this.log?.info(`Conversion uploaded: gclid ${gclid}`);
    return { success: true, error: '', credentialError: false };
  }

  /**
   * Create an UPLOAD_CLICKS conversion action. Refuses to create a duplicate
   * name; a failed name lookup counts as "not found" and creation proceeds.
   */
  async createConversionAction(
    name: string,
    defaultValue: number,
    currencyCode: string,
    category = 'SUBMIT_LEAD_FORM'
  ): Promise<CreateConversionActionResult> {
    const fail = (error: string, credentialError = false): CreateConversionActionResult => ({
      success: false,
      error,
      credentialError,
      conversionActionId: '',
    });

    await this.log?.info(
      `Creating conversion action: name ${name}, category ${category}, value ${defaultValue} ${currencyCode}`
    );
    const token = await this.tokens.getAccessToken();
    if (token === null) {
      const error = this.tokens.lastRefreshError || TOKEN_FAILED;
      await this.log?.error(`Create conversion action failed: ${error}`);
      return fail(error, true);
    }

    const existing = await this.findConversionActionByName(token, name);
    if (existing !== null) {
      await this.log?.error(`Create conversion action failed: name '${name}' already exists with ID ${existing.id}`);
      return fail(`A conversion action named "${name}" already exists (ID: ${existing.id}).`);
    }

    const res = await postWithTimeout(this.customerUrl('/conversionActions:mutate'), {
      headers: this.buildApiHeaders(token),
      body: JSON.stringify(buildCreateConversionActionRequest(name, defaultValue, currencyCode, category)),
    });

    if (!res.ok) {
      await this.log?.error(`Create conversion action failed: ${res.error}`);
      return fail(res.error);
    }

    if (res.status !== 200) {
      const error = apiErrorMessage(res.status, res.body);
      await this.log?.error(`Create conversion action failed: ${error}`);
      return fail(error, true);
    }

    const resourceName = parseBody(MutateConversionActionsResponseSchema, res.body)?.results?.[0]?.resourceName ?? '';
    const actionId = extractConversionActionId(resourceName);
    if (actionId === null) {
      await this.log?.error(`Create conversion action failed: unexpected response: ${res.body}`);
      return fail('Unexpected response: could not extract conversion action ID.');
    }

    await this.log?.info(`Conversion action created: name ${name}, ID ${actionId}`);
    return { success: true, error: '', credentialError: false, conversionActionId: actionId };
  }

  /** Name and category of a conversion action, for populating settings. */
  async fetchConversionActionDetails(conversionActionId: string): Promise<ConversionActionDetailsResult> {
    const fail = (error: string): ConversionActionDetailsResult => ({ success: false, error, name: '', category: '' });

    await this.log?.info(`Fetching conversion action details: ID ${conversionActionId}`);
    const token = await this.tokens.getAccessToken();
    if (token === null) {
      const error = this.tokens.lastRefreshError || TOKEN_FAILED;
      await this.log?.error(`Fetch conversion action failed: ${error}`);
      return fail(error);
    }

    const res = await this.search(token, conversionActionByIdQuery(conversionActionId));
    if (!res.ok) {
      await this.log?.error(`Fetch conversion action failed: ${res.error}`);
      return fail(res.error);
    }
    if (res.status !== 200) {
      const error = apiErrorMessage(res.status, res.body);
      await this.log?.error(`Fetch conversion action failed: ${error}`);
      return fail(error);
    }

    const action = firstAction(parseBody(SearchResponseSchema, res.body));
    if (!action) {
      await this.log?.error(`Fetch conversion action failed: ID ${conversionActionId} not found`);
      return fail(`Conversion action ${conversionActionId} not found.`);
    }

    await this.log?.info(`Conversion action fetched: name ${action.name}, category ${action.category}`);
    return { success: true, error: '', name: action.name, category: action.category };
  }

  /** Exact-name lookup. Any failure is treated as "not found". */
  private async findConversionActionByName(token: string, name: string): Promise<FoundAction | null> {
    const res = await this.search(token, conversionActionByNameQuery(name));
    if (!res.ok || res.status !== 200) return null;
    return firstAction(parseBody(SearchResponseSchema, res.body));
  }

  private search(token: string, query: string): Promise<HttpResult> {
    return postWithTimeout(this.customerUrl('/googleAds:search'), {
      headers: this.buildApiHeaders(token),
      body: JSON.stringify({ query }),
    });
  }

  private customerUrl(suffix: string): string {
    return `${GOOGLE_ADS.GOOGLE_ADS_API_BASE}/${GOOGLE_ADS.API_VERSION}/customers/${this.creds.customerId}${suffix}`;
  }

  /** login-customer-id only when set: an empty header is rejected for MCC-scoped accounts. */
  buildApiHeaders(accessToken: string): Record<string, string> {
    const headers: Record<string, string> = {
      Authorization: `Bearer ${accessToken}`,
      'Content-Type': 'application/json',
      'developer-token': this.creds.developerToken,
    };
    const loginCustomerId = this.creds.loginCustomerId ?? '';
    if (loginCustomerId !== '') {
      headers['login-customer-id'] = loginCustomerId;
    }
    return headers;
  }
}
