/**
 * Google Ads provider: endpoints, wire shapes and client result types.
 */

import { z } from 'zod';

const OAUTH_TOKEN_URL = 'https://oauth2.googleapis.com/token';
const GOOGLE_ADS_API_BASE = 'https://googleads.googleapis.com';
const API_VERSION = 'v23';

export const GOOGLE_ADS = {
  OAUTH_TOKEN_URL,
  GOOGLE_ADS_API_BASE,
  API_VERSION,
  /** Ads API request timeout (ms). Retries belong to the queue, not this layer. */
  REQUEST_TIMEOUT_MS: 30_000,
  /** Seconds subtracted from expires_in before caching an access token. */
  TOKEN_TTL_MARGIN_S: 300,
  /** Cache key for the shared access token. */
  TOKEN_CACHE_KEY: 'access_token',
} as const;

export const PROVIDER_KEY = 'google_ads';

/**
 * Credentials for one Google Ads account.
 *
 * **MCC (Manager) structure:**
 * - `loginCustomerId`: the manager account, sent as the `login-customer-id` header.
 * - `customerId`: the client account conversions are uploaded to.
 */
export interface GoogleAdsCredentials {
  customerId: string;
  developerToken: string;
  clientId: string;
  clientSecret: string;
  refreshToken: string;
  loginCustomerId?: string;
  /** Only used by testConnection() phase 2. */
  conversionActionId?: string;
}

/** ClickConversion for uploadClickConversions (REST, camelCase). */
export interface ClickConversion {
  gclid: string;
  conversionAction: string;
  conversionDateTime: string;
  conversionValue: number;
  currencyCode: string;
}

export interface UploadClickConversionsRequest {
  conversions: ClickConversion[];
  partialFailure: boolean;
}

// Response bodies are parsed with zod; unknown fields pass through untouched.

export const UploadClickConversionsResponseSchema = z
  .object({
    partialFailureError: z
      .object({
        code: z.number().optional(),
        message: z.string().optional(),
        details: z.array(z.unknown()).optional(),
      })
      .passthrough()
      .nullish(),
    results: z.array(z.unknown()).optional(),
  })
  .passthrough();

export const TokenResponseSchema = z
  .object({
    access_token: z.string().optional(),
    expires_in: z.union([z.number(), z.string()]).optional(),
    token_type: z.string().optional(),
    error: z.string().optional(),
    error_description: z.string().optional(),
  })
  .passthrough();

export const SearchResponseSchema = z
  .object({
    results: z
      .array(
        z
          .object({
            conversionAction: z
              .object({
                resourceName: z.string().optional(),
                id: z.union([z.string(), z.number()]).optional(),
                name: z.string().optional(),
                category: z.string().optional(),
              })
              .passthrough()
              .optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

export const MutateConversionActionsResponseSchema = z
  .object({
    results: z.array(z.object({ resourceName: z.string().optional() }).passthrough()).optional(),
  })
  .passthrough();

export const ApiErrorBodySchema = z
  .object({
    error: z
      .object({
        code: z.number().optional(),
        message: z.string().optional(),
        status: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export type UploadClickConversionsResponse = z.infer<typeof UploadClickConversionsResponseSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type SearchResponse = z.infer<typeof SearchResponseSchema>;
export type MutateConversionActionsResponse = z.infer<typeof MutateConversionActionsResponseSchema>;

/** Result of uploadClickConversion(). credentialError only via token acquisition failure. */
export interface UploadResult {
  success: boolean;
  error: string;
  credentialError: boolean;
}

export interface TestConnectionResult {
  success: boolean;
  error: string;
  credentialError: boolean;
  /** Raw HTTP status and body of the failing call, for the operator. */
  debug: string;
  conversionActionName: string;
  conversionActionCategory: string;
}

export interface CreateConversionActionResult {
  success: boolean;
  error: string;
  credentialError: boolean;
  conversionActionId: string;
}

export interface ConversionActionDetailsResult {
  success: boolean;
  error: string;
  name: string;
  category: string;
}
