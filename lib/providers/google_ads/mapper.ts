/**
 * Request builders for the Google Ads REST API: resource names, GAQL queries,
 * upload and mutate bodies.
 */

import type { ClickConversion, UploadClickConversionsRequest } from './types';

/** customers/{customerId}/conversionActions/{conversionActionId} */
export function conversionActionResourceName(customerId: string, conversionActionId: string): string {
  return `customers/${customerId}/conversionActions/${conversionActionId}`;
}

/** Trailing numeric ID of a conversion action resource name, or null. */
export function extractConversionActionId(resourceName: string): string | null {
  const match = resourceName.match(/conversionActions\/(\d+)$/);
  return match ? match[1] : null;
}

/** GAQL string literal content: backslashes, then single quotes, escaped with a backslash. */
export function escapeGaqlString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

export function conversionActionByIdQuery(conversionActionId: string): string {
  return (
    'SELECT conversion_action.id, conversion_action.name, conversion_action.category ' +
    `FROM conversion_action WHERE conversion_action.id = ${conversionActionId}`
  );
}

export function conversionActionByNameQuery(name: string): string {
  return (
    'SELECT conversion_action.id, conversion_action.name ' +
    `FROM conversion_action WHERE conversion_action.name = '${escapeGaqlString(name)}'`
  );
}

/** Single-conversion batch with partialFailure so per-item errors come back in a 200. */
export function buildUploadRequest(conversion: ClickConversion): UploadClickConversionsRequest {
  return { conversions: [conversion], partialFailure: true };
}

export function buildCreateConversionActionRequest(
  name: string,
  defaultValue: number,
  currencyCode: string,
  category: string
) {
  return {
    operations: [
      {
        create: {
          name,
          type: 'UPLOAD_CLICKS',
          category,
          status: 'ENABLED',
          valueSettings: {
            defaultValue,
            alwaysUseDefaultValue: true,
            defaultCurrencyCode: currencyCode,
          },
        },
      },
    ],
  };
}
