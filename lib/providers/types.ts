/**
 * Contract between the attribution engine, the job queue and a conversion reporter.
 */

/** Attribution fraction per click hash, iterated in insertion order. */
export type Attributions = ReadonlyMap<string, number> | Readonly<Record<string, number>>;

/** Click ids per click hash, keyed by platform (e.g. { google_ads: 'gclid-value' }). */
export type ClickIdMap = Readonly<Record<string, Readonly<Record<string, string | undefined>> | undefined>>;

/** Campaign data per click hash. Not used by the Google Ads reporter. */
export type CampaignMap = Readonly<Record<string, unknown>>;

export interface EnqueueContext {
  /** Conversion time: ISO-8601 string, epoch seconds or Date. */
  timestamp: string | number | Date;
}

/**
 * Queue job body for one Google Ads conversion.
 * Settings are snapshotted at enqueue time; process() derives everything else.
 */
export interface ConversionPayload {
  gclid: string;
  /** YYYY-MM-DD HH:MM:SS±HH:MM */
  conversion_datetime: string;
  /** Share of the conversion credited to this click; 0 is a valid value. */
  attribution_fraction: number;
  customer_id: string;
  conversion_action_id: string;
  conversion_value: string;
  currency_code: string;
  developer_token: string;
  client_id: string;
  client_secret: string;
  refresh_token: string;
  login_customer_id: string;
}

export interface ConversionReporter {
  readonly providerKey: string;
  enqueue(
    attributions: Attributions,
    clickIds: ClickIdMap,
    campaigns: CampaignMap,
    context: EnqueueContext
  ): Promise<ConversionPayload[]>;
  /** True on success. Expected failures resolve false; storage failures reject. */
  process(payload: ConversionPayload): Promise<boolean>;
}

export type ReporterRegistry = Readonly<Record<string, ConversionReporter>>;

/** URL query parameter per platform, used by the click-id capture step. */
export type ClickIdCapturers = Readonly<Record<string, string>>;

export function attributionEntries(attributions: Attributions): Array<[string, number]> {
  if (attributions instanceof Map) return [...attributions.entries()];
  return Object.entries(attributions);
}
