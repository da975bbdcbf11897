/**
 * Reporter: enqueue filtering and snapshot, process merge policy, credential
 * flag lifecycle and failed-job reset.
 */
import test from 'node:test';
import assert from 'node:assert/strict';
import { GoogleAdsConversionReporter, type GoogleAdsReporterDeps } from '@/lib/providers/google_ads/reporter';
import { CredentialErrorFlag } from '@/lib/providers/google_ads/credential-flag';
import type { GoogleAdsCredentials, UploadResult } from '@/lib/providers/google_ads/types';
import type { ConversionReporter } from '@/lib/providers/types';
import { InMemoryKeyValueStore } from '@/lib/kv/memory-store';
import { DiagnosticLogger } from '@/lib/diagnostics/diagnostic-logger';
import { InMemorySettingsRepository, type SettingsRepository } from '@/lib/settings/repository';
import type { GoogleAdsSettings } from '@/lib/settings/types';
import { StorageError } from '@/lib/storage/errors';
import { API_BASE, CONFIGURED_SETTINGS, TOKEN_URL, json, payload, stubFetch, tokenOk } from '../helpers/google-ads';

type UploadCall = {
  creds: GoogleAdsCredentials;
  args: [string, string, string, number, string];
};

function setup(
  settingsValues: Partial<GoogleAdsSettings> = CONFIGURED_SETTINGS,
  result: UploadResult = { success: true, error: '', credentialError: false },
  overrides: Partial<GoogleAdsReporterDeps> = {}
) {
  const settings = new InMemorySettingsRepository(settingsValues);
  const store = new InMemoryKeyValueStore();
  const flag = new CredentialErrorFlag(store);
  const uploads: UploadCall[] = [];
  const resets: string[] = [];
  const triggers: Array<[string, string]> = [];

  const reporter = new GoogleAdsConversionReporter({
    settings,
    flag,
    logger: new DiagnosticLogger(settings, { uploadsDir: '/nonexistent' }),
    tokenCache: store,
    queueStore: {
      resetFailedJobs: async (reporterKey) => {
        resets.push(reporterKey);
        return 3;
      },
    },
    queueTrigger: {
      scheduleRun: async (reporterKey, reason) => {
        triggers.push([reporterKey, reason]);
      },
    },
    createClient: (creds) => ({
      uploadClickConversion: async (...args) => {
        uploads.push({ creds, args });
        return result;
      },
    }),
    ...overrides,
  });
  return { reporter, settings, flag, uploads, resets, triggers };
}

const CONTEXT = { timestamp: '2026-03-01T12:30:00Z' };

test('enqueue: keeps only hashes with a google_ads click id, in attribution order', async () => {
  const { reporter } = setup();
  const payloads = await reporter.enqueue(
    new Map([
      ['h3', 0.2],
      ['h1', 0.5],
      ['h2', 0.3],
      ['h4', 0],
    ]),
    {
      h1: { google_ads: 'gclid-1' },
      h2: { meta: 'fbclid-2' },
      h3: { google_ads: 'gclid-3' },
      h4: { google_ads: '' },
    },
    {},
    CONTEXT
  );
  assert.deepEqual(
    payloads.map((p) => [p.gclid, p.attribution_fraction]),
    [
      ['gclid-3', 0.2],
      ['gclid-1', 0.5],
    ]
  );
});

test('enqueue: payload snapshots raw settings and the formatted timestamp', async () => {
  const { reporter } = setup({ ...CONFIGURED_SETTINGS, login_customer_id: '9998887777' });
  const [p] = await reporter.enqueue({ h1: 0.25 }, { h1: { google_ads: 'gclid-1' } }, {}, CONTEXT);
  assert.deepEqual(p, {
    gclid: 'gclid-1',
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
    login_customer_id: '9998887777',
  });
});

test('enqueue: unconfigured settings still produce payloads with empty credentials', async () => {
  const { reporter } = setup({});
  const [p] = await reporter.enqueue({ h1: 1 }, { h1: { google_ads: 'gclid-1' } }, {}, CONTEXT);
  assert.equal(p.customer_id, '');
  assert.equal(p.developer_token, '');
  assert.equal(p.conversion_value, '0');
  assert.equal(p.currency_code, 'SEK');
});

test('enqueue: nothing qualifies returns an empty list', async () => {
  const { reporter } = setup();
  assert.deepEqual(await reporter.enqueue({ h1: 1 }, {}, {}, CONTEXT), []);
  assert.deepEqual(await reporter.enqueue(new Map(), {}, {}, CONTEXT), []);
});

test('enqueue: timestamp in the configured timezone, epoch seconds accepted', async () => {
  const { reporter } = setup(CONFIGURED_SETTINGS, undefined, { timezone: 'Europe/Stockholm' });
  const [p] = await reporter.enqueue({ h1: 1 }, { h1: { google_ads: 'g' } }, {}, { timestamp: 1772368200 });
  assert.equal(p.conversion_datetime, '2026-03-01 13:30:00+01:00');
});

test('enqueue: invalid timestamp rejects', async () => {
  const { reporter } = setup();
  await assert.rejects(
    () => reporter.enqueue({ h1: 1 }, { h1: { google_ads: 'g' } }, {}, { timestamp: 'yesterday-ish' }),
    /Invalid conversion timestamp/
  );
});

test('process: uploads value x fraction and clears the flag', async () => {
  const { reporter, flag, uploads } = setup();
  await flag.set('token_refresh_failed');

  assert.equal(await reporter.process(payload({ attribution_fraction: 0.25 })), true);
  assert.equal(uploads.length, 1);
  assert.deepEqual(uploads[0].args, [
    'test-gclid-1',
    'customers/1234567890/conversionActions/555',
    '2026-03-01 12:30:00+00:00',
    250,
    'SEK',
  ]);
  assert.equal(await flag.get(), null);
});

test('process: zero fraction uploads a zero-value conversion', async () => {
  const { reporter, uploads } = setup();
  assert.equal(await reporter.process(payload({ attribution_fraction: 0 })), true);
  assert.equal(uploads[0].args[3], 0);
});

test('process: a "0" value snapshot falls back to the current conversion_value', async () => {
  const { reporter, uploads } = setup({ ...CONFIGURED_SETTINGS, conversion_value: '1000' });
  assert.equal(await reporter.process(payload({ conversion_value: '0', attribution_fraction: 0.5 })), true);
  assert.equal(uploads[0].args[3], 500);
});

test('process: "0" in both snapshot and settings uploads a zero value', async () => {
  const { reporter, uploads } = setup({ ...CONFIGURED_SETTINGS, conversion_value: '0' });
  assert.equal(await reporter.process(payload({ conversion_value: '0', attribution_fraction: 0.5 })), true);
  assert.equal(uploads[0].args[3], 0);
});

test('process: payload values win, current settings fill the gaps', async () => {
  const { reporter, uploads } = setup({ ...CONFIGURED_SETTINGS, login_customer_id: '4445556666' });
  await reporter.process(
    payload({
      customer_id: '',
      conversion_value: '',
      currency_code: 'EUR',
      developer_token: 'snapshot-dev-token',
      login_customer_id: '',
      attribution_fraction: 0.5,
    })
  );
  const { creds, args } = uploads[0];
  assert.equal(creds.customerId, '1234567890');
  assert.equal(creds.developerToken, 'snapshot-dev-token');
  assert.equal(creds.loginCustomerId, '4445556666');
  assert.equal(args[3], 500);
  assert.equal(args[4], 'EUR');
});

test('process: current conversion_action_id wins over the snapshot', async () => {
  const changed = setup({ ...CONFIGURED_SETTINGS, conversion_action_id: '999' });
  await changed.reporter.process(payload({ conversion_action_id: '555' }));
  assert.equal(changed.uploads[0].args[1], 'customers/1234567890/conversionActions/999');

  const cleared = setup({ ...CONFIGURED_SETTINGS, conversion_action_id: '' });
  await cleared.reporter.process(payload({ conversion_action_id: '555' }));
  assert.equal(cleared.uploads[0].args[1], 'customers/1234567890/conversionActions/555');
});

test('process: missing credentials after merge sets "missing" without any upload', async () => {
  for (const field of ['customer_id', 'developer_token', 'client_id', 'client_secret', 'refresh_token'] as const) {
    const settings: Partial<GoogleAdsSettings> = { ...CONFIGURED_SETTINGS };
    settings[field] = '';
    const p = payload();
    p[field] = '';
    const { reporter, flag, uploads } = setup(settings);
    assert.equal(await reporter.process(p), false, field);
    assert.equal(uploads.length, 0, field);
    assert.equal(await flag.get(), 'missing', field);
  }

  const noAction = setup({ ...CONFIGURED_SETTINGS, conversion_action_id: '' });
  assert.equal(await noAction.reporter.process(payload({ conversion_action_id: '' })), false);
  assert.equal(await noAction.flag.get(), 'missing');
});

test('process: credential failure sets "token_refresh_failed"', async () => {
  const { reporter, flag } = setup(CONFIGURED_SETTINGS, {
    success: false,
    error: 'Token has been expired or revoked.',
    credentialError: true,
  });
  assert.equal(await reporter.process(payload()), false);
  assert.equal(await flag.get(), 'token_refresh_failed');
});

test('process: other failures leave the flag alone', async () => {
  const { reporter, flag } = setup(CONFIGURED_SETTINGS, {
    success: false,
    error: 'HTTP 500: boom',
    credentialError: false,
  });
  assert.equal(await reporter.process(payload()), false);
  assert.equal(await flag.get(), null);

  await flag.set('missing');
  assert.equal(await reporter.process(payload()), false);
  assert.equal(await flag.get(), 'missing');
});

test('process: payload is not mutated', async () => {
  const { reporter } = setup();
  const p = payload({ customer_id: '' });
  const before = JSON.stringify(p);
  await reporter.process(p);
  assert.equal(JSON.stringify(p), before);
});

test('process: storage failures reject', async () => {
  const failing: SettingsRepository = {
    getAll: async () => {
      throw new StorageError('Failed to read settings: timeout', 'settings.read');
    },
    get: async () => '',
    update: async () => {
      throw new StorageError('Failed to write settings: timeout', 'settings.write');
    },
    isConfigured: async () => false,
  };
  const { reporter } = setup(CONFIGURED_SETTINGS, undefined, { settings: failing });
  await assert.rejects(() => reporter.process(payload()), StorageError);
});

test('process: end to end through the real client', async () => {
  const { reporter } = setup(CONFIGURED_SETTINGS, undefined, { createClient: undefined });
  const { calls, restore } = stubFetch((call) => {
    if (call.url === TOKEN_URL) return tokenOk();
    if (call.url === `${API_BASE}:uploadClickConversions`) return json({ results: [{}] });
    return new Response('unexpected', { status: 404 });
  });
  try {
    assert.equal(await reporter.process(payload({ attribution_fraction: 0.25 })), true);
    const body = JSON.parse(calls[1].body);
    assert.equal(body.conversions[0].conversionValue, 250);
    assert.equal(body.conversions[0].conversionAction, 'customers/1234567890/conversionActions/555');
  } finally {
    restore();
  }
});

test('resetFailedJobs: resets this provider and schedules an immediate run', async () => {
  const { reporter, resets, triggers } = setup();
  assert.equal(await reporter.resetFailedJobs(), 3);
  assert.deepEqual(resets, ['google_ads']);
  assert.deepEqual(triggers, [['google_ads', 'credentials_restored']]);
});

test('register: adds google_ads and keeps other entries', () => {
  const { reporter } = setup();
  const other: ConversionReporter = {
    providerKey: 'other',
    enqueue: async () => [],
    process: async () => true,
  };
  const registry = reporter.register({ other });
  assert.deepEqual(Object.keys(registry).sort(), ['google_ads', 'other']);
  assert.equal(registry.google_ads, reporter);
  assert.equal(registry.other, other);
});
