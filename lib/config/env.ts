/**
 * Runtime configuration from the environment.
 *
 * Parsed lazily and cached; tests call _resetEnvForTests() after changing process.env.
 * Credentials for Supabase/Upstash/QStash are read by their own client modules.
 */

import { z } from 'zod';
import { normalizeTimezone } from '@/lib/utils/timezone';

const TABLE_NAME = /^[a-z_][a-z0-9_]*$/;

export const RuntimeEnvSchema = z.object({
  GADS_UPLOADS_DIR: z.string().trim().min(1).optional().default('./uploads'),
  GADS_TIMEZONE: z.string().trim().optional().default('UTC'),
  GADS_SETTINGS_TABLE: z
    .string()
    .trim()
    .regex(TABLE_NAME, 'GADS_SETTINGS_TABLE must be a plain table name')
    .optional()
    .default('gads_settings'),
  GADS_QUEUE_TABLE: z
    .string()
    .trim()
    .regex(TABLE_NAME, 'GADS_QUEUE_TABLE must be a plain table name')
    .optional()
    .default('conversion_queue'),
  QUEUE_PROCESS_URL: z.string().trim().url().optional(),
});

export type RuntimeEnv = {
  uploadsDir: string;
  timezone: string;
  settingsTable: string;
  queueTable: string;
  queueProcessUrl: string | null;
};

let cached: RuntimeEnv | null = null;

function blankToUndefined(v: string | undefined): string | undefined {
  return v === undefined || v.trim() === '' ? undefined : v;
}

/**
 * Returns validated runtime configuration.
 * @throws Error listing every invalid variable (fail-fast on boot).
 */
export function getRuntimeEnv(): RuntimeEnv {
  if (cached) return cached;

  const parsed = RuntimeEnvSchema.safeParse({
    GADS_UPLOADS_DIR: blankToUndefined(process.env.GADS_UPLOADS_DIR),
    GADS_TIMEZONE: blankToUndefined(process.env.GADS_TIMEZONE),
    GADS_SETTINGS_TABLE: blankToUndefined(process.env.GADS_SETTINGS_TABLE),
    GADS_QUEUE_TABLE: blankToUndefined(process.env.GADS_QUEUE_TABLE),
    QUEUE_PROCESS_URL: blankToUndefined(process.env.QUEUE_PROCESS_URL),
  });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid runtime configuration: ${detail}`);
  }

  const env = parsed.data;
  cached = {
    uploadsDir: env.GADS_UPLOADS_DIR,
    timezone: normalizeTimezone(env.GADS_TIMEZONE, 'UTC'),
    settingsTable: env.GADS_SETTINGS_TABLE,
    queueTable: env.GADS_QUEUE_TABLE,
    queueProcessUrl: env.QUEUE_PROCESS_URL ?? null,
  };
  return cached;
}

export function _resetEnvForTests(): void {
  cached = null;
}
