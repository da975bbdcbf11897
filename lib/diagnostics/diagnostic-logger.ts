/**
 * Diagnostic log for Google Ads API communication.
 *
 * Operator-facing file under the uploads root, enabled by the `enable_logging`
 * setting (checked on every call). Size-capped: once the file passes MAX_SIZE
 * the head is dropped, keeping about TRIM_KEEP bytes cut at a line boundary.
 * Secrets must go through mask() before they are logged.
 */

import { appendFile, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import path from 'node:path';
import { logWarn } from '@/lib/logging/logger';
import { errorMessage } from '@/lib/storage/errors';
import type { SettingsRepository } from '@/lib/settings/repository';
import { isLoggingEnabled } from '@/lib/settings/types';
import { formatGoogleAdsTime } from '@/lib/utils/format-google-ads-time';

export type DiagnosticLevel = 'INFO' | 'ERROR';

export interface DiagnosticLoggerOptions {
  /** Uploads root; the log lives in <uploadsDir>/<DIR_NAME>/<FILE_NAME>. */
  uploadsDir: string;
  /** IANA timezone for the timestamp prefix. Default: UTC. */
  timezone?: string;
  now?: () => Date;
}

// Per-path write chain: trim + append for one line complete before the next starts.
const writeChains = new Map<string, Promise<void>>();

export class DiagnosticLogger {
  static readonly DIR_NAME = 'gads-conversion-reporter';
  static readonly FILE_NAME = 'gads-conversion-reporter.log';
  static readonly MAX_SIZE = 512_000;
  static readonly TRIM_KEEP = 256_000;

  private readonly uploadsDir: string;
  private readonly timezone: string;
  private readonly now: () => Date;

  constructor(
    private readonly settings: SettingsRepository,
    options: DiagnosticLoggerOptions
  ) {
    this.uploadsDir = options.uploadsDir;
    this.timezone = options.timezone ?? 'UTC';
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Reveals only the last 4 characters, e.g. "**********1234".
   * Values of 4 characters or fewer are fully masked; '' stays ''.
   */
  static mask(value: string): string {
    const visible = 4;
    if (value.length === 0) return '';
    if (value.length <= visible) return '*'.repeat(value.length);
    return '*'.repeat(value.length - visible) + value.slice(-visible);
  }

  info(message: string): Promise<void> {
    return this.write('INFO', message);
  }

  error(message: string): Promise<void> {
    return this.write('ERROR', message);
  }

  getPath(): string {
    return path.join(this.uploadsDir, DiagnosticLogger.DIR_NAME, DiagnosticLogger.FILE_NAME);
  }

  exists(): boolean {
    return existsSync(this.getPath());
  }

  /** Whole file, or '' when it does not exist. */
  async getContents(): Promise<string> {
    const file = this.getPath();
    await (writeChains.get(file) ?? Promise.resolve());
    if (!existsSync(file)) return '';
    return readFile(file, 'utf8');
  }

  /** Deletes the log file. No-op when it does not exist. */
  async clear(): Promise<void> {
    const file = this.getPath();
    await this.serialize(file, () => rm(file, { force: true }));
  }

  private async write(level: DiagnosticLevel, message: string): Promise<void> {
    try {
      if (!isLoggingEnabled(await this.settings.get('enable_logging'))) return;

      const file = this.getPath();
      // Format: [2026-02-26 14:30:00+01:00] INFO Message
      const line = `[${formatGoogleAdsTime(this.now(), this.timezone)}] ${level} ${message}\n`;

      await this.serialize(file, async () => {
        await mkdir(path.dirname(file), { recursive: true });
        if (existsSync(file) && (await stat(file)).size > DiagnosticLogger.MAX_SIZE) {
          await DiagnosticLogger.trim(file);
        }
        await appendFile(file, line, 'utf8');
      });
    } catch (err) {
      logWarn('DIAGNOSTIC_LOG_WRITE_FAILED', { error: errorMessage(err) });
    }
  }

  /**
   * Keep the last TRIM_KEEP bytes, then drop through the first newline so no partial line remains.
   * The tail is written beside the log and renamed over it.
   */
  private static async trim(file: string): Promise<void> {
    const contents = await readFile(file);
    let tail = contents.subarray(Math.max(0, contents.length - DiagnosticLogger.TRIM_KEEP));
    const firstNewline = tail.indexOf(0x0a);
    if (firstNewline !== -1) {
      tail = tail.subarray(firstNewline + 1);
    }
    const tmp = `${file}.${process.pid}.tmp`;
    try {
      await writeFile(tmp, tail);
      await rename(tmp, file);
    } catch (err) {
      await rm(tmp, { force: true });
      throw err;
    }
  }

  private serialize(file: string, task: () => Promise<void>): Promise<void> {
    const previous = writeChains.get(file) ?? Promise.resolve();
    const next = previous.then(task, task);
    const settled = next.catch(() => undefined);
    writeChains.set(file, settled);
    void settled.then(() => {
      if (writeChains.get(file) === settled) writeChains.delete(file);
    });
    return next;
  }
}
