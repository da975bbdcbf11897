/**
 * Diagnostic log file: toggle, format, masking and size cap.
 */
import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, readFile, readdir, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { DiagnosticLogger } from '@/lib/diagnostics/diagnostic-logger';
import { InMemorySettingsRepository } from '@/lib/settings/repository';

const NOW = new Date('2026-03-01T12:30:00Z');

async function withTempDir(fn: (dir: string) => Promise<void>): Promise<void> {
  const dir = await mkdtemp(path.join(tmpdir(), 'gads-log-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

function makeLogger(dir: string, enableLogging: string, timezone = 'UTC'): DiagnosticLogger {
  return new DiagnosticLogger(new InMemorySettingsRepository({ enable_logging: enableLogging }), {
    uploadsDir: dir,
    timezone,
    now: () => NOW,
  });
}

test('mask: reveals only the last four characters', () => {
  assert.equal(DiagnosticLogger.mask(''), '');
  assert.equal(DiagnosticLogger.mask('abc'), '***');
  assert.equal(DiagnosticLogger.mask('abcd'), '****');
  assert.equal(DiagnosticLogger.mask('abcdefgh'), '****efgh');
});

test('getPath: file lives in its own directory under the uploads root', () => {
  const logger = makeLogger('/srv/uploads', '1');
  assert.equal(logger.getPath(), path.join('/srv/uploads', 'gads-conversion-reporter', 'gads-conversion-reporter.log'));
});

test('disabled logging writes nothing', async () => {
  await withTempDir(async (dir) => {
    for (const value of ['', '0', 'false']) {
      const logger = makeLogger(dir, value);
      await logger.info('hello');
      assert.equal(logger.exists(), false, `enable_logging=${JSON.stringify(value)}`);
      assert.equal(await logger.getContents(), '');
    }
  });
});

test('enabled logging appends timestamped lines', async () => {
  await withTempDir(async (dir) => {
    const logger = makeLogger(dir, '1');
    await logger.info('hello');
    await logger.error('broken');
    assert.equal(
      await logger.getContents(),
      '[2026-03-01 12:30:00+00:00] INFO hello\n[2026-03-01 12:30:00+00:00] ERROR broken\n'
    );
  });
});

test('timestamp prefix uses the configured timezone', async () => {
  await withTempDir(async (dir) => {
    const logger = makeLogger(dir, '1', 'Europe/Stockholm');
    await logger.info('hello');
    assert.equal(await logger.getContents(), '[2026-03-01 13:30:00+01:00] INFO hello\n');
  });
});

test('toggle is read on every call', async () => {
  await withTempDir(async (dir) => {
    const settings = new InMemorySettingsRepository({ enable_logging: '1' });
    const logger = new DiagnosticLogger(settings, { uploadsDir: dir, now: () => NOW });
    await logger.info('first');
    await settings.update({ enable_logging: '' });
    await logger.info('second');
    assert.equal(await logger.getContents(), '[2026-03-01 12:30:00+00:00] INFO first\n');
  });
});

test('file over MAX_SIZE is trimmed to the tail at a line boundary', async () => {
  await withTempDir(async (dir) => {
    const logger = makeLogger(dir, '1');
    // 5200 lines of exactly 100 bytes = 520,000 bytes.
    const lines: string[] = [];
    for (let i = 0; i < 5200; i++) {
      lines.push(String(i).padStart(5, '0') + 'x'.repeat(94) + '\n');
    }
    await mkdir(path.dirname(logger.getPath()), { recursive: true });
    await writeFile(logger.getPath(), lines.join(''));

    await logger.info('after trim');

    const contents = await readFile(logger.getPath(), 'utf8');
    const out = contents.split('\n');
    // Tail starts exactly at line 2640; the first (possibly partial) line is dropped.
    assert.equal(out[0], lines[2641].slice(0, -1));
    assert.equal(out[out.length - 2], '[2026-03-01 12:30:00+00:00] INFO after trim');
    assert.equal(Buffer.byteLength(contents), 255_900 + '[2026-03-01 12:30:00+00:00] INFO after trim\n'.length);
    // Trim replaces the file by rename; no temporary file is left next to it.
    assert.deepEqual(await readdir(path.dirname(logger.getPath())), [DiagnosticLogger.FILE_NAME]);
  });
});

test('clear deletes the file and is a no-op when it is absent', async () => {
  await withTempDir(async (dir) => {
    const logger = makeLogger(dir, '1');
    await logger.clear();
    await logger.info('hello');
    assert.equal(logger.exists(), true);
    await logger.clear();
    assert.equal(logger.exists(), false);
  });
});

test('write failures never reject', async () => {
  await withTempDir(async (dir) => {
    // The uploads "root" is a regular file, so mkdir below it fails.
    const blocker = path.join(dir, 'not-a-dir');
    await writeFile(blocker, 'x');
    const logger = makeLogger(blocker, '1');
    await assert.doesNotReject(() => logger.info('hello'));
    assert.equal(logger.exists(), false);
  });
});

test('concurrent writes keep every line intact', async () => {
  await withTempDir(async (dir) => {
    const logger = makeLogger(dir, '1');
    await Promise.all(Array.from({ length: 20 }, (_, i) => logger.info(`line ${i}`)));
    const out = (await logger.getContents()).trimEnd().split('\n');
    assert.equal(out.length, 20);
    assert.deepEqual(
      out.map((l) => l.replace('[2026-03-01 12:30:00+00:00] INFO ', '')).sort(),
      Array.from({ length: 20 }, (_, i) => `line ${i}`).sort()
    );
  });
});
