/**
 * Minimal leveled logger for operational output.
 *
 * Structured JSON lines on stdout/stderr. The operator-facing diagnostic file
 * lives in lib/diagnostics/diagnostic-logger.ts; this one is for the host's log
 * pipeline.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown> & {
  request_id?: string;
  route?: string;
  reporter?: string;
  gclid?: string;
};

function getMinLevel(): LogLevel {
  const env = (process.env.LOG_LEVEL || '').toLowerCase();
  if (env === 'debug' || env === 'info' || env === 'warn' || env === 'error') return env;
  // Default: debug off in production
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function shouldLog(level: LogLevel): boolean {
  const debugEnv = process.env.GADS_DEBUG === '1' || process.env.GADS_DEBUG === 'true';
  const min = getMinLevel();
  if (level === 'debug' && !debugEnv && min !== 'debug') return false;
  return LEVELS[level] >= LEVELS[min];
}

function writeLine(level: LogLevel, msg: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const line = JSON.stringify({ level, msg, ts: new Date().toISOString(), ...(context || {}) });
  const out = level === 'error' ? process.stderr : process.stdout;
  out.write(line + '\n');
}

export const logger = {
  debug(msg: string, context?: LogContext) {
    writeLine('debug', msg, context);
  },
  info(msg: string, context?: LogContext) {
    writeLine('info', msg, context);
  },
  warn(msg: string, context?: LogContext) {
    writeLine('warn', msg, context);
  },
  error(msg: string, context?: LogContext) {
    writeLine('error', msg, context);
  },
};

/** Info-level log. */
export function logInfo(msg: string, context?: LogContext): void {
  logger.info(msg, context);
}

/** Error-level log. Always emitted. */
export function logError(msg: string, context?: LogContext): void {
  logger.error(msg, context);
}

/** Debug-level log. Only when GADS_DEBUG=1 or LOG_LEVEL=debug. */
export function logDebug(msg: string, context?: LogContext): void {
  logger.debug(msg, context);
}

/** Warn-level log. */
export function logWarn(msg: string, context?: LogContext): void {
  logger.warn(msg, context);
}
