/**
 * Minimal leveled logger.
 *
 * Goals:
 * - No direct console.* usage in library code paths (centralize here)
 * - Structured JSON lines, one per event
 * - Debug disabled by default (env toggle)
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown> & {
  component?: string;
  dataset_version?: string;
  entries?: number;
};

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function getMinLevel(): LogLevel {
  const env = (process.env.LOG_LEVEL || '').toLowerCase();
  if (env === 'debug' || env === 'info' || env === 'warn' || env === 'error') return env;
  return 'info';
}

/**
 * Check if debug logging is enabled.
 * Debug logs are shown when LOG_LEVEL=debug or ATTRIBUTION_DEBUG is 1/true.
 */
export function isDebugEnabled(): boolean {
  const debugEnv = process.env.ATTRIBUTION_DEBUG === '1' || process.env.ATTRIBUTION_DEBUG === 'true';
  return debugEnv || getMinLevel() === 'debug';
}

function shouldLog(level: LogLevel): boolean {
  if (level === 'debug') return isDebugEnabled();
  return LEVELS[level] >= LEVELS[getMinLevel()];
}

function writeLine(level: LogLevel, msg: string, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const ts = new Date().toISOString();
  const line = JSON.stringify({ level, msg, ts, ...(context || {}) });
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

/** Debug-level log. Only when ATTRIBUTION_DEBUG=1 or LOG_LEVEL=debug. */
export function logDebug(msg: string, context?: LogContext): void {
  logger.debug(msg, context);
}

/** Warn-level log. */
export function logWarn(msg: string, context?: LogContext): void {
  logger.warn(msg, context);
}
