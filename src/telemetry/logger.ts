type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let explicitLevel: LogLevel | null = null;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

/** Pin the threshold for this process; `null` falls back to CONCORD_LOG_LEVEL. */
export function setLogLevel(level: LogLevel | null): void {
  explicitLevel = level;
}

export function getLogLevel(): LogLevel {
  if (explicitLevel) return explicitLevel;
  const fromEnv = process.env.CONCORD_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
  if (LEVEL_RANK[level] < LEVEL_RANK[getLogLevel()]) return;
  // stdout is reserved for `concord ... --json` output; every level goes to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(`[concord] ${message}`, context);
    return;
  }
  logger(`[concord] ${message}`);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
