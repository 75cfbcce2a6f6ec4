export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

let overrideLevel: LogLevel | null = null;

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function configureLogger(options: { level: LogLevel | null }): void {
  overrideLevel = options.level;
}

export function getLogLevel(): LogLevel {
  if (overrideLevel) return overrideLevel;
  const fromEnv = process.env.ADVISOR_LOG_LEVEL?.trim().toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
  if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(getLogLevel())) return;
  // stdout carries command output (and --json results); logs stay on stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(`[advisor] ${message}`, context);
    return;
  }
  logger(`[advisor] ${message}`);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
