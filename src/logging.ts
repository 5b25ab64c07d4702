/**
 * Structured JSON Logging
 *
 * Factory for pino-based structured logger.
 * Supports JSON and pretty output via EXPENSE_LOG_FORMAT env var.
 */

import pino from 'pino';

export type LogFormat = 'json' | 'pretty';
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export interface LoggerOptions {
  format?: LogFormat;
  level?: LogLevel;
  name?: string;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function formatFromEnv(): LogFormat | undefined {
  const value = process.env['EXPENSE_LOG_FORMAT'];
  return value === 'json' || value === 'pretty' ? value : undefined;
}

function levelFromEnv(): LogLevel | undefined {
  const value = process.env['EXPENSE_LOG_LEVEL'];
  return isLogLevel(value) ? value : undefined;
}

/**
 * Create a pino logger instance.
 *
 * Reads from env:
 *   EXPENSE_LOG_FORMAT = json | pretty (default: pretty)
 *   EXPENSE_LOG_LEVEL  = trace | debug | info | warn | error | fatal | silent (default: info)
 */
export function createLogger(options?: LoggerOptions): pino.Logger {
  const format = options?.format ?? formatFromEnv() ?? 'pretty';
  const level = options?.level ?? levelFromEnv() ?? 'info';

  const pinoOptions: pino.LoggerOptions = {
    level,
    name: options?.name ?? 'expense-workflow',
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  };

  if (format === 'pretty') {
    return pino({
      ...pinoOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return pino(pinoOptions);
}

/** Singleton logger for the application */
let _logger: pino.Logger | undefined;

export function getLogger(): pino.Logger {
  if (!_logger) {
    _logger = createLogger();
  }
  return _logger;
}

/** Replace the global logger (useful for testing) */
export function setLogger(logger: pino.Logger): void {
  _logger = logger;
}

/** Create a child logger with additional bindings */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return getLogger().child(bindings);
}
