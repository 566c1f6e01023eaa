import winston from 'winston';
import type { Logger } from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerOptions {
  /** Minimum level to emit (default: LOG_LEVEL env or 'info') */
  level?: LogLevel;
  /** Suppress all output, used by tests */
  silent?: boolean;
}

const LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function levelFromEnv(): LogLevel {
  const raw = process.env['LOG_LEVEL']?.toLowerCase();
  return LEVELS.find((l) => l === raw) ?? 'info';
}

/**
 * Create a structured JSON logger for one service.
 *
 * Every line carries `service`, `level`, `timestamp` and any metadata passed
 * to the call, e.g. `logger.warn('geo lookup failed', { ip, reason })`.
 */
export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: options.level ?? levelFromEnv(),
    silent: options.silent ?? false,
    defaultMeta: { service },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    transports: [new winston.transports.Console()],
  });
}

export type { Logger };
