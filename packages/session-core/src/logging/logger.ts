import winston from 'winston';
import type { ILogger, LogLevel, LogMeta } from '@stream-session/contracts';

export interface LoggerOptions {
  level?: LogLevel;
  /** Attached to every entry, e.g. `{ component: 'stream-processor' }` */
  defaultMeta?: LogMeta;
  /** Defaults to a single Console transport writing to stderr */
  transports?: winston.LoggerOptions['transports'];
}

/**
 * Winston-based ILogger adapter.
 */
export class WinstonLoggerAdapter implements ILogger {
  constructor(private readonly logger: winston.Logger) {}

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: LogMeta): void {
    this.logger.error(message, {
      ...meta,
      ...(error ? { error: { name: error.name, message: error.message, stack: error.stack } } : {}),
    });
  }

  /**
   * Set the logging level dynamically
   */
  setLevel(level: LogLevel): void {
    this.logger.silent = level === 'silent';
    if (level !== 'silent') {
      this.logger.level = level;
    }
  }

  getLevel(): LogLevel {
    if (this.logger.silent) {
      return 'silent';
    }
    const level = this.logger.level;
    return level === 'error' || level === 'info' || level === 'debug' ? level : 'warn';
  }

  /**
   * Derive a logger that stamps `meta` on every entry.
   */
  child(meta: LogMeta): WinstonLoggerAdapter {
    return new WinstonLoggerAdapter(this.logger.child(meta));
  }
}

/**
 * Structured JSON with timestamps. Every level goes to stderr so stdout stays
 * free for whatever the host renders.
 */
export function createLogger(options: LoggerOptions = {}): WinstonLoggerAdapter {
  const level = options.level ?? 'warn';
  const logger = winston.createLogger({
    level: level === 'silent' ? 'error' : level,
    silent: level === 'silent',
    defaultMeta: options.defaultMeta,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json(),
    ),
    transports: options.transports ?? [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      }),
    ],
  });
  return new WinstonLoggerAdapter(logger);
}

/**
 * Logger that drops everything. Used when the host wires no logger.
 */
export const noopLogger: ILogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
