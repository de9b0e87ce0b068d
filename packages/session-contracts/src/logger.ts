/**
 * Logger contract. Components receive an ILogger through their constructor;
 * the concrete adapter lives in core.
 */

export type LogMeta = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, error?: Error, meta?: LogMeta): void;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';
