/**
 * Errors thrown by the session core.
 *
 * Stream-level problems (bad tool input, wrong state, doom loops) are never
 * thrown; they come back as `{ type: 'error' }` verdicts. The classes below
 * cover programmer and configuration mistakes only.
 */

import type { ZodError } from 'zod';

export type SessionCoreErrorCode = 'CONFIG_INVALID' | 'LEDGER_INVALID_COUNT';

export class SessionCoreError extends Error {
  readonly code: SessionCoreErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: SessionCoreErrorCode, message: string, details?: Record<string, unknown>) {
    super(`${code}: ${message}`);
    this.name = 'SessionCoreError';
    this.code = code;
    this.details = details;
  }
}

export class ConfigError extends SessionCoreError {
  constructor(zodError: ZodError) {
    const issues = zodError.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    super('CONFIG_INVALID', `Invalid session core config — ${issues.join('; ')}`, { issues });
    this.name = 'ConfigError';
  }
}

export class LedgerError extends SessionCoreError {
  constructor(category: string, tokens: number) {
    super('LEDGER_INVALID_COUNT', `${category} token count must be a non-negative integer, got ${tokens}`, {
      category,
      tokens,
    });
    this.name = 'LedgerError';
  }
}
