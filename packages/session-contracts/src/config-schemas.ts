/**
 * Zod schemas for session core configuration.
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);

export const SessionCoreConfigSchema = z.object({
  /** How many times a failed stream attempt may be retried */
  maxRetries: z.coerce.number().int().min(0).default(3),
  /** Model used for token estimates when the caller names none */
  defaultModel: z.string().min(1).default('gpt-4o'),
  logLevel: LogLevelSchema.default('warn'),
});

export type SessionCoreConfig = z.infer<typeof SessionCoreConfigSchema>;
export type SessionCoreConfigInput = z.input<typeof SessionCoreConfigSchema>;
