/**
 * Session core configuration loading.
 *
 * Precedence: explicit overrides > environment > schema defaults.
 */

import {
  SessionCoreConfigSchema,
  type SessionCoreConfig,
  type SessionCoreConfigInput,
} from '@stream-session/contracts';
import { ConfigError } from './errors.js';

export const CONFIG_ENV_VARS = {
  maxRetries: 'STREAM_SESSION_MAX_RETRIES',
  defaultModel: 'STREAM_SESSION_DEFAULT_MODEL',
  logLevel: 'STREAM_SESSION_LOG_LEVEL',
} as const;

type Env = Record<string, string | undefined>;

function readEnv(env: Env): Record<string, string> {
  const raw: Record<string, string> = {};
  for (const [key, envVar] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[envVar]?.trim();
    if (value) {
      raw[key] = value;
    }
  }
  return raw;
}

/**
 * Resolve configuration. Throws ConfigError when a value fails validation.
 */
export function loadConfig(
  overrides: SessionCoreConfigInput = {},
  env: Env = process.env,
): SessionCoreConfig {
  // An override left undefined falls through to the environment
  const explicit = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const result = SessionCoreConfigSchema.safeParse({ ...readEnv(env), ...explicit });
  if (!result.success) {
    throw new ConfigError(result.error);
  }
  return result.data;
}
