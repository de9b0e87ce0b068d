import type { ILogger, SessionCoreConfig } from '@stream-session/contracts';
import { loadConfig } from './config.js';
import { createLogger } from './logging/logger.js';
import { SessionRunner, type SessionRunnerOptions } from './runner/session-runner.js';
import { TokenEstimator } from './tokens/token-estimator.js';

export type CreateSessionRunnerOptions = Omit<SessionRunnerOptions, 'maxRetries' | 'logger' | 'usageTracker'> & {
  /** Resolved from the environment when omitted */
  config?: SessionCoreConfig;
  logger?: ILogger;
  /** Model whose pricing seeds the usage tracker; defaults to config.defaultModel */
  model?: string;
  estimator?: TokenEstimator;
};

/**
 * Build a SessionRunner from configuration: retry budget, logger and a usage
 * tracker for the session's model.
 */
export function createSessionRunner(options: CreateSessionRunnerOptions): SessionRunner {
  const { config = loadConfig(), model, estimator, logger, ...runnerOptions } = options;
  const sessionLogger =
    logger ?? createLogger({ level: config.logLevel, defaultMeta: { sessionId: options.sessionId } });
  const tokens = estimator ?? new TokenEstimator({ defaultModel: config.defaultModel, logger: sessionLogger });

  return new SessionRunner({
    ...runnerOptions,
    maxRetries: config.maxRetries,
    logger: sessionLogger,
    usageTracker: tokens.createUsageTracker(model ?? config.defaultModel),
  });
}
