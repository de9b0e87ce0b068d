/**
 * @stream-session/core
 *
 * Runtime implementations:
 *   - StreamProcessor  — per-event verdicts and the tool-call state machine
 *   - LoopGuard        — doom-loop detection over recent tool calls
 *   - RetryController  — bounded retries with exponential backoff
 *   - Resource ledger  — token estimates, pricing, usage tracking, overflow
 *   - SessionRunner    — wires the processor to transport, tools and snapshots
 */

// Stream processing
export { StreamProcessor, isTerminalToolState } from './stream/stream-processor.js';
export type { StreamProcessorOptions } from './stream/stream-processor.js';

// Loop guard
export { LoopGuard } from './loop-guard/loop-guard.js';

// Retry
export { RetryController } from './retry/retry-controller.js';
export type { RetryControllerOptions } from './retry/retry-controller.js';

// Resource ledger
export { TokenEstimator } from './tokens/token-estimator.js';
export type { TokenEstimatorOptions } from './tokens/token-estimator.js';
export { TokenUsageTracker, limitStatusFor, costFor } from './tokens/usage-tracker.js';
export { isOverflow } from './tokens/overflow.js';
export { MapTokenizerCache, createTiktokenTokenizer, getSharedTokenizerCache } from './tokens/tokenizer-cache.js';
export {
  MODEL_PRICING,
  DEFAULT_MODEL_PRICING,
  DEFAULT_ENCODING,
  getModelPricing,
  isKnownModel,
  encodingForModel,
  resolvePricingKey,
} from './tokens/pricing.js';
export type { TokenizerEncoding } from './tokens/pricing.js';

// Session runner
export { SessionRunner } from './runner/session-runner.js';
export type { SessionRunnerOptions, SessionOutcome, SessionDelta } from './runner/session-runner.js';
export { createSessionRunner } from './factory.js';
export type { CreateSessionRunnerOptions } from './factory.js';

// Ambient
export { loadConfig, CONFIG_ENV_VARS } from './config.js';
export { createLogger, noopLogger, WinstonLoggerAdapter } from './logging/logger.js';
export type { LoggerOptions } from './logging/logger.js';
export { SessionCoreError, ConfigError, LedgerError } from './errors.js';
export type { SessionCoreErrorCode } from './errors.js';
export { LOOP_GUARD, RETRY, TOKEN_LIMITS, OVERFLOW } from './constants.js';
