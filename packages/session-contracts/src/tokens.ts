/**
 * Resource ledger contracts: token estimates, model pricing, usage snapshots.
 */

/**
 * Result of counting tokens in a piece of text. Stateless.
 */
export interface TokenEstimate {
  tokens: number;
  model: string;
  characters: number;
  /** USD, billed at the model's input rate */
  estimatedCost: number;
}

/**
 * Static per-model pricing. All rates are USD per one million tokens.
 */
export interface ModelPricing {
  inputPer1M: number;
  outputPer1M: number;
  cacheReadPer1M?: number;
  cacheWritePer1M?: number;
  /** Context window size */
  maxTokens: number;
  maxOutputTokens?: number;
}

/**
 * - 'normal'   — below 75% of the limit
 * - 'warning'  — 75% up to (not including) 90%
 * - 'critical' — 90% and above
 */
export type TokenLimitStatus = 'normal' | 'warning' | 'critical';

/**
 * Plain snapshot of a usage tracker.
 */
export interface TokenUsage {
  model: string;
  totalTokens: number;
  promptTokens: number;
  completionTokens: number;
  cacheReadTokens: number;
  cacheWriteTokens: number;
  reasoningTokens: number;
  estimatedCost: number;
  tokenLimit: number;
}

/**
 * Input/output counts recorded on a stream processor.
 */
export interface ProcessorTokenUsage {
  input: number;
  output: number;
}

/**
 * Arguments for the context overflow predicate.
 */
export interface OverflowInput {
  input: number;
  cacheRead: number;
  output: number;
  /** 0 means unknown, treated as unconstrained */
  contextLimit: number;
  modelOutputLimit?: number;
}
