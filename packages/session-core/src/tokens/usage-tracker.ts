/**
 * TokenUsageTracker — per-session token and cost ledger.
 *
 * Invariants:
 * - totalTokens === promptTokens + completionTokens after every record call
 * - estimatedCost never decreases except on reset()
 *
 * Reasoning tokens are billed at the output rate and count as completion.
 * Cache reads/writes are billed at their own rates (free when the model has
 * none) and tracked in their own counters only.
 */

import type { ModelPricing, TokenLimitStatus, TokenUsage } from '@stream-session/contracts';
import { TOKEN_LIMITS, TOKENS_PER_MILLION } from '../constants.js';
import { LedgerError } from '../errors.js';

export function costFor(tokens: number, ratePer1M: number | undefined): number {
  return ratePer1M ? (tokens / TOKENS_PER_MILLION) * ratePer1M : 0;
}

/**
 * Map a usage percentage to a limit status.
 */
export function limitStatusFor(percentage: number): TokenLimitStatus {
  if (percentage >= TOKEN_LIMITS.criticalPercent) {
    return 'critical';
  }
  if (percentage >= TOKEN_LIMITS.warningPercent) {
    return 'warning';
  }
  return 'normal';
}

export class TokenUsageTracker {
  private _totalTokens = 0;
  private _promptTokens = 0;
  private _completionTokens = 0;
  private _cacheReadTokens = 0;
  private _cacheWriteTokens = 0;
  private _reasoningTokens = 0;
  private _estimatedCost = 0;

  constructor(
    readonly model: string,
    private readonly pricing: Readonly<ModelPricing>,
    readonly tokenLimit: number = pricing.maxTokens,
  ) {}

  get totalTokens(): number {
    return this._totalTokens;
  }

  get promptTokens(): number {
    return this._promptTokens;
  }

  get completionTokens(): number {
    return this._completionTokens;
  }

  get cacheReadTokens(): number {
    return this._cacheReadTokens;
  }

  get cacheWriteTokens(): number {
    return this._cacheWriteTokens;
  }

  get reasoningTokens(): number {
    return this._reasoningTokens;
  }

  get estimatedCost(): number {
    return this._estimatedCost;
  }

  recordPrompt(tokens: number): void {
    assertTokenCount('prompt', tokens);
    this._promptTokens += tokens;
    this._totalTokens += tokens;
    this._estimatedCost += costFor(tokens, this.pricing.inputPer1M);
  }

  recordCompletion(tokens: number): void {
    assertTokenCount('completion', tokens);
    this._completionTokens += tokens;
    this._totalTokens += tokens;
    this._estimatedCost += costFor(tokens, this.pricing.outputPer1M);
  }

  recordReasoning(tokens: number): void {
    assertTokenCount('reasoning', tokens);
    this._reasoningTokens += tokens;
    this._completionTokens += tokens;
    this._totalTokens += tokens;
    this._estimatedCost += costFor(tokens, this.pricing.outputPer1M);
  }

  recordCacheRead(tokens: number): void {
    assertTokenCount('cache read', tokens);
    this._cacheReadTokens += tokens;
    this._estimatedCost += costFor(tokens, this.pricing.cacheReadPer1M);
  }

  recordCacheWrite(tokens: number): void {
    assertTokenCount('cache write', tokens);
    this._cacheWriteTokens += tokens;
    this._estimatedCost += costFor(tokens, this.pricing.cacheWritePer1M);
  }

  /**
   * Share of the token limit consumed, 0–100+. A zero limit reports 0.
   */
  usagePercentage(): number {
    if (this.tokenLimit <= 0) {
      return 0;
    }
    return (this._totalTokens / this.tokenLimit) * 100;
  }

  limitStatus(): TokenLimitStatus {
    return limitStatusFor(this.usagePercentage());
  }

  snapshot(): TokenUsage {
    return {
      model: this.model,
      totalTokens: this._totalTokens,
      promptTokens: this._promptTokens,
      completionTokens: this._completionTokens,
      cacheReadTokens: this._cacheReadTokens,
      cacheWriteTokens: this._cacheWriteTokens,
      reasoningTokens: this._reasoningTokens,
      estimatedCost: this._estimatedCost,
      tokenLimit: this.tokenLimit,
    };
  }

  /**
   * Zero every counter. Only ever called explicitly by the owner.
   */
  reset(): void {
    this._totalTokens = 0;
    this._promptTokens = 0;
    this._completionTokens = 0;
    this._cacheReadTokens = 0;
    this._cacheWriteTokens = 0;
    this._reasoningTokens = 0;
    this._estimatedCost = 0;
  }
}

export function assertTokenCount(category: string, tokens: number): void {
  if (!Number.isInteger(tokens) || tokens < 0) {
    throw new LedgerError(category, tokens);
  }
}
