/**
 * TokenEstimator — counts tokens and prices text for a model.
 *
 * The tokenizer cache is injected so tests (and hosts running many sessions)
 * control its lifecycle; without one, the process-wide shared cache is used.
 */

import type { ILogger, TokenEstimate, TokenLimitStatus } from '@stream-session/contracts';
import type { Tokenizer, TokenizerCache } from '@stream-session/sdk';
import { noopLogger } from '../logging/logger.js';
import { encodingForModel, getModelPricing, isKnownModel, type TokenizerEncoding } from './pricing.js';
import { createTiktokenTokenizer, getSharedTokenizerCache } from './tokenizer-cache.js';
import { costFor, limitStatusFor, TokenUsageTracker } from './usage-tracker.js';

export interface TokenEstimatorOptions {
  cache?: TokenizerCache;
  /** Model assumed when estimateTokens() is called without one */
  defaultModel?: string;
  /** Builds the tokenizer for an encoding on a cache miss */
  tokenizerFactory?: (encoding: TokenizerEncoding) => Tokenizer;
  logger?: ILogger;
}

export class TokenEstimator {
  private readonly cache: TokenizerCache;
  private readonly defaultModel: string;
  private readonly tokenizerFactory: (encoding: TokenizerEncoding) => Tokenizer;
  private readonly logger: ILogger;

  constructor(options: TokenEstimatorOptions = {}) {
    this.cache = options.cache ?? getSharedTokenizerCache();
    this.defaultModel = options.defaultModel ?? 'gpt-4o';
    this.tokenizerFactory = options.tokenizerFactory ?? createTiktokenTokenizer;
    this.logger = options.logger ?? noopLogger;
  }

  estimateTokens(text: string, model: string = this.defaultModel): TokenEstimate {
    const tokens = this.tokenizerFor(model).count(text);
    return {
      tokens,
      model,
      characters: text.length,
      estimatedCost: costFor(tokens, getModelPricing(model).inputPer1M),
    };
  }

  createUsageTracker(model: string): TokenUsageTracker {
    if (!isKnownModel(model)) {
      this.logger.debug('No pricing for model, using defaults', { model });
    }
    return new TokenUsageTracker(model, getModelPricing(model));
  }

  /**
   * Limit status for a token total against the model's context window.
   */
  checkTokenLimits(totalTokens: number, model: string): TokenLimitStatus {
    const { maxTokens } = getModelPricing(model);
    return limitStatusFor(maxTokens > 0 ? (totalTokens / maxTokens) * 100 : 0);
  }

  private tokenizerFor(model: string): Tokenizer {
    const encoding = encodingForModel(model);
    return this.cache.getOrCreate(encoding, () => {
      this.logger.debug('Building tokenizer', { encoding, model });
      return this.tokenizerFactory(encoding);
    });
  }
}
