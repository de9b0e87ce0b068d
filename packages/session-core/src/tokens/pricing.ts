/**
 * Static model pricing and tokenizer selection.
 *
 * Rates are USD per one million tokens, as published by each provider.
 * Lookup is by exact name first, then by longest known prefix, so dated
 * snapshots ("gpt-4o-2024-08-06") resolve to their family entry.
 */

import type { ModelPricing } from '@stream-session/contracts';

export type TokenizerEncoding = 'cl100k_base' | 'o200k_base';

export const DEFAULT_ENCODING: TokenizerEncoding = 'cl100k_base';

/** Used for any model not in MODEL_PRICING */
export const DEFAULT_MODEL_PRICING: Readonly<ModelPricing> = Object.freeze({
  inputPer1M: 3,
  outputPer1M: 15,
  maxTokens: 128_000,
});

export const MODEL_PRICING: Readonly<Record<string, Readonly<ModelPricing>>> = Object.freeze({
  // OpenAI
  'gpt-4o': { inputPer1M: 2.5, outputPer1M: 10, cacheReadPer1M: 1.25, maxTokens: 128_000, maxOutputTokens: 16_384 },
  'gpt-4o-mini': { inputPer1M: 0.15, outputPer1M: 0.6, cacheReadPer1M: 0.075, maxTokens: 128_000, maxOutputTokens: 16_384 },
  'gpt-4-turbo': { inputPer1M: 10, outputPer1M: 30, maxTokens: 128_000, maxOutputTokens: 4_096 },
  'gpt-4': { inputPer1M: 30, outputPer1M: 60, maxTokens: 8_192, maxOutputTokens: 8_192 },
  'gpt-3.5-turbo': { inputPer1M: 0.5, outputPer1M: 1.5, maxTokens: 16_385, maxOutputTokens: 4_096 },
  'o1': { inputPer1M: 15, outputPer1M: 60, cacheReadPer1M: 7.5, maxTokens: 200_000, maxOutputTokens: 100_000 },
  'o3-mini': { inputPer1M: 1.1, outputPer1M: 4.4, cacheReadPer1M: 0.55, maxTokens: 200_000, maxOutputTokens: 100_000 },

  // Anthropic
  'claude-3-5-sonnet': { inputPer1M: 3, outputPer1M: 15, cacheReadPer1M: 0.3, cacheWritePer1M: 3.75, maxTokens: 200_000, maxOutputTokens: 8_192 },
  'claude-3-5-haiku': { inputPer1M: 0.8, outputPer1M: 4, cacheReadPer1M: 0.08, cacheWritePer1M: 1, maxTokens: 200_000, maxOutputTokens: 8_192 },
  'claude-3-opus': { inputPer1M: 15, outputPer1M: 75, cacheReadPer1M: 1.5, cacheWritePer1M: 18.75, maxTokens: 200_000, maxOutputTokens: 4_096 },
  'claude-sonnet-4': { inputPer1M: 3, outputPer1M: 15, cacheReadPer1M: 0.3, cacheWritePer1M: 3.75, maxTokens: 200_000, maxOutputTokens: 64_000 },
  'claude-opus-4': { inputPer1M: 15, outputPer1M: 75, cacheReadPer1M: 1.5, cacheWritePer1M: 18.75, maxTokens: 200_000, maxOutputTokens: 32_000 },

  // Google
  'gemini-1.5-pro': { inputPer1M: 1.25, outputPer1M: 5, maxTokens: 2_000_000, maxOutputTokens: 8_192 },
  'gemini-1.5-flash': { inputPer1M: 0.075, outputPer1M: 0.3, maxTokens: 1_000_000, maxOutputTokens: 8_192 },
});

const ENCODING_PREFIXES: ReadonlyArray<[prefix: string, encoding: TokenizerEncoding]> = [
  ['gpt-4o', 'o200k_base'],
  ['o1', 'o200k_base'],
  ['o3', 'o200k_base'],
  ['gpt-4', 'cl100k_base'],
  ['gpt-3.5', 'cl100k_base'],
];

/**
 * Drop a provider qualifier: "anthropic/claude-sonnet-4" → "claude-sonnet-4".
 */
function bareModelName(model: string): string {
  const slash = model.lastIndexOf('/');
  return (slash === -1 ? model : model.slice(slash + 1)).toLowerCase();
}

/**
 * Pricing key for a model, or undefined when the model is unrecognized.
 */
export function resolvePricingKey(model: string): string | undefined {
  const name = bareModelName(model);
  if (Object.hasOwn(MODEL_PRICING, name)) {
    return name;
  }

  let best: string | undefined;
  for (const key of Object.keys(MODEL_PRICING)) {
    if (name.startsWith(`${key}-`) && (!best || key.length > best.length)) {
      best = key;
    }
  }
  return best;
}

export function isKnownModel(model: string): boolean {
  return resolvePricingKey(model) !== undefined;
}

export function getModelPricing(model: string): Readonly<ModelPricing> {
  const key = resolvePricingKey(model);
  return (key && MODEL_PRICING[key]) || DEFAULT_MODEL_PRICING;
}

/**
 * Tokenizer encoding for a model. Models without a published tokenizer
 * (Anthropic, Google) are approximated with the default encoding.
 */
export function encodingForModel(model: string): TokenizerEncoding {
  const name = bareModelName(model);
  for (const [prefix, encoding] of ENCODING_PREFIXES) {
    if (name === prefix || name.startsWith(`${prefix}-`)) {
      return encoding;
    }
  }
  return DEFAULT_ENCODING;
}
