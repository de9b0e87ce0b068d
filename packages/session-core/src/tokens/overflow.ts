import type { OverflowInput } from '@stream-session/contracts';
import { OVERFLOW } from '../constants.js';

/**
 * Whether the conversation no longer fits once output space is reserved.
 *
 * Counts input + cache-read + output tokens; reasoning and cache-write tokens
 * are left out. Reserved output is the model's output limit, capped at
 * OVERFLOW.defaultMaxOutputTokens. A zero context limit means "unknown" and
 * never overflows.
 *
 * Advisory only: truncation or refusal is the caller's policy.
 */
export function isOverflow({ input, cacheRead, output, contextLimit, modelOutputLimit }: OverflowInput): boolean {
  if (contextLimit === 0) {
    return false;
  }

  const count = input + cacheRead + output;
  const outputBudget = Math.min(
    modelOutputLimit ?? OVERFLOW.defaultMaxOutputTokens,
    OVERFLOW.defaultMaxOutputTokens,
  );
  const usable = contextLimit - outputBudget;

  return count > usable;
}
