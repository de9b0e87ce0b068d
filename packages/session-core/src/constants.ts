/**
 * Session core constants — single source of truth for tunable values.
 *
 * Grouping rationale:
 * - LOOP_GUARD: Doom-loop history window and match threshold
 * - RETRY: Retry budget and backoff
 * - TOKEN_LIMITS: Usage-percentage thresholds for limit status
 * - OVERFLOW: Output reservation for the context overflow predicate
 */

export const LOOP_GUARD = {
  /**
   * Number of recent tool calls kept for doom-loop detection.
   * Oldest entry is evicted once the window is full.
   */
  windowSize: 10,

  /**
   * Consecutive identical calls (same tool, deep-equal input) that count as a doom loop.
   * Fixed, not runtime-configurable.
   */
  threshold: 3,
} as const;

export const RETRY = {
  /** Default retry budget per processing session */
  defaultMaxRetries: 3,

  /** Backoff base: delay = baseDelayMs * 2^retryCount */
  baseDelayMs: 100,
} as const;

export const TOKEN_LIMITS = {
  /** Usage percentage at which status becomes 'warning' */
  warningPercent: 75,

  /** Usage percentage at which status becomes 'critical' */
  criticalPercent: 90,
} as const;

export const OVERFLOW = {
  /**
   * Upper bound on tokens reserved for model output when deciding whether
   * the context has overflowed. A model's own output limit can only lower it.
   */
  defaultMaxOutputTokens: 32_000,
} as const;

export const TOKENS_PER_MILLION = 1_000_000;
