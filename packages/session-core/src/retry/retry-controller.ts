/**
 * Retry Controller
 *
 * Bounded retry counter with exponential backoff. Decides *when* a failed
 * attempt may be re-run; it never sleeps or re-runs anything itself.
 */

import { RETRY } from '../constants.js';

export interface RetryControllerOptions {
  /** Default: RETRY.defaultMaxRetries (3) */
  maxRetries?: number;
}

export class RetryController {
  readonly maxRetries: number;
  private count = 0;

  constructor(options: RetryControllerOptions = {}) {
    this.maxRetries = options.maxRetries ?? RETRY.defaultMaxRetries;
  }

  get retryCount(): number {
    return this.count;
  }

  canRetry(): boolean {
    return this.count < this.maxRetries;
  }

  incrementRetry(): void {
    this.count++;
  }

  /**
   * Delay before the next attempt, in milliseconds: 100, 200, 400, ...
   */
  backoffDelay(): number {
    return RETRY.baseDelayMs * 2 ** this.count;
  }

  /**
   * Start a fresh retry budget (new turn, not a retry of the current one).
   */
  reset(): void {
    this.count = 0;
  }
}
