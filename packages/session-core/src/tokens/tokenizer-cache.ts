/**
 * Tokenizer cache — the one piece of state shared across sessions.
 *
 * Encodings are large lookup tables; each is built once per process on first
 * use and never evicted. Node runs this synchronously on one thread, so
 * check-then-set in getOrCreate cannot interleave with another session.
 */

import { getEncoding } from 'js-tiktoken';
import type { Tokenizer, TokenizerCache } from '@stream-session/sdk';
import type { TokenizerEncoding } from './pricing.js';

export class MapTokenizerCache implements TokenizerCache {
  private readonly entries = new Map<string, Tokenizer>();

  getOrCreate(key: string, factory: () => Tokenizer): Tokenizer {
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }

    const tokenizer = factory();
    this.entries.set(key, tokenizer);
    return tokenizer;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Tokenizer backed by a tiktoken BPE encoding.
 */
export function createTiktokenTokenizer(encoding: TokenizerEncoding): Tokenizer {
  const bpe = getEncoding(encoding);
  return {
    // Special-token text counts as the special token instead of throwing
    count: (text: string) => bpe.encode(text, 'all').length,
  };
}

let sharedCache: TokenizerCache | undefined;

/**
 * Process-wide cache used when an estimator is built without one.
 */
export function getSharedTokenizerCache(): TokenizerCache {
  sharedCache ??= new MapTokenizerCache();
  return sharedCache;
}
