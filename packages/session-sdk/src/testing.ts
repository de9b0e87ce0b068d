/**
 * @stream-session/sdk/testing
 *
 * Ready-made mock helpers for testing the session core and anything that
 * plugs into it. Import from this sub-path, never from the main index.
 *
 * @example
 *   import { makeLogger, makeScriptedTransport } from '@stream-session/sdk/testing';
 *
 * All helpers use vitest's `vi.fn()`, so vitest must be available in the test env.
 */

import { vi } from 'vitest';
import type { ILogger, StreamEvent } from '@stream-session/contracts';
import type {
  SnapshotProvider,
  StreamAttempt,
  StreamTransport,
  Tokenizer,
  TokenizerCache,
  ToolInvocation,
  ToolRunner,
  TransportUsage,
} from './collaborators.js';

// ─── Logger mock ─────────────────────────────────────────────────────────────

export function makeLogger(): ILogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

// ─── Tokenizer cache fake ────────────────────────────────────────────────────

/**
 * Tokenizer that counts whitespace-separated words. Deterministic and free of
 * encoding tables, so token counts in tests are easy to derive by hand.
 */
export const wordTokenizer: Tokenizer = {
  count: (text: string) => text.split(/\s+/).filter((word) => word.length > 0).length,
};

export interface FakeTokenizerCache extends TokenizerCache {
  /** Keys in the order their factory ran */
  readonly builtKeys: string[];
}

/**
 * Cache that ignores the real factory and hands out `tokenizer` for every key,
 * recording which keys were requested for the first time.
 */
export function makeTokenizerCache(tokenizer: Tokenizer = wordTokenizer): FakeTokenizerCache {
  const entries = new Map<string, Tokenizer>();
  const builtKeys: string[] = [];
  return {
    builtKeys,
    getOrCreate(key: string): Tokenizer {
      const existing = entries.get(key);
      if (existing) {
        return existing;
      }
      builtKeys.push(key);
      entries.set(key, tokenizer);
      return tokenizer;
    },
    has: (key: string) => entries.has(key),
    get size() {
      return entries.size;
    },
  };
}

// ─── Transport mock ──────────────────────────────────────────────────────────

/**
 * One step of a scripted stream: an event to yield, a usage report to push
 * through the attempt's sink, or a failure to throw from the iterator.
 */
export type ScriptStep = StreamEvent | { usage: TransportUsage } | { fail: Error };

export interface ScriptedTransport extends StreamTransport {
  /** Every attempt the runner opened, in order */
  readonly attempts: StreamAttempt[];
}

/**
 * Transport that replays `scripts[n]` for the n-th opened stream. Attempts past
 * the last script replay the last one.
 */
export function makeScriptedTransport(scripts: ScriptStep[][]): ScriptedTransport {
  const attempts: StreamAttempt[] = [];
  return {
    attempts,
    open(attempt: StreamAttempt): AsyncIterable<StreamEvent> {
      attempts.push(attempt);
      const script = scripts[Math.min(attempt.attempt, scripts.length - 1)] ?? [];
      return replay(script, attempt);
    },
  };
}

async function* replay(script: ScriptStep[], attempt: StreamAttempt): AsyncGenerator<StreamEvent> {
  for (const step of script) {
    if ('usage' in step) {
      attempt.reportUsage(step.usage);
      continue;
    }
    if ('fail' in step) {
      throw step.fail;
    }
    yield step;
  }
}

// ─── Tool runner mock ────────────────────────────────────────────────────────

export type ToolHandler = (call: ToolInvocation) => string | Promise<string>;

export interface MockToolRunner extends ToolRunner {
  /** Invocations in call order */
  readonly calls: ToolInvocation[];
}

export function makeToolRunner(handler: ToolHandler = () => 'ok'): MockToolRunner {
  const calls: ToolInvocation[] = [];
  return {
    calls,
    execute: vi.fn(async (call: ToolInvocation) => {
      calls.push(call);
      return handler(call);
    }),
  };
}

// ─── Snapshot provider mock ──────────────────────────────────────────────────

export function makeSnapshotProvider(handle = 'snap-test'): SnapshotProvider {
  return {
    createSnapshot: vi.fn(async () => handle),
  };
}
