/**
 * Collaborator interfaces: the boundary between the session core and the
 * systems it does not own.
 *
 *   transport ──events──► SessionRunner ──► StreamProcessor
 *                              │
 *                              ├──tool_call_required──► ToolRunner
 *                              └──before first attempt──► SnapshotProvider
 *
 * None of these are implemented in core. Tests use the mocks in `./testing`.
 */

import type { JsonValue, StreamEvent } from '@stream-session/contracts';

// ─────────────────────────────────────────────────────────────────────────────
// Transport
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Token counts as the provider reports them. Counts not reported are omitted.
 */
export interface TransportUsage {
  inputTokens: number;
  outputTokens: number;
  cacheReadTokens?: number;
  cacheWriteTokens?: number;
  /** Reported separately from, and not included in, outputTokens */
  reasoningTokens?: number;
}

/**
 * Receives usage reports from the transport while a stream is open.
 * Token counts are not carried on every event, so they travel on this side channel.
 */
export type UsageSink = (usage: TransportUsage) => void;

export interface StreamAttempt {
  /** 0 for the first attempt, incremented per retry */
  attempt: number;
  signal: AbortSignal;
  reportUsage: UsageSink;
}

/**
 * Produces the normalized event stream for one model call.
 * A new stream is opened for every retry attempt.
 */
export interface StreamTransport {
  open(attempt: StreamAttempt): AsyncIterable<StreamEvent>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tools
// ─────────────────────────────────────────────────────────────────────────────

export interface ToolInvocation {
  id: string;
  name: string;
  input: JsonValue;
}

/**
 * Executes a tool call. Resolves with the tool output; a rejection is fed back
 * to the processor as a tool error. Wall-clock timeouts are the runner's concern.
 */
export interface ToolRunner {
  execute(call: ToolInvocation, signal: AbortSignal): Promise<string>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Snapshots
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a rollback point before tools start changing the workspace.
 * The returned handle is opaque to the core.
 */
export interface SnapshotProvider {
  createSnapshot(sessionId: string): Promise<string>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Tokenizers
// ─────────────────────────────────────────────────────────────────────────────

export interface Tokenizer {
  /** Number of tokens in `text` */
  count(text: string): number;
}

/**
 * Process-wide tokenizer cache. Built once per key on first use, never evicted.
 */
export interface TokenizerCache {
  getOrCreate(key: string, factory: () => Tokenizer): Tokenizer;
  has(key: string): boolean;
  readonly size: number;
}
