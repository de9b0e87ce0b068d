/**
 * SessionRunner — drives one assistant turn through the stream processor.
 *
 *   open stream ─► processEvent() per event
 *        ▲              │
 *        │              ├─ tool_call_required ─► ToolRunner ─► tool:result / tool:error ─► processEvent()
 *        │              ├─ finished / cancelled ─► done
 *        │              └─ error ─► canRetry()? ─► backoff ─► resetForRetry() ─┘
 *
 * Doom loops are never retried.
 */

import { setTimeout as sleepFor } from 'node:timers/promises';
import type {
  FinishReason,
  ILogger,
  ProcessErrorCode,
  ProcessResult,
  StreamEvent,
  ToolCallRequiredResult,
} from '@stream-session/contracts';
import type { SnapshotProvider, StreamTransport, ToolRunner, TransportUsage } from '@stream-session/sdk';
import { noopLogger } from '../logging/logger.js';
import { StreamProcessor } from '../stream/stream-processor.js';
import type { TokenUsageTracker } from '../tokens/usage-tracker.js';

export type SessionOutcome =
  | { status: 'finished'; reason: FinishReason }
  | { status: 'cancelled' }
  | { status: 'failed'; error: string; code: ProcessErrorCode };

export interface SessionDelta {
  kind: 'text' | 'reasoning';
  text: string;
}

export interface SessionRunnerOptions {
  sessionId: string;
  messageId: string;
  transport: StreamTransport;
  tools: ToolRunner;
  snapshots?: SnapshotProvider;
  signal?: AbortSignal;
  maxRetries?: number;
  usageTracker?: TokenUsageTracker;
  /** Incremental text/reasoning for rendering */
  onDelta?: (delta: SessionDelta) => void;
  logger?: ILogger;
  now?: () => number;
  /** Abortable delay used for backoff; injectable for tests */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const NON_RETRYABLE: ReadonlySet<ProcessErrorCode> = new Set(['doom_loop']);

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  await sleepFor(ms, undefined, { signal });
}

export class SessionRunner {
  readonly processor: StreamProcessor;

  private readonly transport: StreamTransport;
  private readonly tools: ToolRunner;
  private readonly snapshots?: SnapshotProvider;
  private readonly signal: AbortSignal;
  private readonly usageTracker?: TokenUsageTracker;
  private readonly onDelta?: (delta: SessionDelta) => void;
  private readonly logger: ILogger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: SessionRunnerOptions) {
    this.transport = options.transport;
    this.tools = options.tools;
    this.snapshots = options.snapshots;
    this.signal = options.signal ?? new AbortController().signal;
    this.usageTracker = options.usageTracker;
    this.onDelta = options.onDelta;
    this.logger = options.logger ?? noopLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.processor = new StreamProcessor({
      sessionId: options.sessionId,
      messageId: options.messageId,
      signal: this.signal,
      maxRetries: options.maxRetries,
      usageTracker: options.usageTracker,
      now: options.now,
      logger: this.logger,
    });
  }

  async run(): Promise<SessionOutcome> {
    if (this.snapshots && this.processor.snapshotId() === undefined) {
      this.processor.setSnapshot(await this.snapshots.createSnapshot(this.processor.sessionId));
    }

    for (;;) {
      const outcome = await this.runAttempt();
      if (outcome.status !== 'failed') {
        return outcome;
      }

      if (NON_RETRYABLE.has(outcome.code) || !this.processor.canRetry()) {
        this.logger.error('Session attempt failed, not retrying', undefined, {
          sessionId: this.processor.sessionId,
          code: outcome.code,
          retryCount: this.processor.retryCount(),
        });
        return outcome;
      }

      const delayMs = this.processor.backoffDelay();
      this.logger.warn('Session attempt failed, retrying', {
        sessionId: this.processor.sessionId,
        code: outcome.code,
        error: outcome.error,
        retryCount: this.processor.retryCount(),
        delayMs,
      });

      try {
        await this.sleep(delayMs, this.signal);
      } catch (error) {
        if (this.signal.aborted) {
          return { status: 'cancelled' };
        }
        throw error;
      }

      this.processor.incrementRetry();
      this.processor.resetForRetry();
    }
  }

  private async runAttempt(): Promise<SessionOutcome> {
    const stream = this.transport.open({
      attempt: this.processor.retryCount(),
      signal: this.signal,
      reportUsage: (usage) => this.recordUsage(usage),
    });

    try {
      for await (const event of stream) {
        const outcome = await this.dispatch(event);
        if (outcome) {
          return outcome;
        }
      }
    } catch (error) {
      if (this.signal.aborted) {
        return { status: 'cancelled' };
      }
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'failed', error: `Transport failed: ${message}`, code: 'stream_error' };
    }

    if (this.signal.aborted) {
      return { status: 'cancelled' };
    }
    return { status: 'failed', error: 'Stream ended without a finish event', code: 'stream_error' };
  }

  /**
   * Process one event, running any tool it unlocks. Returns an outcome once
   * the attempt is over, undefined to keep reading.
   */
  private async dispatch(event: StreamEvent): Promise<SessionOutcome | undefined> {
    let result: ProcessResult = this.processor.processEvent(event);

    if (result.type === 'continue' && (event.type === 'text:delta' || event.type === 'reasoning:delta')) {
      this.onDelta?.({ kind: event.type === 'text:delta' ? 'text' : 'reasoning', text: event.text });
    }

    while (result.type === 'tool_call_required') {
      result = this.processor.processEvent(await this.executeTool(result));
    }

    switch (result.type) {
      case 'continue':
        return undefined;
      case 'finished':
        return { status: 'finished', reason: result.reason };
      case 'cancelled':
        return { status: 'cancelled' };
      case 'error':
        return { status: 'failed', error: result.error, code: result.code };
    }
  }

  private async executeTool(call: ToolCallRequiredResult): Promise<StreamEvent> {
    this.logger.info('Executing tool', { sessionId: this.processor.sessionId, toolCallId: call.id, tool: call.name });
    try {
      const output = await this.tools.execute({ id: call.id, name: call.name, input: call.input }, this.signal);
      return { type: 'tool:result', id: call.id, output };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn('Tool execution failed', { toolCallId: call.id, tool: call.name, error: message });
      return { type: 'tool:error', id: call.id, error: message };
    }
  }

  private recordUsage(usage: TransportUsage): void {
    this.processor.recordTokens(usage.inputTokens, usage.outputTokens);
    if (usage.cacheReadTokens) {
      this.usageTracker?.recordCacheRead(usage.cacheReadTokens);
    }
    if (usage.cacheWriteTokens) {
      this.usageTracker?.recordCacheWrite(usage.cacheWriteTokens);
    }
    if (usage.reasoningTokens) {
      this.usageTracker?.recordReasoning(usage.reasoningTokens);
    }
  }
}
