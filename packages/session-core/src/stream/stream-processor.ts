/**
 * Stream Processor
 *
 * Consumes normalized stream events one at a time, drives the per-tool-call
 * state machine, consults the loop guard before letting a tool call through,
 * and returns a verdict for every event.
 *
 * Single owner: callers must not invoke methods concurrently on one instance.
 * Cancellation is polled once at the top of processEvent(), so a transition
 * that has started always completes.
 */

import type {
  ILogger,
  JsonValue,
  ProcessErrorCode,
  ProcessResult,
  ProcessorTokenUsage,
  StreamEvent,
  ToolCallInputEvent,
  ToolCallRecord,
  ToolCallStartEvent,
  ToolErrorEvent,
  ToolResultEvent,
  ToolState,
} from '@stream-session/contracts';
import { LOOP_GUARD } from '../constants.js';
import { noopLogger } from '../logging/logger.js';
import { LoopGuard } from '../loop-guard/loop-guard.js';
import { RetryController } from '../retry/retry-controller.js';
import { assertTokenCount, type TokenUsageTracker } from '../tokens/usage-tracker.js';

export interface StreamProcessorOptions {
  sessionId: string;
  messageId: string;
  /** Cooperative cancellation; checked before every event */
  signal?: AbortSignal;
  /** Default: RETRY.defaultMaxRetries (3). Ignored when `retry` is given */
  maxRetries?: number;
  retry?: RetryController;
  /** When attached, recordTokens() also feeds the session's usage ledger */
  usageTracker?: TokenUsageTracker;
  /** Epoch-millisecond clock; defaults to Date.now */
  now?: () => number;
  logger?: ILogger;
}

const CONTINUE: ProcessResult = Object.freeze({ type: 'continue' });
const CANCELLED: ProcessResult = Object.freeze({ type: 'cancelled' });

export function isTerminalToolState(state: ToolState): boolean {
  return state.status === 'completed' || state.status === 'error';
}

export class StreamProcessor {
  readonly sessionId: string;
  readonly messageId: string;

  private readonly signal?: AbortSignal;
  private readonly retry: RetryController;
  private readonly loopGuard: LoopGuard;
  private readonly usageTracker?: TokenUsageTracker;
  private readonly now: () => number;
  private readonly logger: ILogger;

  private readonly states = new Map<string, ToolState>();
  private inputTokens = 0;
  private outputTokens = 0;
  private currentSnapshotId: string | undefined;

  constructor(options: StreamProcessorOptions) {
    this.sessionId = options.sessionId;
    this.messageId = options.messageId;
    this.signal = options.signal;
    this.retry = options.retry ?? new RetryController({ maxRetries: options.maxRetries });
    this.usageTracker = options.usageTracker;
    this.now = options.now ?? Date.now;
    this.loopGuard = new LoopGuard(this.now);
    this.logger = options.logger ?? noopLogger;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Event processing
  // ═══════════════════════════════════════════════════════════════════════

  processEvent(event: StreamEvent): ProcessResult {
    if (this.signal?.aborted) {
      return CANCELLED;
    }

    switch (event.type) {
      case 'stream:start':
      case 'text:delta':
      case 'reasoning:start':
      case 'reasoning:delta':
      case 'reasoning:end':
        // Deltas are rendered by the caller, nothing to keep here
        return CONTINUE;
      case 'tool:call-start':
        return this.handleCallStart(event);
      case 'tool:call-input':
        return this.handleCallInput(event);
      case 'tool:result':
      case 'tool:error':
        return this.handleCallOutcome(event);
      case 'stream:finish':
        return { type: 'finished', reason: event.reason };
      case 'stream:error':
        return this.fail('stream_error', event.error);
      default:
        return assertNever(event);
    }
  }

  private handleCallStart(event: ToolCallStartEvent): ProcessResult {
    const prior = this.states.get(event.id);
    if (prior && !isTerminalToolState(prior)) {
      return this.fail('duplicate_call', `Tool call ${event.id} is already ${prior.status}`, {
        toolCallId: event.id,
        tool: event.name,
      });
    }

    this.states.set(event.id, { status: 'pending', name: event.name, input: null });
    this.logger.debug('Tool call announced', { toolCallId: event.id, tool: event.name });
    return CONTINUE;
  }

  private handleCallInput(event: ToolCallInputEvent): ProcessResult {
    let input: JsonValue;
    try {
      input = JSON.parse(event.input);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return this.fail('parse_failed', `Failed to parse tool input: ${reason}`, { toolCallId: event.id });
    }

    const state = this.states.get(event.id);
    if (state?.status !== 'pending') {
      return this.fail('invalid_state', `Tool call ${event.id} not initialized`, {
        toolCallId: event.id,
        status: state?.status,
      });
    }

    // Tool state, loop history and verdict each get their own copy of the input
    this.states.set(event.id, {
      status: 'running',
      name: state.name,
      input: structuredClone(input),
      startTime: this.now(),
    });
    this.loopGuard.recordToolCall(state.name, input);

    if (this.loopGuard.isDoomLoop(state.name, input)) {
      const message = `Doom loop detected: ${LOOP_GUARD.threshold} consecutive identical calls to ${state.name}`;
      this.logger.error(message, undefined, { toolCallId: event.id, tool: state.name, sessionId: this.sessionId });
      return { type: 'error', error: message, code: 'doom_loop' };
    }

    return { type: 'tool_call_required', id: event.id, name: state.name, input: structuredClone(input) };
  }

  private handleCallOutcome(event: ToolResultEvent | ToolErrorEvent): ProcessResult {
    const state = this.states.get(event.id);
    if (state?.status !== 'running') {
      return this.fail('invalid_state', `Tool ${event.id} not in running state`, {
        toolCallId: event.id,
        status: state?.status,
      });
    }

    const durationMs = Math.max(0, this.now() - state.startTime);
    const next: ToolState =
      event.type === 'tool:result'
        ? { status: 'completed', name: state.name, input: state.input, output: event.output, durationMs }
        : { status: 'error', name: state.name, input: state.input, error: event.error, durationMs };

    this.states.set(event.id, next);
    this.logger.debug('Tool call finished', { toolCallId: event.id, tool: state.name, status: next.status, durationMs });
    return CONTINUE;
  }

  private fail(code: ProcessErrorCode, error: string, meta?: Record<string, unknown>): ProcessResult {
    this.logger.warn(error, { code, sessionId: this.sessionId, messageId: this.messageId, ...meta });
    return { type: 'error', error, code };
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Accessors
  // ═══════════════════════════════════════════════════════════════════════

  isCancelled(): boolean {
    return this.signal?.aborted ?? false;
  }

  toolState(id: string): ToolState | undefined {
    return this.states.get(id);
  }

  toolStates(): ReadonlyMap<string, ToolState> {
    return new Map(this.states);
  }

  /**
   * Record token counts reported by the transport. Cumulative across retries.
   */
  recordTokens(input: number, output: number): void {
    assertTokenCount('input', input);
    assertTokenCount('output', output);
    this.inputTokens += input;
    this.outputTokens += output;
    this.usageTracker?.recordPrompt(input);
    this.usageTracker?.recordCompletion(output);
  }

  tokenUsage(): ProcessorTokenUsage {
    return { input: this.inputTokens, output: this.outputTokens };
  }

  /**
   * Attach the rollback handle for this processing step. Opaque to the processor.
   */
  setSnapshot(snapshotId: string): void {
    this.currentSnapshotId = snapshotId;
  }

  snapshotId(): string | undefined {
    return this.currentSnapshotId;
  }

  /**
   * Recent tool calls seen by the loop guard, oldest first.
   */
  recentToolCalls(): readonly ToolCallRecord[] {
    return this.loopGuard.history();
  }

  // ═══════════════════════════════════════════════════════════════════════
  // Retry bookkeeping
  // ═══════════════════════════════════════════════════════════════════════

  get maxRetries(): number {
    return this.retry.maxRetries;
  }

  retryCount(): number {
    return this.retry.retryCount;
  }

  canRetry(): boolean {
    return this.retry.canRetry();
  }

  incrementRetry(): void {
    this.retry.incrementRetry();
  }

  /** Milliseconds to wait before the next attempt */
  backoffDelay(): number {
    return this.retry.backoffDelay();
  }

  /**
   * Clear tool states and the doom-loop window for a fresh attempt.
   * Token counts, the snapshot handle and the retry count survive.
   */
  resetForRetry(): void {
    this.states.clear();
    this.loopGuard.clear();
    this.logger.debug('Processor reset for retry', { sessionId: this.sessionId, retryCount: this.retry.retryCount });
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled stream event: ${JSON.stringify(value)}`);
}
