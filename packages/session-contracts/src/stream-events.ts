/**
 * Stream event contracts.
 *
 * A StreamEvent is one atomic unit pushed by the provider transport. Provider
 * wire formats are normalized upstream; by the time an event reaches the core
 * it is one of the variants below.
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════
// Finish reason
// ═══════════════════════════════════════════════════════════════════════

/**
 * Why the model stopped streaming.
 *
 * - 'stop'           — natural end of the turn
 * - 'length'         — output or context length limit reached
 * - 'tool_call'      — the model yielded to let a tool run
 * - 'content_filter' — provider filtered the output
 */
export type FinishReason = 'stop' | 'length' | 'tool_call' | 'content_filter';

// ═══════════════════════════════════════════════════════════════════════
// Events
// ═══════════════════════════════════════════════════════════════════════

export interface StreamStartEvent {
  type: 'stream:start';
}

export interface TextDeltaEvent {
  type: 'text:delta';
  text: string;
}

export interface ReasoningStartEvent {
  type: 'reasoning:start';
}

export interface ReasoningDeltaEvent {
  type: 'reasoning:delta';
  text: string;
}

export interface ReasoningEndEvent {
  type: 'reasoning:end';
}

/**
 * A tool call was announced. `id` is transport-assigned and only unique among
 * calls that are open at the same time.
 */
export interface ToolCallStartEvent {
  type: 'tool:call-start';
  id: string;
  name: string;
}

/**
 * Structured input for an announced call, as raw JSON text.
 */
export interface ToolCallInputEvent {
  type: 'tool:call-input';
  id: string;
  input: string;
}

export interface ToolResultEvent {
  type: 'tool:result';
  id: string;
  output: string;
}

export interface ToolErrorEvent {
  type: 'tool:error';
  id: string;
  error: string;
}

export interface StreamFinishEvent {
  type: 'stream:finish';
  reason: FinishReason;
}

export interface StreamErrorEvent {
  type: 'stream:error';
  error: string;
}

export type StreamEvent =
  | StreamStartEvent
  | TextDeltaEvent
  | ReasoningStartEvent
  | ReasoningDeltaEvent
  | ReasoningEndEvent
  | ToolCallStartEvent
  | ToolCallInputEvent
  | ToolResultEvent
  | ToolErrorEvent
  | StreamFinishEvent
  | StreamErrorEvent;

export type StreamEventType = StreamEvent['type'];

// ═══════════════════════════════════════════════════════════════════════
// Schemas
// ═══════════════════════════════════════════════════════════════════════

export const FinishReasonSchema = z.enum(['stop', 'length', 'tool_call', 'content_filter']);

/**
 * Runtime validation for events coming from an untyped source
 * (a socket, a replay file, a test fixture).
 */
export const StreamEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('stream:start') }),
  z.object({ type: z.literal('text:delta'), text: z.string() }),
  z.object({ type: z.literal('reasoning:start') }),
  z.object({ type: z.literal('reasoning:delta'), text: z.string() }),
  z.object({ type: z.literal('reasoning:end') }),
  z.object({ type: z.literal('tool:call-start'), id: z.string().min(1), name: z.string().min(1) }),
  z.object({ type: z.literal('tool:call-input'), id: z.string().min(1), input: z.string() }),
  z.object({ type: z.literal('tool:result'), id: z.string().min(1), output: z.string() }),
  z.object({ type: z.literal('tool:error'), id: z.string().min(1), error: z.string() }),
  z.object({ type: z.literal('stream:finish'), reason: FinishReasonSchema }),
  z.object({ type: z.literal('stream:error'), error: z.string() }),
]);

/**
 * Validate an unknown value as a StreamEvent. Throws ZodError on mismatch.
 */
export function parseStreamEvent(value: unknown): StreamEvent {
  return StreamEventSchema.parse(value);
}
