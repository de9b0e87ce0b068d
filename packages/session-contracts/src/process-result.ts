/**
 * Verdicts returned by the stream processor, one per event.
 */

import type { FinishReason } from './stream-events.js';
import type { JsonValue } from './tool-state.js';

/**
 * Machine-readable error kind.
 *
 * - 'parse_failed'   — tool input was not valid JSON
 * - 'invalid_state'  — event arrived for a tool id in the wrong state (or unknown id)
 * - 'duplicate_call' — call-start reused an id whose call is still open
 * - 'doom_loop'      — identical tool call repeated past the threshold
 * - 'stream_error'   — the transport reported a top-level stream error
 */
export type ProcessErrorCode =
  | 'parse_failed'
  | 'invalid_state'
  | 'duplicate_call'
  | 'doom_loop'
  | 'stream_error';

export interface ContinueResult {
  type: 'continue';
}

export interface ToolCallRequiredResult {
  type: 'tool_call_required';
  id: string;
  name: string;
  input: JsonValue;
}

export interface FinishedResult {
  type: 'finished';
  reason: FinishReason;
}

export interface CancelledResult {
  type: 'cancelled';
}

export interface ErrorResult {
  type: 'error';
  error: string;
  code: ProcessErrorCode;
}

export type ProcessResult =
  | ContinueResult
  | ToolCallRequiredResult
  | FinishedResult
  | CancelledResult
  | ErrorResult;
