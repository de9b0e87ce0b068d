/**
 * Per-tool-call lifecycle.
 *
 *   pending ──► running ──► completed
 *                      └──► error
 *
 * Transitions are forward-only. `completed` and `error` are terminal.
 */

/**
 * Any value JSON.parse can produce.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type ToolStatus = 'pending' | 'running' | 'completed' | 'error';

/** Call announced, structured input not received yet */
export interface PendingToolState {
  status: 'pending';
  name: string;
  input: null;
}

/** Input parsed, clock started */
export interface RunningToolState {
  status: 'running';
  name: string;
  input: JsonValue;
  /** Epoch milliseconds */
  startTime: number;
}

export interface CompletedToolState {
  status: 'completed';
  name: string;
  input: JsonValue;
  output: string;
  durationMs: number;
}

export interface ErrorToolState {
  status: 'error';
  name: string;
  input: JsonValue;
  error: string;
  durationMs: number;
}

export type ToolState =
  | PendingToolState
  | RunningToolState
  | CompletedToolState
  | ErrorToolState;

export type TerminalToolState = CompletedToolState | ErrorToolState;

/**
 * One entry in the loop guard history. Frozen on insert.
 */
export interface ToolCallRecord {
  readonly tool: string;
  readonly input: JsonValue;
  /** Epoch milliseconds */
  readonly timestamp: number;
}
