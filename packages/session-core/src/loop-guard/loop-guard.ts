/**
 * Loop Guard
 *
 * Detects when the model is stuck issuing the same tool call over and over
 * ("doom loop") by keeping a short history of recent invocations.
 */

import { isDeepStrictEqual } from 'node:util';
import type { JsonValue, ToolCallRecord } from '@stream-session/contracts';
import { LOOP_GUARD } from '../constants.js';

function deepFreeze(value: JsonValue): JsonValue {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Fixed-capacity FIFO of recent tool calls plus the doom-loop match rule.
 *
 * A call counts as a doom loop when the last `LOOP_GUARD.threshold` records all
 * carry the same tool name and a structurally equal input. Inputs are compared
 * as parsed values, so key order and whitespace in the raw JSON do not matter,
 * but any change to a value does, and breaks the streak.
 */
export class LoopGuard {
  private records: ToolCallRecord[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Append a call to the history, evicting the oldest once over capacity.
   * The record holds a frozen copy of `input`, detached from the caller's value.
   */
  recordToolCall(tool: string, input: JsonValue): ToolCallRecord {
    const record: ToolCallRecord = Object.freeze({
      tool,
      input: deepFreeze(structuredClone(input)),
      timestamp: this.now(),
    });
    this.records.push(record);

    while (this.records.length > LOOP_GUARD.windowSize) {
      this.records.shift();
    }

    return record;
  }

  /**
   * Check whether the most recent records, newest first, are all identical to
   * `(tool, input)`. Fewer records than the threshold never match.
   */
  isDoomLoop(tool: string, input: JsonValue): boolean {
    if (this.records.length < LOOP_GUARD.threshold) {
      return false;
    }

    const recent = this.records.slice(-LOOP_GUARD.threshold).reverse();
    return recent.every((record) => record.tool === tool && isDeepStrictEqual(record.input, input));
  }

  /**
   * Snapshot of the history, oldest first (for debugging and observability)
   */
  history(): readonly ToolCallRecord[] {
    return [...this.records];
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Forget all recorded calls (a retried attempt starts with a clean window)
   */
  clear(): void {
    this.records = [];
  }
}
