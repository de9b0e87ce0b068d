import { describe, it, expect, vi } from 'vitest';
import type { StreamEvent } from '@stream-session/contracts';
import {
  makeLogger,
  makeScriptedTransport,
  makeSnapshotProvider,
  makeToolRunner,
  type ScriptStep,
} from '@stream-session/sdk/testing';
import { SessionRunner, type SessionDelta, type SessionRunnerOptions } from '../session-runner.js';
import { TokenUsageTracker } from '../../tokens/usage-tracker.js';

const finish: StreamEvent = { type: 'stream:finish', reason: 'stop' };

function toolCall(id: string, name: string, input: string): ScriptStep[] {
  return [
    { type: 'tool:call-start', id, name },
    { type: 'tool:call-input', id, input },
  ];
}

function makeRunner(
  scripts: ScriptStep[][],
  overrides: Partial<SessionRunnerOptions> = {},
) {
  const transport = makeScriptedTransport(scripts);
  const tools = makeToolRunner();
  const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const runner = new SessionRunner({
    sessionId: 'session-1',
    messageId: 'message-1',
    transport,
    tools,
    sleep,
    ...overrides,
  });
  return { runner, transport, tools, sleep };
}

describe('SessionRunner', () => {
  it('finishes a plain text turn and forwards deltas', async () => {
    const deltas: SessionDelta[] = [];
    const { runner } = makeRunner(
      [
        [
          { type: 'stream:start' },
          { type: 'reasoning:start' },
          { type: 'reasoning:delta', text: 'plan' },
          { type: 'reasoning:end' },
          { type: 'text:delta', text: 'Hello' },
          { type: 'text:delta', text: ' world' },
          finish,
        ],
      ],
      { onDelta: (delta) => deltas.push(delta) },
    );

    await expect(runner.run()).resolves.toEqual({ status: 'finished', reason: 'stop' });
    expect(deltas).toEqual([
      { kind: 'reasoning', text: 'plan' },
      { kind: 'text', text: 'Hello' },
      { kind: 'text', text: ' world' },
    ]);
  });

  it('executes required tools and feeds results back', async () => {
    const { runner, tools } = makeRunner([[...toolCall('t1', 'grep', '{"q":"x"}'), finish]]);

    await expect(runner.run()).resolves.toEqual({ status: 'finished', reason: 'stop' });
    expect(tools.calls).toEqual([{ id: 't1', name: 'grep', input: { q: 'x' } }]);
    expect(runner.processor.toolState('t1')).toMatchObject({ status: 'completed', output: 'ok' });
  });

  it('records a throwing tool as a tool error and keeps going', async () => {
    const { runner } = makeRunner([[...toolCall('t1', 'shell', '{"cmd":"false"}'), finish]], {
      tools: makeToolRunner(() => {
        throw new Error('exit code 1');
      }),
    });

    await expect(runner.run()).resolves.toEqual({ status: 'finished', reason: 'stop' });
    expect(runner.processor.toolState('t1')).toMatchObject({ status: 'error', error: 'exit code 1' });
  });

  it('retries a failed attempt with backoff and a clean tool state', async () => {
    const logger = makeLogger();
    const { runner, transport, sleep } = makeRunner(
      [
        [...toolCall('t1', 'grep', '{"q":"x"}'), { type: 'stream:error', error: 'overloaded' }],
        [...toolCall('t2', 'grep', '{"q":"x"}'), finish],
      ],
      { logger },
    );

    await expect(runner.run()).resolves.toEqual({ status: 'finished', reason: 'stop' });
    expect(transport.attempts.map((a) => a.attempt)).toEqual([0, 1]);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(100, expect.any(AbortSignal));
    expect(runner.processor.retryCount()).toBe(1);
    expect(runner.processor.toolState('t1')).toBeUndefined();
    expect(runner.processor.toolState('t2')?.status).toBe('completed');
    expect(logger.warn).toHaveBeenCalledWith('Session attempt failed, retrying', {
      sessionId: 'session-1',
      code: 'stream_error',
      error: 'overloaded',
      retryCount: 0,
      delayMs: 100,
    });
  });

  it('gives up once the retry budget is spent', async () => {
    const { runner, transport, sleep } = makeRunner([[{ type: 'stream:error', error: 'overloaded' }]], {
      maxRetries: 2,
    });

    await expect(runner.run()).resolves.toEqual({ status: 'failed', error: 'overloaded', code: 'stream_error' });
    expect(transport.attempts).toHaveLength(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('does not retry a doom loop', async () => {
    const { runner, transport } = makeRunner([
      [
        ...toolCall('a', 'read', '{"path":"x.ts"}'),
        ...toolCall('b', 'read', '{"path":"x.ts"}'),
        ...toolCall('c', 'read', '{"path":"x.ts"}'),
        finish,
      ],
    ]);

    await expect(runner.run()).resolves.toEqual({
      status: 'failed',
      error: 'Doom loop detected: 3 consecutive identical calls to read',
      code: 'doom_loop',
    });
    expect(transport.attempts).toHaveLength(1);
  });

  it('catches a doom loop when the tool mutates its arguments', async () => {
    const tools = makeToolRunner((call) => {
      if (call.input !== null && typeof call.input === 'object' && !Array.isArray(call.input)) {
        call.input.encoding = 'utf8';
      }
      return 'ok';
    });
    const { runner } = makeRunner(
      [
        [
          ...toolCall('a', 'read', '{"path":"x.ts"}'),
          ...toolCall('b', 'read', '{"path":"x.ts"}'),
          ...toolCall('c', 'read', '{"path":"x.ts"}'),
          ...toolCall('d', 'read', '{"path":"x.ts"}'),
          finish,
        ],
      ],
      { tools },
    );

    await expect(runner.run()).resolves.toEqual({
      status: 'failed',
      error: 'Doom loop detected: 3 consecutive identical calls to read',
      code: 'doom_loop',
    });
    expect(tools.calls).toHaveLength(2);
    expect(runner.processor.toolState('a')?.input).toEqual({ path: 'x.ts' });
  });

  it('treats a stream that ends without finishing as a retryable error', async () => {
    const { runner, transport } = makeRunner([[{ type: 'text:delta', text: 'partial' }], [finish]]);

    await expect(runner.run()).resolves.toEqual({ status: 'finished', reason: 'stop' });
    expect(transport.attempts).toHaveLength(2);
  });

  it('turns a transport failure into a stream error', async () => {
    const { runner } = makeRunner([[{ fail: new Error('socket hang up') }]], { maxRetries: 0 });

    await expect(runner.run()).resolves.toEqual({
      status: 'failed',
      error: 'Transport failed: socket hang up',
      code: 'stream_error',
    });
  });

  it('stops with cancelled once the signal is aborted', async () => {
    const controller = new AbortController();
    const tools = makeToolRunner(() => {
      controller.abort();
      return 'ok';
    });
    const { runner } = makeRunner(
      [[...toolCall('t1', 'grep', '{}'), { type: 'text:delta', text: 'after' }, finish]],
      { signal: controller.signal, tools },
    );

    await expect(runner.run()).resolves.toEqual({ status: 'cancelled' });
    expect(tools.execute).toHaveBeenCalledTimes(1);
    expect(runner.processor.toolState('t1')?.status).toBe('running');
  });

  it('reports cancelled when aborted during backoff', async () => {
    const controller = new AbortController();
    const { runner } = makeRunner([[{ type: 'stream:error', error: 'overloaded' }]], {
      signal: controller.signal,
      sleep: async () => {
        controller.abort();
        throw new Error('aborted');
      },
    });

    await expect(runner.run()).resolves.toEqual({ status: 'cancelled' });
  });

  it('records transport usage on the processor and the tracker', async () => {
    const tracker = new TokenUsageTracker('test-model', {
      inputPer1M: 1,
      outputPer1M: 4,
      cacheReadPer1M: 0.5,
      maxTokens: 10_000,
    });
    const { runner } = makeRunner(
      [
        [
          { usage: { inputTokens: 1_000, outputTokens: 200, cacheReadTokens: 400, reasoningTokens: 50 } },
          finish,
        ],
      ],
      { usageTracker: tracker },
    );

    await runner.run();

    expect(runner.processor.tokenUsage()).toEqual({ input: 1_000, output: 200 });
    expect(tracker.promptTokens).toBe(1_000);
    expect(tracker.completionTokens).toBe(250);
    expect(tracker.reasoningTokens).toBe(50);
    expect(tracker.cacheReadTokens).toBe(400);
    expect(tracker.totalTokens).toBe(1_250);
    expect(tracker.estimatedCost).toBeCloseTo(0.001 + 0.0008 + 0.0002 + 0.0002, 10);
  });

  it('takes a snapshot before the first attempt and keeps it across retries', async () => {
    const snapshots = makeSnapshotProvider('snap-7');
    const { runner } = makeRunner([[{ type: 'stream:error', error: 'overloaded' }], [finish]], { snapshots });

    await runner.run();

    expect(snapshots.createSnapshot).toHaveBeenCalledTimes(1);
    expect(snapshots.createSnapshot).toHaveBeenCalledWith('session-1');
    expect(runner.processor.snapshotId()).toBe('snap-7');
  });
});
