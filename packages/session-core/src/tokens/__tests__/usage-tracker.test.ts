import { describe, it, expect } from 'vitest';
import type { ModelPricing } from '@stream-session/contracts';
import { TokenUsageTracker, costFor, limitStatusFor } from '../usage-tracker.js';
import { LedgerError } from '../../errors.js';

const pricing: ModelPricing = {
  inputPer1M: 2,
  outputPer1M: 10,
  cacheReadPer1M: 1,
  maxTokens: 1_000,
};

describe('costFor', () => {
  it('prices tokens per million', () => {
    expect(costFor(500_000, 3)).toBeCloseTo(1.5, 10);
  });

  it('is free without a rate', () => {
    expect(costFor(1_000_000, undefined)).toBe(0);
  });
});

describe('limitStatusFor', () => {
  it('switches at 75 and 90 percent', () => {
    expect(limitStatusFor(74.9)).toBe('normal');
    expect(limitStatusFor(75)).toBe('warning');
    expect(limitStatusFor(89.99)).toBe('warning');
    expect(limitStatusFor(90)).toBe('critical');
  });
});

describe('TokenUsageTracker', () => {
  it('accumulates prompt and completion tokens into the total', () => {
    const tracker = new TokenUsageTracker('test-model', pricing);
    tracker.recordPrompt(500);
    tracker.recordCompletion(100);

    expect(tracker.promptTokens).toBe(500);
    expect(tracker.completionTokens).toBe(100);
    expect(tracker.totalTokens).toBe(600);
    expect(tracker.estimatedCost).toBeCloseTo(0.002, 10);
    expect(tracker.usagePercentage()).toBeCloseTo(60, 10);
    expect(tracker.limitStatus()).toBe('normal');
  });

  it('bills reasoning as completion at the output rate', () => {
    const tracker = new TokenUsageTracker('test-model', pricing);
    tracker.recordPrompt(500);
    tracker.recordCompletion(100);
    tracker.recordReasoning(200);

    expect(tracker.reasoningTokens).toBe(200);
    expect(tracker.completionTokens).toBe(300);
    expect(tracker.totalTokens).toBe(800);
    expect(tracker.totalTokens).toBe(tracker.promptTokens + tracker.completionTokens);
    expect(tracker.estimatedCost).toBeCloseTo(0.004, 10);
    expect(tracker.limitStatus()).toBe('warning');
  });

  it('keeps cache tokens out of the total and bills them at their own rates', () => {
    const tracker = new TokenUsageTracker('test-model', pricing);
    tracker.recordCacheRead(1_000);
    tracker.recordCacheWrite(100);

    expect(tracker.cacheReadTokens).toBe(1_000);
    expect(tracker.cacheWriteTokens).toBe(100);
    expect(tracker.totalTokens).toBe(0);
    expect(tracker.estimatedCost).toBeCloseTo(0.001, 10);
  });

  it('reports critical at ninety percent of the limit', () => {
    const tracker = new TokenUsageTracker('test-model', pricing);
    tracker.recordPrompt(900);

    expect(tracker.limitStatus()).toBe('critical');
  });

  it('reports zero usage when the limit is zero', () => {
    const tracker = new TokenUsageTracker('test-model', pricing, 0);
    tracker.recordPrompt(5_000);

    expect(tracker.usagePercentage()).toBe(0);
    expect(tracker.limitStatus()).toBe('normal');
  });

  it('rejects negative and fractional counts without recording them', () => {
    const tracker = new TokenUsageTracker('test-model', pricing);

    expect(() => tracker.recordPrompt(-1)).toThrow(LedgerError);
    expect(() => tracker.recordCompletion(1.5)).toThrow(
      'LEDGER_INVALID_COUNT: completion token count must be a non-negative integer, got 1.5',
    );
    expect(tracker.totalTokens).toBe(0);
    expect(tracker.estimatedCost).toBe(0);
  });

  it('snapshots every counter and zeroes them on reset', () => {
    const tracker = new TokenUsageTracker('test-model', pricing);
    tracker.recordPrompt(10);
    tracker.recordCompletion(5);
    tracker.recordReasoning(1);
    tracker.recordCacheRead(3);
    tracker.recordCacheWrite(2);

    expect(tracker.snapshot()).toEqual({
      model: 'test-model',
      totalTokens: 16,
      promptTokens: 10,
      completionTokens: 6,
      cacheReadTokens: 3,
      cacheWriteTokens: 2,
      reasoningTokens: 1,
      estimatedCost: expect.any(Number),
      tokenLimit: 1_000,
    });

    tracker.reset();
    expect(tracker.snapshot()).toEqual({
      model: 'test-model',
      totalTokens: 0,
      promptTokens: 0,
      completionTokens: 0,
      cacheReadTokens: 0,
      cacheWriteTokens: 0,
      reasoningTokens: 0,
      estimatedCost: 0,
      tokenLimit: 1_000,
    });
  });
});
