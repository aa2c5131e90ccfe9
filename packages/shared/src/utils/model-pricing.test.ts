import { describe, expect, test } from 'vitest';

import { MODEL_PRICING, calculateCost } from './model-pricing';

describe('calculateCost', () => {
  test('prices input and output tokens per million', () => {
    expect(calculateCost('gpt-5-mini', 1_000_000, 1_000_000)).toBe(2.25);
  });

  test('prices a typical page analysis call', () => {
    expect(calculateCost('gpt-4o', 1200, 400)).toBeCloseTo(0.007, 10);
  });

  test('returns zero for zero tokens of a known model', () => {
    expect(calculateCost('claude-haiku-4-5', 0, 0)).toBe(0);
  });

  test('returns undefined for models without pricing', () => {
    expect(calculateCost('local-llava', 1000, 1000)).toBeUndefined();
    expect(calculateCost('constructor', 1000, 1000)).toBeUndefined();
  });

  test('has non-negative prices for every model', () => {
    for (const pricing of Object.values(MODEL_PRICING)) {
      expect(pricing.input).toBeGreaterThanOrEqual(0);
      expect(pricing.output).toBeGreaterThanOrEqual(0);
    }
  });
});
