import { describe, it, expect } from 'vitest';
import { CostEstimator, roundTo } from '../src/services/cost-estimator.js';
import { ConfigurationError } from '../src/utils/errors.js';

describe('CostEstimator', () => {
  const estimator = new CostEstimator();

  it('prices input and output per 1000 tokens', () => {
    expect(estimator.estimateCost(1000, 500, 'gpt-4')).toBe(0.06);
    expect(estimator.estimateCost(2000, 1000, 'gpt-3.5-turbo')).toBeCloseTo(0.005, 9);
  });

  it('uses gpt-4 prices for unknown models', () => {
    expect(estimator.estimateCost(1000, 500, 'mystery-model')).toBe(0.06);
    expect(estimator.getPrice('constructor')).toEqual({ input: 0.03, output: 0.06 });
  });

  it('treats negative token counts as zero', () => {
    expect(estimator.estimateCost(-100, -5, 'gpt-4')).toBe(0);
    expect(estimator.estimateCost(-100, 1000, 'gpt-4')).toBe(0.06);
  });

  it('rounds to six decimals', () => {
    expect(estimator.estimateCost(1, 0, 'gpt-4o-mini')).toBe(0);
    expect(estimator.estimateCost(7, 0, 'gpt-4o-mini')).toBe(0.000001);
  });

  it('accepts extra prices from configuration', () => {
    const custom = new CostEstimator({ pricing: { 'local-model': { input: 0, output: 0 } } });
    expect(custom.hasPrice('local-model')).toBe(true);
    expect(custom.estimateCost(5000, 5000, 'local-model')).toBe(0);
    expect(custom.listModels()).toContain('gpt-4o');
  });

  it('rejects a default model without a price', () => {
    expect(() => new CostEstimator({ defaultModel: 'missing' })).toThrow(ConfigurationError);
  });
});

describe('roundTo', () => {
  it('rounds to the given number of decimals', () => {
    expect(roundTo(1.23456, 2)).toBe(1.23);
    expect(roundTo(66.6666, 2)).toBe(66.67);
  });
});
