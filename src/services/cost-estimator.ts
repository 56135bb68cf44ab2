import type { ModelPrice } from '../types/config.js';
import { ConfigurationError } from '../utils/errors.js';

// USD per 1000 tokens.
export const DEFAULT_PRICING: Record<string, ModelPrice> = {
  'gpt-4': { input: 0.03, output: 0.06 },
  'gpt-4-turbo': { input: 0.01, output: 0.03 },
  'gpt-3.5-turbo': { input: 0.0015, output: 0.002 },
  'gpt-4o': { input: 0.005, output: 0.015 },
  'gpt-4o-mini': { input: 0.00015, output: 0.0006 },
};

export const DEFAULT_PRICING_MODEL = 'gpt-4';

export interface CostEstimatorOptions {
  pricing?: Record<string, ModelPrice>;
  defaultModel?: string;
}

export class CostEstimator {
  private pricing: Record<string, ModelPrice>;
  private defaultModel: string;

  constructor(options: CostEstimatorOptions = {}) {
    this.pricing = { ...DEFAULT_PRICING, ...options.pricing };
    this.defaultModel = options.defaultModel ?? DEFAULT_PRICING_MODEL;

    if (!this.hasPrice(this.defaultModel)) {
      throw new ConfigurationError(`Default pricing model "${this.defaultModel}" has no price entry`);
    }
  }

  /**
   * Prices for `model`, or the default model's prices when it is not in the table.
   */
  getPrice(model: string): ModelPrice {
    const key = this.hasPrice(model) ? model : this.defaultModel;
    const price = this.pricing[key];
    if (!price) {
      throw new ConfigurationError(`Default pricing model "${this.defaultModel}" has no price entry`);
    }
    return price;
  }

  hasPrice(model: string): boolean {
    return Object.hasOwn(this.pricing, model);
  }

  estimateCost(inputTokens: number, outputTokens: number, model: string): number {
    const price = this.getPrice(model);
    const inputCost = (Math.max(0, inputTokens) / 1000) * price.input;
    const outputCost = (Math.max(0, outputTokens) / 1000) * price.output;
    return roundTo(inputCost + outputCost, 6);
  }

  listModels(): string[] {
    return Object.keys(this.pricing);
  }
}

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}
