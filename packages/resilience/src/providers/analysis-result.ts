import type { AnalysisResult } from './types.js';

type ModelPricing = {
  input: number;
  output: number;
};

// USD per million tokens
const MODEL_PRICING: Readonly<Record<string, ModelPricing>> = Object.freeze({
  'claude-sonnet-4-20250514': { input: 3, output: 15 },
  'claude-3-5-haiku-20241022': { input: 1, output: 5 },
  'gpt-4o': { input: 2.5, output: 10 },
  'gpt-4o-mini': { input: 0.15, output: 0.6 },
  'gemini-1.5-pro': { input: 1.25, output: 5 },
  'gemini-1.5-flash': { input: 0.075, output: 0.3 },
});

const DEFAULT_PRICING: ModelPricing = { input: 3, output: 15 };

function totalTokens(result: AnalysisResult): number {
  return result.inputTokens + result.outputTokens;
}

function estimateCost(result: AnalysisResult): number {
  const pricing = Object.hasOwn(MODEL_PRICING, result.model)
    ? MODEL_PRICING[result.model] ?? DEFAULT_PRICING
    : DEFAULT_PRICING;

  return (
    (result.inputTokens * pricing.input) / 1_000_000 +
    (result.outputTokens * pricing.output) / 1_000_000
  );
}

export { MODEL_PRICING, DEFAULT_PRICING, totalTokens, estimateCost };
export type { ModelPricing };
