export interface ModelPricing {
  inputPerMillion: number; // USD
  outputPerMillion: number; // USD
}

export const MODEL_PRICING: Record<string, ModelPricing> = {
  "claude-haiku-4-5": { inputPerMillion: 1, outputPerMillion: 5 },
  "claude-sonnet-4-5": { inputPerMillion: 3, outputPerMillion: 15 },
  "claude-3-5-haiku-latest": { inputPerMillion: 0.8, outputPerMillion: 4 },
};

const FALLBACK_PRICING: ModelPricing = MODEL_PRICING["claude-haiku-4-5"];

export interface UsageStats {
  requests: number;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  inputCostUsd: number;
  outputCostUsd: number;
  totalCostUsd: number;
}

function roundUsd(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

/** Running token and cost totals for the LLM calls of one process. */
export class UsageTracker {
  private requests = 0;
  private inputTokens = 0;
  private outputTokens = 0;
  private inputCost = 0;
  private outputCost = 0;

  record(model: string, inputTokens: number, outputTokens: number): void {
    const pricing = MODEL_PRICING[model] ?? FALLBACK_PRICING;

    this.requests++;
    this.inputTokens += inputTokens;
    this.outputTokens += outputTokens;
    this.inputCost += (inputTokens / 1_000_000) * pricing.inputPerMillion;
    this.outputCost += (outputTokens / 1_000_000) * pricing.outputPerMillion;
  }

  getStats(): UsageStats {
    return {
      requests: this.requests,
      inputTokens: this.inputTokens,
      outputTokens: this.outputTokens,
      totalTokens: this.inputTokens + this.outputTokens,
      inputCostUsd: roundUsd(this.inputCost),
      outputCostUsd: roundUsd(this.outputCost),
      totalCostUsd: roundUsd(this.inputCost + this.outputCost),
    };
  }

  reset(): void {
    this.requests = 0;
    this.inputTokens = 0;
    this.outputTokens = 0;
    this.inputCost = 0;
    this.outputCost = 0;
  }
}
