export { AnthropicCompletionClient, DEFAULT_MODEL } from "./client.js";
export type { Completion, CompletionClient, CompletionOptions } from "./client.js";
export { EnrichmentResponseError, RateLimitExceededError } from "./errors.js";
export { RateLimiter } from "./rate-limiter.js";
export type { RateLimiterOptions, RateLimitStatus } from "./rate-limiter.js";
export { buildStylePrompt, LlmStyleAnalyzer, parseInsightsResponse } from "./style-analyzer.js";
export type { LlmStyleAnalyzerOptions } from "./style-analyzer.js";
export { MODEL_PRICING, UsageTracker } from "./usage.js";
export type { ModelPricing, UsageStats } from "./usage.js";
