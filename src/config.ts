import {
  AnthropicCompletionClient,
  DEFAULT_MODEL,
  LlmStyleAnalyzer,
  RateLimiter,
  UsageTracker,
} from "./enrichment/index.js";
import type { EnrichmentAnalyzer } from "./signals/index.js";

export interface LlmSettings {
  enabled: boolean;
  apiKey: string | undefined;
  model: string;
  maxEmailsToAnalyze: number;
  requestsPerMinute: number;
  requestsPerDay: number;
  timeoutMs: number;
}

export interface Settings {
  databaseUrl: string | undefined;
  databaseAuthToken: string | undefined;
  port: number;
  maxEmailsToAnalyze: number;
  llm: LlmSettings;
}

export interface LoadSettingsOptions {
  requireDatabase?: boolean;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, key: string, fallback: number, problems: string[], min = 1): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    problems.push(`${key} must be an integer >= ${min} (got "${raw}")`);
    return fallback;
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean, problems: string[]): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (!raw) return fallback;

  if (["true", "1", "yes", "on"].includes(raw)) return true;
  if (["false", "0", "no", "off"].includes(raw)) return false;

  problems.push(`${key} must be true or false (got "${raw}")`);
  return fallback;
}

/**
 * Reads settings from environment variables. Every missing or malformed
 * variable is reported in a single error.
 */
export function loadSettings(env: Env = process.env, options: LoadSettingsOptions = {}): Settings {
  const problems: string[] = [];

  const databaseUrl = env.DATABASE_URL?.trim() || undefined;
  if (options.requireDatabase && !databaseUrl) {
    problems.push("DATABASE_URL is required");
  }

  const llmEnabled = readBool(env, "ENABLE_LLM_ANALYSIS", false, problems);
  const apiKey = env.ANTHROPIC_API_KEY?.trim() || undefined;
  if (llmEnabled && !apiKey) {
    problems.push("ANTHROPIC_API_KEY is required when ENABLE_LLM_ANALYSIS is true");
  }

  const settings: Settings = {
    databaseUrl,
    databaseAuthToken: env.DATABASE_AUTH_TOKEN?.trim() || undefined,
    port: readInt(env, "PORT", 3000, problems, 0),
    maxEmailsToAnalyze: readInt(env, "MAX_EMAILS_TO_ANALYZE", 500, problems),
    llm: {
      enabled: llmEnabled,
      apiKey,
      model: env.ANTHROPIC_MODEL?.trim() || DEFAULT_MODEL,
      maxEmailsToAnalyze: readInt(env, "LLM_MAX_EMAILS_TO_ANALYZE", 10, problems),
      requestsPerMinute: readInt(env, "LLM_REQUESTS_PER_MINUTE", 15, problems),
      requestsPerDay: readInt(env, "LLM_REQUESTS_PER_DAY", 1500, problems),
      timeoutMs: readInt(env, "LLM_TIMEOUT_MS", 30000, problems),
    },
  };

  if (problems.length > 0) {
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  return settings;
}

export function createEnrichment(settings: Settings): EnrichmentAnalyzer | null {
  const { llm } = settings;
  if (!llm.enabled || !llm.apiKey) {
    return null;
  }

  return new LlmStyleAnalyzer(new AnthropicCompletionClient(llm.apiKey, llm.model), {
    rateLimiter: new RateLimiter({
      requestsPerMinute: llm.requestsPerMinute,
      requestsPerDay: llm.requestsPerDay,
    }),
    usage: new UsageTracker(),
    timeoutMs: llm.timeoutMs,
  });
}
