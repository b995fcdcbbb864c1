import { z } from "zod";
import type { EnrichmentAnalyzer, LlmInsights } from "../signals/index.js";
import type { CompletionClient } from "./client.js";
import { EnrichmentResponseError } from "./errors.js";
import { RateLimiter } from "./rate-limiter.js";
import { UsageTracker } from "./usage.js";

const MAX_BODY_CHARS = 500;
const MAX_RESPONSE_TOKENS = 500;

const SYSTEM_PROMPT =
  "You are an expert at analyzing communication styles from email content.";

export interface LlmStyleAnalyzerOptions {
  rateLimiter?: RateLimiter;
  usage?: UsageTracker;
  timeoutMs?: number;
}

const textOrList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join(", ") : value));

// Shape the model is asked to answer with
const insightsResponseSchema = z.object({
  tone: textOrList.nullish(),
  writing_style: textOrList.nullish(),
  common_topics: z.array(z.string()).nullish(),
  relationship_quality: textOrList.nullish(),
  professionalism_level: z.coerce.number().min(1).max(10).nullish(),
  personality_traits: z.array(z.string()).nullish(),
  communication_strengths: z.array(z.string()).nullish(),
});

export function buildStylePrompt(bodies: readonly string[]): string {
  const emails = bodies
    .map((body, i) => `Email ${i + 1}:\n${body.slice(0, MAX_BODY_CHARS)}\n`)
    .join("\n---\n");

  return `Analyze these sent emails to understand the sender's communication style and characteristics.

EMAILS:
${emails}

Extract the following insights in JSON format:
1. "tone": Overall tone (professional, friendly, casual, formal, enthusiastic, etc.)
2. "writing_style": Key characteristics of writing style
3. "common_topics": Main topics discussed (list of 3-5)
4. "relationship_quality": How they build relationships (warm, transactional, collaborative, etc.)
5. "professionalism_level": 1-10 scale (1=very casual, 10=very formal)
6. "personality_traits": 2-3 personality traits evident from writing
7. "communication_strengths": 2-3 strengths in their communication

Be specific and evidence-based. Focus on patterns across multiple emails.
Respond ONLY with valid JSON.`;
}

function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : trimmed;
}

export function parseInsightsResponse(text: string): LlmInsights {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFence(text));
  } catch {
    throw new EnrichmentResponseError("LLM answer is not valid JSON", text);
  }

  const parsed = insightsResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new EnrichmentResponseError(
      `LLM answer does not match the insight shape: ${parsed.error.issues.map((i) => i.path.join(".")).join(", ")}`,
      text
    );
  }

  const answer = parsed.data;
  return {
    tone: answer.tone ?? null,
    writingStyle: answer.writing_style ?? null,
    commonTopics: answer.common_topics ?? null,
    relationshipQuality: answer.relationship_quality ?? null,
    professionalismLevel:
      answer.professionalism_level != null ? Math.round(answer.professionalism_level) : null,
    personalityTraits: answer.personality_traits ?? null,
    communicationStrengths: answer.communication_strengths ?? null,
  };
}

/**
 * Asks the LLM for qualitative style insights over a handful of sent
 * bodies. Throws RateLimitExceededError when the daily budget is spent and
 * EnrichmentResponseError when the answer cannot be used.
 */
export class LlmStyleAnalyzer implements EnrichmentAnalyzer {
  private readonly rateLimiter: RateLimiter;
  private readonly usage: UsageTracker;
  private readonly timeoutMs: number | undefined;

  constructor(
    private readonly client: CompletionClient,
    options: LlmStyleAnalyzerOptions = {}
  ) {
    this.rateLimiter = options.rateLimiter ?? new RateLimiter();
    this.usage = options.usage ?? new UsageTracker();
    this.timeoutMs = options.timeoutMs;
  }

  async analyze(bodies: string[], maxCount: number): Promise<LlmInsights | null> {
    const selected = bodies.slice(0, Math.max(maxCount, 0));
    if (selected.length === 0) {
      return null;
    }

    const prompt = buildStylePrompt(selected);

    await this.rateLimiter.acquire();
    console.log(
      `Analyzing ${selected.length} sent emails with ${this.client.model} (~${Math.ceil(prompt.length / 4)} tokens)`
    );

    const completion = await this.client.complete(prompt, {
      maxTokens: MAX_RESPONSE_TOKENS,
      temperature: 0.3,
      system: SYSTEM_PROMPT,
      timeoutMs: this.timeoutMs,
    });

    this.usage.record(completion.model, completion.inputTokens, completion.outputTokens);
    console.log(`LLM cost: $${this.usage.getStats().totalCostUsd.toFixed(6)} (cumulative)`);

    return parseInsightsResponse(completion.text);
  }

  getRateLimitStatus() {
    return this.rateLimiter.getStatus();
  }

  getUsageStats() {
    return this.usage.getStats();
  }
}
