import { FrequencyCounter, mean, percentage, roundTo } from "./ranking.js";
import { llmInsightsSchema } from "./schemas.js";
import { defaultTables, type PhrasePattern, type SignalTables } from "./tables.js";
import { parseEmailTimestamp } from "./timestamps.js";
import type {
  CommunicationStyleSignals,
  EmailRecord,
  EnrichmentAnalyzer,
  LlmAnalysis,
} from "./types.js";

export interface SentEmailAnalysis {
  greeting: string | null;
  signoff: string | null;
  formality: number;
  wordCount: number;
  hasEmoji: boolean;
  recipientCount: number;
}

export interface StyleOptions {
  tables?: SignalTables;
  enrichment?: EnrichmentAnalyzer | null;
  maxEnrichmentEmails?: number;
}

const TOP_PATTERNS = 3;
const DEFAULT_MAX_ENRICHMENT_EMAILS = 10;

// Emoticons, pictographs, transport, flags, dingbats, misc symbols, supplemental symbols
const EMOJI_REGEX =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{2600}-\u{26FF}\u{2700}-\u{27BF}\u{1F900}-\u{1F9FF}\u{1FA70}-\u{1FAFF}]/u;

const CONTRACTIONS = /\b\w+(?:n't|'ll|'re|'ve|'d|'m)\b/gi;
const EXCLAMATION_RUNS = /!+/g;

function countMatches(text: string, patterns: readonly PhrasePattern[]): number {
  return patterns.reduce((count, p) => count + (text.match(p.regex)?.length ?? 0), 0);
}

/**
 * Formality in (0, 1): 0.5 when no markers are found, moving towards 1 with
 * formal phrases and towards 0 with casual ones.
 */
export function scoreFormality(text: string, tables: SignalTables = defaultTables): number {
  if (!text.trim()) return 0.5;

  const formal = countMatches(text, tables.formalPhrases);
  const casual =
    countMatches(text, tables.casualPhrases) +
    (text.match(CONTRACTIONS)?.length ?? 0) +
    (text.match(EXCLAMATION_RUNS)?.length ?? 0);

  return 0.5 + (0.5 * (formal - casual)) / (formal + casual + 1);
}

export function containsEmoji(text: string): boolean {
  return EMOJI_REGEX.test(text);
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((w) => w.length > 0).length;
}

function nonEmptyLines(text: string): string[] {
  return text
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

export function detectGreeting(text: string, tables: SignalTables = defaultTables): string | null {
  const first = nonEmptyLines(text)[0];
  if (!first) return null;

  const match = tables.greetings.find((g) => first.search(g.regex) === 0);
  return match?.phrase ?? null;
}

export function detectSignoff(text: string, tables: SignalTables = defaultTables): string | null {
  const lines = nonEmptyLines(text);
  const last = lines[lines.length - 1];
  if (!last) return null;

  const match = tables.signoffs.find((s) => last.search(s.regex) !== -1);
  return match?.phrase ?? null;
}

export function analyzeSentEmail(
  record: EmailRecord,
  tables: SignalTables = defaultTables
): SentEmailAnalysis {
  const snippet = record.snippet ?? "";
  const text = [record.subject ?? "", snippet].filter((part) => part.length > 0).join("\n");

  return {
    greeting: detectGreeting(snippet, tables),
    signoff: detectSignoff(snippet, tables),
    formality: scoreFormality(text, tables),
    wordCount: countWords(text),
    hasEmoji: containsEmoji(text),
    recipientCount: record.to.length,
  };
}

export function aggregateStyle(
  analyses: SentEmailAnalysis[]
): Omit<CommunicationStyleSignals, "llmAnalysis"> {
  if (analyses.length === 0) {
    return {
      avgEmailLength: 0,
      formalityScore: 0,
      emojiUsageRate: 0,
      avgRecipientsPerEmail: 0,
      commonGreetings: [],
      commonSignoffs: [],
      sentEmailCount: 0,
    };
  }

  const greetings = new FrequencyCounter<string>();
  const signoffs = new FrequencyCounter<string>();
  for (const a of analyses) {
    if (a.greeting) greetings.add(a.greeting);
    if (a.signoff) signoffs.add(a.signoff);
  }

  return {
    avgEmailLength: Math.round(mean(analyses.map((a) => a.wordCount))),
    formalityScore: roundTo(mean(analyses.map((a) => a.formality)), 2),
    emojiUsageRate: percentage(
      analyses.filter((a) => a.hasEmoji).length,
      analyses.length
    ),
    avgRecipientsPerEmail: roundTo(mean(analyses.map((a) => a.recipientCount)), 2),
    commonGreetings: greetings.top(TOP_PATTERNS),
    commonSignoffs: signoffs.top(TOP_PATTERNS),
    sentEmailCount: analyses.length,
  };
}

/** Sent records newest first; records without a parseable date go last. */
function mostRecentFirst(records: readonly EmailRecord[]): EmailRecord[] {
  return records
    .map((record, index) => ({
      record,
      index,
      instant: parseEmailTimestamp(record.timestamp)?.instant ?? -Infinity,
    }))
    .sort((a, b) => b.instant - a.instant || a.index - b.index)
    .map(({ record }) => record);
}

/**
 * Runs the optional LLM analyzer over the most recent sent bodies. Never
 * throws: any failure or unusable answer is reported as unavailable.
 */
export async function enrichCommunicationStyle(
  sentEmails: readonly EmailRecord[],
  analyzer: EnrichmentAnalyzer | null | undefined,
  maxCount: number = DEFAULT_MAX_ENRICHMENT_EMAILS
): Promise<LlmAnalysis> {
  if (!analyzer || maxCount <= 0) {
    return { available: false };
  }

  const bodies = mostRecentFirst(sentEmails)
    .slice(0, maxCount)
    .map((r) => (r.body ?? r.snippet ?? "").trim())
    .filter((body) => body.length > 0);

  if (bodies.length === 0) {
    return { available: false };
  }

  try {
    const result = await analyzer.analyze(bodies, maxCount);
    if (!result) {
      return { available: false };
    }

    const parsed = llmInsightsSchema.safeParse(result);
    if (!parsed.success) {
      console.warn(`LLM style analysis returned an unexpected shape: ${parsed.error.message}`);
      return { available: false };
    }
    return { available: true, insights: parsed.data };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`LLM style analysis unavailable: ${message}`);
    return { available: false };
  }
}

export async function analyzeCommunicationStyle(
  sentEmails: readonly EmailRecord[],
  options: StyleOptions = {}
): Promise<CommunicationStyleSignals> {
  const tables = options.tables ?? defaultTables;

  const heuristics = aggregateStyle(sentEmails.map((r) => analyzeSentEmail(r, tables)));
  const llmAnalysis = await enrichCommunicationStyle(
    sentEmails,
    options.enrichment,
    options.maxEnrichmentEmails
  );

  return { ...heuristics, llmAnalysis };
}
