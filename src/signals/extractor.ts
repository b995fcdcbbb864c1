import { analyzeActivityPatterns } from "./activity.js";
import { SignalInputError } from "./errors.js";
import { analyzeNewsletters } from "./newsletter.js";
import { extractAddress } from "./parsers.js";
import { analyzeProfessionalContext } from "./professional.js";
import { roundTo } from "./ranking.js";
import { analyzeCommunicationStyle } from "./style.js";
import { defaultTables, type SignalTables } from "./tables.js";
import type {
  ActivityPatternSignals,
  EmailRecord,
  EnrichmentAnalyzer,
  NewsletterSignals,
  ProfessionalContextSignals,
  SignalBundle,
} from "./types.js";

export interface SignalInput {
  emails: readonly EmailRecord[];
  sentEmails: readonly EmailRecord[];
  userEmail: string;
}

export interface ExtractorOptions {
  tables?: SignalTables;
  enrichment?: EnrichmentAnalyzer | null;
  maxEnrichmentEmails?: number;
  maxEmailsToAnalyze?: number;
  now?: () => Date;
}

// Data volumes at which the volume part of the quality score saturates
const QUALITY_EMAIL_SATURATION = 200;
const QUALITY_SENT_SATURATION = 50;

const MAX_LISTED_PROBLEMS = 5;

const ADDRESS_SHAPE = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function validateSignalInput(input: SignalInput): void {
  const user = extractAddress(input.userEmail);
  if (!ADDRESS_SHAPE.test(user)) {
    throw new SignalInputError(`Invalid user email "${input.userEmail}"`);
  }

  const batchIds = new Set(input.emails.map((e) => e.id));
  const missing = input.sentEmails.filter((e) => !batchIds.has(e.id)).map((e) => e.id);
  if (missing.length > 0) {
    throw new SignalInputError(
      `${missing.length} sent email(s) are not part of the full batch`,
      missing.slice(0, MAX_LISTED_PROBLEMS)
    );
  }

  // Senders that do not parse are malformed, not foreign
  const foreign = input.sentEmails
    .filter((e) => {
      const sender = extractAddress(e.from);
      return sender.includes("@") && sender !== user;
    })
    .map((e) => e.id);
  if (foreign.length > 0) {
    throw new SignalInputError(
      `${foreign.length} sent email(s) were not sent by ${user}`,
      foreign.slice(0, MAX_LISTED_PROBLEMS)
    );
  }
}

export function calculateQualityScore(params: {
  totalEmails: number;
  sentEmails: number;
  newsletters: NewsletterSignals;
  professional: ProfessionalContextSignals;
  activity: ActivityPatternSignals;
}): number {
  let score = 0;

  score += 0.3 * Math.min(params.totalEmails / QUALITY_EMAIL_SATURATION, 1);
  score += 0.3 * Math.min(params.sentEmails / QUALITY_SENT_SATURATION, 1);

  if (params.newsletters.totalNewsletters > 0) score += 0.15;
  if (params.professional.topContactDomains.length > 0) score += 0.1;
  if (params.activity.peakActivityHours.length > 0) score += 0.15;

  return roundTo(Math.min(Math.max(score, 0), 1), 2);
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export class SignalExtractor {
  constructor(private readonly options: ExtractorOptions = {}) {}

  async extract(input: SignalInput): Promise<SignalBundle> {
    validateSignalInput(input);

    const { emails, sentEmails } = this.applyLimit(input);
    const tables = this.options.tables ?? defaultTables;
    const userEmail = extractAddress(input.userEmail);

    // Independent, read-only passes over the same batch
    const [newsletters, communicationStyle, professionalContext, activityPatterns] =
      await Promise.all([
        Promise.resolve().then(() => analyzeNewsletters(emails, tables)),
        analyzeCommunicationStyle(sentEmails, {
          tables,
          enrichment: this.options.enrichment,
          maxEnrichmentEmails: this.options.maxEnrichmentEmails,
        }),
        Promise.resolve().then(() =>
          analyzeProfessionalContext(emails, { tables, userEmail })
        ),
        Promise.resolve().then(() => analyzeActivityPatterns(emails)),
      ]);

    const qualityScore = calculateQualityScore({
      totalEmails: emails.length,
      sentEmails: sentEmails.length,
      newsletters,
      professional: professionalContext,
      activity: activityPatterns,
    });

    const now = this.options.now ?? (() => new Date());

    return deepFreeze({
      userEmail,
      analyzedAt: now().toISOString(),
      newsletters,
      communicationStyle,
      professionalContext,
      activityPatterns,
      totalEmailsAnalyzed: emails.length,
      sentEmailsAnalyzed: sentEmails.length,
      qualityScore,
    });
  }

  private applyLimit(input: SignalInput): {
    emails: readonly EmailRecord[];
    sentEmails: readonly EmailRecord[];
  } {
    const limit = this.options.maxEmailsToAnalyze;
    if (limit === undefined || input.emails.length <= limit) {
      return { emails: input.emails, sentEmails: input.sentEmails };
    }

    const emails = input.emails.slice(0, Math.max(limit, 0));
    const kept = new Set(emails.map((e) => e.id));
    return {
      emails,
      sentEmails: input.sentEmails.filter((e) => kept.has(e.id)),
    };
  }
}

export function extractSignals(
  input: SignalInput,
  options: ExtractorOptions = {}
): Promise<SignalBundle> {
  return new SignalExtractor(options).extract(input);
}
