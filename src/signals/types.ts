export interface EmailRecord {
  id: string;
  threadId: string | null;
  from: string; // "Display Name <addr@domain>" or a bare address
  to: string[];
  subject: string;
  snippet: string;
  timestamp: string; // RFC 2822 or ISO 8601
  listUnsubscribe: string | null;
  labels: string[];
  body?: string; // full plain-text body, only read by enrichment
}

export type DomainCategory =
  | "technology"
  | "finance"
  | "business"
  | "news"
  | "productivity"
  | "education";

export interface NewsletterSignals {
  newsletterDomains: string[];
  newsletterCategories: Record<string, number>;
  topNewsletters: string[];
  totalNewsletters: number;
  newsletterPercentage: number; // 0-100
}

export interface LlmInsights {
  tone: string | null;
  writingStyle: string | null;
  commonTopics: string[] | null;
  relationshipQuality: string | null;
  professionalismLevel: number | null; // 1-10
  personalityTraits: string[] | null;
  communicationStrengths: string[] | null;
}

export type LlmAnalysis =
  | { available: false }
  | { available: true; insights: LlmInsights };

export interface CommunicationStyleSignals {
  avgEmailLength: number;
  formalityScore: number; // 0 = very casual, 1 = very formal
  emojiUsageRate: number; // 0-100
  avgRecipientsPerEmail: number;
  commonGreetings: string[];
  commonSignoffs: string[];
  sentEmailCount: number;
  llmAnalysis: LlmAnalysis;
}

export interface ProfessionalContextSignals {
  topContactDomains: string[];
  domainCategories: Record<string, number>;
  inferredIndustry: DomainCategory | null;
  companyAffiliations: string[];
  professionalKeywords: string[];
  totalUniqueContacts: number;
}

export type Weekday =
  | "Monday"
  | "Tuesday"
  | "Wednesday"
  | "Thursday"
  | "Friday"
  | "Saturday"
  | "Sunday";

export interface ActivityPatternSignals {
  emailsPerDay: number;
  peakActivityHours: number[];
  peakActivityDays: Weekday[];
  avgThreadDepth: number;
  responseRate: number; // 0-100
  totalThreads: number;
  dateRangeDays: number;
}

export interface SignalBundle {
  userEmail: string;
  analyzedAt: string;
  newsletters: NewsletterSignals;
  communicationStyle: CommunicationStyleSignals;
  professionalContext: ProfessionalContextSignals;
  activityPatterns: ActivityPatternSignals;
  totalEmailsAnalyzed: number;
  sentEmailsAnalyzed: number;
  qualityScore: number; // 0-1, advisory
}

export interface EnrichmentAnalyzer {
  analyze(bodies: string[], maxCount: number): Promise<LlmInsights | null>;
}
