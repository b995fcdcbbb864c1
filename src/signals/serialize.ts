import type { LlmAnalysis, SignalBundle, Weekday } from "./types.js";

export interface SerializedSignalBundle {
  user_email: string;
  analyzed_at: string;
  newsletter_signals: {
    newsletter_domains: string[];
    newsletter_categories: Record<string, number>;
    top_newsletters: string[];
    total_newsletters: number;
    newsletter_percentage: number;
  };
  communication_style: {
    avg_email_length: number;
    formality_score: number;
    emoji_usage_rate: number;
    avg_recipients_per_email: number;
    common_greetings: string[];
    common_signoffs: string[];
    sent_email_count: number;
    llm_tone: string | null;
    llm_writing_style: string | null;
    llm_common_topics: string[] | null;
    llm_relationship_quality: string | null;
    llm_professionalism_level: number | null;
    llm_personality_traits: string[] | null;
    llm_communication_strengths: string[] | null;
    llm_analysis_available: boolean;
  };
  professional_context: {
    top_contact_domains: string[];
    domain_categories: Record<string, number>;
    inferred_industry: string | null;
    company_affiliations: string[];
    professional_keywords: string[];
    total_unique_contacts: number;
  };
  activity_patterns: {
    emails_per_day: number;
    peak_activity_hours: number[];
    peak_activity_days: Weekday[];
    thread_depth_avg: number;
    response_rate: number;
    total_threads: number;
    date_range_days: number;
  };
  total_emails_analyzed: number;
  sent_emails_analyzed: number;
  analysis_quality_score: number;
}

function serializeLlmAnalysis(analysis: LlmAnalysis) {
  const insights = analysis.available ? analysis.insights : null;
  return {
    llm_tone: insights?.tone ?? null,
    llm_writing_style: insights?.writingStyle ?? null,
    llm_common_topics: insights?.commonTopics ?? null,
    llm_relationship_quality: insights?.relationshipQuality ?? null,
    llm_professionalism_level: insights?.professionalismLevel ?? null,
    llm_personality_traits: insights?.personalityTraits ?? null,
    llm_communication_strengths: insights?.communicationStrengths ?? null,
    llm_analysis_available: analysis.available,
  };
}

/** Stable JSON shape for persisted reports and API responses. */
export function serializeSignalBundle(bundle: SignalBundle): SerializedSignalBundle {
  const { newsletters, communicationStyle, professionalContext, activityPatterns } = bundle;

  return {
    user_email: bundle.userEmail,
    analyzed_at: bundle.analyzedAt,
    newsletter_signals: {
      newsletter_domains: [...newsletters.newsletterDomains],
      newsletter_categories: { ...newsletters.newsletterCategories },
      top_newsletters: [...newsletters.topNewsletters],
      total_newsletters: newsletters.totalNewsletters,
      newsletter_percentage: newsletters.newsletterPercentage,
    },
    communication_style: {
      avg_email_length: communicationStyle.avgEmailLength,
      formality_score: communicationStyle.formalityScore,
      emoji_usage_rate: communicationStyle.emojiUsageRate,
      avg_recipients_per_email: communicationStyle.avgRecipientsPerEmail,
      common_greetings: [...communicationStyle.commonGreetings],
      common_signoffs: [...communicationStyle.commonSignoffs],
      sent_email_count: communicationStyle.sentEmailCount,
      ...serializeLlmAnalysis(communicationStyle.llmAnalysis),
    },
    professional_context: {
      top_contact_domains: [...professionalContext.topContactDomains],
      domain_categories: { ...professionalContext.domainCategories },
      inferred_industry: professionalContext.inferredIndustry,
      company_affiliations: [...professionalContext.companyAffiliations],
      professional_keywords: [...professionalContext.professionalKeywords],
      total_unique_contacts: professionalContext.totalUniqueContacts,
    },
    activity_patterns: {
      emails_per_day: activityPatterns.emailsPerDay,
      peak_activity_hours: [...activityPatterns.peakActivityHours],
      peak_activity_days: [...activityPatterns.peakActivityDays],
      thread_depth_avg: activityPatterns.avgThreadDepth,
      response_rate: activityPatterns.responseRate,
      total_threads: activityPatterns.totalThreads,
      date_range_days: activityPatterns.dateRangeDays,
    },
    total_emails_analyzed: bundle.totalEmailsAnalyzed,
    sent_emails_analyzed: bundle.sentEmailsAnalyzed,
    analysis_quality_score: bundle.qualityScore,
  };
}
