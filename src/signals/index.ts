export { SignalExtractor, extractSignals, validateSignalInput, calculateQualityScore } from "./extractor.js";
export type { SignalInput, ExtractorOptions } from "./extractor.js";
export { SignalInputError } from "./errors.js";
export {
  extractAddress,
  extractDomain,
  extractDisplayName,
  nameFromLocalPart,
  categorizeDomain,
  companyFromDomain,
  isPersonalDomain,
} from "./parsers.js";
export { analyzeNewsletters, classifyNewsletter, isNewsletter } from "./newsletter.js";
export type { NewsletterReason } from "./newsletter.js";
export { analyzeCommunicationStyle, enrichCommunicationStyle, scoreFormality } from "./style.js";
export { analyzeProfessionalContext } from "./professional.js";
export { analyzeActivityPatterns } from "./activity.js";
export { defaultTables, loadSignalTables, extendSignalTables } from "./tables.js";
export type { SignalTables } from "./tables.js";
export { serializeSignalBundle } from "./serialize.js";
export type { SerializedSignalBundle } from "./serialize.js";
export { formatSignalSummary, describeFormality } from "./summary.js";
export { emailRecordSchema, emailBatchSchema, llmInsightsSchema } from "./schemas.js";
export type { EmailBatch } from "./schemas.js";
export type {
  EmailRecord,
  SignalBundle,
  NewsletterSignals,
  CommunicationStyleSignals,
  ProfessionalContextSignals,
  ActivityPatternSignals,
  LlmInsights,
  LlmAnalysis,
  EnrichmentAnalyzer,
  DomainCategory,
  Weekday,
} from "./types.js";
