import {
  categorizeDomain,
  companyFromDomain,
  extractAddress,
  extractDomain,
  isPersonalDomain,
} from "./parsers.js";
import { FrequencyCounter } from "./ranking.js";
import { defaultTables, type SignalTables } from "./tables.js";
import type { DomainCategory, EmailRecord, ProfessionalContextSignals } from "./types.js";

export interface ProfessionalOptions {
  tables?: SignalTables;
  // Mail authored by this address is the user's own, not a contact
  userEmail?: string;
}

const TOP_DOMAINS = 10;
const TOP_KEYWORDS = 10;

export function extractProfessionalKeywords(
  subjects: readonly string[],
  tables: SignalTables = defaultTables
): string[] {
  const counts = new FrequencyCounter<string>();

  for (const subject of subjects) {
    for (const keyword of tables.professionalKeywords) {
      const hits = subject.match(keyword.regex)?.length ?? 0;
      if (hits > 0) {
        counts.add(keyword.phrase, hits);
      }
    }
  }

  return counts.top(TOP_KEYWORDS);
}

export function analyzeProfessionalContext(
  records: readonly EmailRecord[],
  options: ProfessionalOptions = {}
): ProfessionalContextSignals {
  const tables = options.tables ?? defaultTables;
  const self = options.userEmail ? extractAddress(options.userEmail) : null;

  const domains = new FrequencyCounter<string>();
  const categories = new FrequencyCounter<DomainCategory>();
  const contacts = new Set<string>();

  for (const record of records) {
    const sender = extractAddress(record.from);
    if (!sender || sender === self) continue;
    contacts.add(sender);

    const domain = extractDomain(sender);
    if (!domain || isPersonalDomain(domain, tables)) continue;

    domains.add(domain);
    const category = categorizeDomain(domain, tables);
    if (category) {
      categories.add(category);
    }
  }

  const topContactDomains = domains.top(TOP_DOMAINS);

  const companies = new Set<string>();
  for (const domain of topContactDomains) {
    const company = companyFromDomain(domain, tables);
    if (company) {
      companies.add(company);
    }
  }

  return {
    topContactDomains,
    domainCategories: categories.toRecord(),
    inferredIndustry: categories.top(1)[0] ?? null,
    companyAffiliations: [...companies],
    professionalKeywords: extractProfessionalKeywords(
      records.map((r) => r.subject ?? ""),
      tables
    ),
    totalUniqueContacts: contacts.size,
  };
}
