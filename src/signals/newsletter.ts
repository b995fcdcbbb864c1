import {
  categorizeDomain,
  extractAddress,
  extractDisplayName,
  extractDomain,
} from "./parsers.js";
import { FrequencyCounter, percentage } from "./ranking.js";
import { defaultTables, type SignalTables } from "./tables.js";
import type { EmailRecord, NewsletterSignals } from "./types.js";

export type NewsletterReason =
  | "unsubscribe-header"
  | "subject-keyword"
  | "no-reply-sender"
  | "newsletter-platform";

export const UNCATEGORIZED = "uncategorized";

const TOP_NEWSLETTERS = 5;

const NO_REPLY_LOCAL_PART = /^(no[-_.]?reply|do[-_.]?not[-_.]?reply)([-_.+].*)?$/i;

/**
 * Returns the first rule that marks the record as a newsletter, checked in
 * order of reliability, or null for person-to-person mail.
 */
export function classifyNewsletter(
  record: EmailRecord,
  tables: SignalTables = defaultTables
): NewsletterReason | null {
  if (record.listUnsubscribe && record.listUnsubscribe.trim().length > 0) {
    return "unsubscribe-header";
  }

  const subject = record.subject ?? "";
  if (tables.newsletterKeywords.some((k) => subject.search(k.regex) !== -1)) {
    return "subject-keyword";
  }

  const address = extractAddress(record.from);
  const localPart = address.includes("@") ? address.slice(0, address.lastIndexOf("@")) : "";
  if (NO_REPLY_LOCAL_PART.test(localPart)) {
    return "no-reply-sender";
  }

  const domain = extractDomain(address);
  if (domain) {
    for (const platform of tables.newsletterPlatforms) {
      if (domain === platform || domain.endsWith(`.${platform}`)) {
        return "newsletter-platform";
      }
    }
  }

  return null;
}

export function isNewsletter(
  record: EmailRecord,
  tables: SignalTables = defaultTables
): boolean {
  return classifyNewsletter(record, tables) !== null;
}

export function analyzeNewsletters(
  records: readonly EmailRecord[],
  tables: SignalTables = defaultTables
): NewsletterSignals {
  const domains = new Set<string>();
  const categories = new FrequencyCounter<string>();
  const names = new FrequencyCounter<string>();
  let total = 0;

  for (const record of records) {
    if (!isNewsletter(record, tables)) continue;
    total++;

    const domain = extractDomain(record.from);
    if (domain) {
      domains.add(domain);
    }
    categories.add(categorizeDomain(domain, tables) ?? UNCATEGORIZED);

    const name = extractDisplayName(record.from);
    if (name) {
      names.add(name);
    }
  }

  return {
    newsletterDomains: [...domains],
    newsletterCategories: categories.toRecord(),
    topNewsletters: names.top(TOP_NEWSLETTERS),
    totalNewsletters: total,
    newsletterPercentage: percentage(total, records.length),
  };
}
