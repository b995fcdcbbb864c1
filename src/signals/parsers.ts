import { defaultTables, type SignalTables } from "./tables.js";
import type { DomainCategory } from "./types.js";

// Second-level labels that sit under a country code (acme.co.uk, shop.com.au)
const COUNTRY_SECOND_LEVELS = new Set(["co", "com", "ac", "org", "net", "gov", "edu"]);

const GENERIC_COMPANY_LABELS = new Set(["mail", "email", "webmail"]);

export function extractAddress(from: string): string {
  const open = from.indexOf("<");
  const close = from.indexOf(">", open + 1);
  const address = open !== -1 && close !== -1 ? from.slice(open + 1, close) : from;
  return address.trim().toLowerCase();
}

export function extractDomain(address: string): string {
  const bare = extractAddress(address);
  const at = bare.lastIndexOf("@");
  if (at === -1) return "";

  const domain = bare.slice(at + 1).split(/\s+/)[0] ?? "";
  return domain.replace(/[^a-z0-9.-]+$/, "");
}

export function extractDisplayName(from: string): string | null {
  const open = from.indexOf("<");
  if (open === -1 || from.indexOf(">", open) === -1) return null;

  const name = from
    .slice(0, open)
    .trim()
    .replace(/^["']+|["']+$/g, "")
    .trim();
  return name.length > 0 ? name : null;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * john.doe@example.com -> "John Doe". Needs two usable parts
 * (more than one character, not numeric), otherwise null.
 */
export function nameFromLocalPart(address: string): string | null {
  const bare = extractAddress(address);
  const at = bare.lastIndexOf("@");
  if (at <= 0) return null;

  const parts = bare
    .slice(0, at)
    .split(/[._\-+]/)
    .filter((p) => p.length > 1 && !/^\d+$/.test(p));

  if (parts.length < 2) return null;
  return parts.slice(0, 2).map(capitalize).join(" ");
}

function matchesDomainEntry(domain: string, entry: string): boolean {
  if (entry.startsWith(".")) {
    return domain.endsWith(entry);
  }
  return domain === entry || domain.endsWith(`.${entry}`);
}

export function categorizeDomain(
  domain: string,
  tables: SignalTables = defaultTables
): DomainCategory | null {
  const normalized = domain.trim().toLowerCase();
  if (!normalized) return null;

  for (const [category, entries] of tables.domainCategories) {
    if (entries.some((entry) => matchesDomainEntry(normalized, entry))) {
      return category;
    }
  }
  return null;
}

export function isPersonalDomain(
  domain: string,
  tables: SignalTables = defaultTables
): boolean {
  return tables.personalDomains.has(domain.trim().toLowerCase());
}

export function companyFromDomain(
  domain: string,
  tables: SignalTables = defaultTables
): string | null {
  const normalized = domain.trim().toLowerCase();
  if (!normalized || isPersonalDomain(normalized, tables)) return null;

  const labels = normalized.split(".").filter((l) => l.length > 0);
  if (labels.length < 2) return null;

  const last = labels[labels.length - 1];
  const secondLast = labels[labels.length - 2];
  const underCountryCode =
    labels.length >= 3 && last.length === 2 && COUNTRY_SECOND_LEVELS.has(secondLast);
  const label = underCountryCode ? labels[labels.length - 3] : secondLast;

  if (GENERIC_COMPANY_LABELS.has(label)) return null;

  return label.split("-").filter((w) => w.length > 0).map(capitalize).join(" ") || null;
}
