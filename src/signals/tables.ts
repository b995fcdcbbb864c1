import { readFileSync } from "fs";
import { z } from "zod";

const DOMAIN_CATEGORIES = [
  "technology",
  "finance",
  "business",
  "news",
  "productivity",
  "education",
] as const;

const phraseList = z.array(z.string().min(1).transform((s) => s.toLowerCase()));

const tablesSchema = z.object({
  version: z.number().int().positive(),
  domainCategories: z.object({
    technology: phraseList,
    finance: phraseList,
    business: phraseList,
    news: phraseList,
    productivity: phraseList,
    education: phraseList,
  }),
  newsletterKeywords: phraseList,
  newsletterPlatforms: phraseList,
  personalDomains: phraseList,
  formalPhrases: phraseList,
  casualPhrases: phraseList,
  greetings: phraseList,
  signoffs: phraseList,
  professionalKeywords: phraseList,
});

export interface PhrasePattern {
  phrase: string;
  regex: RegExp; // global, case-insensitive
}

/**
 * Lookup tables with their phrase lists compiled to word-bounded regexes.
 * Built once per table version; analyzers only read from it.
 */
export interface SignalTables {
  version: number;
  domainCategories: ReadonlyArray<readonly [(typeof DOMAIN_CATEGORIES)[number], readonly string[]]>;
  newsletterKeywords: readonly PhrasePattern[];
  newsletterPlatforms: ReadonlySet<string>;
  personalDomains: ReadonlySet<string>;
  formalPhrases: readonly PhrasePattern[];
  casualPhrases: readonly PhrasePattern[];
  greetings: readonly PhrasePattern[];
  signoffs: readonly PhrasePattern[];
  professionalKeywords: readonly PhrasePattern[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// Word boundaries only make sense next to word characters ("thanks!" ends in punctuation)
export function compilePhrase(phrase: string): PhrasePattern {
  const start = /^\w/.test(phrase) ? "\\b" : "";
  const end = /\w$/.test(phrase) ? "\\b" : "";
  return {
    phrase,
    regex: new RegExp(`${start}${escapeRegExp(phrase)}${end}`, "gi"),
  };
}

// Longest first so "best regards" wins over "best"
function compileByLength(phrases: string[]): PhrasePattern[] {
  return [...phrases]
    .sort((a, b) => b.length - a.length)
    .map(compilePhrase);
}

export function buildSignalTables(data: unknown): SignalTables {
  const parsed = tablesSchema.parse(data);

  return {
    version: parsed.version,
    domainCategories: DOMAIN_CATEGORIES.map(
      (category) => [category, parsed.domainCategories[category]] as const
    ),
    newsletterKeywords: parsed.newsletterKeywords.map(compilePhrase),
    newsletterPlatforms: new Set(parsed.newsletterPlatforms),
    personalDomains: new Set(parsed.personalDomains),
    formalPhrases: parsed.formalPhrases.map(compilePhrase),
    casualPhrases: parsed.casualPhrases.map(compilePhrase),
    greetings: compileByLength(parsed.greetings),
    signoffs: compileByLength(parsed.signoffs),
    professionalKeywords: parsed.professionalKeywords.map(compilePhrase),
  };
}

export function loadSignalTables(path: string | URL): SignalTables {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return buildSignalTables(raw);
}

export const defaultTables: SignalTables = loadSignalTables(
  new URL("./data/lookup-tables.json", import.meta.url)
);

/**
 * Returns a copy of the default tables with extra entries appended,
 * for deployments that know about domains the shipped tables do not.
 */
export function extendSignalTables(
  extra: Partial<Record<(typeof DOMAIN_CATEGORIES)[number], string[]>>,
  base: SignalTables = defaultTables
): SignalTables {
  return {
    ...base,
    domainCategories: base.domainCategories.map(([category, entries]) => [
      category,
      [...entries, ...(extra[category] ?? []).map((e) => e.toLowerCase())],
    ] as const),
  };
}
