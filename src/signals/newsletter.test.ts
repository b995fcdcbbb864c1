import { describe, expect, it } from "vitest";
import { makeEmail } from "../testing/fixtures.js";
import { analyzeNewsletters, classifyNewsletter } from "./newsletter.js";
import { extendSignalTables } from "./tables.js";

describe("classifyNewsletter", () => {
  it("prefers the unsubscribe header", () => {
    const email = makeEmail({
      id: "1",
      from: "noreply@service.io",
      subject: "Weekly digest",
      listUnsubscribe: "<mailto:leave@service.io>",
    });
    expect(classifyNewsletter(email)).toBe("unsubscribe-header");
  });

  it("matches subject keywords on word boundaries", () => {
    expect(classifyNewsletter(makeEmail({ id: "1", subject: "Your Weekly Digest" }))).toBe(
      "subject-keyword"
    );
    expect(classifyNewsletter(makeEmail({ id: "2", subject: "Digestion tips" }))).toBeNull();
  });

  it("flags no-reply senders", () => {
    const email = makeEmail({ id: "1", from: "No Reply <no-reply@service.io>", subject: "Your receipt" });
    expect(classifyNewsletter(email)).toBe("no-reply-sender");
  });

  it("flags newsletter platforms and their subdomains", () => {
    expect(
      classifyNewsletter(makeEmail({ id: "1", from: "Writer <writer@substack.com>", subject: "New post" }))
    ).toBe("newsletter-platform");
    expect(
      classifyNewsletter(makeEmail({ id: "2", from: "team@news.beehiiv.com", subject: "New post" }))
    ).toBe("newsletter-platform");
  });

  it("leaves person-to-person mail alone", () => {
    expect(
      classifyNewsletter(makeEmail({ id: "1", from: "alice@company.com", subject: "Lunch tomorrow?" }))
    ).toBeNull();
  });
});

describe("analyzeNewsletters", () => {
  const tables = extendSignalTables({ technology: ["example.com"] });

  const batch = Array.from({ length: 10 }, (_, i) =>
    i < 4
      ? makeEmail({
          id: `n${i}`,
          from: `"Example Weekly" <news@newsletter.example.com>`,
          subject: `Issue ${i + 1}`,
          listUnsubscribe: "<https://newsletter.example.com/unsubscribe>",
        })
      : makeEmail({ id: `p${i}`, from: "colleague@acmecorp.com", subject: `Lunch plans ${i}` })
  );

  it("counts newsletters by domain and category", () => {
    expect(analyzeNewsletters(batch, tables)).toEqual({
      newsletterDomains: ["newsletter.example.com"],
      newsletterCategories: { technology: 4 },
      topNewsletters: ["Example Weekly"],
      totalNewsletters: 4,
      newsletterPercentage: 40,
    });
  });

  it("files unknown domains as uncategorized", () => {
    expect(analyzeNewsletters(batch).newsletterCategories).toEqual({ uncategorized: 4 });
  });

  it("ranks display names by frequency, ties in first-seen order", () => {
    const from = (name: string) => `${name} <${name.toLowerCase()}@substack.com>`;
    const records = ["Alpha", "Beta", "Beta", "Gamma", "Alpha", "Beta"].map((name, i) =>
      makeEmail({ id: String(i), from: from(name) })
    );

    expect(analyzeNewsletters(records).topNewsletters).toEqual(["Beta", "Alpha", "Gamma"]);
  });

  it("returns empty signals for an empty batch", () => {
    expect(analyzeNewsletters([])).toEqual({
      newsletterDomains: [],
      newsletterCategories: {},
      topNewsletters: [],
      totalNewsletters: 0,
      newsletterPercentage: 0,
    });
  });
});
