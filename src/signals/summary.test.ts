import { describe, expect, it } from "vitest";
import { FIXED_NOW, makeEmail } from "../testing/fixtures.js";
import { extractSignals } from "./extractor.js";
import { describeFormality, formatSignalSummary } from "./summary.js";

const now = () => FIXED_NOW;

describe("describeFormality", () => {
  it("buckets scores", () => {
    expect(describeFormality(0.8)).toBe("formal");
    expect(describeFormality(0.7)).toBe("professional");
    expect(describeFormality(0.5)).toBe("professional");
    expect(describeFormality(0.2)).toBe("casual");
  });
});

describe("formatSignalSummary", () => {
  it("renders an empty bundle", async () => {
    const bundle = await extractSignals(
      { emails: [], sentEmails: [], userEmail: "me@example.com" },
      { now }
    );

    expect(formatSignalSummary(bundle).split("\n")).toEqual([
      "Signals for me@example.com (2025-02-01T12:00:00.000Z)",
      "Analyzed: 0 emails, 0 sent | quality 0.00",
      "Newsletters: 0 (0%)",
      "Style: no sent emails",
      "Industry: unknown | 0 contacts",
      "Activity: no dated emails",
    ]);
  });

  it("renders style and activity lines", async () => {
    const sent = makeEmail({
      id: "s1",
      from: "me@example.com",
      to: ["friend@example.org"],
      snippet: "Hey! Thanks so much!! 😀",
      timestamp: "2025-01-14T09:15:00Z",
    });
    const bundle = await extractSignals(
      { emails: [sent], sentEmails: [sent], userEmail: "me@example.com" },
      { now }
    );

    const lines = formatSignalSummary(bundle).split("\n");
    expect(lines).toContain('Style: casual (0.13), ~5 words, emoji in 100% of emails');
    expect(lines).toContain('Typical greeting: "hey"');
    expect(lines).toContain('Typical sign-off: "thanks"');
    expect(lines).toContain("Activity: 1/day over 1 days | peak hours 09:00 | peak days Tuesday");
  });
});
