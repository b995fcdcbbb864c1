import { afterEach, describe, expect, it, vi } from "vitest";
import { makeEmail } from "../testing/fixtures.js";
import {
  analyzeCommunicationStyle,
  detectGreeting,
  detectSignoff,
  enrichCommunicationStyle,
  scoreFormality,
} from "./style.js";
import type { EnrichmentAnalyzer, LlmInsights } from "./types.js";

const insights: LlmInsights = {
  tone: "friendly",
  writingStyle: "short and direct",
  commonTopics: ["planning"],
  relationshipQuality: "warm",
  professionalismLevel: 6,
  personalityTraits: ["upbeat"],
  communicationStrengths: ["clarity"],
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe("scoreFormality", () => {
  it("is neutral for empty text", () => {
    expect(scoreFormality("")).toBe(0.5);
    expect(scoreFormality("   ")).toBe(0.5);
  });

  it("moves towards 1 with formal phrases", () => {
    expect(scoreFormality("Dear Sir, please find attached the report. Sincerely")).toBe(0.875);
  });

  it("moves towards 0 with casual markers", () => {
    expect(scoreFormality("hey! gonna be late, lol")).toBeCloseTo(0.1);
  });

  it("stays within bounds", () => {
    const texts = [
      "lol lol lol haha!!! yeah yep nope btw fyi",
      "To whom it may concern, pursuant to our agreement. Yours faithfully. Respectfully",
      "Meeting at noon",
    ];
    for (const text of texts) {
      const score = scoreFormality(text);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(1);
    }
  });
});

describe("greetings and sign-offs", () => {
  const text = "Hi team,\nNotes from today are below.\n\nBest regards";

  it("reads the greeting from the first line", () => {
    expect(detectGreeting(text)).toBe("hi");
    expect(detectGreeting("Thanks for the notes")).toBeNull();
  });

  it("prefers the longest sign-off on the last line", () => {
    expect(detectSignoff(text)).toBe("best regards");
    expect(detectSignoff("")).toBeNull();
  });
});

describe("analyzeCommunicationStyle", () => {
  const casual = makeEmail({
    id: "s1",
    from: "me@example.com",
    to: ["friend@example.org"],
    snippet: "Hey! Thanks so much!! 😀",
  });

  it("scores a casual emoji email", async () => {
    expect(await analyzeCommunicationStyle([casual])).toEqual({
      avgEmailLength: 5,
      formalityScore: 0.13,
      emojiUsageRate: 100,
      avgRecipientsPerEmail: 1,
      commonGreetings: ["hey"],
      commonSignoffs: ["thanks"],
      sentEmailCount: 1,
      llmAnalysis: { available: false },
    });
  });

  it("keeps formality and emoji rate within bounds for extreme input", async () => {
    const records = [
      makeEmail({ id: "emoji", snippet: "😀".repeat(100_000) }),
      makeEmail({ id: "formal", snippet: "sincerely ".repeat(50_000) }),
      makeEmail({ id: "empty", snippet: "" }),
      makeEmail({ id: "casual", snippet: "lol!!! ".repeat(20_000) }),
    ];

    for (const record of records) {
      const style = await analyzeCommunicationStyle([record]);
      expect(style.formalityScore).toBeGreaterThanOrEqual(0);
      expect(style.formalityScore).toBeLessThanOrEqual(1);
      expect(style.emojiUsageRate).toBeGreaterThanOrEqual(0);
      expect(style.emojiUsageRate).toBeLessThanOrEqual(100);
    }

    const combined = await analyzeCommunicationStyle(records);
    expect(combined.emojiUsageRate).toBe(25);
    expect(combined.formalityScore).toBeGreaterThanOrEqual(0);
    expect(combined.formalityScore).toBeLessThanOrEqual(1);
  });

  it("returns zeros when nothing was sent", async () => {
    expect(await analyzeCommunicationStyle([])).toEqual({
      avgEmailLength: 0,
      formalityScore: 0,
      emojiUsageRate: 0,
      avgRecipientsPerEmail: 0,
      commonGreetings: [],
      commonSignoffs: [],
      sentEmailCount: 0,
      llmAnalysis: { available: false },
    });
  });
});

describe("enrichCommunicationStyle", () => {
  const sent = [
    makeEmail({ id: "a", timestamp: "2025-01-10T10:00:00Z", body: "older body" }),
    makeEmail({ id: "b", timestamp: "2025-01-12T10:00:00Z", body: "newer body" }),
    makeEmail({ id: "c", timestamp: "2025-01-11T10:00:00Z", snippet: "snippet only" }),
  ];

  it("passes the most recent bodies to the analyzer", async () => {
    const analyze = vi.fn<EnrichmentAnalyzer["analyze"]>().mockResolvedValue(insights);

    const result = await enrichCommunicationStyle(sent, { analyze }, 2);

    expect(analyze).toHaveBeenCalledWith(["newer body", "snippet only"], 2);
    expect(result).toEqual({ available: true, insights });
  });

  it("is unavailable without an analyzer", async () => {
    expect(await enrichCommunicationStyle(sent, null)).toEqual({ available: false });
  });

  it("is unavailable when the analyzer fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const analyze = vi.fn<EnrichmentAnalyzer["analyze"]>().mockRejectedValue(new Error("timeout"));

    expect(await enrichCommunicationStyle(sent, { analyze })).toEqual({ available: false });
    expect(warn).toHaveBeenCalledWith("LLM style analysis unavailable: timeout");
  });

  it("rejects insights outside the expected shape", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const analyze = vi
      .fn<EnrichmentAnalyzer["analyze"]>()
      .mockResolvedValue({ ...insights, professionalismLevel: 11 });

    expect(await enrichCommunicationStyle(sent, { analyze })).toEqual({ available: false });
  });
});
