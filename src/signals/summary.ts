import type { SignalBundle } from "./types.js";

export function describeFormality(score: number): "formal" | "professional" | "casual" {
  return score > 0.7 ? "formal" : score > 0.4 ? "professional" : "casual";
}

function formatHour(hour: number): string {
  return `${hour.toString().padStart(2, "0")}:00`;
}

export function formatSignalSummary(bundle: SignalBundle): string {
  const { newsletters, communicationStyle: style, professionalContext: pro, activityPatterns: activity } =
    bundle;
  const lines: string[] = [];

  lines.push(`Signals for ${bundle.userEmail} (${bundle.analyzedAt})`);
  lines.push(
    `Analyzed: ${bundle.totalEmailsAnalyzed} emails, ${bundle.sentEmailsAnalyzed} sent | quality ${bundle.qualityScore.toFixed(2)}`
  );

  lines.push(
    `Newsletters: ${newsletters.totalNewsletters} (${newsletters.newsletterPercentage}%)` +
      (newsletters.topNewsletters.length > 0 ? ` | top: ${newsletters.topNewsletters.join(", ")}` : "")
  );

  if (style.sentEmailCount > 0) {
    lines.push(
      `Style: ${describeFormality(style.formalityScore)} (${style.formalityScore.toFixed(2)}), ~${style.avgEmailLength} words, emoji in ${style.emojiUsageRate}% of emails`
    );
    if (style.commonGreetings.length > 0) {
      lines.push(`Typical greeting: "${style.commonGreetings[0]}"`);
    }
    if (style.commonSignoffs.length > 0) {
      lines.push(`Typical sign-off: "${style.commonSignoffs[0]}"`);
    }
  } else {
    lines.push("Style: no sent emails");
  }

  if (style.llmAnalysis.available) {
    const { tone, professionalismLevel } = style.llmAnalysis.insights;
    lines.push(
      `LLM: tone ${tone ?? "unknown"}, professionalism ${professionalismLevel ?? "?"}/10`
    );
  }

  lines.push(
    `Industry: ${pro.inferredIndustry ?? "unknown"} | ${pro.totalUniqueContacts} contacts` +
      (pro.topContactDomains.length > 0 ? ` | top domains: ${pro.topContactDomains.slice(0, 3).join(", ")}` : "")
  );

  if (activity.peakActivityHours.length > 0) {
    lines.push(
      `Activity: ${activity.emailsPerDay}/day over ${activity.dateRangeDays} days | peak hours ${activity.peakActivityHours.map(formatHour).join(", ")} | peak days ${activity.peakActivityDays.join(", ")}`
    );
  } else {
    lines.push("Activity: no dated emails");
  }

  return lines.join("\n");
}
