import type { EmailRecord } from "../signals/index.js";

export const FIXED_NOW = new Date("2025-02-01T12:00:00.000Z");

export function makeEmail(overrides: Partial<EmailRecord> & { id: string }): EmailRecord {
  return {
    threadId: null,
    from: "someone@example.org",
    to: ["me@example.com"],
    subject: "",
    snippet: "",
    timestamp: "",
    listUnsubscribe: null,
    labels: [],
    ...overrides,
  };
}
