import { z } from "zod";

export const emailRecordSchema = z.object({
  id: z.string().min(1),
  threadId: z.string().nullable().default(null),
  from: z.string().default(""),
  to: z.array(z.string()).default([]),
  subject: z.string().default(""),
  snippet: z.string().default(""),
  timestamp: z.string().default(""),
  listUnsubscribe: z.string().nullable().default(null),
  labels: z.array(z.string()).default([]),
  body: z.string().optional(),
});

/** An exported mailbox batch, as read by the HTTP service and the CLI. */
export const emailBatchSchema = z.object({
  userEmail: z.string().email(),
  emails: z.array(emailRecordSchema),
  sentEmails: z.array(emailRecordSchema).default([]),
});

export type EmailBatch = z.infer<typeof emailBatchSchema>;

export const llmInsightsSchema = z.object({
  tone: z.string().nullable(),
  writingStyle: z.string().nullable(),
  commonTopics: z.array(z.string()).nullable(),
  relationshipQuality: z.string().nullable(),
  professionalismLevel: z.number().int().min(1).max(10).nullable(),
  personalityTraits: z.array(z.string()).nullable(),
  communicationStrengths: z.array(z.string()).nullable(),
});

