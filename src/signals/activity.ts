import { FrequencyCounter, percentage, roundTo } from "./ranking.js";
import { parseEmailTimestamp, type ParsedTimestamp } from "./timestamps.js";
import type { ActivityPatternSignals, EmailRecord, Weekday } from "./types.js";

const TOP_PEAKS = 3;
const DAY_MS = 24 * 60 * 60 * 1000;

// "Re:", "RE:", "Re[2]:", and the German/Nordic "Aw:" / "Sv:"
const REPLY_PREFIX = /^\s*(?:re|aw|sv)\s*(?:\[\d+\])?\s*:/i;

export function hasReplyPrefix(subject: string): boolean {
  return REPLY_PREFIX.test(subject);
}

/**
 * Ids of records that open their thread: the earliest parseable timestamp,
 * first-encountered on ties. Threads with no parseable timestamp have none.
 */
function threadOpeners(
  records: readonly EmailRecord[],
  parsed: ReadonlyArray<ParsedTimestamp | null>
): Set<number> {
  const earliest = new Map<string, { index: number; instant: number }>();

  records.forEach((record, index) => {
    const ts = parsed[index];
    if (!record.threadId || !ts) return;

    const current = earliest.get(record.threadId);
    if (!current || ts.instant < current.instant) {
      earliest.set(record.threadId, { index, instant: ts.instant });
    }
  });

  return new Set([...earliest.values()].map((e) => e.index));
}

/**
 * A reply is a record with a reply prefix, or one that is not the first
 * message of its thread. This is an approximation: forwarded chains and
 * clients that drop prefixes are misread.
 */
function countReplies(
  records: readonly EmailRecord[],
  parsed: ReadonlyArray<ParsedTimestamp | null>
): number {
  const openers = threadOpeners(records, parsed);

  return records.filter((record, index) => {
    if (hasReplyPrefix(record.subject ?? "")) return true;
    return Boolean(record.threadId && parsed[index] && !openers.has(index));
  }).length;
}

export function analyzeActivityPatterns(
  records: readonly EmailRecord[]
): ActivityPatternSignals {
  const parsed = records.map((r) => parseEmailTimestamp(r.timestamp));

  const hours = new FrequencyCounter<number>();
  const days = new FrequencyCounter<Weekday>();
  let earliest = Infinity;
  let latest = -Infinity;
  let dated = 0;

  for (const ts of parsed) {
    if (!ts) continue;
    dated++;
    hours.add(ts.hour);
    days.add(ts.weekday);
    earliest = Math.min(earliest, ts.instant);
    latest = Math.max(latest, ts.instant);
  }

  const dateRangeDays = dated > 0 ? Math.max(Math.floor((latest - earliest) / DAY_MS), 1) : 0;

  const threads = new FrequencyCounter<string>();
  for (const record of records) {
    if (record.threadId) {
      threads.add(record.threadId);
    }
  }
  const threadedRecords = records.filter((r) => r.threadId).length;

  return {
    emailsPerDay: dated > 0 ? roundTo(dated / dateRangeDays, 1) : 0,
    peakActivityHours: hours.top(TOP_PEAKS),
    peakActivityDays: days.top(TOP_PEAKS),
    avgThreadDepth: threads.size > 0 ? roundTo(threadedRecords / threads.size, 1) : 0,
    responseRate: percentage(countReplies(records, parsed), records.length),
    totalThreads: threads.size,
    dateRangeDays,
  };
}
