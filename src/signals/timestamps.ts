import type { Weekday } from "./types.js";

export interface ParsedTimestamp {
  instant: number; // epoch milliseconds
  hour: number; // 0-23, wall clock in the timestamp's own offset
  weekday: Weekday;
}

const WEEKDAYS: readonly Weekday[] = [
  "Sunday",
  "Monday",
  "Tuesday",
  "Wednesday",
  "Thursday",
  "Friday",
  "Saturday",
];

// RFC 2822 obsolete zone names, in minutes east of UTC
const NAMED_ZONES: Record<string, number> = {
  UT: 0,
  UTC: 0,
  GMT: 0,
  Z: 0,
  EST: -300,
  EDT: -240,
  CST: -360,
  CDT: -300,
  MST: -420,
  MDT: -360,
  PST: -480,
  PDT: -420,
};

const TRAILING_COMMENT = /\s*\([^)]*\)\s*$/;
const NUMERIC_OFFSET = /([+-])(\d{2}):?(\d{2})$/;
const NAMED_OFFSET = /(?:^|[\s\d])([A-Z]{1,3})$/i;

function zoneOffsetMinutes(value: string): number | null {
  const numeric = value.match(NUMERIC_OFFSET);
  // Guard against the day part of a bare ISO date ("2025-01-14") looking like an offset
  if (numeric && !/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    const minutes = Number(numeric[2]) * 60 + Number(numeric[3]);
    return numeric[1] === "-" ? -minutes : minutes;
  }

  const named = value.match(NAMED_OFFSET);
  if (named) {
    const offset = NAMED_ZONES[named[1].toUpperCase()];
    if (offset !== undefined) return offset;
  }
  return null;
}

/**
 * Parses an email Date header (RFC 2822) or an ISO 8601 string. Values
 * without a zone are read as UTC so that results do not depend on the
 * host's time zone. Returns null for anything unparseable.
 */
export function parseEmailTimestamp(raw: string | null | undefined): ParsedTimestamp | null {
  if (!raw) return null;

  const value = raw.replace(TRAILING_COMMENT, "").trim();
  if (!value) return null;

  let offset = zoneOffsetMinutes(value);
  let parseable = value;
  if (offset === null) {
    offset = 0;
    if (/^\d{4}-\d{2}-\d{2}T/.test(value)) {
      parseable = `${value}Z`;
    } else if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
      parseable = `${value} +0000`;
    }
  }

  const instant = Date.parse(parseable);
  if (Number.isNaN(instant)) return null;

  const wallClock = new Date(instant + offset * 60_000);
  return {
    instant,
    hour: wallClock.getUTCHours(),
    weekday: WEEKDAYS[wallClock.getUTCDay()],
  };
}
