import { describe, expect, it } from "vitest";
import { parseEmailTimestamp } from "./timestamps.js";

describe("parseEmailTimestamp", () => {
  it("reads the wall clock in the header's own offset", () => {
    expect(parseEmailTimestamp("Tue, 14 Jan 2025 09:15:00 +0100")).toEqual({
      instant: Date.UTC(2025, 0, 14, 8, 15),
      hour: 9,
      weekday: "Tuesday",
    });
  });

  it("drops a trailing zone comment", () => {
    expect(parseEmailTimestamp("Mon, 13 Jan 2025 23:30:00 -0800 (PST)")).toEqual({
      instant: Date.UTC(2025, 0, 14, 7, 30),
      hour: 23,
      weekday: "Monday",
    });
  });

  it("understands ISO strings and named zones", () => {
    expect(parseEmailTimestamp("2025-01-14T09:15:00+02:00")?.hour).toBe(9);
    expect(parseEmailTimestamp("Tue, 14 Jan 2025 09:15:00 GMT")?.hour).toBe(9);
  });

  it("reads values without a zone as UTC", () => {
    expect(parseEmailTimestamp("2025-01-14T09:15:00")?.instant).toBe(Date.UTC(2025, 0, 14, 9, 15));
    expect(parseEmailTimestamp("2025-01-14")).toEqual({
      instant: Date.UTC(2025, 0, 14),
      hour: 0,
      weekday: "Tuesday",
    });
  });

  it("returns null for unparseable input", () => {
    expect(parseEmailTimestamp("(no date)")).toBeNull();
    expect(parseEmailTimestamp("")).toBeNull();
    expect(parseEmailTimestamp(null)).toBeNull();
  });
});
