/**
 * Tests for temporal phrase extraction and relative-time parsing.
 * The clock is fixed to Wednesday 2025-06-11 12:00 UTC.
 */

import { describe, test, expect } from "vitest";
import { extractTimeRange, inRange, parseRelativeTime } from "../src/temporal";

const NOW = new Date("2025-06-11T12:00:00.000Z");

function window(text: string): { from: string; to: string; phrase: string } | null {
  const range = extractTimeRange(text, NOW);
  return range && { from: range.from.toISOString(), to: range.to.toISOString(), phrase: range.phrase };
}

describe("extractTimeRange", () => {
  test("last week is the seven days before now", () => {
    expect(window("What did we decide about pricing last week?")).toEqual({
      from: "2025-06-04T12:00:00.000Z",
      to: "2025-06-11T12:00:00.000Z",
      phrase: "last week",
    });
  });

  test("yesterday is the whole previous UTC day", () => {
    expect(window("What happened yesterday?")).toEqual({
      from: "2025-06-10T00:00:00.000Z",
      to: "2025-06-10T23:59:59.999Z",
      phrase: "yesterday",
    });
  });

  test("today starts at UTC midnight", () => {
    expect(window("notes from today")?.from).toBe("2025-06-11T00:00:00.000Z");
  });

  test("this week starts on Monday", () => {
    expect(window("meetings this week")?.from).toBe("2025-06-09T00:00:00.000Z");
  });

  test("past and last N units", () => {
    expect(window("in the past 3 days")?.from).toBe("2025-06-08T12:00:00.000Z");
    expect(window("over the last 2 weeks")).toEqual({
      from: "2025-05-28T12:00:00.000Z",
      to: "2025-06-11T12:00:00.000Z",
      phrase: "last 2 weeks",
    });
  });

  test("N weeks ago is that calendar day", () => {
    expect(window("what did I save 2 weeks ago")).toEqual({
      from: "2025-05-28T00:00:00.000Z",
      to: "2025-05-28T23:59:59.999Z",
      phrase: "2 weeks ago",
    });
  });

  test("last month and last year", () => {
    expect(window("last month")?.from).toBe("2025-05-12T12:00:00.000Z");
    expect(window("What was planned last year?")).toEqual({
      from: "2024-01-01T00:00:00.000Z",
      to: "2024-12-31T23:59:59.999Z",
      phrase: "last year",
    });
  });

  test("month names resolve to the most recent such month", () => {
    expect(window("What happened in March?")).toEqual({
      from: "2025-03-01T00:00:00.000Z",
      to: "2025-03-31T23:59:59.999Z",
      phrase: "in march",
    });
    expect(window("during november")?.from).toBe("2024-11-01T00:00:00.000Z");
    expect(window("budget for march 2024")?.to).toBe("2024-03-31T23:59:59.999Z");
  });

  test("a bare year covers the whole year", () => {
    expect(window("decisions in 2023")).toEqual({
      from: "2023-01-01T00:00:00.000Z",
      to: "2023-12-31T23:59:59.999Z",
      phrase: "in 2023",
    });
  });

  test("recently is the last seven days", () => {
    expect(window("What did we discuss recently?")?.from).toBe("2025-06-04T12:00:00.000Z");
  });

  test("unrecognized phrases give no window", () => {
    expect(window("What did we decide about pricing?")).toBeNull();
    expect(window("may I ask about the budget")).toBeNull();
    expect(window("someday soon")).toBeNull();
  });
});

describe("inRange", () => {
  test("bounds are inclusive", () => {
    const range = { from: new Date("2025-01-01T00:00:00Z"), to: new Date("2025-01-31T00:00:00Z"), phrase: "x" };
    expect(inRange(new Date("2025-01-01T00:00:00Z"), range)).toBe(true);
    expect(inRange(new Date("2025-01-31T00:00:00Z"), range)).toBe(true);
    expect(inRange(new Date("2025-02-01T00:00:00Z"), range)).toBe(false);
  });
});

describe("parseRelativeTime", () => {
  test("latest and oldest with ordinals", () => {
    expect(parseRelativeTime("latest", NOW)).toEqual({ mode: "latest", ordinal: 1 });
    expect(parseRelativeTime("first", NOW)).toEqual({ mode: "oldest", ordinal: 1 });
    expect(parseRelativeTime("2nd oldest", NOW)).toEqual({ mode: "oldest", ordinal: 2 });
    expect(parseRelativeTime("Third Newest", NOW)).toEqual({ mode: "latest", ordinal: 3 });
  });

  test("offsets from now", () => {
    expect(parseRelativeTime("3 hours ago", NOW)).toEqual({
      mode: "around",
      target: new Date("2025-06-11T09:00:00.000Z"),
    });
    expect(parseRelativeTime("yesterday", NOW)).toEqual({
      mode: "around",
      target: new Date("2025-06-10T12:00:00.000Z"),
    });
    expect(parseRelativeTime("last week", NOW)).toEqual({
      mode: "around",
      target: new Date("2025-06-04T12:00:00.000Z"),
    });
  });

  test("unrecognized expressions", () => {
    expect(parseRelativeTime("whenever", NOW)).toBeNull();
  });
});
