/**
 * Temporal phrase extraction for natural-language questions.
 *
 * Recognizes a bounded vocabulary and turns the first match into a
 * [from, to] window in UTC. Anything unrecognized yields null, which the
 * query processor treats as "no time filter".
 */

import type { TimeRange } from "./types";

const DAY_MS = 24 * 60 * 60 * 1000;

export const MONTHS = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
] as const;

const MONTH_ALTERNATION = MONTHS.join("|");

const UNIT_DAYS: Record<string, number> = { day: 1, week: 7, month: 30 };

function startOfUtcDay(d: Date): Date {
  return new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth(), d.getUTCDate()));
}

function daysBefore(d: Date, days: number): Date {
  return new Date(d.getTime() - days * DAY_MS);
}

function monthWindow(year: number, monthIndex: number): { from: Date; to: Date } {
  return {
    from: new Date(Date.UTC(year, monthIndex, 1)),
    to: new Date(Date.UTC(year, monthIndex + 1, 1) - 1),
  };
}

interface TemporalRule {
  pattern: RegExp;
  window: (match: RegExpMatchArray, now: Date) => { from: Date; to: Date } | null;
}

// Order matters: the most specific phrases are tried first.
const RULES: TemporalRule[] = [
  {
    pattern: /\b(?:past|last)\s+(\d{1,3})\s+(day|week|month)s?\b/,
    window: (m, now) => ({ from: daysBefore(now, Number(m[1]) * UNIT_DAYS[m[2]]), to: now }),
  },
  {
    pattern: /\b(\d{1,3})\s+(day|week)s?\s+ago\b/,
    window: (m, now) => {
      const day = startOfUtcDay(daysBefore(now, Number(m[1]) * UNIT_DAYS[m[2]]));
      return { from: day, to: new Date(day.getTime() + DAY_MS - 1) };
    },
  },
  {
    pattern: /\btoday\b/,
    window: (_m, now) => ({ from: startOfUtcDay(now), to: now }),
  },
  {
    pattern: /\byesterday\b/,
    window: (_m, now) => {
      const today = startOfUtcDay(now);
      return { from: new Date(today.getTime() - DAY_MS), to: new Date(today.getTime() - 1) };
    },
  },
  {
    pattern: /\bthis\s+week\b/,
    window: (_m, now) => {
      // Weeks start on Monday
      const today = startOfUtcDay(now);
      const sinceMonday = (today.getUTCDay() + 6) % 7;
      return { from: daysBefore(today, sinceMonday), to: now };
    },
  },
  {
    pattern: /\blast\s+week\b/,
    window: (_m, now) => ({ from: daysBefore(now, 7), to: now }),
  },
  {
    pattern: /\bthis\s+month\b/,
    window: (_m, now) => ({
      from: new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1)),
      to: now,
    }),
  },
  {
    pattern: /\blast\s+month\b/,
    window: (_m, now) => ({ from: daysBefore(now, 30), to: now }),
  },
  {
    pattern: /\bthis\s+year\b/,
    window: (_m, now) => ({ from: new Date(Date.UTC(now.getUTCFullYear(), 0, 1)), to: now }),
  },
  {
    pattern: /\blast\s+year\b/,
    window: (_m, now) => ({
      from: new Date(Date.UTC(now.getUTCFullYear() - 1, 0, 1)),
      to: new Date(Date.UTC(now.getUTCFullYear(), 0, 1) - 1),
    }),
  },
  {
    pattern: /\brecent(?:ly)?\b/,
    window: (_m, now) => ({ from: daysBefore(now, 7), to: now }),
  },
  {
    // "in march", "during march 2024", "march 2024"
    pattern: new RegExp(
      `\\b(?:(?:in|during)\\s+(${MONTH_ALTERNATION})(?:\\s+((?:19|20)\\d{2}))?|(${MONTH_ALTERNATION})\\s+((?:19|20)\\d{2}))\\b`
    ),
    window: (m, now) => {
      const monthName = m[1] ?? m[3];
      const yearText = m[2] ?? m[4];
      const monthIndex = MONTHS.findIndex((name) => name === monthName);
      if (monthIndex === -1) return null;
      let year = yearText ? Number(yearText) : now.getUTCFullYear();
      // Without a year, the most recent such month that has started
      if (!yearText && monthIndex > now.getUTCMonth()) year -= 1;
      return monthWindow(year, monthIndex);
    },
  },
  {
    pattern: /\b(?:in\s+|during\s+)?((?:19|20)\d{2})\b/,
    window: (m) => {
      const year = Number(m[1]);
      return {
        from: new Date(Date.UTC(year, 0, 1)),
        to: new Date(Date.UTC(year + 1, 0, 1) - 1),
      };
    },
  },
];

/**
 * Find the first recognized time phrase in the text.
 * The window is inclusive on both ends.
 */
export function extractTimeRange(text: string, now: Date = new Date()): TimeRange | null {
  const lower = text.toLowerCase();
  for (const rule of RULES) {
    const match = lower.match(rule.pattern);
    if (!match) continue;
    const window = rule.window(match, now);
    if (!window) continue;
    return { ...window, phrase: match[0] };
  }
  return null;
}

export function inRange(timestamp: Date, range: TimeRange): boolean {
  return timestamp >= range.from && timestamp <= range.to;
}

// ── Relative expressions for entry selection ────────────────────────

export type RelativeSelection =
  | { mode: "latest" | "oldest"; ordinal: number }
  | { mode: "around"; target: Date };

const ORDINAL_WORDS: Record<string, number> = { first: 1, second: 2, third: 3 };

const AGO_UNITS_MS: Record<string, number> = {
  minute: 60 * 1000,
  hour: 60 * 60 * 1000,
  day: DAY_MS,
  week: 7 * DAY_MS,
};

/**
 * Parse "latest", "2nd oldest", "third newest", "3 hours ago",
 * "yesterday", "last week", "last month". Returns null when unrecognized.
 */
export function parseRelativeTime(expression: string, now: Date = new Date()): RelativeSelection | null {
  const expr = expression.toLowerCase().trim();

  const numeric = expr.match(/^(\d+)(?:st|nd|rd|th)\s+(latest|newest|recent|oldest|earliest|first)$/);
  if (numeric) {
    return { mode: latestOrOldest(numeric[2]), ordinal: Number(numeric[1]) };
  }

  const worded = expr.match(/^(second|third)\s+(latest|newest|recent|oldest|earliest|first)$/);
  if (worded) {
    return { mode: latestOrOldest(worded[2]), ordinal: ORDINAL_WORDS[worded[1]] };
  }

  if (/^(latest|newest|recent|oldest|earliest|first)$/.test(expr)) {
    return { mode: latestOrOldest(expr), ordinal: 1 };
  }

  const ago = expr.match(/^(\d+)\s*(minute|hour|day|week)s?\s+ago$/);
  if (ago) {
    return { mode: "around", target: new Date(now.getTime() - Number(ago[1]) * AGO_UNITS_MS[ago[2]]) };
  }

  if (expr === "yesterday") return { mode: "around", target: daysBefore(now, 1) };
  if (/^last\s+week$/.test(expr)) return { mode: "around", target: daysBefore(now, 7) };
  if (/^last\s+month$/.test(expr)) return { mode: "around", target: daysBefore(now, 30) };

  return null;
}

function latestOrOldest(word: string): "latest" | "oldest" {
  return word === "latest" || word === "newest" || word === "recent" ? "latest" : "oldest";
}
