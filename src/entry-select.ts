/**
 * Pick one entry of a slot by timestamp, relative time or position.
 */

import { z } from "zod";
import { InvalidFilterError, formatIssues } from "./errors";
import { parseRelativeTime } from "./temporal";
import type { Entry, EntryKind, Slot } from "./types";

const TOLERANCE_MS = 30 * 60 * 1000;
// Matches further than this from the requested time are flagged
const EXACT_MS = 60 * 1000;

export interface EntrySelector {
  timestamp?: Date | string;
  relative_time?: string;
  entry_index?: number;
  kind?: EntryKind;
}

export interface SelectedEntry {
  slot_name: string;
  entry: Entry;
  index: number; // position in slot.entries
  selection_method: "timestamp" | "relative_time" | "index";
  tolerance_applied: boolean;
  previous_entry_id: string | null;
  next_entry_id: string | null;
}

const selectorSchema = z
  .object({
    timestamp: z.coerce.date({ errorMap: () => ({ message: "timestamp is not a valid date" }) }).optional(),
    relative_time: z.string().trim().min(1, "relative_time must not be empty").optional(),
    entry_index: z.number().int("entry_index must be an integer").optional(),
    kind: z.enum(["direct-save", "summary", "imported", "merge-result"]).optional(),
  })
  .refine(
    (s) => [s.timestamp, s.relative_time, s.entry_index].filter((v) => v !== undefined).length === 1,
    { message: "Provide exactly one of: timestamp, relative_time, entry_index" }
  );

/**
 * Returns null when the selector is valid but nothing matches (out of
 * range, nothing within 30 minutes, or the wrong kind).
 */
export function selectEntry(slot: Slot, selector: EntrySelector, now: Date = new Date()): SelectedEntry | null {
  const parsed = selectorSchema.safeParse(selector);
  if (!parsed.success) {
    throw new InvalidFilterError(formatIssues(parsed.error.issues));
  }
  const { timestamp, relative_time, entry_index, kind } = parsed.data;
  const entries = slot.entries;

  let index = -1;
  let method: SelectedEntry["selection_method"] = "index";
  let target: Date | null = null;

  if (timestamp) {
    method = "timestamp";
    target = timestamp;
    index = closestWithin(entries, timestamp);
  } else if (relative_time !== undefined) {
    method = "relative_time";
    const relative = parseRelativeTime(relative_time, now);
    if (!relative) {
      throw new InvalidFilterError([`relative_time "${relative_time}" is not recognized`]);
    }
    if (relative.mode === "around") {
      target = relative.target;
      index = closestWithin(entries, relative.target);
    } else {
      index = byOrdinal(entries, relative.mode, relative.ordinal);
    }
  } else if (entry_index !== undefined) {
    const resolved = entry_index < 0 ? entries.length + entry_index : entry_index;
    index = resolved >= 0 && resolved < entries.length ? resolved : -1;
  }

  if (index === -1) return null;
  const entry = entries[index];
  if (kind && entry.kind !== kind) return null;

  return {
    slot_name: slot.name,
    entry,
    index,
    selection_method: method,
    tolerance_applied: target !== null && Math.abs(entry.timestamp.getTime() - target.getTime()) > EXACT_MS,
    previous_entry_id: index > 0 ? entries[index - 1].entry_id : null,
    next_entry_id: index < entries.length - 1 ? entries[index + 1].entry_id : null,
  };
}

function closestWithin(entries: Entry[], target: Date): number {
  let best = -1;
  let bestDiff = Infinity;
  entries.forEach((entry, i) => {
    const diff = Math.abs(entry.timestamp.getTime() - target.getTime());
    if (diff <= TOLERANCE_MS && diff < bestDiff) {
      bestDiff = diff;
      best = i;
    }
  });
  return best;
}

/** 1-based ordinal counted from the newest or oldest entry */
function byOrdinal(entries: Entry[], mode: "latest" | "oldest", ordinal: number): number {
  if (ordinal < 1 || ordinal > entries.length) return -1;
  const chronological = entries
    .map((entry, i) => ({ time: entry.timestamp.getTime(), i }))
    .sort((a, b) => a.time - b.time || a.i - b.i);
  const pick = mode === "oldest" ? chronological[ordinal - 1] : chronological[chronological.length - ordinal];
  return pick.i;
}
