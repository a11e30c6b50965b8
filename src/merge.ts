/**
 * Similarity & Merge planning
 *
 *   sources (request order) → pooled entries
 *                           → stable sort by timestamp
 *                           → keep each entry unless it duplicates an accepted one
 *                           → target slot: kept entries, tag union, first group
 *
 * Everything here is pure: the engine owns locking, persistence and
 * re-indexing. Preview and execute share the same plan.
 */

import { z } from "zod";
import { MergeValidationError, formatIssues } from "./errors";
import { SimilarityScorer, jaccard } from "./similarity";
import type { DroppedEntry, Entry, EntryRef, MergePreview, MergeRequest, Slot } from "./types";

export const DEFAULT_SIMILARITY_THRESHOLD = 0.8;
export const DEFAULT_SUGGEST_THRESHOLD = 0.7;

/** A validated merge request: trimmed, distinct source names in request order */
export interface ValidatedMerge {
  source_slots: string[];
  target_slot: string;
  similarity_threshold: number;
}

export interface PlannedEntry {
  slot_name: string;
  entry: Entry;
}

export interface MergePlan extends ValidatedMerge {
  kept: PlannedEntry[];
  dropped: DroppedEntry[];
  merged_tags: string[];
  group_path: string | null;
}

// ── Validation ───────────────────────────────────────────────────────

const mergeRequestSchema = z
  .object({
    source_slots: z.array(z.string()),
    target_slot: z.string(),
    similarity_threshold: z
      .number({ invalid_type_error: "similarity_threshold must be a number" })
      .min(0, "similarity_threshold must be between 0 and 1")
      .max(1, "similarity_threshold must be between 0 and 1"),
  })
  .superRefine((req, ctx) => {
    const distinct = new Set(req.source_slots.map((s) => s.trim()).filter(Boolean));
    if (distinct.size < 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "At least 2 distinct source slots are required",
      });
    }
    if (!req.target_slot.trim()) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "target_slot must not be empty" });
    }
  });

/**
 * Check a merge request against the current slot names. Every problem is
 * collected before throwing; missing sources are reported together.
 */
export function validateMergeRequest(
  request: MergeRequest,
  slotExists: (name: string) => boolean,
  defaultThreshold: number = DEFAULT_SIMILARITY_THRESHOLD
): ValidatedMerge {
  const parsed = mergeRequestSchema.safeParse({
    ...request,
    similarity_threshold: request.similarity_threshold ?? defaultThreshold,
  });
  const problems = parsed.success ? [] : formatIssues(parsed.error.issues);

  const source_slots = [...new Set(request.source_slots.map((s) => s.trim()).filter(Boolean))];
  const target_slot = request.target_slot.trim();

  const missing = source_slots.filter((name) => !slotExists(name));
  if (missing.length > 0) {
    problems.push(`Source slots not found: ${missing.join(", ")}`);
  }
  if (target_slot && slotExists(target_slot) && !source_slots.includes(target_slot)) {
    problems.push(`Target slot "${target_slot}" already exists; include it as a source to merge into it`);
  }

  if (problems.length > 0 || !parsed.success) {
    throw new MergeValidationError(problems, missing);
  }
  return { source_slots, target_slot, similarity_threshold: parsed.data.similarity_threshold };
}

// ── Planning ─────────────────────────────────────────────────────────

/** Slots must be given in the order of merge.source_slots */
export function planMerge(slots: Slot[], merge: ValidatedMerge): MergePlan {
  const pool = slots.flatMap((slot) => slot.entries.map((entry) => ({ slot_name: slot.name, entry })));
  const ordered = pool
    .map((item, order) => ({ item, order }))
    .sort((a, b) => a.item.entry.timestamp.getTime() - b.item.entry.timestamp.getTime() || a.order - b.order)
    .map(({ item }) => item);

  const scorer = new SimilarityScorer();
  const kept: PlannedEntry[] = [];
  const dropped: DroppedEntry[] = [];

  for (const candidate of ordered) {
    let best: PlannedEntry | null = null;
    let bestScore = -1;
    for (const accepted of kept) {
      const score = scorer.score(candidate.entry.content, accepted.entry.content);
      if (score > bestScore) {
        bestScore = score;
        best = accepted;
      }
    }

    if (best && bestScore >= merge.similarity_threshold) {
      dropped.push({ ...toRef(candidate), duplicate_of: toRef(best), similarity: bestScore });
    } else {
      kept.push(candidate);
    }
  }

  const merged_tags = [...new Set(slots.flatMap((s) => s.tags))].sort();
  const group_path = slots.find((s) => s.group_path)?.group_path ?? null;

  return { ...merge, kept, dropped, merged_tags, group_path };
}

export function toRef(planned: PlannedEntry): EntryRef {
  return {
    slot_name: planned.slot_name,
    entry_id: planned.entry.entry_id,
    timestamp: planned.entry.timestamp,
  };
}

/** The slot that executing the plan writes */
export function buildMergedSlot(plan: MergePlan, sources: Slot[], now: Date): Slot {
  const entries = plan.kept.map(({ slot_name, entry }, i): Entry => ({
    entry_id: `m${i + 1}`,
    kind: "merge-result",
    content: entry.content,
    timestamp: entry.timestamp,
    metadata: {
      ...entry.metadata,
      merged_from: { slot_name, entry_id: entry.entry_id },
      original_kind: entry.kind,
    },
  }));

  const existingTarget = sources.find((s) => s.name === plan.target_slot);
  const description =
    existingTarget?.description || sources.find((s) => s.description)?.description || "";
  const created_at = sources.reduce<Date>(
    (earliest, s) => (s.created_at < earliest ? s.created_at : earliest),
    now
  );

  return {
    name: plan.target_slot,
    tags: [...plan.merged_tags],
    group_path: plan.group_path,
    description,
    entries,
    created_at,
    updated_at: now,
  };
}

// ── Rendering & preview ──────────────────────────────────────────────

/**
 * Merged text as a reader would see it: a header naming the sources,
 * then one section per source in chronological order with its kept
 * entries.
 */
export function renderMergedContent(plan: MergePlan, now: Date): string {
  const sections = new Map<string, PlannedEntry[]>();
  for (const planned of plan.kept) {
    const list = sections.get(planned.slot_name) ?? [];
    list.push(planned);
    sections.set(planned.slot_name, list);
  }

  const parts = [
    "=== MERGED MEMORY SLOT ===",
    `Created: ${now.toISOString()}`,
    `Source Slots: ${plan.source_slots.join(", ")}`,
    `Total Sources: ${plan.source_slots.length}`,
    "=========================",
  ];
  // Map iteration follows first appearance in the chronological kept list
  for (const [slotName, entries] of sections) {
    parts.push("", `--- From ${slotName} (${entries[0].entry.timestamp.toISOString()}) ---`);
    parts.push(entries.map((p) => p.entry.content).join("\n\n"));
  }
  return parts.join("\n") + "\n";
}

export function buildPreview(
  plan: MergePlan,
  sources: Slot[],
  targetExists: boolean,
  now: Date,
  previewLength: number
): MergePreview {
  const rendered = renderMergedContent(plan, now);

  const chronological_order = sources
    .map((slot, order) => ({
      slot_name: slot.name,
      first_timestamp: earliestTimestamp(slot),
      order,
    }))
    .sort((a, b) => {
      if (a.first_timestamp && b.first_timestamp) {
        return a.first_timestamp.getTime() - b.first_timestamp.getTime() || a.order - b.order;
      }
      if (a.first_timestamp) return -1;
      if (b.first_timestamp) return 1;
      return a.order - b.order;
    })
    .map(({ slot_name, first_timestamp }) => ({ slot_name, first_timestamp }));

  return {
    source_slots: [...plan.source_slots],
    target_slot: plan.target_slot,
    target_exists: targetExists,
    similarity_threshold: plan.similarity_threshold,
    total_entries: plan.kept.length + plan.dropped.length,
    entries_kept: plan.kept.length,
    duplicates_removed: plan.dropped.length,
    merged_tags: [...plan.merged_tags],
    group_path: plan.group_path,
    chronological_order,
    total_content_length: rendered.length,
    content_preview: rendered.length > previewLength ? rendered.slice(0, previewLength) + "…" : rendered,
  };
}

function earliestTimestamp(slot: Slot): Date | null {
  let earliest: Date | null = null;
  for (const entry of slot.entries) {
    if (!earliest || entry.timestamp < earliest) earliest = entry.timestamp;
  }
  return earliest;
}

// ── Merge suggestions ────────────────────────────────────────────────

/**
 * Greedy grouping of slots that look like the same topic. Each slot
 * joins at most one group; a group is seeded by the earliest listed slot
 * not yet grouped.
 *
 *   combined = 0.6 × content similarity + 0.3 × tag overlap + 0.1 × same group
 */
export function suggestMergeCandidates(
  slots: Slot[],
  threshold: number = DEFAULT_SUGGEST_THRESHOLD
): string[][] {
  if (slots.length < 2) return [];

  const scorer = new SimilarityScorer();
  const contents = slots.map((s) => s.entries.map((e) => e.content).join("\n\n"));
  const grouped = new Set<string>();
  const groups: string[][] = [];

  slots.forEach((seed, i) => {
    if (grouped.has(seed.name)) return;
    const members = [seed.name];

    for (let j = i + 1; j < slots.length; j++) {
      const other = slots[j];
      if (grouped.has(other.name)) continue;

      const content = scorer.score(contents[i], contents[j]);
      const tags = jaccard(new Set(seed.tags), new Set(other.tags));
      const sameGroup = seed.group_path !== null && seed.group_path === other.group_path ? 1 : 0;

      if (0.6 * content + 0.3 * tags + 0.1 * sameGroup >= threshold) {
        members.push(other.name);
        grouped.add(other.name);
      }
    }

    if (members.length > 1) {
      groups.push(members);
      grouped.add(seed.name);
    }
  });

  return groups;
}
