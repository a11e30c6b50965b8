/**
 * Slot storage boundary.
 *
 * The engine only ever talks to storage through SlotRepository. The
 * in-memory implementation backs tests and the CLI; snapshots on disk are
 * JSON files validated with zod before anything reaches the index.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { InvalidSlotError, formatIssues } from "./errors";
import { normalizeGroup, normalizeTag } from "./search";
import type { Slot } from "./types";

export interface SlotRepository {
  listSlots(): Promise<Slot[]>;
  getSlot(name: string): Promise<Slot | null>;
  saveSlot(slot: Slot): Promise<void>;
  /** Resolves false when there was nothing to delete */
  deleteSlot(name: string): Promise<boolean>;
}

// ── Validation ───────────────────────────────────────────────────────

const entrySchema = z.object({
  entry_id: z.string().trim().min(1),
  kind: z.enum(["direct-save", "summary", "imported", "merge-result"]).default("direct-save"),
  content: z.string(),
  timestamp: z.coerce.date(),
  metadata: z.record(z.unknown()).default({}),
});

export const slotSchema = z
  .object({
    name: z.string().trim().min(1, "slot name must not be empty"),
    tags: z.array(z.string()).default([]),
    group_path: z.string().nullable().default(null),
    description: z.string().default(""),
    entries: z.array(entrySchema).default([]),
    created_at: z.coerce.date().optional(),
    updated_at: z.coerce.date().optional(),
  })
  .superRefine((slot, ctx) => {
    const seen = new Set<string>();
    slot.entries.forEach((entry, i) => {
      if (seen.has(entry.entry_id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["entries", i, "entry_id"],
          message: `duplicate entry_id "${entry.entry_id}"`,
        });
      }
      seen.add(entry.entry_id);
    });
  })
  .transform((slot): Slot => {
    const first = slot.entries.reduce<Date | null>(
      (min, e) => (min === null || e.timestamp < min ? e.timestamp : min),
      null
    );
    const last = slot.entries.reduce<Date | null>(
      (max, e) => (max === null || e.timestamp > max ? e.timestamp : max),
      null
    );
    const created_at = slot.created_at ?? first ?? new Date(0);
    return {
      name: slot.name,
      tags: normalizeTags(slot.tags),
      group_path: slot.group_path ? normalizeGroup(slot.group_path) || null : null,
      description: slot.description,
      entries: slot.entries,
      created_at,
      updated_at: slot.updated_at ?? last ?? created_at,
    };
  });

const snapshotSchema = z.union([
  z.array(slotSchema),
  z.object({ slots: z.array(slotSchema) }).transform((s) => s.slots),
]);

/** Lower-cased, trimmed, de-duplicated, sorted */
export function normalizeTags(tags: string[]): string[] {
  return [...new Set(tags.map(normalizeTag).filter(Boolean))].sort();
}

/** Validate untrusted slot data */
export function parseSlot(input: unknown): Slot {
  const parsed = slotSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSlotError("Invalid slot", formatIssues(parsed.error.issues));
  }
  return parsed.data;
}

export function parseSnapshot(input: unknown): Slot[] {
  const parsed = snapshotSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSlotError("Invalid slot snapshot", formatIssues(parsed.error.issues));
  }
  const names = new Set<string>();
  for (const slot of parsed.data) {
    if (names.has(slot.name)) {
      throw new InvalidSlotError(`Duplicate slot name "${slot.name}" in snapshot`);
    }
    names.add(slot.name);
  }
  return parsed.data;
}

/**
 * Read a JSON snapshot: either an array of slots or `{ "slots": [...] }`.
 */
export async function loadSlotsFile(path: string): Promise<Slot[]> {
  const text = await readFile(path, "utf-8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InvalidSlotError(`Slot snapshot ${path} is not valid JSON`, [reason]);
  }
  return parseSnapshot(json);
}

// ── In-memory repository ─────────────────────────────────────────────

export class InMemorySlotRepository implements SlotRepository {
  private slots: Map<string, Slot> = new Map();

  constructor(initial: Slot[] = []) {
    for (const slot of initial) this.slots.set(slot.name, cloneSlot(slot));
  }

  async listSlots(): Promise<Slot[]> {
    return [...this.slots.values()].map(cloneSlot);
  }

  async getSlot(name: string): Promise<Slot | null> {
    const slot = this.slots.get(name);
    return slot ? cloneSlot(slot) : null;
  }

  async saveSlot(slot: Slot): Promise<void> {
    this.slots.set(slot.name, cloneSlot(slot));
  }

  async deleteSlot(name: string): Promise<boolean> {
    return this.slots.delete(name);
  }
}

/** Copies the containers; entries themselves are immutable */
export function cloneSlot(slot: Slot): Slot {
  return {
    ...slot,
    tags: [...slot.tags],
    entries: slot.entries.map((e) => ({ ...e, metadata: { ...e.metadata } })),
  };
}
