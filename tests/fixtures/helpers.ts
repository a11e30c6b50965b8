/**
 * Shared test helpers: slot and entry factories, a fixed clock and an
 * engine wired to an in-memory repository.
 */

import { Engine } from "../../src/engine";
import type { EngineConfig } from "../../src/config";
import { InMemorySlotRepository } from "../../src/slot-store";
import type { Entry, Slot } from "../../src/types";

// ── Entry / Slot factories ───────────────────────────────────────────

export function makeEntry(overrides: Partial<Entry> = {}): Entry {
  return {
    entry_id: "e1",
    kind: "direct-save",
    content: "Default test content for the entry.",
    timestamp: new Date("2025-01-01T00:00:00.000Z"),
    metadata: {},
    ...overrides,
  };
}

/**
 * Build a slot from content strings. Entry n gets id "e<n>" and a
 * timestamp one hour after the previous one, starting at `start`.
 */
export function makeSlot(
  name: string,
  contents: string[],
  overrides: Partial<Omit<Slot, "name" | "entries">> & { start?: string } = {}
): Slot {
  const { start = "2025-01-01T00:00:00.000Z", ...rest } = overrides;
  const base = new Date(start).getTime();
  return {
    name,
    tags: [],
    group_path: null,
    description: "",
    entries: contents.map((content, i) =>
      makeEntry({
        entry_id: `e${i + 1}`,
        content,
        timestamp: new Date(base + i * 60 * 60 * 1000),
      })
    ),
    created_at: new Date(base),
    updated_at: new Date(base),
    ...rest,
  };
}

export function fixedClock(iso: string): () => Date {
  const now = new Date(iso);
  return () => new Date(now.getTime());
}

export async function makeEngine(
  slots: Slot[],
  options: { config?: Partial<EngineConfig>; now?: string } = {}
): Promise<{ engine: Engine; repository: InMemorySlotRepository }> {
  const repository = new InMemorySlotRepository(slots);
  const engine = new Engine(repository, options.config, fixedClock(options.now ?? "2025-06-01T12:00:00.000Z"));
  await engine.load();
  return { engine, repository };
}
