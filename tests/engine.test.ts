/**
 * Tests for the Engine: loading, search and questions through the lock,
 * slot and entry mutation, merge preview and execution, and recovery
 * from index consistency errors.
 */

import { afterEach, beforeEach, describe, test, expect, vi } from "vitest";
import { Engine } from "../src/engine";
import {
  IndexConsistencyError,
  InvalidSlotError,
  MergeValidationError,
  QueryParseError,
  SlotNotFoundError,
} from "../src/errors";
import { InMemorySlotRepository } from "../src/slot-store";
import type { SearchResult } from "../src/types";
import { makeEngine, makeEntry, makeSlot } from "./fixtures/helpers";

function ids(results: SearchResult[]): string[] {
  return results.map((r) => `${r.slot_name}/${r.entry_id}`);
}

beforeEach(() => {
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("load and search", () => {
  test("logs one summary line after loading", async () => {
    const { engine } = await makeEngine([
      makeSlot("a", ["pricing plan", "budget review"]),
      makeSlot("b", ["pricing archived"]),
    ]);
    expect(vi.mocked(console.error)).toHaveBeenCalledTimes(1);
    expect(vi.mocked(console.error)).toHaveBeenCalledWith("[memslot] Loaded 2 slots, 3 entries, 5 terms, avg entry length: 2 tokens");
    expect(engine.getStats()).toEqual({
      slot_count: 2,
      entry_count: 3,
      indexed_entries: 3,
      indexed_terms: 5,
      total_postings: 6,
      avg_entry_length: 2,
    });
  });

  test("boolean search over every slot", async () => {
    const { engine } = await makeEngine([
      makeSlot("a", ["pricing plan", "budget review"]),
      makeSlot("b", ["pricing archived"]),
    ]);
    expect(ids(await engine.search("pricing AND NOT archived"))).toEqual(["a/e1"]);
  });

  test("questions go through the natural-language processor", async () => {
    const { engine } = await makeEngine([makeSlot("a", ["pricing plan", "budget review"])]);
    const answer = await engine.query("What is the budget?");
    expect(answer.key_terms).toEqual(["budget"]);
    expect(ids(answer.results)).toEqual(["a/e2"]);
  });

  test("reindex picks up changes made behind the engine's back", async () => {
    const { engine, repository } = await makeEngine([makeSlot("a", ["pricing plan"])]);
    await repository.saveSlot(makeSlot("late", ["roadmap draft"]));
    expect(await engine.search("roadmap")).toEqual([]);

    const stats = await engine.reindex();
    expect(stats.slot_count).toBe(2);
    expect(ids(await engine.search("roadmap"))).toEqual(["late/e1"]);
  });

  test("reindex checks the rebuilt index against the live slots", async () => {
    const { engine } = await makeEngine([makeSlot("a", ["pricing plan"])]);
    const verify = vi.spyOn(engine.index, "verify");
    await engine.reindex();

    expect(verify).toHaveBeenCalledTimes(1);
    const isLive = verify.mock.calls[0][0];
    expect(isLive("a", "e1")).toBe(true);
    expect(isLive("a", "e9")).toBe(false);
    expect(isLive("missing", "e1")).toBe(false);
  });

  test("a stale index after reindex is an IndexConsistencyError", async () => {
    const { engine, repository } = await makeEngine([makeSlot("a", ["pricing plan"]), makeSlot("b", ["budget"])]);
    await repository.deleteSlot("a");
    vi.spyOn(engine.index, "rebuild").mockImplementation(() => {});

    await expect(engine.reindex()).rejects.toThrow(IndexConsistencyError);
  });

  test("regex search runs through the engine", async () => {
    const { engine } = await makeEngine([makeSlot("a", ["ticket 4411 closed", "no number here"])]);
    expect(ids(await engine.search("\\d{4}", { use_regex: true }))).toEqual(["a/e1"]);
    await expect(engine.search("[", { use_regex: true })).rejects.toThrow(QueryParseError);
  });
});

describe("slot and entry mutation", () => {
  test("addEntry creates the slot and persists before indexing", async () => {
    const { engine, repository } = await makeEngine([]);
    const entry = await engine.addEntry("ideas", { content: "Launch pricing experiment" });
    expect(entry).toEqual({
      entry_id: "e1",
      kind: "direct-save",
      content: "Launch pricing experiment",
      timestamp: new Date("2025-06-01T12:00:00.000Z"),
      metadata: { word_count: 3 },
    });
    expect((await repository.getSlot("ideas"))?.entries).toHaveLength(1);
    expect(ids(await engine.search("experiment"))).toEqual(["ideas/e1"]);
  });

  test("addEntry appends with the next free id", async () => {
    const { engine } = await makeEngine([makeSlot("a", ["one", "two"])]);
    const entry = await engine.addEntry("a", { content: "three", kind: "summary" });
    expect(entry.entry_id).toBe("e3");
    expect(entry.kind).toBe("summary");
  });

  test("addEntry rejects empty content and names", async () => {
    const { engine } = await makeEngine([]);
    await expect(engine.addEntry("a", { content: "   " })).rejects.toThrow(InvalidSlotError);
    await expect(engine.addEntry(" ", { content: "text" })).rejects.toThrow(InvalidSlotError);
  });

  test("concurrent writes are serialized", async () => {
    const { engine } = await makeEngine([]);
    const entries = await Promise.all(
      ["one", "two", "three", "four"].map((content) => engine.addEntry("log", { content }))
    );
    expect(entries.map((e) => e.entry_id)).toEqual(["e1", "e2", "e3", "e4"]);
    expect(engine.getSlot("log")?.entries).toHaveLength(4);
  });

  test("removeEntry unindexes the entry", async () => {
    const { engine, repository } = await makeEngine([makeSlot("a", ["pricing plan", "budget review"])]);
    expect(await engine.removeEntry("a", "e1")).toBe(true);
    expect(await engine.search("plan")).toEqual([]);
    expect((await repository.getSlot("a"))?.entries.map((e) => e.entry_id)).toEqual(["e2"]);
    expect(await engine.removeEntry("a", "e1")).toBe(false);
    await expect(engine.removeEntry("missing", "e1")).rejects.toThrow(SlotNotFoundError);
  });

  test("putSlot validates and replaces the indexed slot", async () => {
    const { engine } = await makeEngine([makeSlot("a", ["pricing plan"]), makeSlot("b", ["pricing archived"])]);
    const slot = await engine.putSlot({
      name: "a",
      tags: ["Work"],
      entries: [{ entry_id: "x1", content: "roadmap", timestamp: "2025-01-01T00:00:00Z" }],
    });
    expect(slot.tags).toEqual(["work"]);
    expect(ids(await engine.search("pricing"))).toEqual(["b/e1"]);
    expect(ids(await engine.search("roadmap", { include_tags: ["work"] }))).toEqual(["a/x1"]);
    await expect(engine.putSlot({ name: "" })).rejects.toThrow(InvalidSlotError);
  });

  test("deleteSlot removes the slot everywhere", async () => {
    const { engine, repository } = await makeEngine([makeSlot("a", ["pricing plan"]), makeSlot("b", ["pricing archived"])]);
    expect(await engine.deleteSlot("b")).toBe(true);
    expect(await engine.search("archived")).toEqual([]);
    expect(await repository.getSlot("b")).toBeNull();
    expect(await engine.deleteSlot("b")).toBe(false);
  });

  test("listSlots and getSlot return copies", async () => {
    const { engine } = await makeEngine([makeSlot("b", ["two"]), makeSlot("a", ["one"], { tags: ["x"] })]);
    expect(engine.listSlots().map((s) => [s.name, s.entry_count])).toEqual([
      ["a", 1],
      ["b", 1],
    ]);
    engine.getSlot("a")?.tags.push("mutated");
    expect(engine.getSlot("a")?.tags).toEqual(["x"]);
    expect(engine.getSlot("missing")).toBeNull();
  });

  test("selectEntry reads from the live slot", async () => {
    const { engine } = await makeEngine([makeSlot("a", ["one", "two"])]);
    expect((await engine.selectEntry("a", { relative_time: "latest" }))?.entry.entry_id).toBe("e2");
    await expect(engine.selectEntry("missing", { entry_index: 0 })).rejects.toThrow(SlotNotFoundError);
  });
});

describe("merge", () => {
  const duplicates = () => [
    makeSlot("A", ["Meeting notes: discussed pricing"]),
    makeSlot("B", ["Meeting notes: discussed pricing"]),
  ];

  test("preview writes nothing", async () => {
    const { engine, repository } = await makeEngine(duplicates());
    const preview = await engine.previewMerge({ source_slots: ["A", "B"], target_slot: "AB" });
    expect(preview.entries_kept).toBe(1);
    expect(preview.duplicates_removed).toBe(1);
    expect(preview.target_exists).toBe(false);
    expect(await repository.getSlot("AB")).toBeNull();
    expect(engine.getSlot("AB")).toBeNull();
  });

  test("execute writes the deduplicated target and indexes it", async () => {
    const { engine, repository } = await makeEngine(duplicates());
    const outcome = await engine.executeMerge({ source_slots: ["A", "B"], target_slot: "AB" });

    expect(outcome.target.entries).toHaveLength(1);
    expect(outcome.kept.map((k) => `${k.slot_name}/${k.entry_id}`)).toEqual(["A/e1"]);
    expect(outcome.dropped.map((d) => `${d.slot_name}/${d.entry_id}`)).toEqual(["B/e1"]);
    expect(outcome.deleted_sources).toEqual([]);
    expect((await repository.getSlot("AB"))?.entries.map((e) => e.entry_id)).toEqual(["m1"]);
    expect(ids(await engine.search("meeting")).sort()).toEqual(["A/e1", "AB/m1", "B/e1"]);
  });

  test("delete_sources removes the sources after the target is written", async () => {
    const { engine, repository } = await makeEngine(duplicates());
    const outcome = await engine.executeMerge({ source_slots: ["A", "B"], target_slot: "AB", delete_sources: true });
    expect(outcome.deleted_sources).toEqual(["A", "B"]);
    expect(await repository.getSlot("A")).toBeNull();
    expect(ids(await engine.search("meeting"))).toEqual(["AB/m1"]);
  });

  test("merging into one of the sources keeps the target", async () => {
    const { engine } = await makeEngine([makeSlot("A", ["alpha"]), makeSlot("C", ["gamma"])]);
    const outcome = await engine.executeMerge({ source_slots: ["A", "C"], target_slot: "A", delete_sources: true });
    expect(outcome.deleted_sources).toEqual(["C"]);
    expect(engine.getSlot("A")?.entries.map((e) => e.entry_id)).toEqual(["m1", "m2"]);
    expect(ids(await engine.search("alpha OR gamma")).sort()).toEqual(["A/m1", "A/m2"]);
  });

  test("a single source is rejected and nothing is written", async () => {
    const { engine, repository } = await makeEngine(duplicates());
    await expect(engine.executeMerge({ source_slots: ["A"], target_slot: "T" })).rejects.toThrow(
      "At least 2 distinct source slots are required"
    );
    await expect(engine.previewMerge({ source_slots: ["A", "X", "Y"], target_slot: "T" })).rejects.toThrow(
      MergeValidationError
    );
    expect(await repository.getSlot("T")).toBeNull();
  });

  test("a failed deletion is recorded without rolling back", async () => {
    class FlakyRepository extends InMemorySlotRepository {
      async deleteSlot(name: string): Promise<boolean> {
        if (name === "B") throw new Error("disk unavailable");
        return super.deleteSlot(name);
      }
    }
    const repository = new FlakyRepository([makeSlot("A", ["alpha"]), makeSlot("B", ["beta"])]);
    const engine = new Engine(repository);
    await engine.load();

    const outcome = await engine.executeMerge({ source_slots: ["A", "B"], target_slot: "AB", delete_sources: true });
    expect(outcome.deleted_sources).toEqual(["A"]);
    expect(outcome.failed_deletions).toEqual([{ slot_name: "B", error: "disk unavailable" }]);
    expect(vi.mocked(console.error)).toHaveBeenCalledWith('[memslot] Warning: merged into "AB" but failed to delete "B": disk unavailable');
    expect((await repository.getSlot("AB"))?.entries).toHaveLength(2);
    expect(ids(await engine.search("beta")).sort()).toEqual(["AB/m2", "B/e1"]);
  });

  test("suggestMerges uses the configured threshold", async () => {
    const { engine } = await makeEngine(duplicates());
    expect(await engine.suggestMerges()).toEqual([]);
    expect(await engine.suggestMerges(0.6)).toEqual([["A", "B"]]);
  });
});

describe("index consistency recovery", () => {
  test("a dangling posting triggers a rebuild and one retry", async () => {
    const { engine } = await makeEngine([makeSlot("a", ["pricing plan"]), makeSlot("b", ["budget review"])]);
    engine.index.addEntry("ghost", makeEntry({ entry_id: "g1", content: "pricing ghost" }));

    expect(ids(await engine.search("pricing"))).toEqual(["a/e1"]);
    expect(engine.index.hasEntry("ghost", "g1")).toBe(false);
    expect(vi.mocked(console.error)).toHaveBeenLastCalledWith(
      '[memslot] search: Index references missing entry "g1" of slot "ghost"; rebuilding index and retrying'
    );
  });

  test("a second failure propagates", async () => {
    const { engine } = await makeEngine([makeSlot("a", ["pricing plan"])]);
    engine.index.addEntry("ghost", makeEntry({ entry_id: "g1", content: "pricing ghost" }));
    const rebuild = vi.spyOn(engine, "rebuildIndex").mockImplementation(() => {});

    await expect(engine.query("pricing")).rejects.toThrow(IndexConsistencyError);
    expect(rebuild).toHaveBeenCalledTimes(1);
  });

  test("parse errors are never retried", async () => {
    const { engine } = await makeEngine([makeSlot("a", ["pricing plan"])]);
    const rebuild = vi.spyOn(engine, "rebuildIndex");
    await expect(engine.search("pricing AND")).rejects.toThrow(QueryParseError);
    expect(rebuild).not.toHaveBeenCalled();
  });
});
