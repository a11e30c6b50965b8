/**
 * Engine: the live slot cache, the inverted index over it and every
 * operation callers use.
 *
 *   repository ──load──▶ slot cache ──rebuild──▶ InvertedIndex
 *                                                   │
 *   search / query / previewMerge / selectEntry ◀───┘   (read lock)
 *   addEntry / removeEntry / putSlot / deleteSlot /
 *   executeMerge / reindex                              (write lock)
 *
 * Writes go to the repository first; the cache and index are only
 * updated once the repository call has succeeded.
 */

import type { EngineConfig } from "./config";
import { DEFAULT_CONFIG } from "./config";
import { selectEntry } from "./entry-select";
import type { EntrySelector, SelectedEntry } from "./entry-select";
import { IndexConsistencyError, InvalidSlotError, SlotNotFoundError } from "./errors";
import { InvertedIndex } from "./inverted-index";
import {
  buildMergedSlot,
  buildPreview,
  planMerge,
  suggestMergeCandidates,
  toRef,
  validateMergeRequest,
} from "./merge";
import { NaturalLanguageQueryProcessor } from "./nl-query";
import { ReadWriteLock } from "./rw-lock";
import { QueryEngine } from "./search";
import { cloneSlot, parseSlot } from "./slot-store";
import type { SlotRepository } from "./slot-store";
import { countWords } from "./tokenizer";
import type {
  Entry,
  MergeExecuteRequest,
  MergeOutcome,
  MergePreview,
  MergeRequest,
  NewEntry,
  QueryAnswer,
  SearchOptions,
  SearchResult,
  Slot,
} from "./types";

export interface SlotSummary {
  name: string;
  tags: string[];
  group_path: string | null;
  description: string;
  entry_count: number;
  created_at: Date;
  updated_at: Date;
}

export interface EngineStats {
  slot_count: number;
  entry_count: number;
  indexed_entries: number;
  indexed_terms: number;
  total_postings: number;
  avg_entry_length: number;
}

export class Engine {
  readonly config: EngineConfig;
  readonly index = new InvertedIndex();

  private slots: Map<string, Slot> = new Map();
  private lock = new ReadWriteLock();
  private queryEngine: QueryEngine;
  private nl: NaturalLanguageQueryProcessor;

  constructor(
    private readonly repository: SlotRepository,
    config: Partial<EngineConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.queryEngine = new QueryEngine(
      this.index,
      { resolve: (slot_name, entry_id) => this.resolveEntry(slot_name, entry_id) },
      this.config
    );
    this.nl = new NaturalLanguageQueryProcessor(this.queryEngine, this.config, this.clock);
  }

  // ── Load / Refresh ──────────────────────────────────────────────

  /** Read every slot from the repository, index it and check the result */
  async load(): Promise<void> {
    await this.lock.write(async () => {
      const slots = await this.repository.listSlots();
      this.slots.clear();
      for (const slot of slots) this.slots.set(slot.name, slot);
      this.rebuildIndex();
      this.index.verify((slot_name, entry_id) => this.isLive(slot_name, entry_id));

      const stats = this.index.getStats();
      console.error(
        `[memslot] Loaded ${this.slots.size} slots, ${stats.indexed_entries} entries, ` +
          `${stats.indexed_terms} terms, avg entry length: ${stats.avg_entry_length} tokens`
      );
    });
  }

  /** Discard the cache and index and load again from the repository */
  async reindex(): Promise<EngineStats> {
    await this.load();
    return this.getStats();
  }

  /** Rebuild the index from the slot cache, without touching the repository */
  rebuildIndex(): void {
    this.index.rebuild(this.slots.values());
  }

  // ── Retrieval ───────────────────────────────────────────────────

  async search(query: string, options?: SearchOptions): Promise<SearchResult[]> {
    return this.withConsistencyRetry("search", () => this.queryEngine.evaluate(query, options));
  }

  async query(question: string, maxResults = 5): Promise<QueryAnswer> {
    return this.withConsistencyRetry("query", () => this.nl.answer(question, maxResults));
  }

  async selectEntry(slotName: string, selector: EntrySelector): Promise<SelectedEntry | null> {
    return this.lock.read(() => selectEntry(this.requireSlot(slotName), selector, this.clock()));
  }

  // ── Merge ───────────────────────────────────────────────────────

  async previewMerge(request: MergeRequest): Promise<MergePreview> {
    return this.lock.read(() => {
      const merge = validateMergeRequest(
        request,
        (name) => this.slots.has(name),
        this.config.default_similarity_threshold
      );
      const sources = merge.source_slots.map((name) => this.requireSlot(name));
      const plan = planMerge(sources, merge);
      return buildPreview(plan, sources, this.slots.has(merge.target_slot), this.clock(), this.config.preview_length);
    });
  }

  /**
   * Write the merged target, re-index it, then delete the other sources
   * if asked. A failed deletion is recorded in the outcome; the target
   * stays written.
   */
  async executeMerge(request: MergeExecuteRequest): Promise<MergeOutcome> {
    return this.lock.write(async () => {
      const merge = validateMergeRequest(
        request,
        (name) => this.slots.has(name),
        this.config.default_similarity_threshold
      );
      const sources = merge.source_slots.map((name) => this.requireSlot(name));
      const plan = planMerge(sources, merge);
      const target = buildMergedSlot(plan, sources, this.clock());

      await this.repository.saveSlot(target);
      this.replaceIndexed(target);

      const deleted_sources: string[] = [];
      const failed_deletions: MergeOutcome["failed_deletions"] = [];
      if (request.delete_sources) {
        for (const name of merge.source_slots) {
          if (name === target.name) continue;
          try {
            await this.repository.deleteSlot(name);
          } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            console.error(`[memslot] Warning: merged into "${target.name}" but failed to delete "${name}": ${message}`);
            failed_deletions.push({ slot_name: name, error: message });
            continue;
          }
          this.index.removeSlot(name);
          this.slots.delete(name);
          deleted_sources.push(name);
        }
      }

      return {
        target: cloneSlot(target),
        kept: plan.kept.map(toRef),
        dropped: plan.dropped,
        merged_tags: [...plan.merged_tags],
        group_path: plan.group_path,
        deleted_sources,
        failed_deletions,
      };
    });
  }

  async suggestMerges(threshold: number = this.config.suggest_threshold): Promise<string[][]> {
    return this.lock.read(() => suggestMergeCandidates([...this.slots.values()], threshold));
  }

  // ── Slot and entry mutation ─────────────────────────────────────

  /** Append an entry, creating the slot on first reference */
  async addEntry(slotName: string, input: NewEntry): Promise<Entry> {
    const name = slotName.trim();
    if (!name) throw new InvalidSlotError("Slot name must not be empty");
    if (!input.content.trim()) throw new InvalidSlotError("Entry content must not be empty");

    return this.lock.write(async () => {
      const now = this.clock();
      const existing = this.slots.get(name);
      const slot: Slot = existing ?? {
        name,
        tags: [],
        group_path: null,
        description: "",
        entries: [],
        created_at: now,
        updated_at: now,
      };

      const entry: Entry = {
        entry_id: nextEntryId(slot),
        kind: input.kind ?? "direct-save",
        content: input.content,
        timestamp: input.timestamp ?? now,
        metadata: { ...input.metadata, word_count: countWords(input.content) },
      };
      const updated: Slot = { ...slot, entries: [...slot.entries, entry], updated_at: now };

      await this.repository.saveSlot(updated);
      this.slots.set(name, updated);
      this.index.addEntry(name, entry);
      return entry;
    });
  }

  /** Returns false when the slot has no such entry */
  async removeEntry(slotName: string, entryId: string): Promise<boolean> {
    return this.lock.write(async () => {
      const slot = this.requireSlot(slotName);
      const entries = slot.entries.filter((e) => e.entry_id !== entryId);
      if (entries.length === slot.entries.length) return false;

      const updated: Slot = { ...slot, entries, updated_at: this.clock() };
      await this.repository.saveSlot(updated);
      this.slots.set(slot.name, updated);
      this.index.removeEntry(slot.name, entryId);
      return true;
    });
  }

  /** Create or replace a whole slot; the input is validated and normalized */
  async putSlot(input: unknown): Promise<Slot> {
    const slot = parseSlot(input);
    return this.lock.write(async () => {
      await this.repository.saveSlot(slot);
      this.replaceIndexed(slot);
      return cloneSlot(slot);
    });
  }

  /** Returns false when the slot does not exist */
  async deleteSlot(name: string): Promise<boolean> {
    return this.lock.write(async () => {
      if (!this.slots.has(name)) return false;
      await this.repository.deleteSlot(name);
      this.index.removeSlot(name);
      this.slots.delete(name);
      return true;
    });
  }

  // ── Inspection ──────────────────────────────────────────────────

  getSlot(name: string): Slot | null {
    const slot = this.slots.get(name);
    return slot ? cloneSlot(slot) : null;
  }

  listSlots(): SlotSummary[] {
    return [...this.slots.values()]
      .map((s) => ({
        name: s.name,
        tags: [...s.tags],
        group_path: s.group_path,
        description: s.description,
        entry_count: s.entries.length,
        created_at: s.created_at,
        updated_at: s.updated_at,
      }))
      .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  getStats(): EngineStats {
    let entryCount = 0;
    for (const slot of this.slots.values()) entryCount += slot.entries.length;
    return { slot_count: this.slots.size, entry_count: entryCount, ...this.index.getStats() };
  }

  // ── Internals ───────────────────────────────────────────────────

  private requireSlot(name: string): Slot {
    const slot = this.slots.get(name);
    if (!slot) throw new SlotNotFoundError(name);
    return slot;
  }

  private isLive(slot_name: string, entry_id: string): boolean {
    return this.slots.get(slot_name)?.entries.some((e) => e.entry_id === entry_id) ?? false;
  }

  private resolveEntry(slot_name: string, entry_id: string): { slot: Slot; entry: Entry } {
    const slot = this.slots.get(slot_name);
    const entry = slot?.entries.find((e) => e.entry_id === entry_id);
    if (!slot || !entry) {
      throw new IndexConsistencyError(`Index references missing entry "${entry_id}" of slot "${slot_name}"`);
    }
    return { slot, entry };
  }

  private replaceIndexed(slot: Slot): void {
    this.index.removeSlot(slot.name);
    this.slots.set(slot.name, slot);
    for (const entry of slot.entries) this.index.addEntry(slot.name, entry);
  }

  /**
   * Run a read operation; on an index consistency error rebuild the index
   * from the slot cache and retry once. A second failure propagates.
   */
  private async withConsistencyRetry<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return await this.lock.read(fn);
    } catch (err: unknown) {
      if (!(err instanceof IndexConsistencyError)) throw err;
      console.error(`[memslot] ${operation}: ${err.message}; rebuilding index and retrying`);
      await this.lock.write(() => this.rebuildIndex());
      return this.lock.read(fn);
    }
  }
}

function nextEntryId(slot: Slot): string {
  const taken = new Set(slot.entries.map((e) => e.entry_id));
  let n = slot.entries.length + 1;
  while (taken.has(`e${n}`)) n++;
  return `e${n}`;
}
