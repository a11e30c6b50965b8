/**
 * Inverted Index: positional postings + TF-IDF
 *
 * term → TermRecord { document_frequency, postings by entry }
 *
 * Every (slot, entry) pair is a document. Postings keep the term
 * frequency and the token positions needed to confirm phrase adjacency.
 * Weighting is plain TF-IDF:
 *
 *   weight(t, e) = tf(t, e) · log(N / max(df(t), 1))
 *
 * The index owns no slot data; the engine feeds it entries and rebuilds
 * it from the live slots whenever consistency is in doubt.
 */

import { IndexConsistencyError } from "./errors";
import { tokenize } from "./tokenizer";
import type { Entry, Posting, Slot, TermRecord } from "./types";

/** Per-entry bookkeeping for the universe of indexed documents */
export interface IndexedEntry {
  slot_name: string;
  entry_id: string;
  timestamp: Date;
  seq: number; // insertion sequence, the final ranking tiebreak
  token_count: number;
  terms: string[]; // distinct terms, for O(terms) removal
}

interface MutableTermRecord {
  document_frequency: number;
  postings: Map<string, Posting>; // entry key → posting
}

export function entryKey(slot_name: string, entry_id: string): string {
  return `${slot_name}\u0000${entry_id}`;
}

export class InvertedIndex {
  private terms: Map<string, MutableTermRecord> = new Map();
  private entries: Map<string, IndexedEntry> = new Map();
  private seq = 0;

  // ── Mutation ────────────────────────────────────────────────────

  addEntry(slot_name: string, entry: Entry): void {
    const key = entryKey(slot_name, entry.entry_id);
    if (this.entries.has(key)) {
      throw new IndexConsistencyError(
        `Entry "${entry.entry_id}" of slot "${slot_name}" is already indexed; remove it before re-indexing`
      );
    }

    const tokens = tokenize(entry.content);
    const termPositions: Map<string, number[]> = new Map();
    for (const token of tokens) {
      const positions = termPositions.get(token.term);
      if (positions) {
        positions.push(token.position);
      } else {
        termPositions.set(token.term, [token.position]);
      }
    }

    for (const [term, positions] of termPositions) {
      let record = this.terms.get(term);
      if (!record) {
        record = { document_frequency: 0, postings: new Map() };
        this.terms.set(term, record);
      }
      record.postings.set(key, {
        slot_name,
        entry_id: entry.entry_id,
        term_frequency: positions.length,
        positions,
      });
      record.document_frequency += 1;
    }

    this.entries.set(key, {
      slot_name,
      entry_id: entry.entry_id,
      timestamp: entry.timestamp,
      seq: this.seq++,
      token_count: tokens.length,
      terms: [...termPositions.keys()],
    });
  }

  /** Returns false when the entry was not indexed */
  removeEntry(slot_name: string, entry_id: string): boolean {
    const key = entryKey(slot_name, entry_id);
    const indexed = this.entries.get(key);
    if (!indexed) return false;

    for (const term of indexed.terms) {
      const record = this.terms.get(term);
      if (!record || !record.postings.delete(key)) {
        throw new IndexConsistencyError(
          `Term "${term}" has no posting for entry "${entry_id}" of slot "${slot_name}"`
        );
      }
      record.document_frequency -= 1;
      if (record.document_frequency === 0) this.terms.delete(term);
    }

    this.entries.delete(key);
    return true;
  }

  /** Remove every entry of a slot; returns how many were removed */
  removeSlot(slot_name: string): number {
    const ids = [...this.entries.values()]
      .filter((e) => e.slot_name === slot_name)
      .map((e) => e.entry_id);
    for (const id of ids) this.removeEntry(slot_name, id);
    return ids.length;
  }

  clear(): void {
    this.terms.clear();
    this.entries.clear();
    this.seq = 0;
  }

  /** Discard everything and index the given slots in order */
  rebuild(slots: Iterable<Slot>): void {
    this.clear();
    for (const slot of slots) {
      for (const entry of slot.entries) {
        this.addEntry(slot.name, entry);
      }
    }
  }

  // ── Lookup ──────────────────────────────────────────────────────

  /** Copy of a term's record, postings ordered by slot then entry id */
  lookup(term: string): TermRecord | undefined {
    const record = this.terms.get(term);
    if (!record) return undefined;

    const postings = [...record.postings.values()]
      .map((p) => ({ ...p, positions: [...p.positions] }))
      .sort(
        (a, b) =>
          compareStrings(a.slot_name, b.slot_name) || compareStrings(a.entry_id, b.entry_id)
      );

    return { term, document_frequency: record.document_frequency, postings };
  }

  /** Posting of one term in one entry, without copying */
  posting(term: string, slot_name: string, entry_id: string): Posting | undefined {
    return this.terms.get(term)?.postings.get(entryKey(slot_name, entry_id));
  }

  /** Iterate a term's postings without copying */
  postings(term: string): Iterable<Posting> {
    return this.terms.get(term)?.postings.values() ?? [];
  }

  documentFrequency(term: string): number {
    return this.terms.get(term)?.document_frequency ?? 0;
  }

  idf(term: string): number {
    const df = Math.max(this.documentFrequency(term), 1);
    return Math.log(this.entries.size / df);
  }

  /** TF-IDF weight of a posting for the given term */
  weight(term: string, posting: Posting): number {
    return posting.term_frequency * this.idf(term);
  }

  /**
   * True when the terms occur at consecutive positions in the entry.
   * A single-term phrase only needs the term to be present.
   */
  phraseMatch(phraseTerms: string[], slot_name: string, entry_id: string): boolean {
    if (phraseTerms.length === 0) return false;

    const positionSets: Set<number>[] = [];
    for (const term of phraseTerms) {
      const posting = this.posting(term, slot_name, entry_id);
      if (!posting) return false;
      positionSets.push(new Set(posting.positions));
    }

    for (const startPos of positionSets[0]) {
      let matched = true;
      for (let i = 1; i < positionSets.length; i++) {
        if (!positionSets[i].has(startPos + i)) {
          matched = false;
          break;
        }
      }
      if (matched) return true;
    }
    return false;
  }

  hasEntry(slot_name: string, entry_id: string): boolean {
    return this.entries.has(entryKey(slot_name, entry_id));
  }

  /** Every indexed entry, keyed by entryKey() */
  allEntries(): ReadonlyMap<string, IndexedEntry> {
    return this.entries;
  }

  get size(): number {
    return this.entries.size;
  }

  // ── Consistency ─────────────────────────────────────────────────

  /**
   * Check postings against the live data and df against posting counts.
   * Throws IndexConsistencyError on the first violation.
   */
  verify(isLive: (slot_name: string, entry_id: string) => boolean): void {
    for (const [term, record] of this.terms) {
      if (record.document_frequency !== record.postings.size) {
        throw new IndexConsistencyError(
          `Term "${term}" has document frequency ${record.document_frequency} but ${record.postings.size} postings`
        );
      }
      for (const [key, posting] of record.postings) {
        if (!this.entries.has(key) || !isLive(posting.slot_name, posting.entry_id)) {
          throw new IndexConsistencyError(
            `Term "${term}" references missing entry "${posting.entry_id}" of slot "${posting.slot_name}"`
          );
        }
      }
    }
  }

  // ── Stats ───────────────────────────────────────────────────────

  getStats(): {
    indexed_entries: number;
    indexed_terms: number;
    total_postings: number;
    avg_entry_length: number;
  } {
    let totalPostings = 0;
    for (const record of this.terms.values()) totalPostings += record.postings.size;

    let totalTokens = 0;
    for (const e of this.entries.values()) totalTokens += e.token_count;

    return {
      indexed_entries: this.entries.size,
      indexed_terms: this.terms.size,
      total_postings: totalPostings,
      avg_entry_length: this.entries.size > 0 ? Math.round(totalTokens / this.entries.size) : 0,
    };
  }
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
