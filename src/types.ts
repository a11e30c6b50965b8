/**
 * memslot type definitions
 *
 * Models the slot/entry knowledge store and the search structures built
 * over it:
 *
 *   Slot, Entry, EntryKind        → content supplied by the slot repository
 *   Token                          → tokenizer output shared by every component
 *   Posting, TermRecord            → positional inverted index
 *   SearchOptions, SearchResult    → boolean query engine
 *   QueryAnswer, TimeRange         → natural-language query processor
 *   MergeRequest, MergePreview,
 *   MergeOutcome                   → similarity & merge engine
 *   RankingParams                  → configurable scoring knobs
 */

// ── Slot model ──────────────────────────────────────────────────────

/** Closed set of entry origins */
export type EntryKind = "direct-save" | "summary" | "imported" | "merge-result";

export const ENTRY_KINDS: readonly EntryKind[] = [
  "direct-save",
  "summary",
  "imported",
  "merge-result",
];

/** One immutable unit of content inside a slot */
export interface Entry {
  entry_id: string; // unique within its slot
  kind: EntryKind;
  content: string;
  timestamp: Date;
  metadata: Record<string, unknown>; // word_count, topics, provenance…
}

/** A named container of chronological entries */
export interface Slot {
  name: string;
  tags: string[]; // lower-cased, de-duplicated, sorted
  group_path: string | null; // "/"-separated hierarchy
  description: string;
  entries: Entry[]; // insertion order is significant
  created_at: Date;
  updated_at: Date;
}

/** Fields a caller provides when saving new content */
export interface NewEntry {
  content: string;
  kind?: EntryKind;
  timestamp?: Date;
  metadata?: Record<string, unknown>;
}

// ── Tokens ──────────────────────────────────────────────────────────

export interface Token {
  term: string; // normalized + stemmed
  surface: string; // the word as it appears in the text
  position: number; // index in the kept-token stream
  start: number; // character offset in the source text
  end: number;
}

// ── Positional index ────────────────────────────────────────────────

/**
 * A posting in the positional inverted index: one per (term, entry).
 * Positions are offsets in the entry's kept-token stream.
 */
export interface Posting {
  slot_name: string;
  entry_id: string;
  term_frequency: number; // |positions|
  positions: number[];
}

/** A term with its posting list and corpus-wide document frequency */
export interface TermRecord {
  term: string;
  document_frequency: number;
  postings: Posting[];
}

// ── Search ──────────────────────────────────────────────────────────

export interface SearchOptions {
  include_tags?: string[];
  exclude_tags?: string[];
  include_groups?: string[];
  exclude_groups?: string[];
  date_from?: Date;
  date_to?: Date;
  kinds?: EntryKind[];
  max_results?: number;
  case_sensitive?: boolean;
  /** Treat the query as a regular expression over entry text */
  use_regex?: boolean;
}

/** Character span inside a snippet */
export interface Highlight {
  start: number;
  end: number;
}

export interface SearchResult {
  slot_name: string;
  entry_id: string;
  score: number; // normalized to [0, 1]
  snippet: string;
  highlights: Highlight[];
  matched_terms: string[];
  tags: string[];
  group_path: string | null;
  kind: EntryKind;
  timestamp: Date;
}

// ── Natural-language queries ────────────────────────────────────────

export type QuestionType = "what" | "who" | "when" | "where" | "why" | "how";

export interface TimeRange {
  from: Date;
  to: Date;
  phrase: string; // the text that produced the window
}

export interface QueryAnswer {
  question: string;
  question_type: QuestionType;
  classified: boolean; // false when the type fell back to "what"
  key_terms: string[];
  synthesized_query: string;
  time_range: TimeRange | null;
  results: SearchResult[];
  answer: string;
}

// ── Merge ───────────────────────────────────────────────────────────

export interface MergeRequest {
  source_slots: string[];
  target_slot: string;
  similarity_threshold?: number;
}

export interface MergeExecuteRequest extends MergeRequest {
  delete_sources?: boolean;
}

export interface EntryRef {
  slot_name: string;
  entry_id: string;
  timestamp: Date;
}

export interface DroppedEntry extends EntryRef {
  duplicate_of: EntryRef;
  similarity: number;
}

export interface MergePreview {
  source_slots: string[];
  target_slot: string;
  target_exists: boolean;
  similarity_threshold: number;
  total_entries: number;
  entries_kept: number;
  duplicates_removed: number;
  merged_tags: string[];
  group_path: string | null;
  chronological_order: { slot_name: string; first_timestamp: Date | null }[];
  total_content_length: number;
  content_preview: string;
}

export interface MergeOutcome {
  target: Slot;
  kept: EntryRef[];
  dropped: DroppedEntry[];
  merged_tags: string[];
  group_path: string | null;
  deleted_sources: string[];
  failed_deletions: { slot_name: string; error: string }[];
}

// ── Ranking configuration ───────────────────────────────────────────

/**
 * Scoring and presentation knobs. Overridable per engine and through
 * MEMSLOT_* environment variables (see config.ts).
 */
export interface RankingParams {
  /** Fixed weight credited to an entry for a confirmed phrase match. Default 5.0 */
  phrase_weight: number;

  /** Re-rank boost for entries whose slot tags fit the question type. Default 0.5 */
  type_tag_boost: number;

  /** Snippet window in characters. Default 160 */
  snippet_length: number;

  /** Upper bound accepted for max_results. Default 100 */
  max_results_limit: number;
}

export const DEFAULT_RANKING: RankingParams = {
  phrase_weight: 5.0,
  type_tag_boost: 0.5,
  snippet_length: 160,
  max_results_limit: 100,
};
