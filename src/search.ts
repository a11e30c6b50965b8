/**
 * Boolean Query Engine: parse, evaluate, filter, rank, snippet
 *
 * Each leaf yields a candidate set of entries with a weight:
 *   term   → TF-IDF from the inverted index
 *   phrase → fixed phrase_weight for entries whose positions confirm adjacency
 *
 * Combination:
 *   AND → intersection, weights summed
 *   OR  → union, max weight per entry
 *   NOT → complement against all indexed entries, weight 0
 *
 * A word with no searchable terms (a stop word, bare punctuation) is
 * neutral: AND and OR keep the other operand, NOT subtracts nothing.
 *
 * With use_regex the query is a pattern instead: each entry weighs its
 * match count, saturating at REGEX_MATCH_SATURATION matches.
 *
 * Filters (tags, groups, dates, kinds) narrow the candidates, scores are
 * normalized by the maximum remaining weight, then results are ranked
 * (score desc, newest first, insertion order) and truncated.
 */

import { z } from "zod";
import { IndexConsistencyError, InvalidFilterError, QueryParseError, formatIssues } from "./errors";
import { entryKey } from "./inverted-index";
import type { InvertedIndex, IndexedEntry } from "./inverted-index";
import { parseQuery, positiveLeaves } from "./query-parser";
import type { QueryNode } from "./query-parser";
import { tokenize } from "./tokenizer";
import type {
  Entry,
  EntryKind,
  Highlight,
  RankingParams,
  SearchOptions,
  SearchResult,
  Slot,
  Token,
} from "./types";
import { DEFAULT_RANKING, ENTRY_KINDS } from "./types";

/** Resolves index references back to live slot data */
export interface EntryResolver {
  resolve(slot_name: string, entry_id: string): { slot: Slot; entry: Entry };
}

interface Candidate {
  weight: number;
  matched: Set<string>;
}

type CandidateSet = Map<string, Candidate>;

type SpanFinder = (entry: Entry, key: string, candidate: Candidate) => Highlight[];

const REGEX_MATCH_SATURATION = 10;

/** Search options after validation and defaulting */
export interface NormalizedSearchOptions {
  include_tags: string[];
  exclude_tags: string[];
  include_groups: string[];
  exclude_groups: string[];
  date_from: Date | null;
  date_to: Date | null;
  kinds: ReadonlySet<EntryKind>;
  max_results: number;
  case_sensitive: boolean;
  use_regex: boolean;
}

// ── Option validation ────────────────────────────────────────────────

function searchOptionsSchema(maxLimit: number) {
  const tagList = z.array(z.string()).default([]);
  return z
    .object({
      include_tags: tagList,
      exclude_tags: tagList,
      include_groups: tagList,
      exclude_groups: tagList,
      date_from: z.date().optional(),
      date_to: z.date().optional(),
      kinds: z.array(z.enum(["direct-save", "summary", "imported", "merge-result"])).min(1).optional(),
      max_results: z
        .number()
        .int("max_results must be an integer")
        .min(1, "max_results must be at least 1")
        .max(maxLimit, `max_results must be at most ${maxLimit}`)
        .default(20),
      case_sensitive: z.boolean().default(false),
      use_regex: z.boolean().default(false),
    })
    .superRefine((opts, ctx) => {
      const include = new Set(opts.include_tags.map(normalizeTag));
      for (const tag of opts.exclude_tags.map(normalizeTag)) {
        if (include.has(tag)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `tag "${tag}" is both included and excluded`,
          });
        }
      }
      const includeGroups = new Set(opts.include_groups.map(normalizeGroup));
      for (const group of opts.exclude_groups.map(normalizeGroup)) {
        if (includeGroups.has(group)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `group "${group}" is both included and excluded`,
          });
        }
      }
      if (opts.date_from && opts.date_to && opts.date_from > opts.date_to) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "date_from is after date_to" });
      }
    });
}

export function normalizeSearchOptions(
  options: SearchOptions | undefined,
  maxLimit: number = DEFAULT_RANKING.max_results_limit
): NormalizedSearchOptions {
  const parsed = searchOptionsSchema(maxLimit).safeParse(options ?? {});
  if (!parsed.success) {
    throw new InvalidFilterError(formatIssues(parsed.error.issues));
  }
  const opts = parsed.data;
  return {
    include_tags: opts.include_tags.map(normalizeTag),
    exclude_tags: opts.exclude_tags.map(normalizeTag),
    include_groups: opts.include_groups.map(normalizeGroup),
    exclude_groups: opts.exclude_groups.map(normalizeGroup),
    date_from: opts.date_from ?? null,
    date_to: opts.date_to ?? null,
    kinds: new Set(opts.kinds ?? ENTRY_KINDS),
    max_results: opts.max_results,
    case_sensitive: opts.case_sensitive,
    use_regex: opts.use_regex,
  };
}

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

export function normalizeGroup(group: string): string {
  return group.trim().replace(/^\/+|\/+$/g, "");
}

/** Hierarchical match: "work" covers "work" and "work/clients" */
export function groupMatches(group_path: string | null, group: string): boolean {
  if (!group_path) return false;
  const path = normalizeGroup(group_path);
  return path === group || path.startsWith(group + "/");
}

// ── Engine ───────────────────────────────────────────────────────────

export class QueryEngine {
  private ranking: RankingParams;

  constructor(
    private readonly index: InvertedIndex,
    private readonly resolver: EntryResolver,
    ranking: Partial<RankingParams> = {}
  ) {
    this.ranking = { ...DEFAULT_RANKING, ...ranking };
  }

  /** Parse and evaluate a raw boolean query, or a pattern with use_regex */
  evaluate(rawQuery: string, options?: SearchOptions): SearchResult[] {
    const opts = normalizeSearchOptions(options, this.ranking.max_results_limit);
    if (opts.use_regex) return this.evaluateRegex(rawQuery, opts);
    return this.evaluateParsed(parseQuery(rawQuery), opts);
  }

  /** Pass `limit` = Infinity to rank every match instead of the top max_results */
  evaluateParsed(ast: QueryNode, opts: NormalizedSearchOptions, limit = opts.max_results): SearchResult[] {
    const ctx = new EvalContext(this.index, this.resolver, opts.case_sensitive);
    const candidates = this.evaluateNode(ast, ctx);
    if (!candidates) return [];

    // Terms to highlight come from leaves outside NOT
    const highlightTerms = new Set<string>();
    for (const leaf of positiveLeaves(ast)) {
      if (leaf.type === "term" || leaf.type === "phrase") {
        for (const t of tokenize(leaf.text)) highlightTerms.add(t.term);
      }
    }

    return this.rank(candidates, opts, limit, (entry, _key, candidate) =>
      tokenize(entry.content)
        .filter((t) => candidate.matched.has(t.term) && highlightTerms.has(t.term))
        .map((t) => ({ start: t.start, end: t.end }))
    );
  }

  evaluateRegex(pattern: string, opts: NormalizedSearchOptions, limit = opts.max_results): SearchResult[] {
    const regex = compilePattern(pattern, opts.case_sensitive);
    const candidates: CandidateSet = new Map();
    const spans: Map<string, Highlight[]> = new Map();

    for (const [key, info] of this.index.allEntries()) {
      const { entry } = this.resolver.resolve(info.slot_name, info.entry_id);
      const found = [...entry.content.matchAll(regex)].filter((m) => m[0].length > 0);
      if (found.length === 0) continue;

      candidates.set(key, {
        weight: Math.min(1, found.length / REGEX_MATCH_SATURATION),
        matched: new Set(found.map((m) => (opts.case_sensitive ? m[0] : m[0].toLowerCase()))),
      });
      spans.set(
        key,
        found.map((m) => {
          const start = m.index ?? 0;
          return { start, end: start + m[0].length };
        })
      );
    }

    return this.rank(candidates, opts, limit, (_entry, key) => spans.get(key) ?? []);
  }

  // ── Filtering and ranking ─────────────────────────────────────────

  private rank(
    candidates: CandidateSet,
    opts: NormalizedSearchOptions,
    limit: number,
    spansFor: SpanFinder
  ): SearchResult[] {
    if (candidates.size === 0) return [];

    const scored: { key: string; info: IndexedEntry; slot: Slot; entry: Entry; candidate: Candidate }[] = [];
    for (const [key, candidate] of candidates) {
      const info = this.index.allEntries().get(key);
      if (!info) {
        throw new IndexConsistencyError(`Candidate "${key}" is not an indexed entry`);
      }
      const { slot, entry } = this.resolver.resolve(info.slot_name, info.entry_id);
      if (!passesFilters(slot, entry, opts)) continue;
      scored.push({ key, info, slot, entry, candidate });
    }
    if (scored.length === 0) return [];

    const maxWeight = scored.reduce((max, s) => Math.max(max, s.candidate.weight), 0);

    scored.sort(
      (a, b) =>
        b.candidate.weight - a.candidate.weight ||
        b.info.timestamp.getTime() - a.info.timestamp.getTime() ||
        a.info.seq - b.info.seq
    );

    return scored.slice(0, limit).map(({ key, slot, entry, candidate }) => {
      const spans = spansFor(entry, key, candidate);
      const { snippet, highlights } = buildSnippet(entry.content, spans, this.ranking.snippet_length);

      return {
        slot_name: slot.name,
        entry_id: entry.entry_id,
        score: maxWeight > 0 ? candidate.weight / maxWeight : 0,
        snippet,
        highlights,
        matched_terms: [...candidate.matched].sort(),
        tags: [...slot.tags],
        group_path: slot.group_path,
        kind: entry.kind,
        timestamp: entry.timestamp,
      };
    });
  }

  // ── Expression evaluation ─────────────────────────────────────────

  /** null marks a leaf with no searchable terms */
  private evaluateNode(node: QueryNode, ctx: EvalContext): CandidateSet | null {
    switch (node.type) {
      case "term":
        return this.evaluateTerm(node.text, ctx);
      case "phrase":
        return this.evaluatePhrase(node.text, ctx);
      case "and": {
        const left = this.evaluateNode(node.left, ctx);
        if (left && left.size === 0) return left;
        const right = this.evaluateNode(node.right, ctx);
        if (!left || !right) return left ?? right;
        const result: CandidateSet = new Map();
        for (const [key, l] of left) {
          const r = right.get(key);
          if (!r) continue;
          result.set(key, { weight: l.weight + r.weight, matched: union(l.matched, r.matched) });
        }
        return result;
      }
      case "or": {
        const left = this.evaluateNode(node.left, ctx);
        const right = this.evaluateNode(node.right, ctx);
        if (!left || !right) return left ?? right;
        const result: CandidateSet = new Map(left);
        for (const [key, r] of right) {
          const l = result.get(key);
          result.set(
            key,
            l ? { weight: Math.max(l.weight, r.weight), matched: union(l.matched, r.matched) } : r
          );
        }
        return result;
      }
      case "not": {
        const excluded = this.evaluateNode(node.operand, ctx);
        if (!excluded) return null;
        const result: CandidateSet = new Map();
        for (const key of this.index.allEntries().keys()) {
          if (!excluded.has(key)) result.set(key, { weight: 0, matched: new Set() });
        }
        return result;
      }
    }
  }

  private evaluateTerm(text: string, ctx: EvalContext): CandidateSet | null {
    const folded = tokenize(text);
    if (folded.length === 0) return null;
    // "follow-up" style words split into several terms: treat as a phrase
    if (folded.length > 1) return this.evaluatePhrase(text, ctx);

    const term = folded[0].term;
    const exact = ctx.caseSensitive ? tokenize(text, true)[0]?.term : undefined;
    const result: CandidateSet = new Map();

    for (const posting of this.index.postings(term)) {
      if (exact !== undefined && !ctx.containsExact(posting.slot_name, posting.entry_id, [exact])) {
        continue;
      }
      result.set(entryKey(posting.slot_name, posting.entry_id), {
        weight: this.index.weight(term, posting),
        matched: new Set([term]),
      });
    }
    return result;
  }

  private evaluatePhrase(text: string, ctx: EvalContext): CandidateSet | null {
    const phraseTerms = tokenize(text).map((t) => t.term);
    if (phraseTerms.length === 0) return null;
    const result: CandidateSet = new Map();

    const exact = ctx.caseSensitive ? tokenize(text, true).map((t) => t.term) : undefined;

    // Drive from the rarest term's postings
    const rarest = [...new Set(phraseTerms)].sort(
      (a, b) => this.index.documentFrequency(a) - this.index.documentFrequency(b)
    )[0];

    for (const posting of this.index.postings(rarest)) {
      const { slot_name, entry_id } = posting;
      if (!this.index.phraseMatch(phraseTerms, slot_name, entry_id)) continue;
      if (exact && !ctx.containsExact(slot_name, entry_id, exact)) continue;
      result.set(entryKey(slot_name, entry_id), {
        weight: this.ranking.phrase_weight,
        matched: new Set(phraseTerms),
      });
    }
    return result;
  }
}

// ── Evaluation context ───────────────────────────────────────────────
//
// Case-sensitive leaves re-check the entry's own text, tokenized without
// case folding. Token lists are cached for the duration of one query.

class EvalContext {
  private exactTokens: Map<string, Token[]> = new Map();

  constructor(
    private readonly index: InvertedIndex,
    private readonly resolver: EntryResolver,
    readonly caseSensitive: boolean
  ) {}

  /** True when the exact-cased terms occur consecutively in the entry */
  containsExact(slot_name: string, entry_id: string, exactTerms: string[]): boolean {
    if (!this.index.hasEntry(slot_name, entry_id)) return false;
    const key = entryKey(slot_name, entry_id);
    let tokens = this.exactTokens.get(key);
    if (!tokens) {
      tokens = tokenize(this.resolver.resolve(slot_name, entry_id).entry.content, true);
      this.exactTokens.set(key, tokens);
    }

    for (let i = 0; i + exactTerms.length <= tokens.length; i++) {
      let matched = true;
      for (let j = 0; j < exactTerms.length; j++) {
        if (tokens[i + j].term !== exactTerms[j]) {
          matched = false;
          break;
        }
      }
      if (matched) return true;
    }
    return false;
  }
}

function compilePattern(pattern: string, caseSensitive: boolean): RegExp {
  if (pattern.trim() === "") {
    throw new QueryParseError("empty query", pattern, 0);
  }
  try {
    return new RegExp(pattern, caseSensitive ? "g" : "gi");
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new QueryParseError(`invalid regular expression: ${reason}`, pattern, 0);
  }
}

function union(a: Set<string>, b: Set<string>): Set<string> {
  const out = new Set(a);
  for (const v of b) out.add(v);
  return out;
}

function passesFilters(slot: Slot, entry: Entry, opts: NormalizedSearchOptions): boolean {
  if (!opts.kinds.has(entry.kind)) return false;

  if (opts.include_tags.length > 0 && !opts.include_tags.some((t) => slot.tags.includes(t))) {
    return false;
  }
  if (opts.exclude_tags.some((t) => slot.tags.includes(t))) return false;

  if (
    opts.include_groups.length > 0 &&
    !opts.include_groups.some((g) => groupMatches(slot.group_path, g))
  ) {
    return false;
  }
  if (opts.exclude_groups.some((g) => groupMatches(slot.group_path, g))) return false;

  if (opts.date_from && entry.timestamp < opts.date_from) return false;
  if (opts.date_to && entry.timestamp > opts.date_to) return false;

  return true;
}

// ── Snippets ─────────────────────────────────────────────────────────
//
// Density-based: slide a window of maxLen characters anchored a little
// before each highlight and keep the one covering the most highlights.

export function buildSnippet(
  content: string,
  spans: Highlight[],
  maxLen: number
): { snippet: string; highlights: Highlight[] } {
  if (content.length <= maxLen) {
    return { snippet: content, highlights: spans.map((s) => ({ ...s })) };
  }

  let bestStart = 0;
  let bestCount = -1;
  const lead = Math.floor(maxLen / 4);

  for (const span of spans) {
    const start = Math.min(Math.max(0, span.start - lead), content.length - maxLen);
    const end = start + maxLen;
    const count = spans.filter((s) => s.start >= start && s.end <= end).length;
    if (count > bestCount) {
      bestCount = count;
      bestStart = start;
    }
  }

  const end = bestStart + maxLen;
  const prefix = bestStart > 0 ? "…" : "";
  const suffix = end < content.length ? "…" : "";
  const snippet = prefix + content.slice(bestStart, end) + suffix;
  const shift = prefix.length - bestStart;

  const highlights = spans
    .filter((s) => s.start >= bestStart && s.end <= end)
    .map((s) => ({ start: s.start + shift, end: s.end + shift }));

  return { snippet, highlights };
}

/** Wrap highlight spans in markers for display */
export function renderHighlights(
  snippet: string,
  highlights: Highlight[],
  open = "**",
  close = "**"
): string {
  let out = "";
  let cursor = 0;
  for (const h of [...highlights].sort((a, b) => a.start - b.start)) {
    out += snippet.slice(cursor, h.start) + open + snippet.slice(h.start, h.end) + close;
    cursor = h.end;
  }
  return out + snippet.slice(cursor);
}
