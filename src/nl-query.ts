/**
 * Natural-Language Query Processor
 *
 *   question → type (leading interrogative) + time window + key terms
 *            → broad OR query over the full corpus
 *            → drop results outside the window
 *            → re-rank by tag affinity to the question type
 *            → answer text quoting only retrieved snippets
 */

import { parseQuery } from "./query-parser";
import type { QueryEngine } from "./search";
import { normalizeSearchOptions } from "./search";
import { extractTimeRange, inRange } from "./temporal";
import { tokenize } from "./tokenizer";
import type { QueryAnswer, QuestionType, RankingParams, SearchResult } from "./types";
import { DEFAULT_RANKING } from "./types";

const INTERROGATIVES: ReadonlyMap<string, QuestionType> = new Map<string, QuestionType>([
  ["what", "what"],
  ["which", "what"],
  ["who", "who"],
  ["whom", "who"],
  ["whose", "who"],
  ["when", "when"],
  ["where", "where"],
  ["why", "why"],
  ["how", "how"],
]);

const WHAT_LEAD_INS = [/^tell\s+me\b/, /^show\s+me\b/, /^list\b/, /^summari[sz]e\b/];

// Words that carry the request, not the topic
const FILLER_WORDS = new Set([
  "tell",
  "show",
  "list",
  "find",
  "give",
  "know",
  "anything",
  "something",
  "summarize",
  "summarise",
  "please",
]);

/** Slot tags that suggest an entry answers a given kind of question */
export const TYPE_TAG_VOCABULARY: Record<QuestionType, string[]> = {
  what: ["decision", "decisions", "meeting", "meetings", "notes", "summary", "spec"],
  who: ["decision", "decisions", "meeting", "meetings", "people", "team", "contacts"],
  when: ["meeting", "meetings", "schedule", "timeline", "deadline", "events"],
  where: ["location", "locations", "travel", "office", "places"],
  why: ["decision", "decisions", "rationale", "analysis", "retro"],
  how: ["process", "howto", "guide", "procedure", "runbook"],
};

const MAX_KEY_TERMS = 10;

export interface QuestionClassification {
  type: QuestionType;
  classified: boolean;
}

export function classifyQuestion(question: string): QuestionClassification {
  const lower = question.trim().toLowerCase();
  const firstWord = lower.match(/^[\p{L}]+/u)?.[0] ?? "";
  const type = INTERROGATIVES.get(firstWord);
  if (type) return { type, classified: true };
  if (WHAT_LEAD_INS.some((re) => re.test(lower))) return { type: "what", classified: true };
  return { type: "what", classified: false };
}

/**
 * Topic words of the question: surface words, lower-cased, without stop
 * words, interrogatives or request fillers, one per stem, at most 10.
 */
export function extractKeyTerms(text: string): string[] {
  const seen = new Set<string>();
  const keyTerms: string[] = [];
  for (const token of tokenize(text)) {
    const word = token.surface.toLowerCase();
    if (INTERROGATIVES.has(word) || FILLER_WORDS.has(word)) continue;
    if (seen.has(token.term)) continue;
    seen.add(token.term);
    keyTerms.push(word);
    if (keyTerms.length === MAX_KEY_TERMS) break;
  }
  return keyTerms;
}

export class NaturalLanguageQueryProcessor {
  private ranking: RankingParams;

  constructor(
    private readonly engine: QueryEngine,
    ranking: Partial<RankingParams> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.ranking = { ...DEFAULT_RANKING, ...ranking };
  }

  answer(question: string, maxResults = 5): QueryAnswer {
    // Validates maxResults against the same bounds as a search
    const opts = normalizeSearchOptions({ max_results: maxResults }, this.ranking.max_results_limit);

    const trimmed = question.trim();
    const { type, classified } = classifyQuestion(trimmed);
    const timeRange = extractTimeRange(trimmed, this.clock());

    const topicText = timeRange ? trimmed.toLowerCase().replace(timeRange.phrase, " ") : trimmed;
    const keyTerms = extractKeyTerms(topicText);
    const synthesizedQuery = keyTerms.join(" OR ");

    const base: Omit<QueryAnswer, "results" | "answer"> = {
      question: trimmed,
      question_type: type,
      classified,
      key_terms: keyTerms,
      synthesized_query: synthesizedQuery,
      time_range: timeRange,
    };

    if (keyTerms.length === 0) {
      return { ...base, results: [], answer: "The question has no searchable terms; try naming the topic." };
    }

    // Every match over the full corpus first; the window and the limit apply afterwards
    let results = this.engine.evaluateParsed(parseQuery(synthesizedQuery), opts, Infinity);
    if (timeRange) {
      results = results.filter((r) => inRange(r.timestamp, timeRange));
    }

    const ranked = this.rerank(results, type).slice(0, opts.max_results);
    return { ...base, results: ranked, answer: composeAnswer(type, keyTerms, ranked) };
  }

  private rerank(results: SearchResult[], type: QuestionType): SearchResult[] {
    const vocabulary = new Set(TYPE_TAG_VOCABULARY[type]);
    const boost = this.ranking.type_tag_boost;

    return results
      .map((r, order) => {
        const tagMatch = r.tags.some((t) => vocabulary.has(t)) ? 1 : 0;
        return { result: { ...r, score: (r.score + boost * tagMatch) / (1 + boost) }, order };
      })
      .sort((a, b) => b.result.score - a.result.score || a.order - b.order)
      .map((x) => x.result);
  }
}

// ── Answer text ──────────────────────────────────────────────────────

const INTROS: Record<QuestionType, (n: number) => string> = {
  what: (n) => `Here is what your slots say (${n} results):`,
  who: (n) => `Here is what your slots say about the people involved (${n} results):`,
  when: (n) => `Here is the timing information found (${n} results):`,
  where: (n) => `Here is the location information found (${n} results):`,
  why: (n) => `Here is the reasoning found (${n} results):`,
  how: (n) => `Here is the process information found (${n} results):`,
};

const MAX_SLOTS_IN_ANSWER = 3;

export function composeAnswer(type: QuestionType, keyTerms: string[], results: SearchResult[]): string {
  if (results.length === 0) {
    return `No matching entries found for: ${keyTerms.join(", ")}.`;
  }

  // Best result per slot, slots in rank order
  const bySlot: Map<string, SearchResult> = new Map();
  for (const r of results) {
    if (!bySlot.has(r.slot_name)) bySlot.set(r.slot_name, r);
  }

  const lines = [INTROS[type](results.length)];
  for (const [slotName, best] of [...bySlot].slice(0, MAX_SLOTS_IN_ANSWER)) {
    const tags = best.tags.length ? ` [tags: ${best.tags.join(", ")}]` : "";
    lines.push(`- ${slotName} (relevance ${best.score.toFixed(2)}, ${best.timestamp.toISOString()})${tags}: ${best.snippet}`);
  }
  if (bySlot.size > MAX_SLOTS_IN_ANSWER) {
    lines.push(`…and ${bySlot.size - MAX_SLOTS_IN_ANSWER} more slots with related entries.`);
  }
  return lines.join("\n");
}
