/**
 * Tokenizer / Normalizer
 *
 * The single tokenization path shared by indexing, query parsing and
 * merge similarity, so index terms and query terms always compare equal.
 *
 *   text → words (Unicode letters/digits) → case fold → stop words out
 *        → light suffix stemming → Token { term, surface, position, start, end }
 */

import stopWordList from "./data/stopwords.json";
import type { Token } from "./types";

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const WORD_PATTERN = /[\p{L}\p{N}]+/gu;

const MIN_TOKEN_LENGTH = 2;

export function isStopWord(word: string): boolean {
  return STOP_WORDS.has(word.toLowerCase());
}

/**
 * Split text into normalized terms with positions and character spans.
 * Positions count kept tokens only, so a phrase is adjacency in the
 * stop-word-free stream. Never throws.
 */
export function tokenize(text: string, caseSensitive = false): Token[] {
  const tokens: Token[] = [];
  let position = 0;

  for (const match of text.matchAll(WORD_PATTERN)) {
    const surface = match[0];
    if (surface.length < MIN_TOKEN_LENGTH) continue;
    if (STOP_WORDS.has(surface.toLowerCase())) continue;

    const start = match.index ?? 0;
    const folded = caseSensitive ? surface : surface.toLowerCase();
    tokens.push({
      term: stem(folded),
      surface,
      position: position++,
      start,
      end: start + surface.length,
    });
  }

  return tokens;
}

/** Normalized terms only, in text order */
export function terms(text: string, caseSensitive = false): string[] {
  return tokenize(text, caseSensitive).map((t) => t.term);
}

/** Distinct case-folded terms, used for similarity scoring */
export function termSet(text: string): Set<string> {
  return new Set(terms(text));
}

// ── Stemming ─────────────────────────────────────────────────────────
//
// Two deterministic steps so inflectional variants collapse:
//   plural:     sses → ss, ies → y, ss kept, trailing s dropped
//   inflection: trailing ing / ed dropped when ≥ 3 characters remain

export function stem(word: string): string {
  if (word.length < 4) return word;

  let w = word;
  if (w.endsWith("sses")) {
    w = w.slice(0, -2);
  } else if (w.endsWith("ies") && w.length > 4) {
    w = w.slice(0, -3) + "y";
  } else if (!w.endsWith("ss") && w.endsWith("s")) {
    w = w.slice(0, -1);
  }

  if (w.endsWith("ing") && w.length - 3 >= 3) {
    w = w.slice(0, -3);
  } else if (w.endsWith("ed") && w.length - 2 >= 3) {
    w = w.slice(0, -2);
  }

  return w;
}

/** Whitespace-delimited word count, as stored in entry metadata */
export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}
