/**
 * Content similarity for duplicate detection.
 *
 * Jaccard coefficient over the tokenizer's term sets. Byte-identical
 * texts score exactly 1; different texts are capped just below, so a
 * threshold of 1.0 only ever drops exact copies.
 */

import { termSet } from "./tokenizer";

export const DISTINCT_TEXT_CEILING = 0.999;

export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 0;
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let shared = 0;
  for (const term of small) {
    if (large.has(term)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

/** Similarity in [0, 1] between two texts */
export function similarity(a: string, b: string): number {
  if (a === b) return 1;
  return Math.min(jaccard(termSet(a), termSet(b)), DISTINCT_TEXT_CEILING);
}

/**
 * Pre-tokenized variant for pairwise loops: term sets are computed once
 * per text instead of once per comparison.
 */
export class SimilarityScorer {
  private sets: Map<string, Set<string>> = new Map();

  score(a: string, b: string): number {
    if (a === b) return 1;
    return Math.min(jaccard(this.termsOf(a), this.termsOf(b)), DISTINCT_TEXT_CEILING);
  }

  private termsOf(text: string): Set<string> {
    let set = this.sets.get(text);
    if (!set) {
      set = termSet(text);
      this.sets.set(text, set);
    }
    return set;
  }
}
