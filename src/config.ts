/**
 * Engine configuration: ranking knobs plus merge defaults, overridable
 * through MEMSLOT_* environment variables.
 *
 *   MEMSLOT_PHRASE_WEIGHT         fixed weight of a confirmed phrase match (5)
 *   MEMSLOT_TYPE_TAG_BOOST        question-type tag re-rank boost (0.5)
 *   MEMSLOT_SNIPPET_LENGTH        snippet window in characters (160)
 *   MEMSLOT_MAX_RESULTS_LIMIT     upper bound for max_results (100)
 *   MEMSLOT_SIMILARITY_THRESHOLD  default merge duplicate threshold (0.8)
 *   MEMSLOT_PREVIEW_LENGTH        merge preview sample length (500)
 *   MEMSLOT_SUGGEST_THRESHOLD     merge suggestion threshold (0.7)
 */

import { z } from "zod";
import { ConfigError, formatIssues } from "./errors";
import { DEFAULT_SIMILARITY_THRESHOLD, DEFAULT_SUGGEST_THRESHOLD } from "./merge";
import type { RankingParams } from "./types";
import { DEFAULT_RANKING } from "./types";

export interface EngineConfig extends RankingParams {
  default_similarity_threshold: number;
  preview_length: number;
  suggest_threshold: number;
}

export const DEFAULT_CONFIG: EngineConfig = {
  ...DEFAULT_RANKING,
  default_similarity_threshold: DEFAULT_SIMILARITY_THRESHOLD,
  preview_length: 500,
  suggest_threshold: DEFAULT_SUGGEST_THRESHOLD,
};

const unit = z.coerce.number().min(0).max(1);

const envSchema = z.object({
  MEMSLOT_PHRASE_WEIGHT: z.coerce.number().positive().optional(),
  MEMSLOT_TYPE_TAG_BOOST: z.coerce.number().min(0).optional(),
  MEMSLOT_SNIPPET_LENGTH: z.coerce.number().int().min(20).optional(),
  MEMSLOT_MAX_RESULTS_LIMIT: z.coerce.number().int().min(1).optional(),
  MEMSLOT_SIMILARITY_THRESHOLD: unit.optional(),
  MEMSLOT_PREVIEW_LENGTH: z.coerce.number().int().min(1).optional(),
  MEMSLOT_SUGGEST_THRESHOLD: unit.optional(),
});

/** Read overrides from the environment; unset or blank variables keep defaults */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key]?.trim();
    if (value) present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error.issues));
  }
  const vars = parsed.data;

  return {
    phrase_weight: vars.MEMSLOT_PHRASE_WEIGHT ?? DEFAULT_CONFIG.phrase_weight,
    type_tag_boost: vars.MEMSLOT_TYPE_TAG_BOOST ?? DEFAULT_CONFIG.type_tag_boost,
    snippet_length: vars.MEMSLOT_SNIPPET_LENGTH ?? DEFAULT_CONFIG.snippet_length,
    max_results_limit: vars.MEMSLOT_MAX_RESULTS_LIMIT ?? DEFAULT_CONFIG.max_results_limit,
    default_similarity_threshold:
      vars.MEMSLOT_SIMILARITY_THRESHOLD ?? DEFAULT_CONFIG.default_similarity_threshold,
    preview_length: vars.MEMSLOT_PREVIEW_LENGTH ?? DEFAULT_CONFIG.preview_length,
    suggest_threshold: vars.MEMSLOT_SUGGEST_THRESHOLD ?? DEFAULT_CONFIG.suggest_threshold,
  };
}
