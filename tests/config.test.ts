/**
 * Tests for environment-driven configuration.
 */

import { describe, test, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "../src/config";
import { ConfigError } from "../src/errors";

describe("loadConfig", () => {
  test("defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      phrase_weight: 5,
      type_tag_boost: 0.5,
      snippet_length: 160,
      max_results_limit: 100,
      default_similarity_threshold: 0.8,
      preview_length: 500,
      suggest_threshold: 0.7,
    });
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  test("reads MEMSLOT_* overrides", () => {
    const config = loadConfig({
      MEMSLOT_PHRASE_WEIGHT: "3.5",
      MEMSLOT_SNIPPET_LENGTH: "80",
      MEMSLOT_SIMILARITY_THRESHOLD: "0.9",
      UNRELATED: "ignored",
    });
    expect(config.phrase_weight).toBe(3.5);
    expect(config.snippet_length).toBe(80);
    expect(config.default_similarity_threshold).toBe(0.9);
    expect(config.max_results_limit).toBe(100);
  });

  test("blank values keep the default", () => {
    expect(loadConfig({ MEMSLOT_PREVIEW_LENGTH: "  " }).preview_length).toBe(500);
  });

  test("every bad variable is reported", () => {
    try {
      loadConfig({ MEMSLOT_PHRASE_WEIGHT: "heavy", MEMSLOT_SUGGEST_THRESHOLD: "2" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.code).toBe("config");
        expect(err.issues).toHaveLength(2);
        expect(err.issues[0].startsWith("MEMSLOT_PHRASE_WEIGHT: ")).toBe(true);
        expect(err.issues[1].startsWith("MEMSLOT_SUGGEST_THRESHOLD: ")).toBe(true);
      }
    }
  });

  test("integers are required where counts are expected", () => {
    expect(() => loadConfig({ MEMSLOT_MAX_RESULTS_LIMIT: "12.5" })).toThrow(ConfigError);
  });
});
