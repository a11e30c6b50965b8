export { Engine } from "./engine";
export type { EngineStats, SlotSummary } from "./engine";
export { DEFAULT_CONFIG, loadConfig } from "./config";
export type { EngineConfig } from "./config";
export {
  ConfigError,
  IndexConsistencyError,
  InvalidFilterError,
  InvalidSlotError,
  MemslotError,
  MergeValidationError,
  QueryParseError,
  SlotNotFoundError,
} from "./errors";
export type { ErrorCode } from "./errors";
export { InMemorySlotRepository, loadSlotsFile, parseSlot, parseSnapshot } from "./slot-store";
export type { SlotRepository } from "./slot-store";
export { InvertedIndex } from "./inverted-index";
export { QueryEngine, renderHighlights } from "./search";
export { NaturalLanguageQueryProcessor, classifyQuestion, extractKeyTerms } from "./nl-query";
export { parseQuery, formatQuery } from "./query-parser";
export type { QueryNode } from "./query-parser";
export { tokenize, termSet, stem } from "./tokenizer";
export { similarity } from "./similarity";
export { planMerge, renderMergedContent, suggestMergeCandidates, validateMergeRequest } from "./merge";
export { selectEntry } from "./entry-select";
export type { EntrySelector, SelectedEntry } from "./entry-select";
export { extractTimeRange, parseRelativeTime } from "./temporal";
export { ReadWriteLock } from "./rw-lock";
export * from "./types";
