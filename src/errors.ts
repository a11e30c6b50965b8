// Error types surfaced by the engine. Parse and validation errors carry
// enough detail for the caller to fix the request; they are never retried.

export type ErrorCode =
  | "query_parse"
  | "invalid_filter"
  | "merge_validation"
  | "index_consistency"
  | "not_found"
  | "invalid_slot"
  | "config";

export class MemslotError extends Error {
  readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, retryable = false) {
    super(message);
    this.name = "MemslotError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Malformed boolean query. Never auto-corrected. */
export class QueryParseError extends MemslotError {
  readonly fragment: string;
  readonly position: number;

  constructor(reason: string, fragment: string, position: number) {
    super("query_parse", `Malformed query near "${fragment}" (at ${position}): ${reason}`);
    this.name = "QueryParseError";
    this.fragment = fragment;
    this.position = position;
  }
}

export class InvalidFilterError extends MemslotError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("invalid_filter", `Invalid search options: ${issues.join("; ")}`);
    this.name = "InvalidFilterError";
    this.issues = issues;
  }
}

export class MergeValidationError extends MemslotError {
  readonly problems: string[];
  readonly missing_slots: string[];

  constructor(problems: string[], missing_slots: string[] = []) {
    super("merge_validation", `Invalid merge request: ${problems.join("; ")}`);
    this.name = "MergeValidationError";
    this.problems = problems;
    this.missing_slots = missing_slots;
  }
}

/**
 * The index disagrees with the live slot data. Recovered by rebuilding
 * the index and retrying once.
 */
export class IndexConsistencyError extends MemslotError {
  constructor(message: string) {
    super("index_consistency", message, true);
    this.name = "IndexConsistencyError";
  }
}

export class SlotNotFoundError extends MemslotError {
  readonly slot_name: string;

  constructor(slot_name: string) {
    super("not_found", `Slot "${slot_name}" not found`);
    this.name = "SlotNotFoundError";
    this.slot_name = slot_name;
  }
}

export class InvalidSlotError extends MemslotError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("invalid_slot", issues.length ? `${message}: ${issues.join("; ")}` : message);
    this.name = "InvalidSlotError";
    this.issues = issues;
  }
}

export class ConfigError extends MemslotError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/** Flatten zod issues into "path: message" strings */
export function formatIssues(
  issues: readonly { path: readonly (string | number)[]; message: string }[]
): string[] {
  return issues.map((i) => (i.path.length ? `${i.path.join(".")}: ${i.message}` : i.message));
}
