/**
 * Boolean query parser
 *
 * Grammar (NOT binds tightest, then AND, then OR; left-associative):
 *
 *   query   := or
 *   or      := and ( OR and )*
 *   and     := unary ( [AND] unary )*      juxtaposition is an implicit AND
 *   unary   := NOT unary | primary
 *   primary := WORD | "PHRASE" | ( query )
 *
 * Keywords are case-insensitive. Malformed input raises QueryParseError
 * with the offending fragment; nothing is silently dropped or repaired.
 */

import { QueryParseError } from "./errors";

export type QueryNode =
  | { type: "term"; text: string }
  | { type: "phrase"; text: string }
  | { type: "and"; left: QueryNode; right: QueryNode }
  | { type: "or"; left: QueryNode; right: QueryNode }
  | { type: "not"; operand: QueryNode };

type LexKind = "word" | "phrase" | "and" | "or" | "not" | "lparen" | "rparen";

interface Lexeme {
  kind: LexKind;
  text: string; // raw source text of the lexeme
  value: string; // word or phrase body
  position: number;
}

const KEYWORDS: Record<string, LexKind> = { and: "and", or: "or", not: "not" };

// ── Lexer ────────────────────────────────────────────────────────────

export function lex(input: string): Lexeme[] {
  const lexemes: Lexeme[] = [];
  let i = 0;

  while (i < input.length) {
    const ch = input[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === "(" || ch === ")") {
      lexemes.push({
        kind: ch === "(" ? "lparen" : "rparen",
        text: ch,
        value: ch,
        position: i,
      });
      i++;
      continue;
    }

    if (ch === '"') {
      const close = input.indexOf('"', i + 1);
      if (close === -1) {
        throw new QueryParseError("unterminated quoted phrase", input.slice(i), i);
      }
      const body = input.slice(i + 1, close);
      if (body.trim() === "") {
        throw new QueryParseError("empty quoted phrase", input.slice(i, close + 1), i);
      }
      lexemes.push({ kind: "phrase", text: input.slice(i, close + 1), value: body, position: i });
      i = close + 1;
      continue;
    }

    let end = i;
    while (end < input.length && !/[\s()"]/.test(input[end])) end++;
    const word = input.slice(i, end);
    const keyword = KEYWORDS[word.toLowerCase()];
    lexemes.push({ kind: keyword ?? "word", text: word, value: word, position: i });
    i = end;
  }

  return lexemes;
}

// ── Parser ───────────────────────────────────────────────────────────

class Parser {
  private pos = 0;

  constructor(
    private readonly input: string,
    private readonly lexemes: Lexeme[]
  ) {}

  parse(): QueryNode {
    if (this.lexemes.length === 0) {
      throw new QueryParseError("empty query", this.input, 0);
    }
    const node = this.parseOr();
    const leftover = this.peek();
    if (leftover) {
      // Only a stray ")" can stop the descent early
      throw new QueryParseError("unbalanced closing parenthesis", leftover.text, leftover.position);
    }
    return node;
  }

  private peek(): Lexeme | undefined {
    return this.lexemes[this.pos];
  }

  private next(): Lexeme | undefined {
    return this.lexemes[this.pos++];
  }

  private parseOr(): QueryNode {
    let left = this.parseAnd();
    for (let lx = this.peek(); lx?.kind === "or"; lx = this.peek()) {
      this.next();
      const right = this.parseOperand(lx);
      left = { type: "or", left, right: this.continueAnd(right) };
    }
    return left;
  }

  private parseAnd(): QueryNode {
    return this.continueAnd(this.parseUnary());
  }

  private continueAnd(first: QueryNode): QueryNode {
    let left = first;
    for (let lx = this.peek(); lx; lx = this.peek()) {
      if (lx.kind === "and") {
        this.next();
        left = { type: "and", left, right: this.parseOperand(lx) };
      } else if (startsOperand(lx.kind)) {
        left = { type: "and", left, right: this.parseUnary() };
      } else {
        break;
      }
    }
    return left;
  }

  /** Operand required after a binary operator or NOT */
  private parseOperand(operator: Lexeme): QueryNode {
    const lx = this.peek();
    if (!lx || !startsOperand(lx.kind)) {
      throw new QueryParseError(
        `operator ${operator.text.toUpperCase()} is missing its right operand`,
        operator.text,
        operator.position
      );
    }
    return this.parseUnary();
  }

  private parseUnary(): QueryNode {
    const lx = this.peek();
    if (!lx) {
      throw new QueryParseError("unexpected end of query", this.input, this.input.length);
    }
    if (lx.kind === "not") {
      this.next();
      return { type: "not", operand: this.parseOperand(lx) };
    }
    return this.parsePrimary();
  }

  private parsePrimary(): QueryNode {
    const lx = this.next();
    if (!lx) {
      throw new QueryParseError("unexpected end of query", this.input, this.input.length);
    }

    switch (lx.kind) {
      case "word":
        return { type: "term", text: lx.value };
      case "phrase":
        return { type: "phrase", text: lx.value };
      case "lparen": {
        const close = this.peek();
        if (close?.kind === "rparen") {
          throw new QueryParseError("empty group", "()", lx.position);
        }
        if (!close) {
          throw new QueryParseError("unbalanced opening parenthesis", this.input.slice(lx.position), lx.position);
        }
        const inner = this.parseOr();
        const closing = this.next();
        if (closing?.kind !== "rparen") {
          throw new QueryParseError("unbalanced opening parenthesis", this.input.slice(lx.position), lx.position);
        }
        return inner;
      }
      case "and":
      case "or":
        throw new QueryParseError(
          `operator ${lx.text.toUpperCase()} is missing its left operand`,
          lx.text,
          lx.position
        );
      case "rparen":
        throw new QueryParseError("unbalanced closing parenthesis", lx.text, lx.position);
      case "not":
        // parseUnary consumes NOT before reaching here
        return { type: "not", operand: this.parseOperand(lx) };
    }
  }
}

function startsOperand(kind: LexKind): boolean {
  return kind === "word" || kind === "phrase" || kind === "lparen" || kind === "not";
}

export function parseQuery(input: string): QueryNode {
  return new Parser(input, lex(input)).parse();
}

/** Canonical, fully parenthesized rendering of a parsed query */
export function formatQuery(node: QueryNode): string {
  switch (node.type) {
    case "term":
      return node.text;
    case "phrase":
      return `"${node.text}"`;
    case "not":
      return `NOT ${formatQuery(node.operand)}`;
    case "and":
      return `(${formatQuery(node.left)} AND ${formatQuery(node.right)})`;
    case "or":
      return `(${formatQuery(node.left)} OR ${formatQuery(node.right)})`;
  }
}

/** Leaves that contribute matches, i.e. not under a NOT */
export function positiveLeaves(node: QueryNode): QueryNode[] {
  switch (node.type) {
    case "term":
    case "phrase":
      return [node];
    case "not":
      return [];
    case "and":
    case "or":
      return [...positiveLeaves(node.left), ...positiveLeaves(node.right)];
  }
}
