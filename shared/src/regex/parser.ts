// SPDX-License-Identifier: Apache-2.0
import { Cursor } from "./cursor";
import {
  andNode,
  isRepeatOperator,
  literalNode,
  orNode,
  repeatNode,
  wildcardNode,
  type RegexNode,
} from "./ast";

/** Characters that can never start a literal. */
export const RESERVED_CHARS = "|*+?()";
export const REPEAT_CHARS = "+?*";
export const ESCAPE_CHAR = "\\";

const ESCAPES: Record<string, string> = {
  b: "\b",
  n: "\n",
  f: "\f",
  r: "\r",
  t: "\t",
};

export const DEFAULT_MAX_DEPTH = 256;

export interface ParseOptions {
  /** Maximum group nesting before {@link PatternDepthError} is thrown. */
  maxDepth?: number;
}

export interface ParseOutcome {
  node: RegexNode | null;
  /** Offset just past the consumed prefix; the start offset when `node` is null. */
  end: number;
}

export class PatternDepthError extends Error {
  readonly offset: number;
  readonly maxDepth: number;

  constructor(offset: number, maxDepth: number) {
    super(`Group at offset ${offset} nests deeper than ${maxDepth} levels`);
    this.name = "PatternDepthError";
    this.offset = offset;
    this.maxDepth = maxDepth;
  }
}

/** Value of the character after a backslash. */
export function unescapeChar(ch: string): string {
  return ESCAPES[ch] ?? ch;
}

/**
 * Recursive-descent parser, one public method per precedence level:
 *
 *   Alternation := Sequence ( '|' Sequence )?
 *   Sequence    := Postfix Sequence?
 *   Postfix     := Atom ( '+' | '?' | '*' )?
 *   Atom        := '(' Alternation ')' | '.' | EscapedChar
 *
 * A rule either returns a node and leaves the cursor just past it, or
 * returns null and leaves the cursor where it found it.
 */
export class RegexParser {
  private readonly cursor: Cursor;
  private readonly maxDepth: number;
  private depth = 0;

  constructor(cursor: Cursor, options: ParseOptions = {}) {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
    }
    this.cursor = cursor;
    this.maxDepth = maxDepth;
  }

  alternation(): RegexNode | null {
    const left = this.sequence();
    if (!left) return null;

    const beforeBar = this.cursor.snapshot();
    if (this.cursor.matchChar("|")) {
      const right = this.sequence();
      if (right) return orNode(left, right);
    }
    this.cursor.restore(beforeBar);
    return left;
  }

  /**
   * Concatenation is right-nested, `abc` => AND(a, AND(b, c)). The
   * operands are collected in a loop and folded from the right, which
   * builds the same tree as the recursive rule without using stack per
   * character.
   */
  sequence(): RegexNode | null {
    const parts: RegexNode[] = [];
    let part = this.postfix();
    while (part) {
      parts.push(part);
      part = this.postfix();
    }
    if (parts.length === 0) return null;

    let node = parts[parts.length - 1];
    for (let i = parts.length - 2; i >= 0; i--) {
      node = andNode(parts[i], node);
    }
    return node;
  }

  postfix(): RegexNode | null {
    const atom = this.atom();
    if (!atom) return null;
    const op = this.cursor.matchAnyCharIn(REPEAT_CHARS);
    return op !== null && isRepeatOperator(op) ? repeatNode(op, atom) : atom;
  }

  atom(): RegexNode | null {
    return this.group() ?? this.dot() ?? this.escapedChar();
  }

  private group(): RegexNode | null {
    const start = this.cursor.snapshot();
    if (!this.cursor.matchChar("(")) return null;
    if (this.depth >= this.maxDepth) {
      throw new PatternDepthError(start.offset, this.maxDepth);
    }

    this.depth++;
    try {
      const inner = this.alternation();
      if (inner && this.cursor.matchChar(")")) return inner;
    } finally {
      this.depth--;
    }
    this.cursor.restore(start);
    return null;
  }

  private dot(): RegexNode | null {
    return this.cursor.matchChar(".") ? wildcardNode() : null;
  }

  private escapedChar(): RegexNode | null {
    const start = this.cursor.snapshot();
    const ch = this.cursor.matchCharNotIn(RESERVED_CHARS);
    if (ch === null) return null;
    if (ch !== ESCAPE_CHAR) return literalNode(ch);

    const escaped = this.cursor.matchAnyChar();
    if (escaped === null) {
      // Lone trailing backslash: no literal, and the backslash stays unread.
      this.cursor.restore(start);
      return null;
    }
    return literalNode(unescapeChar(escaped));
  }
}

/** Parse the longest Alternation starting at `start`. */
export function parseAt(input: string, start = 0, options: ParseOptions = {}): ParseOutcome {
  const cursor = new Cursor(input, start);
  const node = new RegexParser(cursor, options).alternation();
  return { node, end: cursor.position };
}

/**
 * Parse a pattern from the beginning. Trailing input the grammar cannot
 * continue with is left unread; use {@link parseExact} to reject it.
 */
export function parse(input: string, options: ParseOptions = {}): RegexNode | null {
  return parseAt(input, 0, options).node;
}

export function parseExact(input: string, options: ParseOptions = {}): RegexNode | null {
  const { node, end } = parseAt(input, 0, options);
  return end === input.length ? node : null;
}
