// SPDX-License-Identifier: Apache-2.0
import { NODE_SPECS, isWildcard, type CharNode, type RegexNode } from "./ast";
import { ESCAPE_CHAR, RESERVED_CHARS } from "./parser";

const CONTROL_ESCAPES: Record<string, string> = {
  "\b": "b",
  "\n": "n",
  "\f": "f",
  "\r": "r",
  "\t": "t",
};

/** Characters that read as syntax when written bare. */
const SYNTAX_CHARS = `${RESERVED_CHARS}.${ESCAPE_CHAR}`;

// Binding strength, loosest first. A child whose level is below what its
// position requires gets parenthesized.
const Level = {
  ALTERNATION: 0,
  SEQUENCE: 1,
  POSTFIX: 2,
  ATOM: 3,
} as const;

type Level = (typeof Level)[keyof typeof Level];

function levelOf(node: RegexNode): Level {
  switch (node.type) {
    case "OR":
      return Level.ALTERNATION;
    case "AND":
      return Level.SEQUENCE;
    case "OPT":
    case "MANY":
    case "NONZERO":
      return Level.POSTFIX;
    case "CHAR":
      return Level.ATOM;
  }
}

function isSurrogate(cp: number): boolean {
  return cp >= 0xd800 && cp <= 0xdfff;
}

function serializeChar(node: CharNode): string {
  if (isWildcard(node)) return ".";
  if (node.end - node.begin !== 1) {
    throw new RangeError(`CHAR range [${node.begin}, ${node.end}) has no pattern syntax`);
  }
  const ch = String.fromCodePoint(node.begin);
  const control = CONTROL_ESCAPES[ch];
  if (control !== undefined) return ESCAPE_CHAR + control;
  // A bare surrogate could pair up with a neighbouring one on reparse.
  if (isSurrogate(node.begin)) return ESCAPE_CHAR + ch;
  return SYNTAX_CHARS.includes(ch) ? ESCAPE_CHAR + ch : ch;
}

function wrap(node: RegexNode, required: Level): string {
  const text = serializeNode(node);
  return levelOf(node) >= required ? text : `(${text})`;
}

function serializeNode(node: RegexNode): string {
  switch (node.type) {
    case "CHAR":
      return serializeChar(node);

    case "OR": {
      const [left, right] = node.children;
      return `${wrap(left, Level.SEQUENCE)}|${wrap(right, Level.SEQUENCE)}`;
    }

    case "AND": {
      // Walk the right spine iteratively; only left operands recurse.
      let out = "";
      let rest: RegexNode = node;
      while (rest.type === "AND") {
        out += wrap(rest.children[0], Level.POSTFIX);
        rest = rest.children[1];
      }
      return out + wrap(rest, Level.SEQUENCE);
    }

    case "OPT":
    case "MANY":
    case "NONZERO":
      return wrap(node.children[0], Level.ATOM) + NODE_SPECS[node.type].symbol;
  }
}

/**
 * Write a tree back as pattern text. Parsing the result yields an equal
 * tree. Throws on a CHAR range wider than one character that is not the
 * wildcard.
 */
export function toPattern(node: RegexNode): string {
  return serializeNode(node);
}
