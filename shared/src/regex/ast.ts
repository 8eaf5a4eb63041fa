// SPDX-License-Identifier: Apache-2.0

export const NodeType = {
  OR: "OR",
  AND: "AND",
  OPT: "OPT",
  MANY: "MANY",
  NONZERO: "NONZERO",
  CHAR: "CHAR",
} as const;

export type NodeType = (typeof NodeType)[keyof typeof NodeType];

// --- Character domain ---

export const CHAR_MIN = 0;
export const CHAR_MAX = 0x10ffff;
/** Exclusive upper bound of the domain; the wildcard's `end`. */
export const CHAR_LIMIT = CHAR_MAX + 1;

// --- AST Node Types ---

/** Accepts one character in the half-open range `[begin, end)`. */
export interface CharNode {
  readonly type: "CHAR";
  readonly begin: number;
  readonly end: number;
}

export interface OrNode {
  readonly type: "OR";
  readonly children: readonly [RegexNode, RegexNode];
}

/** Concatenation: `children[0]` then `children[1]`. */
export interface AndNode {
  readonly type: "AND";
  readonly children: readonly [RegexNode, RegexNode];
}

export interface OptNode {
  readonly type: "OPT";
  readonly children: readonly [RegexNode];
}

export interface ManyNode {
  readonly type: "MANY";
  readonly children: readonly [RegexNode];
}

export interface NonzeroNode {
  readonly type: "NONZERO";
  readonly children: readonly [RegexNode];
}

export type RepeatNode = OptNode | ManyNode | NonzeroNode;

export type RegexNode = CharNode | OrNode | AndNode | RepeatNode;

export type RepeatOperator = "?" | "*" | "+";

export interface NodeTypeSpec {
  tag: string;
  symbol: string;
}

export const NODE_SPECS: Record<NodeType, NodeTypeSpec> = {
  OR: { tag: "OR", symbol: "|" },
  AND: { tag: "AND", symbol: "&" },
  OPT: { tag: "OPT", symbol: "?" },
  MANY: { tag: "MANY", symbol: "*" },
  NONZERO: { tag: "NONZERO", symbol: "+" },
  CHAR: { tag: "CHAR", symbol: "#" },
};

export function isRepeatOperator(s: string): s is RepeatOperator {
  return s === "?" || s === "*" || s === "+";
}

// --- Construction ---

export function charNode(begin: number, end: number): CharNode {
  if (!Number.isInteger(begin) || !Number.isInteger(end)) {
    throw new RangeError(`CHAR bounds must be integers, got [${begin}, ${end})`);
  }
  if (begin < CHAR_MIN || end > CHAR_LIMIT || begin >= end) {
    throw new RangeError(`CHAR range [${begin}, ${end}) is empty or outside the character domain`);
  }
  return { type: NodeType.CHAR, begin, end };
}

/** CHAR node for exactly one character. */
export function literalNode(ch: string): CharNode {
  const cp = ch.codePointAt(0);
  if (cp === undefined || String.fromCodePoint(cp) !== ch) {
    throw new RangeError(`Expected a single character, got ${JSON.stringify(ch)}`);
  }
  return charNode(cp, cp + 1);
}

export function wildcardNode(): CharNode {
  return charNode(CHAR_MIN, CHAR_LIMIT);
}

export function orNode(left: RegexNode, right: RegexNode): OrNode {
  return { type: NodeType.OR, children: [left, right] };
}

export function andNode(left: RegexNode, right: RegexNode): AndNode {
  return { type: NodeType.AND, children: [left, right] };
}

export function repeatNode(op: RepeatOperator, child: RegexNode): RepeatNode {
  switch (op) {
    case "?":
      return { type: NodeType.OPT, children: [child] };
    case "*":
      return { type: NodeType.MANY, children: [child] };
    case "+":
      return { type: NodeType.NONZERO, children: [child] };
  }
}

export interface CharRange {
  begin: number;
  end: number;
}

/**
 * Build a node from a runtime tag. Throws when the child count does not
 * match the tag's arity, or when a CHAR node is missing its range.
 */
export function createNode(
  type: NodeType,
  children: readonly RegexNode[] = [],
  range?: CharRange,
): RegexNode {
  const expect = (arity: number): void => {
    if (children.length !== arity) {
      throw new RangeError(`${type} takes ${arity} children, got ${children.length}`);
    }
  };

  switch (type) {
    case "CHAR":
      expect(0);
      if (!range) throw new RangeError("CHAR node needs a character range");
      return charNode(range.begin, range.end);
    case "OR":
    case "AND": {
      expect(2);
      const [left, right] = children;
      return type === "OR" ? orNode(left, right) : andNode(left, right);
    }
    case "OPT":
      expect(1);
      return repeatNode("?", children[0]);
    case "MANY":
      expect(1);
      return repeatNode("*", children[0]);
    case "NONZERO":
      expect(1);
      return repeatNode("+", children[0]);
  }
}

// --- Inspection ---

export function isCharNode(node: RegexNode): node is CharNode {
  return node.type === NodeType.CHAR;
}

export function isWildcard(node: CharNode): boolean {
  return node.begin === CHAR_MIN && node.end === CHAR_LIMIT;
}

export function childrenOf(node: RegexNode): readonly RegexNode[] {
  return node.type === NodeType.CHAR ? [] : node.children;
}

// Walks below use explicit stacks: a long concatenation is a right-nested
// AND chain as deep as the pattern is long.

export function nodeEquals(a: RegexNode, b: RegexNode): boolean {
  const pending: Array<[RegexNode, RegexNode]> = [[a, b]];
  let pair = pending.pop();
  while (pair) {
    const [x, y] = pair;
    if (x.type !== y.type) return false;
    if (isCharNode(x) && isCharNode(y)) {
      if (x.begin !== y.begin || x.end !== y.end) return false;
    } else {
      const xs = childrenOf(x);
      const ys = childrenOf(y);
      if (xs.length !== ys.length) return false;
      xs.forEach((child, i) => pending.push([child, ys[i]]));
    }
    pair = pending.pop();
  }
  return true;
}

export function nodeCount(root: RegexNode): number {
  let count = 0;
  const stack: RegexNode[] = [root];
  let node = stack.pop();
  while (node) {
    count++;
    stack.push(...childrenOf(node));
    node = stack.pop();
  }
  return count;
}

/** Depth of the tree; a lone CHAR node has depth 1. */
export function nodeDepth(root: RegexNode): number {
  let max = 0;
  const stack: Array<[RegexNode, number]> = [[root, 1]];
  let entry = stack.pop();
  while (entry) {
    const [node, depth] = entry;
    if (depth > max) max = depth;
    for (const child of childrenOf(node)) stack.push([child, depth + 1]);
    entry = stack.pop();
  }
  return max;
}
