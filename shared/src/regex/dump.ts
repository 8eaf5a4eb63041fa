// SPDX-License-Identifier: Apache-2.0
import { NODE_SPECS, childrenOf, type RegexNode } from "./ast";

const NAMED_CONTROLS: Record<number, string> = {
  0x00: "\\0",
  0x08: "\\b",
  0x09: "\\t",
  0x0a: "\\n",
  0x0c: "\\f",
  0x0d: "\\r",
};

function isPrintable(cp: number): boolean {
  if (cp >= 0x20 && cp < 0x7f) return true;
  if (cp < 0xa0 || cp > 0x10ffff) return false;
  return cp < 0xd800 || cp > 0xdfff;
}

/**
 * Readable form of a CHAR bound. Control characters, lone surrogates and
 * the out-of-domain wildcard end become escapes.
 */
export function renderCodePoint(cp: number): string {
  const named = NAMED_CONTROLS[cp];
  if (named !== undefined) return named;
  if (isPrintable(cp)) return String.fromCodePoint(cp);
  return `\\u{${cp.toString(16)}}`;
}

export interface DumpOptions {
  /** Repeated once per level of depth. Defaults to a single space. */
  indent?: string;
}

/**
 * Indented, line-per-node rendering of a tree:
 *
 *   OR
 *    CHAR c d
 *    CHAR e f
 */
export function dumpTree(root: RegexNode, options: DumpOptions = {}): string {
  const indent = options.indent ?? " ";
  let out = "";
  const stack: Array<[RegexNode, number]> = [[root, 0]];
  let entry = stack.pop();
  while (entry) {
    const [node, depth] = entry;
    const tag = NODE_SPECS[node.type].tag;
    const bounds = node.type === "CHAR" ? ` ${renderCodePoint(node.begin)} ${renderCodePoint(node.end)}` : "";
    out += `${indent.repeat(depth)}${tag}${bounds}\n`;

    const children = childrenOf(node);
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push([children[i], depth + 1]);
    }
    entry = stack.pop();
  }
  return out;
}

export function dumpJson(root: RegexNode): string {
  return JSON.stringify(root, null, 2);
}
