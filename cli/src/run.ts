// SPDX-License-Identifier: Apache-2.0
import {
  dumpJson,
  dumpTree,
  nodeCount,
  nodeDepth,
  parseAt,
  type RegexNode,
} from "@regex-tree/shared";
import type { CliOptions } from "./options";

export interface ParseReport {
  /** Text for stdout; empty when there is nothing to print. */
  output: string;
  /** Lines for stderr. */
  notices: string[];
  exitCode: number;
  node: RegexNode | null;
}

/**
 * Parse `options.pattern` and decide what the process prints. A pattern
 * with no leading expression, or one that is only partly consumed under
 * `--exact`, exits 1. Depth-limit errors propagate to the caller.
 */
export function runParse(options: CliOptions): ParseReport {
  const { pattern } = options;
  const { node, end } = parseAt(pattern, 0, { maxDepth: options.maxDepth });

  if (!node) {
    return {
      output: "",
      notices: [`No tree: ${JSON.stringify(pattern)} does not start with an expression`],
      exitCode: 1,
      node: null,
    };
  }

  const notices: string[] = [];
  if (end < pattern.length) {
    notices.push(`Stopped at offset ${end} of ${pattern.length}; unconsumed: ${JSON.stringify(pattern.slice(end))}`);
    if (options.exact) return { output: "", notices, exitCode: 1, node: null };
  }

  const output = options.json ? `${dumpJson(node)}\n` : dumpTree(node);
  return { output, notices, exitCode: 0, node };
}

export function summarize(node: RegexNode): string {
  return `${nodeCount(node)} nodes, depth ${nodeDepth(node)}`;
}
