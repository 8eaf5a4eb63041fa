// SPDX-License-Identifier: Apache-2.0
import { describe, test, expect } from "vitest";
import { PatternDepthError } from "@regex-tree/shared";
import { runParse, summarize } from "./run";
import type { CliOptions } from "./options";

function options(pattern: string, overrides: Partial<CliOptions> = {}): CliOptions {
  return { pattern, json: false, exact: false, maxDepth: 256, verbose: false, ...overrides };
}

describe("runParse", () => {
  test("prints the indented dump for the default pattern", () => {
    const report = runParse(options("c|d(f?|g)"));
    expect(report.exitCode).toBe(0);
    expect(report.notices).toEqual([]);
    expect(report.output).toBe(
      "OR\n CHAR c d\n AND\n  CHAR d e\n  OR\n   OPT\n    CHAR f g\n   CHAR g h\n",
    );
  });

  test("prints JSON with --json", () => {
    const report = runParse(options("a", { json: true }));
    expect(report.output).toBe('{\n  "type": "CHAR",\n  "begin": 97,\n  "end": 98\n}\n');
  });

  test("empty pattern has no tree", () => {
    expect(runParse(options(""))).toEqual({
      output: "",
      notices: ['No tree: "" does not start with an expression'],
      exitCode: 1,
      node: null,
    });
  });

  test("partial parse prints the tree and names the leftover", () => {
    const report = runParse(options("a**"));
    expect(report.exitCode).toBe(0);
    expect(report.output).toBe("MANY\n CHAR a b\n");
    expect(report.notices).toEqual(['Stopped at offset 2 of 3; unconsumed: "*"']);
  });

  test("partial parse fails under --exact", () => {
    expect(runParse(options("a**", { exact: true }))).toEqual({
      output: "",
      notices: ['Stopped at offset 2 of 3; unconsumed: "*"'],
      exitCode: 1,
      node: null,
    });
  });

  test("complete parse succeeds under --exact", () => {
    expect(runParse(options("a*", { exact: true })).exitCode).toBe(0);
  });

  test("depth limit errors propagate", () => {
    expect(() => runParse(options("((a))", { maxDepth: 1 }))).toThrow(PatternDepthError);
  });
});

describe("summarize", () => {
  test("counts nodes and depth", () => {
    const { node } = runParse(options("c|d(f?|g)"));
    expect(node).not.toBeNull();
    if (node) expect(summarize(node)).toBe("8 nodes, depth 5");
  });
});
