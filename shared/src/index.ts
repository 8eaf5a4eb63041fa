// SPDX-License-Identifier: Apache-2.0
export {
  NodeType,
  NODE_SPECS,
  CHAR_MIN,
  CHAR_MAX,
  CHAR_LIMIT,
  charNode,
  literalNode,
  wildcardNode,
  orNode,
  andNode,
  repeatNode,
  createNode,
  isRepeatOperator,
  isCharNode,
  isWildcard,
  childrenOf,
  nodeEquals,
  nodeCount,
  nodeDepth,
} from "./regex/ast";
export type {
  RegexNode,
  CharNode,
  OrNode,
  AndNode,
  OptNode,
  ManyNode,
  NonzeroNode,
  RepeatNode,
  RepeatOperator,
  NodeTypeSpec,
  CharRange,
} from "./regex/ast";

export { Cursor } from "./regex/cursor";
export type { CursorSnapshot } from "./regex/cursor";

export {
  RegexParser,
  PatternDepthError,
  parse,
  parseAt,
  parseExact,
  unescapeChar,
  DEFAULT_MAX_DEPTH,
  RESERVED_CHARS,
  REPEAT_CHARS,
  ESCAPE_CHAR,
} from "./regex/parser";
export type { ParseOptions, ParseOutcome } from "./regex/parser";

export { dumpTree, dumpJson, renderCodePoint } from "./regex/dump";
export type { DumpOptions } from "./regex/dump";

export { toPattern } from "./regex/serialize";
