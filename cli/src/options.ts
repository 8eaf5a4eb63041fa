// SPDX-License-Identifier: Apache-2.0
import cac from "cac";
import { z } from "zod";
import { DEFAULT_MAX_DEPTH } from "@regex-tree/shared";

export const DEFAULT_PATTERN = "c|d(f?|g)";

// A pattern that starts with "-" can only be given after "--", where cac
// leaves it in the "--" list instead of the positional.
const CliOptionsSchema = z
  .object({
    pattern: z.string().optional(),
    "--": z.array(z.string()).default([]),
    json: z.boolean().default(false),
    exact: z.boolean().default(false),
    maxDepth: z.coerce.number().int().positive().default(DEFAULT_MAX_DEPTH),
    verbose: z.boolean().default(false),
  })
  .superRefine((value, ctx) => {
    const given = (value.pattern === undefined ? 0 : 1) + value["--"].length;
    if (given > 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["pattern"],
        message: `Expected at most one pattern, got ${given}`,
      });
    }
  })
  .transform(({ pattern, "--": afterDashes, ...flags }) => ({
    ...flags,
    pattern: pattern ?? afterDashes[0] ?? DEFAULT_PATTERN,
  }));

export type CliOptions = z.infer<typeof CliOptionsSchema>;

export function parseCliOptions(pattern: unknown, flags: object): CliOptions {
  const result = CliOptionsSchema.safeParse({ ...flags, pattern });
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid options: ${detail}`);
  }
  return result.data;
}

/**
 * Read `process.argv`-shaped arguments. Returns null when there is nothing
 * to parse (`--help` was printed). Throws on unknown options and on values
 * the schema rejects.
 */
export function readArgv(argv: string[]): CliOptions | null {
  const cli = cac("regex-tree");
  const received: Array<{ pattern: unknown; flags: object }> = [];

  cli
    .command("[pattern]", `Parse a pattern and print its syntax tree (default: ${DEFAULT_PATTERN})`)
    .option("--json", "Print the tree as JSON", { default: false })
    .option("--exact", "Fail unless the whole pattern is consumed", { default: false })
    .option("--max-depth <n>", "Maximum group nesting", { default: DEFAULT_MAX_DEPTH })
    .option("--verbose", "Print detailed progress", { default: false })
    .action((pattern: unknown, flags: object) => {
      received.push({ pattern, flags });
    });

  cli.help();
  cli.parse(argv, { run: false });
  cli.runMatchedCommand();

  const args = received.at(0);
  return args ? parseCliOptions(args.pattern, args.flags) : null;
}
