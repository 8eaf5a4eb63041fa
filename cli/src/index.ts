// SPDX-License-Identifier: Apache-2.0
import { log } from "./log";
import { readArgv } from "./options";
import { runParse, summarize } from "./run";

process.stdout.on("error", (err: NodeJS.ErrnoException) => {
  if (err.code === "EPIPE") process.exit(0);
  throw err;
});

function main(): void {
  const opts = readArgv(process.argv);
  if (!opts) return;
  log(`Parsing ${JSON.stringify(opts.pattern)} (max depth ${opts.maxDepth})`, opts.verbose);

  const report = runParse(opts);
  if (report.node) log(summarize(report.node), opts.verbose);
  process.stdout.write(report.output);
  for (const notice of report.notices) log(notice, true);
  process.exitCode = report.exitCode;
}

// Argv errors (unknown options, bad values) and depth-limit errors all
// end here.
try {
  main();
} catch (err) {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`Error: ${msg}\n`);
  process.exit(1);
}
