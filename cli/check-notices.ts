#!/usr/bin/env npx tsx
/**
 * check-notices: report copyright notices whose year is stale or missing.
 *
 * Usage:
 *   npx tsx cli/check-notices.ts [--root DIR] [--quiet] [file ...]
 *
 * File arguments are relative to the root. Without any, every tracked
 * file under the root is checked.
 * Exits 1 when any file is missing a notice, has the wrong year, or
 * couldn't be read.
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { formatNoticedFile } from "./noticed-file.js";
import { checkNotices, formatSummary, hasProblems, listFiles, summarize } from "./notice-check.js";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    root: { type: "string", default: "." },
    quiet: { type: "boolean", short: "q", default: false },
  },
});

const root = resolve(values.root);
const paths = positionals.length > 0 ? positionals : await listFiles(root);
const files = await checkNotices(root, paths);

for (const file of files) {
  if (values.quiet && (file.state === "CORRECT" || file.state === "EXEMPT")) continue;
  console.log(formatNoticedFile(file));
}

const summary = summarize(files);
console.log(formatSummary(summary));
process.exitCode = hasProblems(summary) ? 1 : 0;
