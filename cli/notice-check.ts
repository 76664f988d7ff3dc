/**
 * Batch side of the notice checker: which files to look at, which are
 * exempt, and how results are summed up.
 */

import { readdir } from "node:fs/promises";
import { join, relative, sep } from "node:path";
import { gitLsFiles } from "./git.js";
import {
  checkFile,
  exemptFile,
  gitDateSource,
  NoticeState,
  type DateSource,
  type NoticedFile,
  type NoticeStateName,
} from "./noticed-file.js";

const SKIPPED_DIRECTORIES = new Set(["node_modules", "dist", ".git"]);

const EXEMPT_EXTENSIONS = new Set([
  ".json", ".lock", ".png", ".jpg", ".jpeg", ".gif", ".ico", ".svg", ".webp", ".pdf", ".woff", ".woff2",
]);

/** True for files that never carry a notice. `path` is "/"-separated and relative. */
export function isExempt(path: string): boolean {
  const segments = path.split("/");
  if (segments.some((segment) => SKIPPED_DIRECTORIES.has(segment))) return true;
  const name = segments[segments.length - 1];
  if (name.startsWith("LICENSE") || name === ".gitignore") return true;
  const dot = name.lastIndexOf(".");
  return dot > 0 && EXEMPT_EXTENSIONS.has(name.slice(dot).toLowerCase());
}

/** Every file under `root`, skipping dependency and output directories. */
export async function walkFiles(root: string): Promise<string[]> {
  const found: string[] = [];
  const visit = async (directory: string): Promise<void> => {
    const entries = await readdir(directory, { withFileTypes: true });
    for (const entry of entries) {
      const full = join(directory, entry.name);
      if (entry.isDirectory()) {
        if (!SKIPPED_DIRECTORIES.has(entry.name)) await visit(full);
      } else if (entry.isFile()) {
        found.push(relative(root, full).split(sep).join("/"));
      }
    }
  };
  await visit(root);
  return found.sort();
}

/** Tracked files inside a git work tree, otherwise a directory walk. */
export async function listFiles(root: string): Promise<string[]> {
  try {
    return (await gitLsFiles(root)).sort();
  } catch {
    return walkFiles(root);
  }
}

export async function checkNotices(
  root: string,
  paths: readonly string[],
  source: DateSource = gitDateSource,
): Promise<NoticedFile[]> {
  const results: NoticedFile[] = [];
  for (const path of paths) {
    const full = join(root, path);
    results.push(isExempt(path) ? exemptFile(full) : await checkFile(full, source));
  }
  return results;
}

const STATE_ORDER: readonly NoticeStateName[] = ["EXEMPT", "MISSING", "CORRECT", "INCORRECT_DATE", "ERROR"];

export type NoticeSummary = Record<NoticeStateName, number>;

export function summarize(files: readonly NoticedFile[]): NoticeSummary {
  const summary: NoticeSummary = { EXEMPT: 0, MISSING: 0, CORRECT: 0, INCORRECT_DATE: 0, ERROR: 0 };
  for (const file of files) summary[file.state]++;
  return summary;
}

/** One line, e.g. `- 3  0 1  . 12  X 0  ! 0`. */
export function formatSummary(summary: NoticeSummary): string {
  return STATE_ORDER
    .map((state) => `${NoticeState[state]} ${summary[state]}`)
    .join("  ");
}

export function hasProblems(summary: NoticeSummary): boolean {
  return summary.MISSING + summary.INCORRECT_DATE + summary.ERROR > 0;
}
