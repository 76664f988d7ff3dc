/**
 * The few git queries the notice checker needs, via the git CLI.
 */

import { execFile } from "node:child_process";
import { dirname, basename } from "node:path";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

async function git(cwd: string, args: string[]): Promise<string> {
  const { stdout } = await execFileAsync("git", args, { cwd, encoding: "utf-8" });
  return stdout;
}

/** Tracked files under `root`, relative to it. Throws outside a work tree. */
export async function gitLsFiles(root: string): Promise<string[]> {
  const out = await git(root, ["ls-files", "-z"]);
  return out.split("\0").filter((name) => name !== "");
}

/** True when the working copy of `path` differs from HEAD, or isn't tracked. */
export async function gitIsDifferent(path: string): Promise<boolean> {
  const cwd = dirname(path);
  const name = basename(path);
  const tracked = await git(cwd, ["ls-files", "--", name]);
  if (tracked.trim() === "") return true;
  // --quiet exits 1 on a difference, which execFile reports as an error
  try {
    await git(cwd, ["diff", "--quiet", "HEAD", "--", name]);
    return false;
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === 1) return true;
    throw err;
  }
}

/** Committer date of the last commit touching `path`, at local midnight. */
export async function gitModifiedDate(path: string): Promise<Date> {
  const out = (await git(dirname(path), ["log", "-1", "--format=%cs", "--", basename(path)])).trim();
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(out);
  if (!match) throw new Error(`No commit date for "${path}".`);
  const [, year, month, day] = match;
  return new Date(Number(year), Number(month) - 1, Number(day));
}
