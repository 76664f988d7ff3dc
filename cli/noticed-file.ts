/**
 * Classify one file's copyright notice against its last-modified date.
 *
 * The date is the filesystem mtime when the working copy differs from the
 * committed one, otherwise the date of the last commit touching the file
 * (falling back to mtime when git can't say).
 */

import { readFile, stat } from "node:fs/promises";
import { findNotice, type DiscoveredNotice } from "./copyright-notice.js";
import { gitIsDifferent, gitModifiedDate } from "./git.js";

export const NoticeState = {
  EXEMPT: "-",
  MISSING: "0",
  CORRECT: ".",
  INCORRECT_DATE: "X",
  ERROR: "!",
} as const;

export type NoticeStateName = keyof typeof NoticeState;

export interface NoticedFile {
  path: string;
  modifiedDate: Date | null;
  notice: DiscoveredNotice | null;
  state: NoticeStateName;
  error: Error | null;
}

/** Where modification dates come from. Tests substitute their own. */
export interface DateSource {
  isDifferent(path: string): Promise<boolean>;
  lastCommitDate(path: string): Promise<Date>;
  mtime(path: string): Promise<Date>;
}

export const gitDateSource: DateSource = {
  isDifferent: gitIsDifferent,
  lastCommitDate: gitModifiedDate,
  mtime: async (path) => (await stat(path)).mtime,
};

export async function modifiedDate(path: string, source: DateSource): Promise<Date> {
  let different: boolean;
  try {
    different = await source.isDifferent(path);
  } catch {
    // not a git work tree, or git missing
    different = true;
  }
  if (different) return source.mtime(path);
  try {
    return await source.lastCommitDate(path);
  } catch {
    return source.mtime(path);
  }
}

/** State for a file whose notice (or lack of one) and date are known. */
export function classify(notice: DiscoveredNotice | null, modified: Date): NoticeStateName {
  if (notice === null) return "MISSING";
  return notice.year === modified.getFullYear() ? "CORRECT" : "INCORRECT_DATE";
}

export function exemptFile(path: string): NoticedFile {
  return { path, modifiedDate: null, notice: null, state: "EXEMPT", error: null };
}

const decoder = new TextDecoder("utf-8", { fatal: true });

export async function checkFile(path: string, source: DateSource = gitDateSource): Promise<NoticedFile> {
  let text: string;
  try {
    text = decoder.decode(await readFile(path));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    return { path, modifiedDate: null, notice: null, state: "ERROR", error };
  }
  const notice = findNotice(path, text);
  const modified = await modifiedDate(path, source);
  return { path, modifiedDate: modified, notice, state: classify(notice, modified), error: null };
}

function isoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${date.getFullYear()}-${month}-${day}`;
}

/** Two lines: the path, then the state and whatever was found. */
export function formatNoticedFile(file: NoticedFile): string {
  const summary: string[] = [file.state];
  if (file.modifiedDate !== null || file.notice !== null) {
    summary.push(file.modifiedDate ? isoDate(file.modifiedDate) : "None");
    if (file.notice === null) {
      summary.push("None");
    } else {
      summary.push(
        JSON.stringify(file.notice.style),
        String(file.notice.year),
        JSON.stringify(file.notice.suffix),
      );
    }
  }
  if (file.error) summary.push(file.error.message);
  return `${file.path}\n${summary.join(" ")}`;
}
