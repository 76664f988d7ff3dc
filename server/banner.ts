/**
 * Startup banner: where the server listens, what it serves, and direct links
 * to the pages of the first root whose names start with a capital letter.
 * Informational only; nothing parses it.
 */

import { readdir } from "node:fs/promises";
import { sep } from "node:path";
import type { ContentRoots } from "./content-roots.js";

export const BANNER_WIDTH = 80;
export const BANNER_INDENT = 2;

export function serverURL(host: string, port: number): string {
  return `http://${host === "127.0.0.1" ? "localhost" : host}:${port}`;
}

/**
 * Render each directory on one or more lines, breaking between path
 * segments. The first line of a directory starts with ">".
 */
export function formatRootLines(
  directories: readonly string[],
  width = BANNER_WIDTH,
  indent = BANNER_INDENT,
): string[] {
  const lines: string[] = [];
  for (const directory of directories) {
    const segments = directory
      .split(sep)
      .filter((segment) => segment !== "")
      .map((segment) => sep + segment);
    if (segments.length === 0) segments.push(sep);

    let line = ">".padEnd(indent);
    let started = false;
    for (const segment of segments) {
      if (started && line.length + segment.length > width) {
        lines.push(line);
        line = "".padEnd(indent);
      }
      line += segment;
      started = true;
    }
    lines.push(line);
  }
  return lines;
}

/** Top-level .html files whose name starts with an uppercase letter, sorted. */
export async function listCapitalisedPages(directory: string): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".html") && /^\p{Lu}/u.test(entry.name))
    .map((entry) => entry.name)
    .sort();
}

export function startMessage(url: string, roots: ContentRoots, pages: readonly string[]): string {
  return [
    `Starting HTTP server at ${url} for:`,
    ...formatRootLines(roots.directories),
    `cd ${roots.ancestor}`,
    ...pages.map((page) => `${url}/${page}`),
  ].join("\n");
}
