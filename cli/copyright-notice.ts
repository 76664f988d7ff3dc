/**
 * Copyright notice extraction from a file header.
 *
 * A notice is a line near the top of the file such as
 *   // Copyright 2024 Example, LLC.
 *   # Copyright 2023 Example, LLC.
 *   <!-- Copyright 2022 Example, LLC. -->
 */

export type NoticeStyle = "//" | "#" | "/*" | "*" | "<!--";

export interface DiscoveredNotice {
  path: string;
  style: NoticeStyle;
  year: number;
  /** Text after the year, closing comment markers removed. */
  suffix: string;
  /** Zero-based line the notice was found on. */
  line: number;
}

/** How many header lines are searched. */
export const HEADER_LINES = 10;

const NOTICE_PATTERN = /^\s*(\/\/|#|\/\*|\*|<!--)\s*Copyright\s+(\d{4})\b(.*)$/;

function isNoticeStyle(value: string): value is NoticeStyle {
  return value === "//" || value === "#" || value === "/*" || value === "*" || value === "<!--";
}

function cleanSuffix(raw: string): string {
  return raw.replace(/\s*(\*\/|-->)\s*$/, "").trim();
}

/** Find the first notice in the header of `text`, or null when there is none. */
export function findNotice(path: string, text: string): DiscoveredNotice | null {
  const lines = text.split(/\r?\n/, HEADER_LINES);
  for (const [index, line] of lines.entries()) {
    const match = NOTICE_PATTERN.exec(line);
    if (!match) continue;
    const [, style, year, rest] = match;
    if (!isNoticeStyle(style)) continue;
    return { path, style, year: Number(year), suffix: cleanSuffix(rest), line: index };
  }
  return null;
}
