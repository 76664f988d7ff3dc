/**
 * Structured logger. Subscribes to the event bus, writes JSON lines to stderr.
 *
 * Configure via environment:
 *   LOG_LEVEL=debug|info|warn|error  (default: info)
 *   LOG_FILE=/path/to/file           (optional, appends)
 */

import { appendFile } from "node:fs/promises";
import { subscribe } from "./event-bus.js";
import { levelFor, type HarnessEvent, type LogLevel } from "./events.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  level?: string;
  file?: string | null;
  /** Where lines go. Defaults to process.stderr. */
  write?: (line: string) => void;
}

let minLevel: number = LEVEL_ORDER.info;
let logFile: string | null = null;
let writeLine: (line: string) => void = (line) => {
  process.stderr.write(line);
};
let unsubscribe: (() => void) | null = null;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function formatLine(event: HarnessEvent & { requestId?: string }, level: LogLevel): string {
  const { type, ...payload } = event;
  return JSON.stringify({ ts: new Date().toISOString(), level, type, ...payload });
}

function handleEvent(event: HarnessEvent & { requestId?: string }): void {
  const level = levelFor(event);
  if (LEVEL_ORDER[level] < minLevel) return;

  const line = formatLine(event, level);
  writeLine(line + "\n");

  if (logFile) {
    appendFile(logFile, line + "\n").catch((err: unknown) => {
      // Don't emit: a failing log file would recurse through the bus
      process.stderr.write(`[logger] could not append to ${logFile}: ${String(err)}\n`);
    });
  }
}

/** Subscribe the logger to the bus. Calling it again replaces the old settings. */
export function initLogger(options: LoggerOptions = {}): void {
  const envLevel = options.level ?? process.env.LOG_LEVEL;
  minLevel = envLevel && isLogLevel(envLevel) ? LEVEL_ORDER[envLevel] : LEVEL_ORDER.info;
  logFile = options.file !== undefined ? options.file : process.env.LOG_FILE || null;
  if (options.write) writeLine = options.write;
  unsubscribe?.();
  unsubscribe = subscribe(handleEvent);
}

// Exported for testing
export { handleEvent as _handleEvent, formatLine as _formatLine, LEVEL_ORDER };
