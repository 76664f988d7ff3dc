/**
 * Command-line and environment settings for the harness.
 *
 *   harness [--port N] [--data-dir DIR] [directory ...]
 *
 * HARNESS_PORT sets the port when --port is absent. The built-in library
 * directory always goes last, as the lowest-priority content root.
 */

import { tmpdir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { DEFAULT_PORT } from "./bridge.js";
import { ConfigurationError } from "./errors.js";

const PROJECT_ROOT = join(dirname(fileURLToPath(import.meta.url)), "..");

export const LIBRARY_ROOT = join(PROJECT_ROOT, "library");

export interface HarnessConfig {
  port: number;
  /** Content roots in priority order, library last. */
  directories: string[];
  /** Where the write command puts files. */
  dataDir: string;
}

export function parsePort(raw: string): number {
  const port = raw.trim() === "" ? Number.NaN : Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`Invalid port "${raw}".`);
  }
  return port;
}

const OPTIONS = {
  port: { type: "string", short: "p" },
  "data-dir": { type: "string" },
} as const;

function parseCommandLine(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], allowPositionals: true, options: OPTIONS });
  } catch (err) {
    // parseArgs rejects unknown options and missing values
    throw new ConfigurationError(err instanceof Error ? err.message : String(err));
  }
}

export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
  libraryRoot: string = LIBRARY_ROOT,
): HarnessConfig {
  const parsed = parseCommandLine(argv);
  const portRaw = parsed.values.port ?? env.HARNESS_PORT;
  return {
    port: portRaw === undefined ? DEFAULT_PORT : parsePort(portRaw),
    directories: [...parsed.positionals.map((directory) => resolve(directory)), libraryRoot],
    dataDir: resolve(parsed.values["data-dir"] ?? join(tmpdir(), "webview-harness")),
  };
}
