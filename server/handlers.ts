/**
 * Built-in command handlers.
 *
 * The vocabulary follows what the native shells understand:
 *   { "load": "Page.html" }
 *   { "command": "write", "parameters": { "filename", "text", "base64decode"? } }
 *   { "command": "status" }
 *   { "command": "echo", ... }
 * Anything else returns null so the next handler (or the Unhandled
 * envelope) gets it.
 */

import { mkdir, writeFile } from "node:fs/promises";
import { basename, join, resolve } from "node:path";
import type { CommandHandler, CommandObject } from "./command-dispatcher.js";
import { isCommandObject } from "./command-dispatcher.js";
import { resolveFile } from "./content-roots.js";
import { NotFoundError } from "./errors.js";
import { emit } from "./event-bus.js";
import { getRecent } from "./status-buffer.js";

function commandName(command: CommandObject): string | null {
  return typeof command.command === "string" ? command.command : null;
}

/** Check that the page a shell is about to load is servable. */
export const loadHandler: CommandHandler = {
  name: "load",
  async tryHandle(command, context) {
    const page = command.load;
    if (typeof page !== "string") return null;
    try {
      const file = await resolveFile(context.roots, page);
      emit({ type: "handler:load", page, resolved: file.relativePath });
      return { ...command, confirm: `Load "${file.relativePath}".` };
    } catch (err) {
      if (!(err instanceof NotFoundError)) throw err;
      emit({ type: "handler:load", page, resolved: null });
      return { ...command, failed: err.message };
    }
  },
};

export interface WriteParameters {
  filename: string;
  text: string;
  base64decode: boolean;
}

/** Validate `parameters` of a write command. Missing fields are faults, not misses. */
export function parseWriteParameters(command: CommandObject): WriteParameters {
  const parameters = command.parameters;
  if (!isCommandObject(parameters)) throw new Error("No parameters in write command");
  if (typeof parameters.text !== "string") throw new Error("No text parameter in write command");
  if (typeof parameters.filename !== "string" || parameters.filename === "") {
    throw new Error("No file name parameter in write command");
  }
  return {
    filename: parameters.filename,
    text: parameters.text,
    base64decode: parameters.base64decode === true,
  };
}

/** Write text, or base64-decoded bytes, into `dataDir`. Only the basename of `filename` is used. */
export function createWriteHandler(dataDir: string): CommandHandler {
  const root = resolve(dataDir);
  return {
    name: "write",
    async tryHandle(command) {
      if (commandName(command) !== "write") return null;
      const { filename, text, base64decode } = parseWriteParameters(command);
      const target = join(root, basename(filename));
      const content = base64decode ? Buffer.from(text, "base64") : Buffer.from(text, "utf-8");
      await mkdir(root, { recursive: true });
      await writeFile(target, content);
      emit({ type: "handler:write", file: target, bytes: content.length });
      return { wrote: target };
    },
  };
}

export const statusHandler: CommandHandler = {
  name: "status",
  tryHandle(command, context) {
    if (commandName(command) !== "status") return null;
    return {
      uptime: process.uptime(),
      roots: [...context.roots.directories],
      recentEvents: getRecent(50),
    };
  },
};

export const echoHandler: CommandHandler = {
  name: "echo",
  tryHandle(command) {
    if (commandName(command) !== "echo") return null;
    return { ...command, echoed: true };
  },
};

/** The chain main.ts registers, in order. */
export function defaultHandlers(dataDir: string): CommandHandler[] {
  return [loadHandler, createWriteHandler(dataDir), statusHandler, echoHandler];
}
