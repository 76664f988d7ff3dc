/**
 * Typed harness events: the contract between business logic and observers.
 *
 * Business logic calls emit(event). Subscribers (logger, status buffer)
 * consume events without coupling to the emitter. Each variant is narrowable
 * via its `type` field.
 */

// -- Severity levels (used by logger subscriber to filter) --

export type LogLevel = "debug" | "info" | "warn" | "error";

// -- Event variants --

export type HarnessEvent =
  // Static file requests
  | { type: "static:resolve"; path: string; resolved: string; rootIndex: number | null }
  | { type: "static:forbidden"; path: string }
  | { type: "static:not-found"; path: string; message: string }
  | { type: "static:serve"; file: string; status: number; bytes: number }

  // Command dispatch
  | { type: "command:receive"; command: unknown }
  | { type: "command:handled"; handler: string; keys: string[] }
  | { type: "command:unhandled"; keys: string[] }
  | { type: "command:response"; status: number; bytes: number }
  | { type: "command:empty"; contentLength: string | null }
  | { type: "command:decode-error"; error: string }
  | { type: "command:fault"; handler: string; error: string }

  // Built-in handlers
  | { type: "handler:write"; file: string; bytes: number }
  | { type: "handler:load"; page: string; resolved: string | null }

  // Request handling
  | { type: "request:http"; method: string; url: string; status: number; durationMs: number }
  | { type: "request:rejected"; reason: string; method: string; url: string }
  | { type: "request:error"; method: string; url: string; error: string }

  // Server lifecycle
  | { type: "server:start"; url: string; roots: string[]; ancestor: string }
  | { type: "server:config-error"; error: string }
  | { type: "server:shutdown"; signal: string }
  | { type: "server:shutdown-complete" }
  | { type: "server:uncaught-exception"; error: string }
  | { type: "server:unhandled-rejection"; error: string };

// -- Level mapping --

const LEVEL_MAP: Record<HarnessEvent["type"], LogLevel> = {
  "static:resolve": "info",
  "static:forbidden": "warn",
  "static:not-found": "warn",
  "static:serve": "debug",
  "command:receive": "debug",
  "command:handled": "info",
  "command:unhandled": "info",
  "command:response": "debug",
  "command:empty": "warn",
  "command:decode-error": "error",
  "command:fault": "error",
  "handler:write": "info",
  "handler:load": "info",
  "request:http": "debug",
  "request:rejected": "warn",
  "request:error": "error",
  "server:start": "info",
  "server:config-error": "error",
  "server:shutdown": "info",
  "server:shutdown-complete": "info",
  "server:uncaught-exception": "error",
  "server:unhandled-rejection": "error",
};

export function levelFor(event: HarnessEvent): LogLevel {
  return LEVEL_MAP[event.type];
}
