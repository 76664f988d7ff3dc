#!/usr/bin/env npx tsx
/**
 * Harness entry point.
 *
 * Usage:
 *   npx tsx server/main.ts [--port 8001] [--data-dir DIR] [directory ...]
 */

import { createBridge, type Bridge } from "./bridge.js";
import { loadConfig } from "./config.js";
import { ConfigurationError } from "./errors.js";
import { emit, errorDetail } from "./event-bus.js";
import { defaultHandlers } from "./handlers.js";
import { initLogger } from "./logger.js";
import { initStatusBuffer } from "./status-buffer.js";

initLogger();
initStatusBuffer();

process.on("uncaughtException", (err) => {
  emit({ type: "server:uncaught-exception", error: errorDetail(err) });
  process.exitCode = 1;
});
process.on("unhandledRejection", (reason) => {
  emit({ type: "server:unhandled-rejection", error: errorDetail(reason) });
});

let bridge: Bridge;
try {
  const config = loadConfig();
  bridge = createBridge({
    directories: config.directories,
    handlers: defaultHandlers(config.dataDir),
    port: config.port,
  });
} catch (err) {
  if (!(err instanceof ConfigurationError)) throw err;
  emit({ type: "server:config-error", error: err.message });
  process.exit(1);
}

// -- Graceful shutdown --

function shutdown(signal: string): void {
  emit({ type: "server:shutdown", signal });
  bridge.close().then(
    () => emit({ type: "server:shutdown-complete" }),
    (err: unknown) => emit({ type: "server:uncaught-exception", error: errorDetail(err) }),
  );
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

// -- Start --

await bridge.listen();
console.log(await bridge.startMessage());
