/**
 * POST handler: JSON commands through an ordered handler chain.
 *
 * Decode: Content-Length missing or zero → 400, nothing parsed.
 *         Body that isn't JSON → 500 (protocol fault).
 * Chain:  handlers run in order; the first non-null response wins.
 * Miss:   { ...command, failed: "Unhandled." }, a normal 200 answer.
 * Fault:  a handler that throws is NOT caught here. The transport turns it
 *         into 501 and emits command:fault with the stack.
 */

import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from "node:http";
import type { ContentRoots } from "./content-roots.js";
import { CommandRequestError, HandlerFaultError } from "./errors.js";
import { emit, errorDetail } from "./event-bus.js";

// -- Types --

export type CommandObject = Record<string, unknown>;
export type ResponseObject = Record<string, unknown>;

/** What a handler gets to know about the connection a command came in on. */
export interface CommandContext {
  requestId: string;
  remoteAddress: string | undefined;
  headers: IncomingHttpHeaders;
  roots: ContentRoots;
}

/**
 * One link in the chain. Return null for commands you don't recognize;
 * throw only for genuine faults.
 */
export interface CommandHandler {
  readonly name: string;
  tryHandle(
    command: CommandObject,
    context: CommandContext,
  ): ResponseObject | null | Promise<ResponseObject | null>;
}

export interface DispatcherOptions {
  serverVersion?: string;
  runtimeVersion?: string;
}

export const SERVER_VERSION = "WebViewHarness/0.1.0";
export const UNHANDLED = "Unhandled.";

export function isCommandObject(value: unknown): value is CommandObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// -- Dispatcher --

export class CommandDispatcher {
  readonly handlers: readonly CommandHandler[];
  private readonly serverVersion: string;
  private readonly runtimeVersion: string;

  constructor(handlers: readonly CommandHandler[], options: DispatcherOptions = {}) {
    this.handlers = Object.freeze([...handlers]);
    this.serverVersion = options.serverVersion ?? SERVER_VERSION;
    this.runtimeVersion = options.runtimeVersion ?? `Node.js/${process.version}`;
  }

  /** Diagnostic identity: dispatcher class, server version, runtime version. */
  confirmation(): string {
    return [this.constructor.name, this.serverVersion, this.runtimeVersion].join(" ");
  }

  async dispatch(command: CommandObject, context: CommandContext): Promise<ResponseObject> {
    let response: ResponseObject | null = null;
    for (const handler of this.handlers) {
      try {
        response = await handler.tryHandle(command, context);
      } catch (err) {
        throw new HandlerFaultError(handler.name, err);
      }
      if (response !== null) {
        emit({ type: "command:handled", handler: handler.name, keys: Object.keys(command) });
        break;
      }
    }

    if (response === null) {
      emit({ type: "command:unhandled", keys: Object.keys(command) });
      return { ...command, failed: UNHANDLED };
    }

    if (!("failed" in response) && !("confirm" in response)) {
      return { ...response, confirm: this.confirmation() };
    }
    return response;
  }
}

// -- Transport --

export interface BodyLimits {
  maxBodyBytes: number;
  timeoutMs: number;
}

export const DEFAULT_BODY_LIMITS: BodyLimits = {
  maxBodyBytes: 1024 * 1024,
  timeoutMs: 10_000,
};

function readBody(req: IncomingMessage, limits: BodyLimits): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;

    const finish = (err: Error | null): void => {
      clearTimeout(timer);
      req.off("data", onData);
      req.off("end", onEnd);
      req.off("error", onError);
      if (err) reject(err);
      else resolve(Buffer.concat(chunks).toString("utf-8"));
    };
    const onData = (chunk: Buffer): void => {
      size += chunk.length;
      if (size > limits.maxBodyBytes) {
        finish(new CommandRequestError(413, "Body too large."));
        return;
      }
      chunks.push(chunk);
    };
    const onEnd = (): void => finish(null);
    const onError = (err: Error): void => finish(err);

    const timer = setTimeout(() => {
      finish(new CommandRequestError(408, "Timed out reading body."));
    }, limits.timeoutMs);

    req.on("data", onData);
    req.on("end", onEnd);
    req.on("error", onError);
  });
}

/**
 * Read the body and decode it. Returns null for a missing or zero
 * Content-Length (the "no command" case). Throws CommandRequestError for
 * bodies that can't become a command and SyntaxError for bad JSON.
 */
export async function readCommand(
  req: IncomingMessage,
  limits: BodyLimits = DEFAULT_BODY_LIMITS,
): Promise<CommandObject | null> {
  const header = req.headers["content-length"];
  const contentLength = header === undefined ? 0 : Number(header);
  if (!Number.isInteger(contentLength) || contentLength < 0) {
    throw new CommandRequestError(400, "Invalid Content-Length.");
  }
  if (contentLength === 0) return null;
  if (contentLength > limits.maxBodyBytes) {
    throw new CommandRequestError(413, "Body too large.");
  }

  const parsed: unknown = JSON.parse(await readBody(req, limits));
  if (parsed === null) return null;
  if (!isCommandObject(parsed)) {
    throw new CommandRequestError(400, "Command must be a JSON object.");
  }
  return parsed;
}

function sendJSON(res: ServerResponse, status: number, body: unknown): number {
  const bytes = Buffer.from(JSON.stringify(body), "utf-8");
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": bytes.length,
  });
  res.end(bytes);
  return bytes.length;
}

function sendError(res: ServerResponse, status: number, message: string, close = false): void {
  const body = JSON.stringify({ error: message });
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(body),
    ...(close ? { Connection: "close" } : {}),
  });
  res.end(body);
}

/** Handle one POST. The request path is ignored. */
export async function handleCommandRequest(
  dispatcher: CommandDispatcher,
  context: CommandContext,
  req: IncomingMessage,
  res: ServerResponse,
  limits: BodyLimits = DEFAULT_BODY_LIMITS,
): Promise<void> {
  let command: CommandObject | null;
  try {
    command = await readCommand(req, limits);
  } catch (err) {
    if (err instanceof CommandRequestError) {
      emit({ type: "request:rejected", reason: err.message, method: req.method ?? "?", url: req.url ?? "?" });
      // Unread body bytes would be taken for the next request on a kept-alive socket
      sendError(res, err.status, err.message, err.status === 408 || err.status === 413);
      return;
    }
    if (err instanceof SyntaxError) {
      emit({ type: "command:decode-error", error: err.message });
      sendError(res, 500, "Invalid JSON.");
      return;
    }
    throw err;
  }

  if (command === null) {
    emit({ type: "command:empty", contentLength: req.headers["content-length"] ?? null });
    sendError(res, 400, "No command.");
    return;
  }

  emit({ type: "command:receive", command });

  let response: ResponseObject;
  try {
    response = await dispatcher.dispatch(command, context);
  } catch (err) {
    if (!(err instanceof HandlerFaultError)) throw err;
    emit({ type: "command:fault", handler: err.handler, error: errorDetail(err.cause) });
    sendError(res, 501, err.message);
    return;
  }

  const bytes = sendJSON(res, 200, response);
  emit({ type: "command:response", status: 200, bytes });
}
