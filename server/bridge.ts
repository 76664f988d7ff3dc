/**
 * Harness bridge: static content + JSON commands for a web-view shell.
 *
 * Static files: GET|HEAD /<path>, resolved by basename across the content
 *               roots (see content-roots.ts and static-responder.ts)
 * Commands:     POST /<any>, JSON body through the handler chain
 *               (see command-dispatcher.ts)
 *
 * The content-roots table is computed once here, before the socket opens,
 * and never changes afterwards. So is the handler chain.
 */

import { statSync } from "node:fs";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { resolve } from "node:path";

import { listCapitalisedPages, serverURL, startMessage } from "./banner.js";
import {
  CommandDispatcher,
  DEFAULT_BODY_LIMITS,
  handleCommandRequest,
  type BodyLimits,
  type CommandHandler,
  type DispatcherOptions,
} from "./command-dispatcher.js";
import { buildContentRoots, type ContentRoots } from "./content-roots.js";
import { ConfigurationError } from "./errors.js";
import { emit, errorDetail } from "./event-bus.js";
import { withRequestContext, type RequestContext } from "./request-context.js";
import { handleStaticRequest } from "./static-responder.js";

// -- Types --

export interface BridgeOptions {
  /** Content roots, highest priority first. Each must be an existing directory. */
  directories: readonly string[];
  handlers?: readonly CommandHandler[];
  /** 0 picks a free port. */
  port?: number;
  host?: string;
  bodyLimits?: Partial<BodyLimits>;
  dispatcher?: DispatcherOptions;
}

export interface Bridge {
  readonly roots: ContentRoots;
  readonly dispatcher: CommandDispatcher;
  readonly server: Server;
  /** Start accepting connections. Resolves with the server URL. */
  listen(): Promise<string>;
  /** Banner text; only meaningful once listening. */
  startMessage(): Promise<string>;
  close(): Promise<void>;
}

export const DEFAULT_PORT = 8001;
export const LOOPBACK = "127.0.0.1";

// -- Startup validation --

/** Resolve every directory and fail fast on anything that isn't one. */
export function validateDirectories(directories: readonly string[]): string[] {
  if (directories.length === 0) {
    throw new ConfigurationError("At least one content directory is required.");
  }
  return directories.map((directory) => {
    const absolute = resolve(directory);
    let isDirectory = false;
    try {
      isDirectory = statSync(absolute).isDirectory();
    } catch {
      // missing or unreadable: reported below
    }
    if (!isDirectory) throw new ConfigurationError(`Not a directory "${absolute}".`);
    return absolute;
  });
}

// -- Request routing --

function replyText(res: ServerResponse, status: number, body: string, headers: Record<string, string> = {}): void {
  res.writeHead(status, {
    "Content-Type": "text/plain; charset=utf-8",
    "Content-Length": Buffer.byteLength(body),
    ...headers,
  });
  res.end(body);
}

async function route(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: RequestContext,
  roots: ContentRoots,
  dispatcher: CommandDispatcher,
  limits: BodyLimits,
): Promise<void> {
  switch (req.method) {
    case "GET":
    case "HEAD":
      await handleStaticRequest(roots, req, res);
      return;
    case "POST":
      await handleCommandRequest(
        dispatcher,
        {
          requestId: ctx.requestId,
          remoteAddress: req.socket.remoteAddress,
          headers: req.headers,
          roots,
        },
        req,
        res,
        limits,
      );
      return;
    default:
      replyText(res, 501, `Unsupported method "${req.method ?? ""}".`, { Allow: "GET, HEAD, POST" });
  }
}

// -- Bridge --

export function createBridge(options: BridgeOptions): Bridge {
  const roots = buildContentRoots(validateDirectories(options.directories));
  const dispatcher = new CommandDispatcher(options.handlers ?? [], options.dispatcher);
  const limits: BodyLimits = { ...DEFAULT_BODY_LIMITS, ...options.bodyLimits };
  const host = options.host ?? LOOPBACK;
  let url: string | null = null;

  const server = createServer((req, res) => {
    withRequestContext(req.method ?? "?", req.url ?? "/", (ctx) => {
      res.on("finish", () => {
        emit({
          type: "request:http",
          method: ctx.method,
          url: ctx.url,
          status: res.statusCode,
          durationMs: Date.now() - ctx.startedAt,
        });
      });

      route(req, res, ctx, roots, dispatcher, limits).catch((err: unknown) => {
        emit({ type: "request:error", method: ctx.method, url: ctx.url, error: errorDetail(err) });
        if (res.headersSent) {
          res.destroy();
        } else {
          replyText(res, 500, "Internal error.");
        }
      });
    });
  });

  return {
    roots,
    dispatcher,
    server,

    listen() {
      return new Promise((resolveListen, reject) => {
        server.once("error", reject);
        server.listen(options.port ?? DEFAULT_PORT, host, () => {
          server.off("error", reject);
          const address = server.address();
          const port = typeof address === "object" && address !== null ? address.port : options.port ?? DEFAULT_PORT;
          const bound = serverURL(host, port);
          url = bound;
          emit({ type: "server:start", url: bound, roots: [...roots.directories], ancestor: roots.ancestor });
          resolveListen(bound);
        });
      });
    },

    async startMessage() {
      if (url === null) throw new Error("Bridge is not listening.");
      return startMessage(url, roots, await listCapitalisedPages(roots.directories[0]));
    },

    close() {
      return new Promise((resolveClose, reject) => {
        server.close((err) => (err ? reject(err) : resolveClose()));
        server.closeAllConnections();
      });
    },
  };
}
