/**
 * GET / HEAD handler.
 *
 *   1. Root request ("/", "/name"): resolve the basename, 404 if absent.
 *   2. Otherwise the path must start with a relative root: 403 if not.
 *   3. Resolve the basename across all roots: 404 if absent.
 *   4. Serve the file with conditional and range support.
 *
 * Errors from resolution never leave this module; they become status codes.
 */

import { createReadStream, type Stats } from "node:fs";
import { stat } from "node:fs/promises";
import type { IncomingMessage, ServerResponse } from "node:http";
import { extname } from "node:path";
import { pipeline } from "node:stream/promises";
import {
  isRootRequest,
  matchRootPrefix,
  resolveFile,
  type ContentRoots,
  type ResolvedFile,
} from "./content-roots.js";
import { NotFoundError } from "./errors.js";
import { emit } from "./event-bus.js";

// -- Content types --

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".htm": "text/html; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".mjs": "text/javascript; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".map": "application/json; charset=utf-8",
  ".txt": "text/plain; charset=utf-8",
  ".md": "text/markdown; charset=utf-8",
  ".xml": "application/xml",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".ico": "image/x-icon",
  ".woff": "font/woff",
  ".woff2": "font/woff2",
  ".ttf": "font/ttf",
  ".wasm": "application/wasm",
  ".pdf": "application/pdf",
};

export function contentTypeFor(path: string): string {
  return CONTENT_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream";
}

// -- Validators --

export function etagFor(stats: Pick<Stats, "size" | "mtimeMs">): string {
  return `W/"${stats.size.toString(16)}-${Math.floor(stats.mtimeMs).toString(16)}"`;
}

/** True when the client's cached copy is still current. If-None-Match wins over If-Modified-Since. */
export function isNotModified(
  headers: IncomingMessage["headers"],
  etag: string,
  mtime: Date,
): boolean {
  const ifNoneMatch = headers["if-none-match"];
  if (ifNoneMatch !== undefined) {
    return ifNoneMatch
      .split(",")
      .map((tag) => tag.trim())
      .some((tag) => tag === "*" || tag === etag || `W/${tag}` === etag);
  }
  const ifModifiedSince = headers["if-modified-since"];
  if (ifModifiedSince !== undefined) {
    const since = Date.parse(ifModifiedSince);
    // HTTP dates have whole-second precision
    return !Number.isNaN(since) && Math.floor(mtime.getTime() / 1000) * 1000 <= since;
  }
  return false;
}

// -- Ranges --

export interface ByteRange {
  start: number;
  end: number; // inclusive
}

/**
 * Parse a single-range `Range` header against a file size.
 * null means "serve the whole file" (absent, multi-range or malformed).
 */
export function parseRange(
  header: string | undefined,
  size: number,
): ByteRange | "unsatisfiable" | null {
  if (!header) return null;
  const match = /^bytes=(\d*)-(\d*)$/.exec(header.trim());
  if (!match) return null;
  const [, startText, endText] = match;
  if (startText === "" && endText === "") return null;

  if (startText === "") {
    const suffix = Number(endText);
    if (suffix === 0 || size === 0) return "unsatisfiable";
    return { start: Math.max(0, size - suffix), end: size - 1 };
  }

  const start = Number(startText);
  const end = endText === "" ? size - 1 : Number(endText);
  if (end < start) return null;
  if (start >= size) return "unsatisfiable";
  return { start, end: Math.min(end, size - 1) };
}

// -- Responses --

function sendText(res: ServerResponse, status: number, body: string): void {
  res.writeHead(status, {
    "Content-Type": "text/plain; charset=utf-8",
    "Content-Length": Buffer.byteLength(body),
  });
  res.end(body);
}

/** Stream a resolved file with standard static-file semantics. */
export async function serveFile(
  req: IncomingMessage,
  res: ServerResponse,
  file: ResolvedFile,
): Promise<void> {
  const stats = await stat(file.absolutePath);
  const etag = etagFor(stats);
  const headers: Record<string, string | number> = {
    "Content-Type": contentTypeFor(file.absolutePath),
    "Cache-Control": "no-cache",
    "Accept-Ranges": "bytes",
    ETag: etag,
    "Last-Modified": stats.mtime.toUTCString(),
  };

  if (isNotModified(req.headers, etag, stats.mtime)) {
    res.writeHead(304, { ETag: etag, "Last-Modified": headers["Last-Modified"] });
    res.end();
    emit({ type: "static:serve", file: file.relativePath, status: 304, bytes: 0 });
    return;
  }

  const range = parseRange(req.headers.range, stats.size);
  if (range === "unsatisfiable") {
    res.writeHead(416, { "Content-Range": `bytes */${stats.size}` });
    res.end();
    emit({ type: "static:serve", file: file.relativePath, status: 416, bytes: 0 });
    return;
  }

  const status = range ? 206 : 200;
  const start = range?.start ?? 0;
  const end = range?.end ?? stats.size - 1;
  const length = stats.size === 0 ? 0 : end - start + 1;
  headers["Content-Length"] = length;
  if (range) headers["Content-Range"] = `bytes ${start}-${end}/${stats.size}`;
  res.writeHead(status, headers);

  if (req.method === "HEAD" || length === 0) {
    res.end();
  } else {
    await pipeline(createReadStream(file.absolutePath, { start, end }), res);
  }
  emit({ type: "static:serve", file: file.relativePath, status, bytes: length });
}

async function resolveOrReply(
  roots: ContentRoots,
  pathname: string,
  res: ServerResponse,
): Promise<ResolvedFile | null> {
  try {
    return await resolveFile(roots, pathname);
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err;
    emit({ type: "static:not-found", path: pathname, message: err.message });
    sendText(res, 404, err.message);
    return null;
  }
}

/**
 * The decoded path of a request target, query and fragment cut off.
 * Dot segments and repeated slashes are left alone: the prefix check
 * sees exactly what the client sent. Throws URIError on bad escapes.
 */
export function requestPath(target: string): string {
  const end = target.search(/[?#]/);
  return decodeURIComponent(end === -1 ? target : target.slice(0, end));
}

/** Handle one GET or HEAD request against the content roots. */
export async function handleStaticRequest(
  roots: ContentRoots,
  req: IncomingMessage,
  res: ServerResponse,
): Promise<void> {
  let pathname: string;
  try {
    pathname = requestPath(req.url ?? "/");
  } catch {
    sendText(res, 400, "Bad request path.");
    return;
  }

  let rootIndex: number | null = null;
  if (!isRootRequest(pathname)) {
    rootIndex = matchRootPrefix(roots, pathname);
    if (rootIndex === null) {
      emit({ type: "static:forbidden", path: pathname });
      sendText(res, 403, "Forbidden");
      return;
    }
  }

  const file = await resolveOrReply(roots, pathname, res);
  if (!file) return;

  emit({ type: "static:resolve", path: pathname, resolved: file.relativePath, rootIndex });
  await serveFile(req, res, file);
}
