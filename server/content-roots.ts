/**
 * Content roots and the path resolver.
 *
 * Pure functions apart from the stat() in resolveFile. The bridge builds the
 * ContentRoots table once at startup and hands the frozen value to every
 * request; nothing here touches the process working directory.
 *
 * Resolution is by basename only. A request for /web/index.html is checked
 * against the relative roots for its prefix, but the file itself is looked up
 * as "index.html" under every root in priority order, so it can come from a
 * root other than the one the prefix named.
 */

import { stat } from "node:fs/promises";
import { join, relative, resolve, sep } from "node:path";
import { NotFoundError } from "./errors.js";

export const DEFAULT_DOCUMENT = "index.html";

export interface ContentRoots {
  /** Absolute directories, highest priority first. */
  readonly directories: readonly string[];
  /** Deepest directory containing every root. */
  readonly ancestor: string;
  /**
   * Each directory relative to `ancestor`, "/"-separated, index-aligned.
   * A directory equal to the ancestor is ".", so only paths starting with
   * "." fall under it.
   */
  readonly relativeRoots: readonly string[];
}

export interface ResolvedFile {
  /** RelativeRoot joined with the basename: the path in the served namespace. */
  relativePath: string;
  absolutePath: string;
  rootIndex: number;
}

/** Deepest common directory of absolute paths. */
export function commonAncestor(paths: readonly string[]): string {
  if (paths.length === 0) throw new Error("commonAncestor needs at least one path");
  const split = paths.map((p) => resolve(p).split(sep));
  const first = split[0];
  let depth = first.length;
  for (const parts of split.slice(1)) {
    let i = 0;
    while (i < depth && i < parts.length && parts[i] === first[i]) i++;
    depth = i;
  }
  const common = first.slice(0, depth).join(sep);
  // "/a" and "/b" share only the leading empty segment
  return common === "" ? sep : common;
}

export const SELF_ROOT = ".";

function toNamespacePath(path: string): string {
  return path === "" ? SELF_ROOT : path.split(sep).join("/");
}

/** Compute the ancestor and relative roots for an ordered list of directories. */
export function buildContentRoots(directories: readonly string[]): ContentRoots {
  const absolute = directories.map((d) => resolve(d));
  const ancestor = commonAncestor(absolute);
  return Object.freeze({
    directories: Object.freeze(absolute),
    ancestor,
    relativeRoots: Object.freeze(absolute.map((d) => toNamespacePath(relative(ancestor, d)))),
  });
}

/** Everything after the last "/", or the default document when that is empty. */
export function requestBasename(filename: string): string {
  const name = filename.slice(filename.lastIndexOf("/") + 1);
  return name === "" ? DEFAULT_DOCUMENT : name;
}

// stat() failures that mean "no such file here": NUL bytes in the name, symlink loops
const NOT_A_FILE = new Set(["ENOENT", "ENOTDIR", "ELOOP", "EBADF", "ERR_INVALID_ARG_VALUE"]);

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (err) {
    if (err instanceof Error && "code" in err && NOT_A_FILE.has(String(err.code))) {
      return false;
    }
    throw err;
  }
}

/**
 * Find the first root holding `basename(filename)` as a regular file.
 * Throws NotFoundError when no root has it.
 */
export async function resolveFile(roots: ContentRoots, filename: string): Promise<ResolvedFile> {
  const name = requestBasename(filename);
  // "." and ".." are directories wherever they are looked up
  if (name === "." || name === "..") throw new NotFoundError(name);

  for (const [index, directory] of roots.directories.entries()) {
    const absolutePath = join(directory, name);
    if (await isRegularFile(absolutePath)) {
      const rel = roots.relativeRoots[index];
      return {
        relativePath: rel === SELF_ROOT ? name : `${rel}/${name}`,
        absolutePath,
        rootIndex: index,
      };
    }
  }
  throw new NotFoundError(name);
}

/**
 * Index of the first relative root that prefixes the request path (one
 * leading "/" stripped), or null when the path is outside every root.
 * Plain string prefix: "webby/x" matches the root "web".
 */
export function matchRootPrefix(roots: ContentRoots, requestPath: string): number | null {
  const effective = requestPath.startsWith("/") ? requestPath.slice(1) : requestPath;
  const index = roots.relativeRoots.findIndex((prefix) => effective.startsWith(prefix));
  return index === -1 ? null : index;
}

/** True when nothing precedes the last "/". "/", "" and "/name" are root requests. */
export function isRootRequest(requestPath: string): boolean {
  const slash = requestPath.lastIndexOf("/");
  return slash <= 0;
}
