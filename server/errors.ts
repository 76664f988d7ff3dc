/**
 * Error types that carry meaning across module boundaries.
 *
 * Everything else is a plain Error: the transport maps handler faults to
 * 501 by where they were thrown, not by their class.
 */

/** A requested basename exists under none of the content roots. */
export class NotFoundError extends Error {
  readonly filename: string;

  constructor(filename: string) {
    super(`File "${filename}" not found.`);
    this.name = "NotFoundError";
    this.filename = filename;
  }
}

/** Startup settings that make the bridge unusable, e.g. a root that isn't a directory. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A command handler threw. The dispatcher wraps and rethrows so the
 * transport can name the handler; it never turns a fault into a response.
 */
export class HandlerFaultError extends Error {
  readonly handler: string;

  constructor(handler: string, cause: unknown) {
    super(`Handler "${handler}" failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "HandlerFaultError";
    this.handler = handler;
  }
}

/** A POST that can't be read as a command. `status` is the HTTP answer. */
export class CommandRequestError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "CommandRequestError";
    this.status = status;
  }
}
