/**
 * Per-request context via AsyncLocalStorage.
 *
 * The bridge wraps each request in withRequestContext(), so the request id
 * reaches every command handler and every emit() in the same async chain.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { randomBytes } from "node:crypto";

export interface RequestContext {
  requestId: string;
  method: string;
  url: string;
  startedAt: number;
}

export const requestContext = new AsyncLocalStorage<RequestContext>();

/** Generate a short 8-char hex request ID. */
export function generateRequestId(): string {
  return randomBytes(4).toString("hex");
}

/** Run `fn` inside a fresh context for one HTTP request. */
export function withRequestContext<T>(
  method: string,
  url: string,
  fn: (ctx: RequestContext) => T,
): T {
  const ctx: RequestContext = {
    requestId: generateRequestId(),
    method,
    url,
    startedAt: Date.now(),
  };
  return requestContext.run(ctx, () => fn(ctx));
}

/** Get the current request's ID, or undefined if not in a request context. */
export function getRequestId(): string | undefined {
  return requestContext.getStore()?.requestId;
}
