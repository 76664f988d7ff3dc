/**
 * Event bus. Decouples event production from consumption.
 *
 * Request handlers and command handlers call emit(event). Subscribers receive
 * typed HarnessEvents without coupling to the emitter.
 */

import type { HarnessEvent } from "./events.js";
import { getRequestId } from "./request-context.js";

export type EventListener = (event: HarnessEvent & { requestId?: string }) => void;

const listeners = new Set<EventListener>();

export function emit(event: HarnessEvent): void {
  const requestId = getRequestId();
  const enriched = requestId ? { ...event, requestId } : event;
  for (const listener of [...listeners]) {
    try {
      listener(enriched);
    } catch (err) {
      // Subscriber errors must not block other subscribers or propagate to callers
      console.error("[event-bus] subscriber threw:", err);
    }
  }
}

/** Register a subscriber. Returns a function that removes it again. */
export function subscribe(cb: EventListener): () => void {
  listeners.add(cb);
  return () => {
    listeners.delete(cb);
  };
}

/** Extract error string with stack trace preserved. */
export function errorDetail(err: unknown): string {
  return err instanceof Error ? err.stack || String(err) : String(err);
}
