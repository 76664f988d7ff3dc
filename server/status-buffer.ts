/**
 * Circular buffer subscriber. Keeps recent events in memory for the
 * `status` command.
 */

import { subscribe } from "./event-bus.js";
import { levelFor, type HarnessEvent, type LogLevel } from "./events.js";

export interface BufferEntry {
  ts: string;
  level: LogLevel;
  event: HarnessEvent;
}

const CAPACITY = 200;
const buffer: BufferEntry[] = new Array(CAPACITY);
let head = 0;   // next write position
let count = 0;  // entries held, capped at CAPACITY
let unsubscribe: (() => void) | null = null;

function handleEvent(event: HarnessEvent): void {
  buffer[head] = {
    ts: new Date().toISOString(),
    level: levelFor(event),
    event,
  };
  head = (head + 1) % CAPACITY;
  if (count < CAPACITY) count++;
}

/** Return the last `n` events in chronological order. */
export function getRecent(n?: number): BufferEntry[] {
  const total = Math.min(n ?? count, count);
  const result: BufferEntry[] = new Array(total);
  let readPos = (head - total + CAPACITY) % CAPACITY;
  for (let i = 0; i < total; i++) {
    result[i] = buffer[readPos];
    readPos = (readPos + 1) % CAPACITY;
  }
  return result;
}

export function initStatusBuffer(): void {
  if (unsubscribe) return;
  unsubscribe = subscribe(handleEvent);
}

/** Drop everything held. Used between tests. */
export function resetStatusBuffer(): void {
  head = 0;
  count = 0;
}

export { handleEvent as _handleEvent, CAPACITY };
