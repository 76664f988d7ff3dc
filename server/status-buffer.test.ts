import { describe, it, expect, beforeEach } from "vitest";
import { CAPACITY, getRecent, initStatusBuffer, resetStatusBuffer } from "./status-buffer.js";
import { emit } from "./event-bus.js";

// Subscribe once, shared across tests as in real usage
initStatusBuffer();

function emitN(n: number): void {
  for (let i = 0; i < n; i++) {
    emit({ type: "handler:write", file: `/data/${i}.txt`, bytes: i });
  }
}

function bytesOf(entries: ReturnType<typeof getRecent>): number[] {
  return entries.map((entry) => (entry.event.type === "handler:write" ? entry.event.bytes : -1));
}

describe("status-buffer", () => {
  beforeEach(() => {
    resetStatusBuffer();
  });

  it("returns events in chronological order", () => {
    emitN(5);
    expect(bytesOf(getRecent(5))).toEqual([0, 1, 2, 3, 4]);
  });

  it("getRecent(n) returns the newest n entries", () => {
    emitN(10);
    expect(bytesOf(getRecent(3))).toEqual([7, 8, 9]);
  });

  it("getRecent() without arg returns all buffered entries", () => {
    emitN(5);
    expect(getRecent()).toHaveLength(5);
  });

  it("asking for more than is held returns what there is", () => {
    emitN(2);
    expect(getRecent(50)).toHaveLength(2);
  });

  it("wraps correctly when buffer exceeds capacity", () => {
    emitN(CAPACITY + 10);
    const recent = getRecent();
    expect(recent).toHaveLength(CAPACITY);
    expect(bytesOf(recent)[0]).toBe(10);
    expect(bytesOf(recent).at(-1)).toBe(CAPACITY + 9);
  });

  it("initialising twice does not record events twice", () => {
    initStatusBuffer();
    emitN(1);
    expect(getRecent()).toHaveLength(1);
  });

  it("entries include timestamp and level", () => {
    emit({ type: "command:fault", handler: "write", error: "Error: disk full" });
    const [entry] = getRecent(1);
    expect(entry.level).toBe("error");
    expect(entry.ts).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it("is empty after a reset", () => {
    emitN(3);
    resetStatusBuffer();
    expect(getRecent()).toEqual([]);
  });
});
