import { describe, it, expect } from "vitest";
import { contentTypeFor, etagFor, isNotModified, parseRange, requestPath } from "./static-responder.js";

describe("contentTypeFor", () => {
  it("maps known extensions case-insensitively", () => {
    expect(contentTypeFor("web/index.html")).toBe("text/html; charset=utf-8");
    expect(contentTypeFor("lib/app.JS")).toBe("text/javascript; charset=utf-8");
    expect(contentTypeFor("icon.svg")).toBe("image/svg+xml");
  });

  it("falls back to octet-stream", () => {
    expect(contentTypeFor("data.bin")).toBe("application/octet-stream");
    expect(contentTypeFor("Makefile")).toBe("application/octet-stream");
  });
});

describe("etagFor", () => {
  it("encodes size and whole-millisecond mtime in hex", () => {
    expect(etagFor({ size: 255, mtimeMs: 4096.7 })).toBe('W/"ff-1000"');
  });
});

describe("isNotModified", () => {
  const etag = 'W/"ff-1000"';
  const mtime = new Date("2026-03-01T10:00:00.500Z");

  it("matches If-None-Match against the current tag", () => {
    expect(isNotModified({ "if-none-match": etag }, etag, mtime)).toBe(true);
    expect(isNotModified({ "if-none-match": '"other", W/"ff-1000"' }, etag, mtime)).toBe(true);
    expect(isNotModified({ "if-none-match": '"ff-1000"' }, etag, mtime)).toBe(true);
    expect(isNotModified({ "if-none-match": "*" }, etag, mtime)).toBe(true);
  });

  it("reports a changed tag as modified", () => {
    expect(isNotModified({ "if-none-match": 'W/"ff-2000"' }, etag, mtime)).toBe(false);
  });

  it("ignores If-Modified-Since when If-None-Match is present", () => {
    const headers = {
      "if-none-match": 'W/"ff-2000"',
      "if-modified-since": "Sun, 01 Mar 2026 10:00:00 GMT",
    };
    expect(isNotModified(headers, etag, mtime)).toBe(false);
  });

  it("compares If-Modified-Since at second precision", () => {
    expect(isNotModified({ "if-modified-since": "Sun, 01 Mar 2026 10:00:00 GMT" }, etag, mtime)).toBe(true);
    expect(isNotModified({ "if-modified-since": "Sun, 01 Mar 2026 09:59:59 GMT" }, etag, mtime)).toBe(false);
  });

  it("ignores an unparseable date", () => {
    expect(isNotModified({ "if-modified-since": "yesterday" }, etag, mtime)).toBe(false);
  });

  it("is false with no conditional headers", () => {
    expect(isNotModified({}, etag, mtime)).toBe(false);
  });
});

describe("parseRange", () => {
  it("returns null without a header", () => {
    expect(parseRange(undefined, 100)).toBeNull();
  });

  it("parses a closed range", () => {
    expect(parseRange("bytes=0-9", 100)).toEqual({ start: 0, end: 9 });
  });

  it("parses an open-ended range", () => {
    expect(parseRange("bytes=90-", 100)).toEqual({ start: 90, end: 99 });
  });

  it("parses a suffix range", () => {
    expect(parseRange("bytes=-10", 100)).toEqual({ start: 90, end: 99 });
    expect(parseRange("bytes=-500", 100)).toEqual({ start: 0, end: 99 });
  });

  it("clamps the end to the file size", () => {
    expect(parseRange("bytes=50-500", 100)).toEqual({ start: 50, end: 99 });
  });

  it("reports ranges starting past the end as unsatisfiable", () => {
    expect(parseRange("bytes=100-", 100)).toBe("unsatisfiable");
    expect(parseRange("bytes=-0", 100)).toBe("unsatisfiable");
    expect(parseRange("bytes=0-", 0)).toBe("unsatisfiable");
  });

  it("ignores multi-range, reversed and malformed headers", () => {
    expect(parseRange("bytes=0-1,5-6", 100)).toBeNull();
    expect(parseRange("bytes=9-1", 100)).toBeNull();
    expect(parseRange("items=0-1", 100)).toBeNull();
    expect(parseRange("bytes=-", 100)).toBeNull();
  });
});

describe("requestPath", () => {
  it("drops the query and fragment", () => {
    expect(requestPath("/web/page.html?v=2")).toBe("/web/page.html");
    expect(requestPath("/web/page.html#top")).toBe("/web/page.html");
  });

  it("decodes percent-escapes", () => {
    expect(requestPath("/web/my%20page.html")).toBe("/web/my page.html");
    expect(requestPath("/elsewhere/%2e%2e/Main.html")).toBe("/elsewhere/../Main.html");
  });

  it("keeps dot segments and repeated slashes as sent", () => {
    expect(requestPath("/elsewhere/../Main.html")).toBe("/elsewhere/../Main.html");
    expect(requestPath("//elsewhere/Main.html")).toBe("//elsewhere/Main.html");
  });

  it("throws on a malformed escape", () => {
    expect(() => requestPath("/web/%E0%A4%A")).toThrow(URIError);
  });
});
