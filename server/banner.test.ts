import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtempSync, mkdirSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { formatRootLines, listCapitalisedPages, serverURL, startMessage } from "./banner.js";
import { buildContentRoots } from "./content-roots.js";

describe("serverURL", () => {
  it("shows loopback as localhost", () => {
    expect(serverURL("127.0.0.1", 8001)).toBe("http://localhost:8001");
  });

  it("keeps any other host", () => {
    expect(serverURL("0.0.0.0", 80)).toBe("http://0.0.0.0:80");
  });
});

describe("formatRootLines", () => {
  it("puts a short directory on one marked line", () => {
    expect(formatRootLines(["/app/web"])).toEqual(["> /app/web"]);
  });

  it("wraps between segments and indents continuation lines", () => {
    expect(formatRootLines(["/alpha/beta/gamma/delta"], 20)).toEqual(["> /alpha/beta/gamma", "  /delta"]);
  });

  it("never breaks before the first segment", () => {
    expect(formatRootLines(["/a-segment-longer-than-the-width"], 10)).toEqual([
      "> /a-segment-longer-than-the-width",
    ]);
  });

  it("gives each directory its own marker", () => {
    expect(formatRootLines(["/app/web", "/app/lib"])).toEqual(["> /app/web", "> /app/lib"]);
  });

  it("renders the filesystem root", () => {
    expect(formatRootLines(["/"])).toEqual(["> /"]);
  });
});

describe("listCapitalisedPages", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "harness-banner-"));
    writeFileSync(join(dir, "Main.html"), "");
    writeFileSync(join(dir, "About.html"), "");
    writeFileSync(join(dir, "index.html"), "");
    writeFileSync(join(dir, "Readme.txt"), "");
    mkdirSync(join(dir, "Folder.html"));
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("lists capitalised .html files, sorted", async () => {
    expect(await listCapitalisedPages(dir)).toEqual(["About.html", "Main.html"]);
  });
});

describe("startMessage", () => {
  it("lists the URL, roots, ancestor and page links", () => {
    const roots = buildContentRoots(["/app/web", "/app/lib"]);
    expect(startMessage("http://localhost:8001", roots, ["Main.html"]).split("\n")).toEqual([
      "Starting HTTP server at http://localhost:8001 for:",
      "> /app/web",
      "> /app/lib",
      "cd /app",
      "http://localhost:8001/Main.html",
    ]);
  });

  it("omits links when there are no pages", () => {
    const roots = buildContentRoots(["/app/web"]);
    expect(startMessage("http://localhost:8001", roots, [])).toBe(
      "Starting HTTP server at http://localhost:8001 for:\n> /app/web\ncd /app/web",
    );
  });
});
