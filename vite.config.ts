import { resolve } from "node:path";
import { defineConfig } from "vitest/config";

// `vite build` packages the page-side client into library/, the
// lowest-priority content root, next to the hand-written index.html.
export default defineConfig({
  build: {
    outDir: resolve("library"),
    // library/ holds hand-written pages too
    emptyOutDir: false,
    lib: {
      entry: resolve("client/harness-bridge.ts"),
      formats: ["es"],
      fileName: () => "harness-bridge.js",
    },
    target: "es2020",
  },
  test: {
    include: ["server/**/*.test.ts", "cli/**/*.test.ts", "client/**/*.test.ts"],
    environment: "node",
  },
});
