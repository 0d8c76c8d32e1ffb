import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

// Workspace packages export built JS at runtime; tests run their sources.
const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@tally/types": source("types"),
      "@tally/ledger": source("ledger"),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      include: ["packages/*/src/**/*.ts"],
      exclude: ["packages/*/src/index.ts", "packages/cli/src/main.ts"],
    },
  },
});
