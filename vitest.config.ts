import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // PGlite boots a full Postgres in WASM per test file.
    testTimeout: 30_000,
    hookTimeout: 60_000,
  },
});
