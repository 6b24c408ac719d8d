import { defineConfig } from "vitest/config";

// Tests write fixtures into per-test temp dirs; mupdf's wasm init is slow on first use.
export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
