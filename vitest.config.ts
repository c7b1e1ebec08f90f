import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    // wabt's wasm build takes a moment to initialise on first use.
    testTimeout: 30_000,
  },
});
