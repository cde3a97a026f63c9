import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // Env must be in place before config.ts parses it
    setupFiles: ["./test/setup-env.ts"],
    // Only run unit tests (fast, no external dependencies)
    include: ["src/__tests__/unit/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.test.ts", "src/entrypoints/**"],
    },
  },
});
