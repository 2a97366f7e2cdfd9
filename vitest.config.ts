import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    pool: "forks",
    include: ["test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json"],
      // drivers/playwright.ts needs a live page and is exercised through a mocked Page only.
      include: ["src/**/*.ts"],
      exclude: ["src/index.ts", "src/types.ts", "src/drivers/**"],
      thresholds: {
        lines: 70,
        functions: 70,
        branches: 70,
        statements: 70,
      },
    },
  },
});
