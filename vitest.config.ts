import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts"],
    // Clear env so tests see defaults; config tests pass their own env objects.
    env: {
      FARMDAL_LOG_LEVEL: "",
      FARMDAL_LOG_PRETTY: "",
      DATABASE_URL: "",
    },
    // Isolate tests to avoid module state leaks
    pool: "forks",
    testTimeout: 10000,
  },
});
