import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    // Each test file opens its own temporary SQLite files.
    pool: "forks",
  },
});
