// vitest.config.ts
// Configuration for the vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    pool: "threads",
    testTimeout: 10_000,
  },
});
