// vitest.config.ts
// Configuration for vitest test runner

import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    // Tests evaluate generated code in-process; nothing here is slow
    testTimeout: 10_000,
    pool: "threads",
    include: ["test/**/*.spec.ts"],
  },
});
