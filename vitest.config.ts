import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    mockReset: true,
    include: ["test/**/*.test.ts"],
    // Socket tests bind loopback ports; keep them from hanging the run
    testTimeout: 30000,
    hookTimeout: 10000,
    teardownTimeout: 5000,
    // Single thread keeps port usage and teardown ordering predictable
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true,
      },
    },
    fileParallelism: false,
    coverage: {
      enabled: false,
      include: ["src/**/*.ts"],
      provider: "v8",
      reporter: ["text", "lcov"],
    },
  },
});
