import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    env: {
      PROFILER_LOG_LEVEL: "warn",
    },
  },
});
