import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "packages/*/src/**/*.test.ts",
      "packages/*/test/**/*.test.ts",
      "packages/*/benchmarks/**/*.bench.ts",
    ],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      LEADLINK_LOG_LEVEL: "warn",
    },
  },
});
