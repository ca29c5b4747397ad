import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    pool: 'forks',
    testTimeout: 20_000,
    include: ["packages/*/src/**/*.test.ts"],
    coverage: {
      reporter: ["text", "json", "html"],
    },
  },
  resolve: {
    alias: {
      "@threadlane/system": new URL('./packages/system/src/index.ts', import.meta.url).pathname,
      "@threadlane/bridge": new URL('./packages/bridge/src/index.ts', import.meta.url).pathname,
      "@threadlane/sqlite": new URL('./packages/sqlite/src/index.ts', import.meta.url).pathname,
    },
  },
});
