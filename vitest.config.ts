import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    testTimeout: 30_000,
    include: ["extensions/*/src/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/*.live.test.ts"],
    setupFiles: ["test/setup.ts"],
    globals: true,
  },
});
