import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node", // turndown brings its own DOM implementation under Node
    testTimeout: 15000,
    include: ["test/**/*.test.ts"],
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      include: ["src/**/*.ts"],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
