import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: [
      "src/**/*.test.ts",
      "tests/**/*.test.ts",
      "packages/backend-local/tests/**/*.test.ts",
    ],
    coverage: {
      reporter: ["text", "html", "lcov"],
    },
  },
});
