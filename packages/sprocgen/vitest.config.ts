import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["src/**/*.ts"],
      exclude: [
        // Entry points - exercised through generate()
        "src/cli.ts",
        "src/index.ts",
        // Test files and helpers
        "**/*.test.ts",
        "src/testing.ts",
      ],
    },
  },
});
