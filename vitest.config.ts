import { defineConfig } from "vitest/config";

/**
 * Root Vitest configuration with workspace projects.
 *
 * Each workspace package has its own vitest.config.ts that extends vitest.shared.ts.
 * This root config aggregates all workspace configs.
 *
 * Run specific project:
 *   npx vitest --project fixture-runner
 *
 * Run all tests:
 *   npm test
 */
export default defineConfig({
  test: {
    coverage: {
      provider: "v8",
      include: ["packages/*/src/**"],
      exclude: [
        "**/*.test.ts",
        "**/__tests__/**",
        "**/node_modules/**",
        "**/dist/**",
      ],
      reporter: ["text", "json", "html"],
    },
    reporters: ["default"],

    projects: [
      "packages/shared-types/vitest.config.ts",
      "packages/harness-shared/vitest.config.ts",
      "packages/fixture-runner/vitest.config.ts",
    ],
  },
});
