import { defineConfig } from "vitest/config";

/**
 * Shared Vitest configuration for the lintcase workspace.
 * Per-package configs should use mergeConfig to extend this.
 *
 * @example
 * import { mergeConfig } from 'vitest/config';
 * import sharedConfig from '../../vitest.shared';
 * export default mergeConfig(sharedConfig, defineConfig({ ... }));
 */
export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
    env: {
      NODE_ENV: "test",
      LOG_FORMAT: "text",
      LOG_LEVEL: "silent",
    },
  },
});
