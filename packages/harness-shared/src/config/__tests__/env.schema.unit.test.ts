import { ErrorCode } from "@lintcase/shared-types";
import { describe, expect, it } from "vitest";

import { AppError } from "../../common/errors";
import { harnessEnvSchema, validateHarnessEnv } from "../env.schema";

function captureError(fn: () => unknown): AppError {
  try {
    fn();
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected an AppError");
}

describe("env.schema", () => {
  describe("harnessEnvSchema", () => {
    it("applies defaults to an empty env", () => {
      expect(harnessEnvSchema.parse({})).toEqual({
        NODE_ENV: "development",
        LOG_FORMAT: "text",
        LOG_LEVEL: "info",
        LINT_CASE_TIMEOUT_MS: 10_000,
        LINT_CONCURRENCY: 4,
        LINT_DEFAULT_DIALECT: "ansi",
      });
    });

    it("coerces numeric strings", () => {
      const env = harnessEnvSchema.parse({
        LINT_CASE_TIMEOUT_MS: "250",
        LINT_CONCURRENCY: "8",
      });

      expect(env.LINT_CASE_TIMEOUT_MS).toBe(250);
      expect(env.LINT_CONCURRENCY).toBe(8);
    });

    it("ignores unrelated variables", () => {
      const env = harnessEnvSchema.parse({ PATH: "/usr/bin" });

      expect(env).not.toHaveProperty("PATH");
    });

    it("accepts the silent log level", () => {
      expect(harnessEnvSchema.parse({ LOG_LEVEL: "silent" }).LOG_LEVEL).toBe(
        "silent",
      );
    });
  });

  describe("validateHarnessEnv", () => {
    it("returns the parsed env", () => {
      expect(
        validateHarnessEnv({ LINT_DEFAULT_DIALECT: "bigquery" })
          .LINT_DEFAULT_DIALECT,
      ).toBe("bigquery");
    });

    it("rejects concurrency below 1 with CONFIG_ERROR", () => {
      const error = captureError(() =>
        validateHarnessEnv({ LINT_CONCURRENCY: "0" }),
      );

      expect(error.code).toBe(ErrorCode.CONFIG_ERROR);
      expect(error.extensions?.violations).toEqual([
        "LINT_CONCURRENCY: Number must be greater than or equal to 1",
      ]);
    });

    it("rejects an empty default dialect", () => {
      const error = captureError(() =>
        validateHarnessEnv({ LINT_DEFAULT_DIALECT: "" }),
      );

      expect(error.extensions?.violations).toEqual([
        "LINT_DEFAULT_DIALECT: LINT_DEFAULT_DIALECT must not be empty",
      ]);
    });

    it("reports every invalid variable", () => {
      const error = captureError(() =>
        validateHarnessEnv({ NODE_ENV: "staging", LINT_CASE_TIMEOUT_MS: "-5" }),
      );

      expect(error.extensions?.violations).toHaveLength(2);
      expect(error.extensions?.violations?.[0]).toMatch(/^NODE_ENV: /);
      expect(error.extensions?.violations?.[1]).toBe(
        "LINT_CASE_TIMEOUT_MS: Number must be greater than 0",
      );
    });
  });
});
