import pino, { type Logger } from "pino";
import { describe, expect, it } from "vitest";

import {
  createLogger,
  createLoggerOptions,
  createSilentLogger,
  REDACTED_FIELD_PATHS,
} from "./logger";

function captureLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  const logger = pino(createLoggerOptions("test", "json", "info"), {
    write: (line: string) => {
      lines.push(line);
    },
  });
  return { logger, lines };
}

describe("Logger", () => {
  describe("Field Redaction", () => {
    it("redacts password, token and secret fields", () => {
      expect(REDACTED_FIELD_PATHS).toContain("password");
      expect(REDACTED_FIELD_PATHS).toContain("token");
      expect(REDACTED_FIELD_PATHS).toContain("secret");
    });

    it("includes all field paths in pino config", () => {
      const { redact } = createLoggerOptions("development", "text", undefined);
      if (!redact || Array.isArray(redact)) {
        throw new Error("Expected redact options object");
      }

      expect(redact.paths).toEqual([...REDACTED_FIELD_PATHS]);
      expect(redact.censor).toBe("[REDACTED]");
    });

    it("censors credentials nested in a case config", () => {
      const { logger, lines } = captureLogger();

      logger.info(
        { config: { templater: { password: "test-secret" } } },
        "evaluating case",
      );

      expect(lines).toHaveLength(1);
      const entry: unknown = JSON.parse(lines[0] ?? "");
      expect(entry).toMatchObject({
        msg: "evaluating case",
        name: "lintcase",
        service: "lintcase",
        config: { templater: { password: "[REDACTED]" } },
      });
    });
  });

  describe("Output Format", () => {
    it("uses pino-pretty outside production with text format", () => {
      const options = createLoggerOptions("development", "text", undefined);

      expect(options.transport).toMatchObject({ target: "pino-pretty" });
    });

    it("writes JSON lines when LOG_FORMAT is json", () => {
      const options = createLoggerOptions("development", "json", undefined);

      expect(options.transport).toBeUndefined();
    });

    it("always writes JSON lines in production", () => {
      const options = createLoggerOptions("production", "text", undefined);

      expect(options.transport).toBeUndefined();
    });
  });

  describe("Log Level", () => {
    it("defaults to debug outside production", () => {
      expect(createLoggerOptions("development", "text", undefined).level).toBe(
        "debug",
      );
    });

    it("defaults to info in production", () => {
      expect(createLoggerOptions("production", "json", undefined).level).toBe(
        "info",
      );
    });

    it("prefers an explicit level", () => {
      expect(createLoggerOptions("production", "json", "warn").level).toBe(
        "warn",
      );
    });
  });

  it("createLogger applies the environment", () => {
    const logger = createLogger({
      NODE_ENV: "test",
      LOG_FORMAT: "json",
      LOG_LEVEL: "error",
    });

    expect(logger.level).toBe("error");
  });

  it("createSilentLogger drops everything", () => {
    expect(createSilentLogger().level).toBe("silent");
  });
});
