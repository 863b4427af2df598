import { parseArgs } from "node:util";

import {
  AppError,
  createLogger,
  describeCause,
  safeContext,
  toAppError,
  validateHarnessEnv,
  type Logger,
} from "@lintcase/harness-shared";
import {
  ErrorCode,
  type FixtureSuite,
  type RunReport,
} from "@lintcase/shared-types";
import { z } from "zod";

import {
  loadRuleEngine,
  type ModuleImporter,
} from "../engine/load-rule-engine";
import { loadFixtureFile } from "../load/fixture-loader";
import { FixtureRunner } from "../run/fixture-runner";
import { exitCodeFor, formatRunReport } from "../run/report";

export const USAGE =
  "usage: lintcase --engine <module> [--rule <id>] [--dialect <name>] " +
  "[--timeout <ms>] [--concurrency <n>] <fixture files...>";

const cliFlagsSchema = z.object({
  engine: z.string().min(1, "--engine is required"),
  rule: z.string().min(1).optional(),
  dialect: z.string().min(1).optional(),
  timeout: z.coerce.number().int().positive().optional(),
  concurrency: z.coerce.number().int().min(1).max(64).optional(),
  files: z.array(z.string()).min(1, "at least one fixture file is required"),
});

export type CliFlags = z.infer<typeof cliFlagsSchema>;

export interface CliIo {
  env: Record<string, string | undefined>;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  cwd?: string;
  signal?: AbortSignal;
  /** Overrides the logger built from the environment. */
  logger?: Logger;
  importModule?: ModuleImporter;
}

function configError(violations: string[], cause?: unknown): AppError {
  return new AppError(
    ErrorCode.CONFIG_ERROR,
    cause,
    { operation: "parseCliArgs" },
    { violations },
  );
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        engine: { type: "string", short: "e" },
        rule: { type: "string", short: "r" },
        dialect: { type: "string", short: "d" },
        timeout: { type: "string" },
        concurrency: { type: "string" },
      },
    });
  } catch (error) {
    throw configError(
      [error instanceof Error ? error.message : String(error)],
      error,
    );
  }
}

export function parseCliArgs(argv: string[]): CliFlags {
  const parsed = readArgs(argv);
  const result = cliFlagsSchema.safeParse({
    ...parsed.values,
    files: parsed.positionals,
  });
  if (!result.success) {
    throw configError(
      result.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      ),
      result.error,
    );
  }
  return result.data;
}

function formatFatal(error: AppError): string {
  const lines = [`${error.code}: ${error.message}`];
  for (const violation of error.extensions?.violations ?? []) {
    lines.push(`  - ${violation}`);
  }
  if (!error.extensions?.violations && error.cause !== undefined) {
    lines.push(`  caused by: ${describeCause(error.cause)}`);
  }
  return lines.join("\n");
}

/**
 * Runs fixture files against an engine module and returns the exit code.
 * Every file is loaded before the first case runs, so a malformed file
 * aborts the whole invocation.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let logger = io.logger;
  try {
    const env = validateHarnessEnv(io.env);
    logger ??= createLogger(env);
    const flags = parseCliArgs(argv);

    const runner = new FixtureRunner({
      timeoutMs: flags.timeout ?? env.LINT_CASE_TIMEOUT_MS,
      concurrency: flags.concurrency ?? env.LINT_CONCURRENCY,
      defaultDialect: flags.dialect ?? env.LINT_DEFAULT_DIALECT,
      logger,
    });

    const engine = await loadRuleEngine(flags.engine, {
      cwd: io.cwd,
      importModule: io.importModule,
    });

    const suites: FixtureSuite[] = [];
    for (const file of flags.files) {
      suites.push(await loadFixtureFile(file, { ruleId: flags.rule }));
    }

    const reports: RunReport[] = [];
    for (const suite of suites) {
      const report = await runner.runSuite(suite, engine, {
        signal: io.signal,
      });
      reports.push(report);
      io.stdout(`${formatRunReport(report)}\n`);
      if (report.cancelled) {
        break;
      }
    }
    return exitCodeFor(reports);
  } catch (error) {
    const appError = toAppError(error, { operation: "runCli" });
    logger?.error(
      { err: appError, context: safeContext(appError.context) },
      "lintcase failed",
    );
    io.stderr(`${formatFatal(appError)}\n`);
    if (appError.code === ErrorCode.CONFIG_ERROR) {
      io.stderr(`${USAGE}\n`);
    }
    return 1;
  }
}
