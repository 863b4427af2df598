import {
  AppError,
  createSilentLogger,
  DEFAULT_DIALECT,
  isFatal,
  runnerSchema,
  safeContext,
  type Logger,
} from "@lintcase/harness-shared";
import {
  ErrorCode,
  type CaseFailure,
  type CaseOutcome,
  type CaseStatus,
  type Evaluation,
  type Expectation,
  type FixtureConfig,
  type FixtureSuite,
  type RuleEngine,
  type RunReport,
  type TestCase,
} from "@lintcase/shared-types";
import { z } from "zod";

import {
  buildDefaultConfig,
  getDialect,
  resolveCaseConfig,
} from "../config/merge-config";
import {
  loadFixtureFile,
  loadFixtures,
  type LoadFixturesOptions,
} from "../load/fixture-loader";
import { evaluateWithTimeout } from "./evaluate-with-timeout";

export {
  DEFAULT_CASE_TIMEOUT_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_DIALECT,
} from "@lintcase/harness-shared";

export interface FixtureRunnerOptions {
  /** Bound on each engine call. */
  timeoutMs?: number;
  /** Maximum number of cases evaluated at once. */
  concurrency?: number;
  /** Dialect for cases that do not set `configs.core.dialect`. */
  defaultDialect?: string;
  /** Harness-wide configuration; case configs are deep-merged over it. */
  defaults?: FixtureConfig;
  logger?: Logger;
}

// Same bounds as the LINT_* environment variables.
const runnerOptionsSchema = z.object({
  timeoutMs: runnerSchema.shape.LINT_CASE_TIMEOUT_MS,
  concurrency: runnerSchema.shape.LINT_CONCURRENCY,
  defaultDialect: z.string().min(1).default(DEFAULT_DIALECT),
});

function validateRunnerOptions(options: FixtureRunnerOptions) {
  const result = runnerOptionsSchema.safeParse({
    timeoutMs: options.timeoutMs,
    concurrency: options.concurrency,
    defaultDialect: options.defaultDialect,
  });
  if (!result.success) {
    throw new AppError(
      ErrorCode.CONFIG_ERROR,
      result.error,
      { operation: "createFixtureRunner" },
      {
        violations: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`,
        ),
      },
    );
  }
  return result.data;
}

export interface RunOptions {
  signal?: AbortSignal;
}

const NO_FIX = "(no fixed SQL returned)";

/**
 * Compares what the engine answered with what the case declares.
 * Returns null when they agree.
 */
export function checkEvaluation(
  expectation: Expectation,
  evaluation: Evaluation,
): CaseFailure | null {
  const input = expectation.sql;

  if (expectation.mode === "pass") {
    if (!evaluation.violated) {
      return null;
    }
    return {
      code: ErrorCode.ASSERTION_FAILED,
      message: "expected no violation but the rule was violated",
      input,
      expected: "no violation",
      actual: "violation",
    };
  }

  if (!evaluation.violated) {
    return {
      code: ErrorCode.ASSERTION_FAILED,
      message: "expected a violation but the rule passed",
      input,
      expected: "violation",
      actual: "no violation",
    };
  }

  if (
    expectation.fixSql !== undefined &&
    evaluation.fixedSql !== expectation.fixSql
  ) {
    return {
      code: ErrorCode.ASSERTION_FAILED,
      message: "fixed SQL differs from fix_str",
      input,
      expected: expectation.fixSql,
      actual: evaluation.fixedSql ?? NO_FIX,
    };
  }
  return null;
}

function engineUnavailable(error: unknown, testCase: TestCase): AppError {
  if (error instanceof AppError && isFatal(error)) {
    return error;
  }
  return new AppError(ErrorCode.RULE_ENGINE_UNAVAILABLE, error, {
    caseName: testCase.name,
    ruleId: testCase.ruleId,
    operation: "evaluate",
  });
}

function runCancelled(reason: unknown, testCase: TestCase): AppError {
  if (reason instanceof AppError) {
    return reason;
  }
  return new AppError(ErrorCode.RUN_CANCELLED, reason, {
    caseName: testCase.name,
    ruleId: testCase.ruleId,
    operation: "evaluate",
  });
}

function summarize(
  suite: FixtureSuite,
  outcomes: CaseOutcome[],
  cancelled: boolean,
  durationMs: number,
): RunReport {
  const count = (status: CaseStatus) =>
    outcomes.filter((outcome) => outcome.status === status).length;
  return {
    ruleId: suite.ruleId,
    source: suite.source,
    outcomes,
    passed: count("passed"),
    failed: count("failed"),
    skipped: count("skipped"),
    cancelled,
    durationMs,
  };
}

/**
 * Loads fixture suites and checks each case against a rule engine.
 *
 * Cases are independent: they may run concurrently, one failing case never
 * stops the others, and results always come back in declaration order.
 */
export class FixtureRunner {
  private readonly timeoutMs: number;
  private readonly concurrency: number;
  private readonly defaults: FixtureConfig;
  private readonly logger: Logger;

  /** @throws AppError CONFIG_ERROR when an option is out of bounds. */
  constructor(options: FixtureRunnerOptions = {}) {
    const { timeoutMs, concurrency, defaultDialect } =
      validateRunnerOptions(options);
    this.timeoutMs = timeoutMs;
    this.concurrency = concurrency;
    this.defaults = buildDefaultConfig(defaultDialect, options.defaults);
    this.logger = options.logger ?? createSilentLogger();
  }

  load(input: unknown, options?: LoadFixturesOptions): FixtureSuite {
    return loadFixtures(input, options);
  }

  loadFile(
    path: string,
    options?: Omit<LoadFixturesOptions, "source">,
  ): Promise<FixtureSuite> {
    return loadFixtureFile(path, options);
  }

  /**
   * Evaluates one case.
   *
   * Mismatches and timeouts resolve to a failed outcome. An engine that
   * cannot be invoked rejects with RULE_ENGINE_UNAVAILABLE; a cancelled
   * run rejects with the run signal's reason.
   */
  async run(
    testCase: TestCase,
    engine: RuleEngine,
    options: RunOptions = {},
  ): Promise<CaseOutcome> {
    const { expectation } = testCase;
    const config = resolveCaseConfig(this.defaults, testCase.configOverrides);
    const started = performance.now();

    this.logger.debug(
      {
        caseName: testCase.name,
        mode: expectation.mode,
        dialect: getDialect(config),
      },
      "evaluating case",
    );

    let evaluation: Evaluation;
    try {
      evaluation = await evaluateWithTimeout(
        engine,
        { sql: expectation.sql, ruleId: testCase.ruleId, config },
        {
          timeoutMs: this.timeoutMs,
          signal: options.signal,
          caseName: testCase.name,
        },
      );
    } catch (error) {
      if (
        error instanceof AppError &&
        error.code === ErrorCode.RULE_ENGINE_TIMEOUT
      ) {
        const failure: CaseFailure = {
          code: ErrorCode.RULE_ENGINE_TIMEOUT,
          message: `no answer within ${this.timeoutMs}ms`,
          input: expectation.sql,
          expected: expectation.mode === "pass" ? "no violation" : "violation",
          actual: "timeout",
        };
        this.logger.warn(
          { err: error, context: safeContext(error.context) },
          "case timed out",
        );
        return {
          status: "failed",
          caseName: testCase.name,
          mode: expectation.mode,
          durationMs: performance.now() - started,
          failure,
        };
      }
      if (options.signal?.aborted) {
        throw runCancelled(options.signal.reason, testCase);
      }
      throw engineUnavailable(error, testCase);
    }

    const durationMs = performance.now() - started;
    const failure = checkEvaluation(expectation, evaluation);
    if (failure) {
      this.logger.warn(
        {
          caseName: testCase.name,
          mode: expectation.mode,
          expected: failure.expected,
          actual: failure.actual,
        },
        failure.message,
      );
      return {
        status: "failed",
        caseName: testCase.name,
        mode: expectation.mode,
        durationMs,
        failure,
      };
    }
    return {
      status: "passed",
      caseName: testCase.name,
      mode: expectation.mode,
      durationMs,
    };
  }

  /**
   * Evaluates every case of a suite with at most `concurrency` in flight.
   *
   * Aborting `signal` stops starting new cases and abandons in-flight ones;
   * they are reported as skipped and the report is marked cancelled. A fatal
   * error aborts the other in-flight cases and rejects the run.
   */
  async runSuite(
    suite: FixtureSuite,
    engine: RuleEngine,
    options: RunOptions = {},
  ): Promise<RunReport> {
    const started = performance.now();
    const outcomes: Array<CaseOutcome | undefined> = suite.cases.map(
      () => undefined,
    );
    const controller = new AbortController();
    const state: { cancelled: boolean; fatal?: AppError } = {
      cancelled: false,
    };

    const onCancel = () => {
      state.cancelled = true;
      controller.abort(
        new AppError(ErrorCode.RUN_CANCELLED, options.signal?.reason, {
          source: suite.source,
          ruleId: suite.ruleId,
          operation: "runSuite",
        }),
      );
    };
    if (options.signal?.aborted) {
      onCancel();
    } else {
      options.signal?.addEventListener("abort", onCancel, { once: true });
    }

    let next = 0;
    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted) {
        const index = next;
        next += 1;
        const testCase = suite.cases[index];
        if (testCase === undefined) {
          return;
        }
        try {
          outcomes[index] = await this.run(testCase, engine, {
            signal: controller.signal,
          });
        } catch (error) {
          if (state.cancelled) {
            return;
          }
          state.fatal ??= engineUnavailable(error, testCase);
          controller.abort(state.fatal);
          return;
        }
      }
    };

    try {
      const workerCount = Math.min(this.concurrency, suite.cases.length);
      await Promise.all(Array.from({ length: workerCount }, () => worker()));
    } finally {
      options.signal?.removeEventListener("abort", onCancel);
    }

    const { fatal } = state;
    if (fatal) {
      this.logger.error(
        { err: fatal, context: safeContext(fatal.context) },
        "run aborted",
      );
      throw fatal;
    }

    const completed = suite.cases.map((testCase, index): CaseOutcome => {
      const outcome = outcomes[index];
      return (
        outcome ?? {
          status: "skipped",
          caseName: testCase.name,
          mode: testCase.expectation.mode,
        }
      );
    });

    const report = summarize(
      suite,
      completed,
      state.cancelled,
      performance.now() - started,
    );
    this.logger.info(
      {
        ruleId: report.ruleId,
        source: report.source,
        passed: report.passed,
        failed: report.failed,
        skipped: report.skipped,
        cancelled: report.cancelled,
      },
      "suite finished",
    );
    return report;
  }
}
