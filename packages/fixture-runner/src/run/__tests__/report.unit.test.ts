import { ErrorCode, type RunReport } from "@lintcase/shared-types";
import { describe, expect, it } from "vitest";

import { exitCodeFor, formatRunReport } from "../report";

function makeReport(overrides: Partial<RunReport> = {}): RunReport {
  return {
    ruleId: "L048",
    source: "L048.yml",
    outcomes: [],
    passed: 0,
    failed: 0,
    skipped: 0,
    cancelled: false,
    durationMs: 0,
    ...overrides,
  };
}

describe("formatRunReport", () => {
  it("prints only the header when everything passed", () => {
    const report = makeReport({
      outcomes: [
        { status: "passed", caseName: "test_pass_1", mode: "pass", durationMs: 1 },
      ],
      passed: 1,
      durationMs: 3.6,
    });

    expect(formatRunReport(report)).toBe(
      "L048 (L048.yml): 1 passed, 0 failed, 0 skipped in 4ms",
    );
  });

  it("lists failures and skipped cases with their mode", () => {
    const report = makeReport({
      outcomes: [
        { status: "passed", caseName: "test_pass_1", mode: "pass", durationMs: 1 },
        {
          status: "failed",
          caseName: "test_fail_simple",
          mode: "fail",
          durationMs: 2,
          failure: {
            code: ErrorCode.ASSERTION_FAILED,
            message: "fixed SQL differs from fix_str",
            input: "SELECT ('foo'||'bar') as buzz",
            expected: "SELECT ('foo' || 'bar') as buzz",
            actual: "(no fixed SQL returned)",
          },
        },
        { status: "skipped", caseName: "test_pass_comma", mode: "pass" },
      ],
      passed: 1,
      failed: 1,
      skipped: 1,
      cancelled: true,
      durationMs: 12.4,
    });

    expect(formatRunReport(report).split("\n")).toEqual([
      "L048 (L048.yml): 1 passed, 1 failed, 1 skipped in 12ms (cancelled)",
      "  FAIL test_fail_simple [fail] ASSERTION_FAILED: fixed SQL differs from fix_str",
      "    input:    SELECT ('foo'||'bar') as buzz",
      "    expected: SELECT ('foo' || 'bar') as buzz",
      "    actual:   (no fixed SQL returned)",
      "  SKIP test_pass_comma [pass]",
    ]);
  });

  it("aligns multi-line SQL under the first line", () => {
    const report = makeReport({
      outcomes: [
        {
          status: "failed",
          caseName: "test_multi",
          mode: "pass",
          durationMs: 1,
          failure: {
            code: ErrorCode.RULE_ENGINE_TIMEOUT,
            message: "no answer within 20ms",
            input: "SELECT\n  col1\nFROM t\n",
            expected: "no violation",
            actual: "timeout",
          },
        },
      ],
      failed: 1,
    });

    expect(formatRunReport(report).split("\n").slice(1)).toEqual([
      "  FAIL test_multi [pass] RULE_ENGINE_TIMEOUT: no answer within 20ms",
      "    input:    SELECT",
      "                col1",
      "              FROM t",
      "    expected: no violation",
      "    actual:   timeout",
    ]);
  });
});

describe("exitCodeFor", () => {
  it("is 0 when every case passed", () => {
    expect(exitCodeFor(makeReport({ passed: 3 }))).toBe(0);
    expect(exitCodeFor([])).toBe(0);
  });

  it("is 1 when a case failed or was skipped", () => {
    expect(exitCodeFor(makeReport({ failed: 1 }))).toBe(1);
    expect(exitCodeFor([makeReport(), makeReport({ skipped: 1 })])).toBe(1);
  });

  it("is 1 when a run was cancelled", () => {
    expect(exitCodeFor([makeReport({ cancelled: true })])).toBe(1);
  });
});
