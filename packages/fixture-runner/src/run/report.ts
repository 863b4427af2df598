import type { CaseOutcome, RunReport } from "@lintcase/shared-types";

const LABEL_WIDTH = "expected:".length;
const FIELD_INDENT = "    ";

function formatField(label: string, value: string): string[] {
  const [first = "", ...rest] = value.replace(/\n+$/, "").split("\n");
  const continuation = " ".repeat(FIELD_INDENT.length + LABEL_WIDTH + 1);
  return [
    `${FIELD_INDENT}${label.padEnd(LABEL_WIDTH)} ${first}`,
    ...rest.map((line) => `${continuation}${line}`),
  ];
}

function formatOutcome(outcome: CaseOutcome): string[] {
  switch (outcome.status) {
    case "passed":
      return [];
    case "skipped":
      return [`  SKIP ${outcome.caseName} [${outcome.mode}]`];
    case "failed": {
      const { failure } = outcome;
      return [
        `  FAIL ${outcome.caseName} [${outcome.mode}] ${failure.code}: ${failure.message}`,
        ...formatField("input:", failure.input),
        ...formatField("expected:", failure.expected),
        ...formatField("actual:", failure.actual),
      ];
    }
  }
}

/**
 * Summary of one suite: a header with the counts, then every failing or
 * skipped case with its mode and, for failures, expected vs. actual.
 */
export function formatRunReport(report: RunReport): string {
  const header =
    `${report.ruleId} (${report.source}): ` +
    `${report.passed} passed, ${report.failed} failed, ${report.skipped} skipped ` +
    `in ${Math.round(report.durationMs)}ms` +
    (report.cancelled ? " (cancelled)" : "");

  return [header, ...report.outcomes.flatMap(formatOutcome)].join("\n");
}

function isReportList(
  value: RunReport | readonly RunReport[],
): value is readonly RunReport[] {
  return Array.isArray(value);
}

/**
 * Process exit status for a set of runs: 1 when anything failed, was
 * skipped or cancelled.
 */
export function exitCodeFor(reports: RunReport | readonly RunReport[]): 0 | 1 {
  const list: readonly RunReport[] = isReportList(reports)
    ? reports
    : [reports];
  const clean = list.every(
    (report) => !report.cancelled && report.failed === 0 && report.skipped === 0,
  );
  return clean ? 0 : 1;
}
