/**
 * Test case and suite factories
 */

import type {
  FixtureConfig,
  FixtureSuite,
  TestCase,
} from "@lintcase/shared-types";

import { getNextTestCaseId } from "../setup/reset";

export const DEFAULT_RULE_ID = "L048";
export const DEFAULT_PASS_SQL = "SELECT 'a' AS col";
export const DEFAULT_FAIL_SQL = "SELECT 'a'AS col";

export interface CaseFactoryOverrides {
  name?: string;
  ruleId?: string;
  sql?: string;
  configOverrides?: FixtureConfig;
}

export function createPassCase(overrides: CaseFactoryOverrides = {}): TestCase {
  const id = getNextTestCaseId();
  return {
    name: overrides.name ?? `test_pass_${id}`,
    ruleId: overrides.ruleId ?? DEFAULT_RULE_ID,
    expectation: { mode: "pass", sql: overrides.sql ?? DEFAULT_PASS_SQL },
    configOverrides: overrides.configOverrides ?? {},
  };
}

/**
 * @param overrides - `fixSql` adds an expected fix to the failure
 */
export function createFailCase(
  overrides: CaseFactoryOverrides & { fixSql?: string } = {},
): TestCase {
  const id = getNextTestCaseId();
  const sql = overrides.sql ?? DEFAULT_FAIL_SQL;
  return {
    name: overrides.name ?? `test_fail_${id}`,
    ruleId: overrides.ruleId ?? DEFAULT_RULE_ID,
    expectation:
      overrides.fixSql === undefined
        ? { mode: "fail", sql }
        : { mode: "fail", sql, fixSql: overrides.fixSql },
    configOverrides: overrides.configOverrides ?? {},
  };
}

export function createSuite(
  cases: TestCase[],
  overrides: Partial<Omit<FixtureSuite, "cases">> = {},
): FixtureSuite {
  return {
    ruleId: overrides.ruleId ?? DEFAULT_RULE_ID,
    source: overrides.source ?? "test-suite.yml",
    cases,
  };
}
