import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";

import { AppError } from "@lintcase/harness-shared";
import {
  ErrorCode,
  RawTestCaseSchema,
  RULE_ID_KEY,
  RuleIdSchema,
  type Expectation,
  type FixtureConfig,
  type FixtureConfigValue,
  type FixtureSuite,
  type RawTestCase,
  type TestCase,
} from "@lintcase/shared-types";
import { load, YAMLException, type EventType, type State } from "js-yaml";

import { validateRuleOptions } from "../config/config-info";
import { isConfigMapping } from "../config/merge-config";

const FIXTURE_EXTENSIONS = new Set([".yml", ".yaml"]);

export interface LoadFixturesOptions {
  /** Label for reports and errors; a file path when loading from disk. */
  source?: string;
  /** Rule under test when the fixture has no top-level `rule` key. */
  ruleId?: string;
}

type CaseBuild =
  | { ok: true; testCase: TestCase }
  | { ok: false; problems: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function malformed(
  source: string,
  violations: string[],
  cause?: unknown,
): AppError {
  return new AppError(
    ErrorCode.MALFORMED_FIXTURE,
    cause,
    { source, operation: "loadFixtures" },
    { violations },
  );
}

function deepFreeze(value: FixtureConfigValue): void {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
    Object.freeze(value);
  } else if (isConfigMapping(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
}

/**
 * `L048.yml` -> `L048`. Only file-like sources name a rule.
 */
export function ruleIdFromSource(source: string): string | undefined {
  const extension = extname(source).toLowerCase();
  if (!FIXTURE_EXTENSIONS.has(extension)) {
    return undefined;
  }
  const stem = basename(source, extname(source));
  return RuleIdSchema.safeParse(stem).success ? stem : undefined;
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

interface ParsedFixture {
  document: unknown;
  /** Top-level keys in the order they appear in the source text. */
  keyOrder: string[];
}

function isKeyScalar(value: unknown): value is string | number | boolean {
  return (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  );
}

function followedByColon(input: string, position: number): boolean {
  let index = position;
  while (input[index] === " " || input[index] === "\t") {
    index += 1;
  }
  return input[index] === ":";
}

/**
 * js-yaml builds plain objects, which list integer-like keys first. The
 * listener records the top-level keys as they are read so cases keep their
 * declaration order.
 */
function parseYaml(text: string, source: string): ParsedFixture {
  const keyOrder: string[] = [];
  let depth = 0;
  const listener = (eventType: EventType, state: State): void => {
    if (eventType === "open") {
      depth += 1;
      return;
    }
    depth -= 1;
    const node: unknown = state.result;
    if (
      depth === 1 &&
      isKeyScalar(node) &&
      followedByColon(state.input, state.position)
    ) {
      keyOrder.push(String(node));
    }
  };

  try {
    return { document: load(text, { filename: source, listener }), keyOrder };
  } catch (error) {
    if (error instanceof YAMLException) {
      throw malformed(source, [error.message], error);
    }
    throw error;
  }
}

function orderedKeys(
  document: Record<string, unknown>,
  keyOrder: readonly string[],
): string[] {
  const keys = new Set(keyOrder.filter((key) => Object.hasOwn(document, key)));
  for (const key of Object.keys(document)) {
    keys.add(key);
  }
  return [...keys];
}

function resolveRuleId(
  document: Record<string, unknown>,
  source: string,
  options: LoadFixturesOptions,
): { ruleId?: string; problem?: string } {
  if (RULE_ID_KEY in document) {
    const parsed = RuleIdSchema.safeParse(document[RULE_ID_KEY]);
    if (!parsed.success) {
      return {
        problem: `${RULE_ID_KEY}: ${parsed.error.issues[0]?.message ?? "invalid rule id"}`,
      };
    }
    return { ruleId: parsed.data };
  }

  const ruleId = options.ruleId ?? ruleIdFromSource(source);
  if (ruleId === undefined) {
    return {
      problem: `${RULE_ID_KEY}: no rule id in the fixture, the options or the file name`,
    };
  }
  return { ruleId };
}

/**
 * Mode invariants: exactly one of pass_str / fail_str, fix_str only with
 * fail_str, non-empty input SQL.
 */
function checkMode(name: string, body: RawTestCase): string[] {
  const problems: string[] = [];
  const hasPass = body.pass_str !== undefined;
  const hasFail = body.fail_str !== undefined;

  if (hasPass && hasFail) {
    problems.push(`${name}: defines both pass_str and fail_str`);
  }
  if (!hasPass && !hasFail) {
    problems.push(`${name}: defines neither pass_str nor fail_str`);
  }
  if (body.fix_str !== undefined && !hasFail) {
    problems.push(`${name}: fix_str requires fail_str`);
  }

  for (const key of ["pass_str", "fail_str"] as const) {
    const sql = body[key];
    if (sql !== undefined && sql.trim() === "") {
      problems.push(`${name}: ${key} must not be empty`);
    }
  }
  return problems;
}

function checkConfigs(name: string, configs: FixtureConfig): string[] {
  const problems: string[] = [];

  if ("core" in configs) {
    const core = configs.core;
    if (!isConfigMapping(core)) {
      problems.push(`${name}: configs.core must be a mapping`);
    } else if ("dialect" in core && !isNonEmptyString(core.dialect)) {
      problems.push(`${name}: configs.core.dialect must be a non-empty string`);
    }
  }

  if ("rules" in configs && configs.rules !== undefined) {
    for (const problem of validateRuleOptions(configs.rules)) {
      problems.push(`${name}: ${problem}`);
    }
  }
  return problems;
}

function toExpectation(body: RawTestCase): Expectation | undefined {
  if (body.pass_str !== undefined) {
    return { mode: "pass", sql: body.pass_str };
  }
  if (body.fail_str === undefined) {
    return undefined;
  }
  return body.fix_str === undefined
    ? { mode: "fail", sql: body.fail_str }
    : { mode: "fail", sql: body.fail_str, fixSql: body.fix_str };
}

function buildCase(name: string, value: unknown, ruleId: string): CaseBuild {
  if (!isRecord(value)) {
    return { ok: false, problems: [`${name}: case body must be a mapping`] };
  }

  const parsed = RawTestCaseSchema.safeParse(value);
  if (!parsed.success) {
    return {
      ok: false,
      problems: parsed.error.issues.map((issue) =>
        issue.path.length > 0
          ? `${name}: ${issue.path.join(".")}: ${issue.message}`
          : `${name}: ${issue.message}`,
      ),
    };
  }

  const body = parsed.data;
  const configOverrides = body.configs ?? {};
  const problems = [
    ...checkMode(name, body),
    ...checkConfigs(name, configOverrides),
  ];
  const expectation = toExpectation(body);
  if (problems.length > 0 || expectation === undefined) {
    return { ok: false, problems };
  }

  deepFreeze(configOverrides);
  return {
    ok: true,
    testCase: Object.freeze({
      name,
      ruleId,
      expectation: Object.freeze(expectation),
      configOverrides,
    }),
  };
}

/**
 * Turns fixture data (YAML text or an already parsed mapping) into an
 * ordered, immutable suite of test cases.
 *
 * Every problem in the file is collected first; if there is any, a single
 * MALFORMED_FIXTURE error lists them all and no case is returned.
 */
export function loadFixtures(
  input: unknown,
  options: LoadFixturesOptions = {},
): FixtureSuite {
  const source = options.source ?? "<inline>";
  const { document, keyOrder }: ParsedFixture =
    typeof input === "string"
      ? parseYaml(input, source)
      : { document: input, keyOrder: [] };

  if (!isRecord(document)) {
    throw malformed(source, [
      "top level must be a mapping of test case names to case bodies",
    ]);
  }

  const { ruleId, problem } = resolveRuleId(document, source, options);
  const problems: string[] = problem ? [problem] : [];
  const cases: TestCase[] = [];

  for (const name of orderedKeys(document, keyOrder)) {
    if (name === RULE_ID_KEY) {
      continue;
    }
    const built = buildCase(name, document[name], ruleId ?? "");
    if (built.ok) {
      cases.push(built.testCase);
    } else {
      problems.push(...built.problems);
    }
  }

  if (cases.length === 0 && problems.length === 0) {
    problems.push("fixture defines no test cases");
  }
  if (problems.length > 0 || ruleId === undefined) {
    throw malformed(source, problems);
  }

  return Object.freeze({
    ruleId,
    source,
    cases: Object.freeze(cases),
  });
}

export async function loadFixtureFile(
  path: string,
  options: Omit<LoadFixturesOptions, "source"> = {},
): Promise<FixtureSuite> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw malformed(path, [`cannot read fixture file: ${reason}`], error);
  }
  return loadFixtures(text, { ...options, source: path });
}
