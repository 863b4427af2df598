import { z } from "zod";

/** Scalar or nested value inside a case's `configs` mapping. */
export type FixtureConfigValue =
  | string
  | number
  | boolean
  | null
  | FixtureConfigValue[]
  | FixtureConfig;

/** Nested configuration mapping, e.g. `{ core: { dialect: "bigquery" } }`. */
export interface FixtureConfig {
  [key: string]: FixtureConfigValue;
}

export const FixtureConfigValueSchema: z.ZodType<FixtureConfigValue> = z.lazy(
  () =>
    z.union([
      z.string(),
      z.number(),
      z.boolean(),
      z.null(),
      z.array(FixtureConfigValueSchema),
      FixtureConfigSchema,
    ]),
);

export const FixtureConfigSchema: z.ZodType<FixtureConfig> = z.lazy(() =>
  z.record(z.string(), FixtureConfigValueSchema),
);

/**
 * Body of one test case as written in a fixture file.
 * Mode invariants (pass_str XOR fail_str, fix_str only with fail_str) are
 * checked by the loader so every problem can be reported at once.
 */
export const RawTestCaseSchema = z
  .object({
    pass_str: z.string().optional(),
    fail_str: z.string().optional(),
    fix_str: z.string().optional(),
    configs: FixtureConfigSchema.optional(),
  })
  .strict();

export type RawTestCase = z.infer<typeof RawTestCaseSchema>;

/** Reserved top-level key naming the rule under test. */
export const RULE_ID_KEY = "rule";

export const RuleIdSchema = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9_.-]+$/, "rule id may only contain letters, digits, _ . -");

export type CaseMode = "pass" | "fail";

/** Exactly one of pass or fail; a fix can only accompany a failure. */
export type Expectation =
  | { readonly mode: "pass"; readonly sql: string }
  | { readonly mode: "fail"; readonly sql: string; readonly fixSql?: string };

export interface TestCase {
  readonly name: string;
  readonly ruleId: string;
  readonly expectation: Expectation;
  readonly configOverrides: FixtureConfig;
}

export interface FixtureSuite {
  readonly ruleId: string;
  /** File path or caller-supplied label, used in reports and logs. */
  readonly source: string;
  readonly cases: readonly TestCase[];
}
