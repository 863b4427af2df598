// Fixture schema
export type {
  CaseMode,
  Expectation,
  FixtureConfig,
  FixtureConfigValue,
  FixtureSuite,
  RawTestCase,
  TestCase,
} from "./fixtures.js";
export {
  FixtureConfigSchema,
  FixtureConfigValueSchema,
  RawTestCaseSchema,
  RULE_ID_KEY,
  RuleIdSchema,
} from "./fixtures.js";

// Rule engine boundary
export type {
  EvaluateOptions,
  Evaluation,
  EvaluationRequest,
  RuleEngine,
} from "./rule-engine.js";
export { EvaluationSchema } from "./rule-engine.js";

// Run results
export type {
  CaseFailure,
  CaseFailureCode,
  CaseOutcome,
  CaseStatus,
  RunReport,
} from "./outcomes.js";

// Error handling
export { ErrorCode, ErrorMessages } from "./errors/index.js";

// Test helpers
export { assertDefined } from "./testing/assert-defined.js";
