// Stubs
export {
  createHangingEngine,
  createRuleEngineStub,
  createScriptedEngine,
  type HangingRuleEngine,
  type RuleEngineStub,
  type ScriptedAnswer,
  type ScriptedRuleEngine,
} from "./stubs/rule-engine.stub";
export { withOverrides } from "./stubs/with-overrides";

// Factories
export {
  createFailCase,
  createPassCase,
  createSuite,
  DEFAULT_FAIL_SQL,
  DEFAULT_PASS_SQL,
  DEFAULT_RULE_ID,
  type CaseFactoryOverrides,
} from "./factories/test-case.factory";

// Setup
export {
  getNextTestCaseId,
  resetFactories,
} from "./setup/reset";
