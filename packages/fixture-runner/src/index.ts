// Loading
export {
  loadFixtureFile,
  loadFixtures,
  ruleIdFromSource,
  type LoadFixturesOptions,
} from "./load/fixture-loader";

// Configuration
export {
  buildDefaultConfig,
  getDialect,
  isConfigMapping,
  mergeConfigs,
  resolveCaseConfig,
} from "./config/merge-config";
export {
  describeConfigOption,
  STANDARD_CONFIG_INFO,
  validateConfigOption,
  validateRuleOptions,
  type ConfigOptionDescription,
  type ConfigOptionInfo,
  type ConfigOptionValidation,
} from "./config/config-info";

// Running
export {
  checkEvaluation,
  DEFAULT_CASE_TIMEOUT_MS,
  DEFAULT_CONCURRENCY,
  DEFAULT_DIALECT,
  FixtureRunner,
  type FixtureRunnerOptions,
  type RunOptions,
} from "./run/fixture-runner";
export {
  evaluateWithTimeout,
  type EvaluateWithTimeoutOptions,
} from "./run/evaluate-with-timeout";
export { exitCodeFor, formatRunReport } from "./run/report";

// Rule engines
export {
  isRuleEngine,
  loadRuleEngine,
  toModuleSpecifier,
  type LoadRuleEngineOptions,
  type ModuleImporter,
} from "./engine/load-rule-engine";

// CLI
export { parseCliArgs, runCli, USAGE, type CliFlags, type CliIo } from "./cli/run-cli";
