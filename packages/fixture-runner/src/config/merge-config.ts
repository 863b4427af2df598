import type { FixtureConfig, FixtureConfigValue } from "@lintcase/shared-types";

export function isConfigMapping(
  value: FixtureConfigValue | undefined,
): value is FixtureConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep-merges `overrides` over `base`. Mappings merge key by key; scalars and
 * arrays in `overrides` replace whatever `base` holds. Neither input is
 * mutated.
 */
export function mergeConfigs(
  base: FixtureConfig,
  overrides: FixtureConfig,
): FixtureConfig {
  const merged: FixtureConfig = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    const current = merged[key];
    merged[key] =
      isConfigMapping(current) && isConfigMapping(value)
        ? mergeConfigs(current, value)
        : value;
  }
  return merged;
}

/**
 * Harness-wide defaults every case starts from.
 */
export function buildDefaultConfig(
  dialect: string,
  extra: FixtureConfig = {},
): FixtureConfig {
  return mergeConfigs({ core: { dialect } }, extra);
}

/**
 * The configuration handed to the rule engine for one case: a private copy,
 * so an engine that mutates it cannot leak into other cases.
 */
export function resolveCaseConfig(
  defaults: FixtureConfig,
  overrides: FixtureConfig,
): FixtureConfig {
  return structuredClone(mergeConfigs(defaults, overrides));
}

export function getDialect(config: FixtureConfig): string | undefined {
  const core = config.core;
  if (!isConfigMapping(core)) {
    return undefined;
  }
  const dialect = core.dialect;
  return typeof dialect === "string" ? dialect : undefined;
}
