import type { FixtureConfigValue } from "@lintcase/shared-types";

import { isConfigMapping } from "./merge-config";

/** Inclusive integer bounds, or the list of accepted values. */
export type ConfigOptionValidation =
  | { readonly min: number; readonly max: number }
  | readonly (string | boolean)[];

export interface ConfigOptionInfo {
  readonly validation: ConfigOptionValidation;
  readonly definition: string;
}

const BOOLEAN = [true, false] as const;

/**
 * Standard rule options: what each one means and which values it accepts.
 * Used to validate `configs.rules` in fixtures and to document options.
 */
export const STANDARD_CONFIG_INFO: Readonly<Record<string, ConfigOptionInfo>> =
  {
    tab_space_size: {
      validation: { min: 0, max: 99 },
      definition:
        "The number of spaces to consider equal to one tab. Used in the fixing step of this rule",
    },
    max_line_length: {
      validation: { min: 0, max: 999 },
      definition: "The maximum length of a line to allow without raising a violation",
    },
    indent_unit: {
      validation: ["space", "tab"],
      definition: "Whether to use tabs or spaces to add new indents",
    },
    comma_style: {
      validation: ["leading", "trailing"],
      definition: "The comma style to enforce",
    },
    allow_scalar: {
      validation: BOOLEAN,
      definition:
        "Whether or not to allow a single element in the select clause to be without an alias",
    },
    single_table_references: {
      validation: ["consistent", "qualified", "unqualified"],
      definition: "The expectation for references in single-table select",
    },
    unquoted_identifiers_policy: {
      validation: ["all", "aliases", "column_aliases"],
      definition: "Types of unquoted identifiers to flag violations for",
    },
    capitalisation_policy: {
      validation: ["consistent", "upper", "lower", "capitalise"],
      definition: "The capitalisation policy to enforce",
    },
    extended_capitalisation_policy: {
      validation: ["consistent", "upper", "lower", "pascal", "capitalise"],
      definition:
        "The capitalisation policy to enforce, extended with PascalCase. Not applied to keywords.",
    },
    lint_templated_tokens: {
      validation: BOOLEAN,
      definition:
        "Should lines starting with a templating placeholder such as `{{blah}}` have their indentation linted",
    },
    select_clause_trailing_comma: {
      validation: ["forbid", "require"],
      definition:
        "Should trailing commas within select clauses be required or forbidden",
    },
    ignore_comment_lines: {
      validation: BOOLEAN,
      definition:
        "Should lines that contain only whitespace and comments be ignored when linting line lengths",
    },
    forbid_subquery_in: {
      validation: ["join", "from", "both"],
      definition: "Which clauses should be linted for subqueries",
    },
    prefer_count_1: {
      validation: BOOLEAN,
      definition: "Should count(1) be preferred over count(*) and count(0)?",
    },
    prefer_count_0: {
      validation: BOOLEAN,
      definition: "Should count(0) be preferred over count(*) and count(1)?",
    },
    operator_new_lines: {
      validation: ["before", "after"],
      definition: "Should operator be placed before or after newlines.",
    },
  };

function lookupConfigInfo(name: string): ConfigOptionInfo | undefined {
  return Object.hasOwn(STANDARD_CONFIG_INFO, name)
    ? STANDARD_CONFIG_INFO[name]
    : undefined;
}

function isRange(
  validation: ConfigOptionValidation,
): validation is { readonly min: number; readonly max: number } {
  return !Array.isArray(validation);
}

function formatAccepted(validation: ConfigOptionValidation): string {
  if (isRange(validation)) {
    return `an integer from ${validation.min} to ${validation.max}`;
  }
  return `one of ${validation.map((v) => JSON.stringify(v)).join(", ")}`;
}

/**
 * Checks a single rule option. Returns a problem description, or null when
 * the value is accepted. Options this table does not know are accepted:
 * engines may define their own.
 */
export function validateConfigOption(
  name: string,
  value: FixtureConfigValue,
): string | null {
  const info = lookupConfigInfo(name);
  if (!info) {
    return null;
  }

  const { validation } = info;
  if (isRange(validation)) {
    if (
      typeof value === "number" &&
      Number.isInteger(value) &&
      value >= validation.min &&
      value <= validation.max
    ) {
      return null;
    }
  } else if (
    (typeof value === "string" || typeof value === "boolean") &&
    validation.includes(value)
  ) {
    return null;
  }

  return `${name} must be ${formatAccepted(validation)}, got ${JSON.stringify(value)}`;
}

/**
 * Validates the `rules` section of a case's configs. Both layouts are
 * accepted: options directly under `rules` apply to every rule, options in
 * a `rules.<ruleId>` mapping apply to that rule only.
 */
export function validateRuleOptions(rules: FixtureConfigValue): string[] {
  if (!isConfigMapping(rules)) {
    return ["configs.rules must be a mapping"];
  }

  const problems: string[] = [];
  for (const [key, value] of Object.entries(rules)) {
    if (isConfigMapping(value)) {
      for (const [option, optionValue] of Object.entries(value)) {
        const problem = validateConfigOption(option, optionValue);
        if (problem) {
          problems.push(`configs.rules.${key}.${problem}`);
        }
      }
      continue;
    }
    const problem = validateConfigOption(key, value);
    if (problem) {
      problems.push(`configs.rules.${problem}`);
    }
  }
  return problems;
}

export interface ConfigOptionDescription {
  name: string;
  definition: string;
  accepts: string;
}

export function describeConfigOption(
  name: string,
): ConfigOptionDescription | null {
  const info = lookupConfigInfo(name);
  if (!info) {
    return null;
  }
  return {
    name,
    definition: info.definition,
    accepts: formatAccepted(info.validation),
  };
}
