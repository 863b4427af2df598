import { describe, expect, it } from "vitest";

import {
  describeConfigOption,
  STANDARD_CONFIG_INFO,
  validateConfigOption,
  validateRuleOptions,
} from "../config-info";

describe("STANDARD_CONFIG_INFO", () => {
  it("documents every option", () => {
    for (const info of Object.values(STANDARD_CONFIG_INFO)) {
      expect(info.definition.length).toBeGreaterThan(0);
    }
  });
});

describe("validateConfigOption", () => {
  it("accepts values in range", () => {
    expect(validateConfigOption("tab_space_size", 4)).toBeNull();
    expect(validateConfigOption("max_line_length", 0)).toBeNull();
  });

  it("rejects non-integers and out-of-range numbers", () => {
    expect(validateConfigOption("tab_space_size", 4.5)).toBe(
      "tab_space_size must be an integer from 0 to 99, got 4.5",
    );
    expect(validateConfigOption("max_line_length", "80")).toBe(
      'max_line_length must be an integer from 0 to 999, got "80"',
    );
  });

  it("checks enumerated values", () => {
    expect(validateConfigOption("comma_style", "leading")).toBeNull();
    expect(validateConfigOption("comma_style", "middle")).toBe(
      'comma_style must be one of "leading", "trailing", got "middle"',
    );
  });

  it("checks booleans", () => {
    expect(validateConfigOption("prefer_count_1", false)).toBeNull();
    expect(validateConfigOption("prefer_count_1", "yes")).toBe(
      'prefer_count_1 must be one of true, false, got "yes"',
    );
  });

  it("accepts options it does not know", () => {
    expect(validateConfigOption("my_engine_option", [1, 2])).toBeNull();
  });

  it("treats inherited object members as unknown options", () => {
    expect(validateConfigOption("constructor", 1)).toBeNull();
    expect(validateConfigOption("toString", "x")).toBeNull();
    expect(validateConfigOption("__proto__", true)).toBeNull();
  });
});

describe("validateRuleOptions", () => {
  it("requires a mapping", () => {
    expect(validateRuleOptions(["L048"])).toEqual([
      "configs.rules must be a mapping",
    ]);
  });

  it("checks global and per-rule options", () => {
    expect(
      validateRuleOptions({
        indent_unit: "tab",
        operator_new_lines: "around",
        L048: { capitalisation_policy: "shout", custom: true },
      }),
    ).toEqual([
      'configs.rules.operator_new_lines must be one of "before", "after", got "around"',
      'configs.rules.L048.capitalisation_policy must be one of "consistent", "upper", "lower", "capitalise", got "shout"',
    ]);
  });
});

describe("describeConfigOption", () => {
  it("describes a known option", () => {
    expect(describeConfigOption("indent_unit")).toEqual({
      name: "indent_unit",
      definition: "Whether to use tabs or spaces to add new indents",
      accepts: 'one of "space", "tab"',
    });
  });

  it("returns null for unknown options", () => {
    expect(describeConfigOption("nope")).toBeNull();
  });

  it("returns null for inherited object members", () => {
    expect(describeConfigOption("toString")).toBeNull();
    expect(describeConfigOption("hasOwnProperty")).toBeNull();
  });
});
