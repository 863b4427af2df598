import { isAbsolute, resolve } from "node:path";
import { pathToFileURL } from "node:url";

import { AppError } from "@lintcase/harness-shared";
import { ErrorCode, type RuleEngine } from "@lintcase/shared-types";

export type ModuleImporter = (specifier: string) => Promise<unknown>;

export interface LoadRuleEngineOptions {
  /** Base for relative module paths. */
  cwd?: string;
  importModule?: ModuleImporter;
}

const defaultImporter: ModuleImporter = (specifier) => import(specifier);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function isRuleEngine(value: unknown): value is RuleEngine {
  return isRecord(value) && typeof value.evaluate === "function";
}

/**
 * Relative and absolute paths become file URLs; anything else is treated as
 * a package name.
 */
export function toModuleSpecifier(modulePath: string, cwd: string): string {
  if (modulePath.startsWith(".") || isAbsolute(modulePath)) {
    return pathToFileURL(resolve(cwd, modulePath)).href;
  }
  return modulePath;
}

function unavailable(
  modulePath: string,
  violations: string[],
  cause?: unknown,
): AppError {
  return new AppError(
    ErrorCode.RULE_ENGINE_UNAVAILABLE,
    cause,
    { modulePath, operation: "loadRuleEngine" },
    { violations },
  );
}

/**
 * Imports a rule engine module. Accepted shapes, in order: a default export
 * implementing RuleEngine, an `engine` export, or a `createRuleEngine()`
 * factory (sync or async).
 */
export async function loadRuleEngine(
  modulePath: string,
  options: LoadRuleEngineOptions = {},
): Promise<RuleEngine> {
  const importModule = options.importModule ?? defaultImporter;
  const specifier = toModuleSpecifier(modulePath, options.cwd ?? process.cwd());

  let loaded: unknown;
  try {
    loaded = await importModule(specifier);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw unavailable(modulePath, [`cannot import ${specifier}: ${reason}`], error);
  }

  if (!isRecord(loaded)) {
    throw unavailable(modulePath, ["module did not evaluate to an object"]);
  }

  for (const candidate of [loaded.default, loaded.engine]) {
    if (isRuleEngine(candidate)) {
      return candidate;
    }
  }

  const factory = loaded.createRuleEngine;
  if (typeof factory === "function") {
    let created: unknown;
    try {
      created = await factory();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw unavailable(modulePath, [`createRuleEngine() failed: ${reason}`], error);
    }
    if (isRuleEngine(created)) {
      return created;
    }
    throw unavailable(modulePath, [
      "createRuleEngine() did not return an object with an evaluate() method",
    ]);
  }

  throw unavailable(modulePath, [
    "module exports no rule engine (expected a default export, an `engine` export or createRuleEngine())",
  ]);
}
