import { z } from "zod";

import type { FixtureConfig } from "./fixtures.js";

export interface EvaluationRequest {
  sql: string;
  ruleId: string;
  /** Harness defaults with the case's overrides merged on top. */
  config: FixtureConfig;
}

export const EvaluationSchema = z.object({
  violated: z.boolean(),
  fixedSql: z.string().nullable().optional(),
});

export type Evaluation = z.infer<typeof EvaluationSchema>;

export interface EvaluateOptions {
  /** Aborted when the case times out or the run is cancelled. */
  signal: AbortSignal;
}

/**
 * External lint engine the harness checks fixtures against.
 * The harness never mutates the engine; it only calls `evaluate`.
 */
export interface RuleEngine {
  evaluate(
    request: EvaluationRequest,
    options: EvaluateOptions,
  ): Evaluation | Promise<Evaluation>;
}
