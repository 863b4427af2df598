import type { ErrorCode } from "./errors/index.js";
import type { CaseMode } from "./fixtures.js";

export type CaseFailureCode =
  | ErrorCode.ASSERTION_FAILED
  | ErrorCode.RULE_ENGINE_TIMEOUT;

export interface CaseFailure {
  code: CaseFailureCode;
  message: string;
  /** SQL the case fed to the engine. */
  input: string;
  expected: string;
  actual: string;
}

export type CaseOutcome =
  | {
      status: "passed";
      caseName: string;
      mode: CaseMode;
      durationMs: number;
    }
  | {
      status: "failed";
      caseName: string;
      mode: CaseMode;
      durationMs: number;
      failure: CaseFailure;
    }
  | {
      /** Never started, or abandoned when the run was cancelled. */
      status: "skipped";
      caseName: string;
      mode: CaseMode;
    };

export type CaseStatus = CaseOutcome["status"];

export interface RunReport {
  ruleId: string;
  source: string;
  /** In declaration order, regardless of completion order. */
  outcomes: CaseOutcome[];
  passed: number;
  failed: number;
  skipped: number;
  cancelled: boolean;
  durationMs: number;
}
