/**
 * Rule engine stand-ins. The harness never ships an engine, so tests drive
 * it through these.
 */

import type {
  EvaluateOptions,
  Evaluation,
  EvaluationRequest,
  RuleEngine,
} from "@lintcase/shared-types";
import { vi, type Mock } from "vitest";

import { withOverrides } from "./with-overrides";

export interface RuleEngineStub extends RuleEngine {
  evaluate: Mock<RuleEngine["evaluate"]>;
}

/**
 * Engine whose `evaluate` is a vi.fn that reports no violation by default.
 */
export function createRuleEngineStub(
  overrides?: Partial<RuleEngineStub>,
): RuleEngineStub {
  return withOverrides(
    {
      evaluate: vi
        .fn<RuleEngine["evaluate"]>()
        .mockImplementation(async () => ({ violated: false })),
    },
    overrides,
  );
}

/** Answer for one SQL string; `delayMs` holds the answer back. */
export interface ScriptedAnswer extends Evaluation {
  delayMs?: number;
}

export interface ScriptedRuleEngine extends RuleEngine {
  /** Every request received, in call order. */
  readonly requests: EvaluationRequest[];
}

function wait(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal.reason);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Engine answering from a table keyed by exact SQL text. SQL missing from
 * the table makes `evaluate` throw.
 */
export function createScriptedEngine(
  script: Readonly<Record<string, ScriptedAnswer>>,
): ScriptedRuleEngine {
  const requests: EvaluationRequest[] = [];
  return {
    requests,
    async evaluate(
      request: EvaluationRequest,
      options: EvaluateOptions,
    ): Promise<Evaluation> {
      requests.push(request);
      const answer = script[request.sql];
      if (!answer) {
        throw new Error(`no scripted answer for: ${request.sql}`);
      }
      const { delayMs, ...evaluation } = answer;
      if (delayMs !== undefined) {
        await wait(delayMs, options.signal);
      }
      return evaluation;
    },
  };
}

export interface HangingRuleEngine extends RuleEngine {
  /** Number of evaluations started. */
  readonly started: () => number;
  /** Number of evaluations that saw their signal abort. */
  readonly aborted: () => number;
}

/**
 * Engine that never answers on its own; each call settles only when its
 * signal aborts, rejecting with the signal's reason.
 */
export function createHangingEngine(): HangingRuleEngine {
  let started = 0;
  let aborted = 0;
  return {
    started: () => started,
    aborted: () => aborted,
    evaluate(_request, options): Promise<Evaluation> {
      started += 1;
      return new Promise((_, reject) => {
        const onAbort = () => {
          aborted += 1;
          reject(options.signal.reason);
        };
        if (options.signal.aborted) {
          onAbort();
          return;
        }
        options.signal.addEventListener("abort", onAbort, { once: true });
      });
    },
  };
}
