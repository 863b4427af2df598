import { AppError } from "@lintcase/harness-shared";
import {
  ErrorCode,
  EvaluationSchema,
  type Evaluation,
  type EvaluationRequest,
  type RuleEngine,
} from "@lintcase/shared-types";

export interface EvaluateWithTimeoutOptions {
  timeoutMs: number;
  /** Run-level signal; aborting it abandons this evaluation. */
  signal?: AbortSignal;
  caseName?: string;
}

function invalidEvaluation(
  request: EvaluationRequest,
  caseName: string | undefined,
  violations: string[],
): AppError {
  return new AppError(
    ErrorCode.RULE_ENGINE_UNAVAILABLE,
    undefined,
    { caseName, ruleId: request.ruleId, operation: "evaluate" },
    { violations },
  );
}

/**
 * Calls the engine once, bounded by `timeoutMs`.
 *
 * The engine gets its own signal, aborted on timeout (reason:
 * RULE_ENGINE_TIMEOUT) or when the run signal aborts (the run's reason).
 * Either way the returned promise rejects with that reason immediately;
 * the engine is expected to stop cooperatively, it is never forced.
 */
export async function evaluateWithTimeout(
  engine: RuleEngine,
  request: EvaluationRequest,
  options: EvaluateWithTimeoutOptions,
): Promise<Evaluation> {
  const { timeoutMs, signal, caseName } = options;
  const controller = new AbortController();

  const onRunAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    onRunAbort();
  } else {
    signal?.addEventListener("abort", onRunAbort, { once: true });
  }

  const timer = setTimeout(() => {
    controller.abort(
      new AppError(ErrorCode.RULE_ENGINE_TIMEOUT, undefined, {
        caseName,
        ruleId: request.ruleId,
        operation: "evaluate",
        timeoutMs,
      }),
    );
  }, timeoutMs);

  let rejectAborted: (reason: unknown) => void = () => undefined;
  const aborted = new Promise<never>((_, reject) => {
    rejectAborted = reject;
  });
  const onAbort = () => rejectAborted(controller.signal.reason);
  controller.signal.addEventListener("abort", onAbort, { once: true });

  try {
    if (controller.signal.aborted) {
      throw controller.signal.reason;
    }
    const result = await Promise.race([
      Promise.resolve().then(() =>
        engine.evaluate(request, { signal: controller.signal }),
      ),
      aborted,
    ]);

    const parsed = EvaluationSchema.safeParse(result);
    if (!parsed.success) {
      throw invalidEvaluation(
        request,
        caseName,
        parsed.error.issues.map(
          (issue) =>
            `engine returned an invalid evaluation: ${issue.path.join(".") || "result"}: ${issue.message}`,
        ),
      );
    }
    return parsed.data;
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", onRunAbort);
    controller.signal.removeEventListener("abort", onAbort);
  }
}
