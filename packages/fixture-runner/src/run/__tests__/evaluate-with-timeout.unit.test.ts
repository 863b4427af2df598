import { AppError } from "@lintcase/harness-shared";
import {
  ErrorCode,
  type Evaluation,
  type EvaluationRequest,
} from "@lintcase/shared-types";
import {
  createHangingEngine,
  createRuleEngineStub,
} from "@lintcase/test-utils";
import { describe, expect, it } from "vitest";

import { evaluateWithTimeout } from "../evaluate-with-timeout";

const request: EvaluationRequest = {
  sql: "SELECT 'a'AS col",
  ruleId: "L048",
  config: { core: { dialect: "ansi" } },
};

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected the promise to reject");
}

describe("evaluateWithTimeout", () => {
  it("returns the engine's evaluation", async () => {
    const engine = createRuleEngineStub();
    engine.evaluate.mockResolvedValue({
      violated: true,
      fixedSql: "SELECT 'a' AS col",
    });

    await expect(
      evaluateWithTimeout(engine, request, { timeoutMs: 1000 }),
    ).resolves.toEqual({ violated: true, fixedSql: "SELECT 'a' AS col" });
    expect(engine.evaluate).toHaveBeenCalledWith(request, {
      signal: expect.any(AbortSignal),
    });
  });

  it("accepts engines that answer synchronously", async () => {
    const engine = { evaluate: (): Evaluation => ({ violated: false }) };

    await expect(
      evaluateWithTimeout(engine, request, { timeoutMs: 1000 }),
    ).resolves.toEqual({ violated: false });
  });

  it("rejects with RULE_ENGINE_TIMEOUT and aborts the engine's signal", async () => {
    const engine = createHangingEngine();

    const error = await captureRejection(
      evaluateWithTimeout(engine, request, {
        timeoutMs: 20,
        caseName: "test_slow",
      }),
    );

    expect(error).toBeInstanceOf(AppError);
    if (!(error instanceof AppError)) {
      throw new Error("Expected AppError");
    }
    expect(error.code).toBe(ErrorCode.RULE_ENGINE_TIMEOUT);
    expect(error.context).toEqual({
      caseName: "test_slow",
      ruleId: "L048",
      operation: "evaluate",
      timeoutMs: 20,
    });
    expect(engine.started()).toBe(1);
    expect(engine.aborted()).toBe(1);
  });

  it("rejects with the run signal's reason when the run is aborted", async () => {
    const engine = createHangingEngine();
    const controller = new AbortController();
    const reason = new Error("stop");

    const pending = evaluateWithTimeout(engine, request, {
      timeoutMs: 1000,
      signal: controller.signal,
    });
    controller.abort(reason);

    await expect(pending).rejects.toBe(reason);
  });

  it("does not call the engine when the run is already aborted", async () => {
    const engine = createRuleEngineStub();
    const controller = new AbortController();
    const reason = new Error("stop");
    controller.abort(reason);

    await expect(
      evaluateWithTimeout(engine, request, {
        timeoutMs: 1000,
        signal: controller.signal,
      }),
    ).rejects.toBe(reason);
    expect(engine.evaluate).not.toHaveBeenCalled();
  });

  it("rejects an evaluation that does not match the schema", async () => {
    const invalid: Evaluation = JSON.parse('{"violated":"yes"}');
    const engine = createRuleEngineStub();
    engine.evaluate.mockResolvedValue(invalid);

    const error = await captureRejection(
      evaluateWithTimeout(engine, request, { timeoutMs: 1000 }),
    );

    expect(error).toBeInstanceOf(AppError);
    if (!(error instanceof AppError)) {
      throw new Error("Expected AppError");
    }
    expect(error.code).toBe(ErrorCode.RULE_ENGINE_UNAVAILABLE);
    expect(error.extensions?.violations).toEqual([
      "engine returned an invalid evaluation: violated: Expected boolean, received string",
    ]);
  });

  it("propagates engine errors", async () => {
    const engine = createRuleEngineStub();
    engine.evaluate.mockRejectedValue(new Error("engine crashed"));

    await expect(
      evaluateWithTimeout(engine, request, { timeoutMs: 1000 }),
    ).rejects.toThrow("engine crashed");
  });
});
