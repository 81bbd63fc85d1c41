/**
 * End-to-end tests for the composed resilience pipeline
 *
 * Drives fallback → retry → circuit breaker → action with fake timers and
 * checks what each layer observes.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import type { ResiliencePipelineConfig } from "@stalwart/types";
import {
  createResiliencePipeline,
  type ResiliencePipeline,
} from "../../../src/resilience/pipeline.js";
import {
  BrokenCircuitError,
  ExecutionCancelledError,
  FallbackActionError,
  PolicyConfigError,
  RetryExhaustedError,
} from "../../../src/resilience/errors.js";

const TEST_CONFIG: ResiliencePipelineConfig = {
  maxRetryCount: 3,
  baseDelayMs: 10,
  jitterMaxMs: 0,
  failureThreshold: 0.25,
  samplingDurationMs: 30_000,
  breakDurationMs: 10_000,
  minimumThroughput: 64,
};

interface Harness {
  pipeline: ResiliencePipeline<string>;
  fallbackAction: Mock<(error: unknown) => string>;
  onRetry: Mock;
  onBreak: Mock;
  onReset: Mock;
  onHalfOpen: Mock;
  onFallback: Mock;
}

function createHarness(overrides: Partial<ResiliencePipelineConfig> = {}): Harness {
  const fallbackAction = vi.fn((_error: unknown) => "fallback");
  const observers = {
    onRetry: vi.fn(),
    onBreak: vi.fn(),
    onReset: vi.fn(),
    onHalfOpen: vi.fn(),
    onFallback: vi.fn(),
  };

  const pipeline = createResiliencePipeline<string>({
    config: { ...TEST_CONFIG, ...overrides },
    fallbackAction,
    observers,
    random: () => 0,
  });

  return { pipeline, fallbackAction, ...observers };
}

async function run(
  pipeline: ResiliencePipeline<string>,
  action: () => Promise<string>,
  signal?: AbortSignal
): Promise<string> {
  const promise = pipeline.execute(action, signal);
  await vi.runAllTimersAsync();
  return promise;
}

function alwaysFailing(): Mock<() => Promise<string>> {
  return vi.fn(async (): Promise<string> => {
    throw new Error("Ope");
  });
}

describe("Resilience pipeline end-to-end", () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should succeed every call when the action always succeeds", async () => {
    const h = createHarness();
    const action = vi.fn(async () => "primary");

    for (let i = 0; i < 10; i++) {
      await expect(run(h.pipeline, action)).resolves.toBe("primary");
    }

    expect(action).toHaveBeenCalledTimes(10);
    expect(h.onRetry).not.toHaveBeenCalled();
    expect(h.fallbackAction).not.toHaveBeenCalled();
    expect(h.pipeline.circuitBreaker.state).toBe("closed");
    expect(h.pipeline.circuitBreaker.getHealth()).toEqual({
      successes: 10,
      failures: 0,
      total: 10,
    });
  });

  it("should recover through retries when the third attempt succeeds", async () => {
    const h = createHarness();
    const action = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockResolvedValue("primary");

    await expect(run(h.pipeline, action)).resolves.toBe("primary");

    expect(action).toHaveBeenCalledTimes(3);
    expect(h.onRetry).toHaveBeenCalledTimes(2);
    expect(h.onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [20, 1],
      [40, 2],
    ]);
    expect(h.fallbackAction).not.toHaveBeenCalled();
    expect(h.pipeline.circuitBreaker.getHealth()).toEqual({
      successes: 1,
      failures: 2,
      total: 3,
    });
  });

  it("should short-circuit to the fallback once the breaker opens", async () => {
    const h = createHarness({ minimumThroughput: 4 });
    const action = alwaysFailing();

    await expect(run(h.pipeline, action)).resolves.toBe("fallback");

    expect(action).toHaveBeenCalledTimes(4);
    expect(h.pipeline.circuitBreaker.state).toBe("open");
    expect(h.onBreak).toHaveBeenCalledTimes(1);
    expect(h.onBreak.mock.calls[0][1]).toBe(10_000);
    expect(h.onFallback.mock.calls[0][0]).toBeInstanceOf(RetryExhaustedError);
    expect(h.onFallback.mock.calls[0][1]).toBe("retry_exhausted");

    await expect(run(h.pipeline, action)).resolves.toBe("fallback");

    expect(action).toHaveBeenCalledTimes(4);
    expect(h.onRetry).toHaveBeenCalledTimes(3);
    expect(h.fallbackAction).toHaveBeenCalledTimes(2);
    expect(h.fallbackAction.mock.calls[1][0]).toBeInstanceOf(BrokenCircuitError);
    expect(h.onFallback.mock.calls[1][1]).toBe("circuit_open");
  });

  it("should stop retrying as soon as the breaker opens mid-retry", async () => {
    const h = createHarness({ minimumThroughput: 4, maxRetryCount: 5 });
    const action = alwaysFailing();

    await expect(run(h.pipeline, action)).resolves.toBe("fallback");

    expect(action).toHaveBeenCalledTimes(4);
    expect(h.onRetry).toHaveBeenCalledTimes(4);
    expect(h.onFallback.mock.calls[0][1]).toBe("circuit_open");
  });

  it("should fall back after exhausting retries below the throughput floor", async () => {
    const h = createHarness();
    const action = alwaysFailing();

    await expect(run(h.pipeline, action)).resolves.toBe("fallback");

    expect(action).toHaveBeenCalledTimes(4);
    expect(h.pipeline.circuitBreaker.state).toBe("closed");
    expect(h.onBreak).not.toHaveBeenCalled();
    const [error, kind] = h.onFallback.mock.calls[0];
    expect(kind).toBe("retry_exhausted");
    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(4);
    }
  });

  it("should close again after a successful half-open probe", async () => {
    const h = createHarness({ minimumThroughput: 4 });
    await run(h.pipeline, alwaysFailing());
    expect(h.pipeline.circuitBreaker.state).toBe("open");

    vi.advanceTimersByTime(10_000);
    const healthy = vi.fn(async () => "primary");

    await expect(run(h.pipeline, healthy)).resolves.toBe("primary");

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(h.onHalfOpen).toHaveBeenCalledTimes(1);
    expect(h.onReset).toHaveBeenCalledTimes(1);
    expect(h.pipeline.circuitBreaker.state).toBe("closed");
    expect(h.pipeline.circuitBreaker.getHealth().total).toBe(0);
  });

  it("should send concurrent callers to the fallback while a probe is in flight", async () => {
    const h = createHarness({ minimumThroughput: 4 });
    await run(h.pipeline, alwaysFailing());
    vi.advanceTimersByTime(10_000);

    let releaseProbe: (value: string) => void = () => {};
    const probe = vi.fn(
      () =>
        new Promise<string>((resolve) => {
          releaseProbe = resolve;
        })
    );
    const contender = vi.fn(async () => "primary");

    const probeCall = h.pipeline.execute(probe);
    await expect(h.pipeline.execute(contender)).resolves.toBe("fallback");

    expect(contender).not.toHaveBeenCalled();
    expect(h.onFallback.mock.calls[1][1]).toBe("circuit_open");

    releaseProbe("primary");
    await expect(probeCall).resolves.toBe("primary");
    expect(h.pipeline.circuitBreaker.state).toBe("closed");
  });

  it("should propagate a failing fallback action", async () => {
    const failure = new Error("fallback unavailable");
    const pipeline = createResiliencePipeline<string>({
      config: { ...TEST_CONFIG, maxRetryCount: 0 },
      fallbackAction: () => {
        throw failure;
      },
    });

    const error = await pipeline.execute(alwaysFailing()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FallbackActionError);
    if (error instanceof FallbackActionError) {
      expect(error.fallbackError).toBe(failure);
      expect(error.originalError).toBeInstanceOf(RetryExhaustedError);
    }
  });

  it("should abandon the execution when cancelled during a backoff wait", async () => {
    const h = createHarness({ baseDelayMs: 1000 });
    const controller = new AbortController();
    const action = alwaysFailing();

    const outcome = h.pipeline
      .execute(action, controller.signal)
      .catch((e: unknown) => e);
    await vi.advanceTimersByTimeAsync(10);
    expect(h.onRetry).toHaveBeenCalledTimes(1);

    controller.abort();
    await vi.runAllTimersAsync();

    expect(await outcome).toBeInstanceOf(ExecutionCancelledError);
    expect(action).toHaveBeenCalledTimes(1);
    expect(h.fallbackAction).not.toHaveBeenCalled();
  });

  describe("executeAndCapture", () => {
    it("should capture a successful result", async () => {
      const h = createHarness();

      await expect(
        h.pipeline.executeAndCapture(async () => "primary")
      ).resolves.toEqual({ outcome: "successful", result: "primary" });
    });

    it("should capture a failing fallback instead of throwing", async () => {
      const pipeline = createResiliencePipeline<string>({
        config: { ...TEST_CONFIG, maxRetryCount: 0 },
        fallbackAction: () => {
          throw new Error("fallback unavailable");
        },
      });

      const result = await pipeline.executeAndCapture(alwaysFailing());

      expect(result.outcome).toBe("failure");
      if (result.outcome === "failure") {
        expect(result.errorKind).toBe("fallback_failed");
        expect(result.error).toBeInstanceOf(FallbackActionError);
      }
    });
  });

  describe("createResiliencePipeline", () => {
    it("should reject an invalid configuration", () => {
      expect(() =>
        createResiliencePipeline({
          config: { ...TEST_CONFIG, maxRetryCount: -1 },
          fallbackAction: () => undefined,
        })
      ).toThrow(PolicyConfigError);
    });

    it("should expose the composed policies", () => {
      const h = createHarness();

      expect(h.pipeline.retry.maxRetryCount).toBe(3);
      expect(h.pipeline.circuitBreaker.state).toBe("closed");
    });
  });
});
