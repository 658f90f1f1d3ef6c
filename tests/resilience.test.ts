/**
 * Resilience executor: backoff, retries, circuit breaking and fallback
 */

import { EventBus } from "../src/core/eventBus";
import { ResilienceExecutor, computeBackoffDelay } from "../src/core/resilience";
import { CircuitOpenError, RetryExhaustedError } from "../src/core/errors";

const policy = { initialDelayMs: 100, maxDelayMs: 5000, multiplier: 2, jitter: false };

describe("computeBackoffDelay", () => {
  test("grows exponentially up to the cap", () => {
    expect([0, 1, 2, 3].map((a) => computeBackoffDelay(a, policy))).toEqual([100, 200, 400, 800]);
    expect(computeBackoffDelay(10, policy)).toBe(5000);
  });

  test("jitter scales into the upper half of the delay", () => {
    const jittered = { ...policy, jitter: true };
    expect(computeBackoffDelay(1, jittered, () => 0)).toBe(100);
    expect(computeBackoffDelay(1, jittered, () => 1)).toBe(200);
    expect(computeBackoffDelay(1, jittered, () => 0.5)).toBe(150);
  });
});

describe("ResilienceExecutor", () => {
  let clock: number;
  let sleeps: number[];

  function executor(config: ConstructorParameters<typeof ResilienceExecutor>[0], eventBus?: EventBus) {
    return new ResilienceExecutor(
      { ...policy, ...config },
      {
        eventBus,
        now: () => clock,
        sleep: async (ms) => {
          sleeps.push(ms);
        },
      }
    );
  }

  const failing = (message = "down") => async (): Promise<never> => {
    throw new Error(message);
  };

  beforeEach(() => {
    clock = 0;
    sleeps = [];
  });

  test("retries with backoff until the operation succeeds", async () => {
    const bus = new EventBus();
    const resilience = executor({ maxRetries: 3 }, bus);
    const op = jest.fn(async (attempt: number) => {
      if (attempt < 2) throw new Error(`attempt ${attempt} failed`);
      return "ok";
    });

    await expect(resilience.execute(op, "svc")).resolves.toBe("ok");

    expect(op).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([100, 200]);
    expect(bus.getHistory({ type: "RetryScheduledEvent" }).map((e) => e.payload)).toEqual([
      { targetId: "svc", attempt: 1, delayMs: 100, error: "attempt 0 failed" },
      { targetId: "svc", attempt: 2, delayMs: 200, error: "attempt 1 failed" },
    ]);
  });

  test("throws RetryExhaustedError after maxRetries + 1 attempts", async () => {
    const resilience = executor({ maxRetries: 2 });
    const op = jest.fn(failing("still down"));

    const error = await resilience.execute(op, "svc").catch((e: unknown) => e);

    expect(op).toHaveBeenCalledTimes(3);
    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (error instanceof RetryExhaustedError) {
      expect(error.attempts).toBe(3);
      expect(error.lastError.message).toBe("still down");
    }
    // one execute call is one breaker observation
    expect(resilience.getBreakerState("svc").consecutiveFailures).toBe(1);
  });

  test("rethrows a non-retryable error without retrying", async () => {
    const resilience = executor({ maxRetries: 5 });
    const op = jest.fn(failing("bad request"));

    await expect(resilience.execute(op, "svc", { isRetryable: () => false })).rejects.toThrow("bad request");
    expect(op).toHaveBeenCalledTimes(1);
    expect(resilience.getBreakerState("svc").consecutiveFailures).toBe(1);
  });

  test("opens after the failure threshold and rejects without calling the target", async () => {
    const bus = new EventBus();
    const resilience = executor({ maxRetries: 0, failureThreshold: 5, recoveryWindowMs: 60_000 }, bus);
    const op = jest.fn(failing());

    for (let i = 0; i < 5; i++) {
      await expect(resilience.execute(op, "flaky")).rejects.toBeInstanceOf(RetryExhaustedError);
    }
    expect(resilience.getBreakerState("flaky").status).toBe("open");

    clock = 10_000;
    const rejected = await resilience.execute(op, "flaky").catch((e: unknown) => e);

    expect(op).toHaveBeenCalledTimes(5);
    expect(rejected).toBeInstanceOf(CircuitOpenError);
    if (rejected instanceof CircuitOpenError) expect(rejected.retryAfterMs).toBe(50_000);
    expect(bus.getHistory({ type: "CircuitOpenedEvent" }).map((e) => e.payload)).toEqual([
      { targetId: "flaky", failures: 5 },
    ]);
  });

  test("breakers are independent per target", async () => {
    const resilience = executor({ maxRetries: 0, failureThreshold: 1 });
    await expect(resilience.execute(failing(), "a")).rejects.toBeInstanceOf(RetryExhaustedError);

    await expect(resilience.execute(async () => "fine", "b")).resolves.toBe("fine");
    expect(resilience.getBreakerState("a").status).toBe("open");
    expect(resilience.getBreakerState("b").status).toBe("closed");
  });

  test("lets exactly one probe through after the recovery window", async () => {
    const bus = new EventBus();
    const resilience = executor({ maxRetries: 0, failureThreshold: 1, recoveryWindowMs: 1000 }, bus);
    await expect(resilience.execute(failing(), "svc")).rejects.toBeInstanceOf(RetryExhaustedError);

    clock = 1000;
    let release: (value: string) => void = () => {};
    const probe = resilience.execute(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        }),
      "svc"
    );
    expect(resilience.getBreakerState("svc").status).toBe("half-open");

    const second = jest.fn(async () => "second");
    await expect(resilience.execute(second, "svc")).rejects.toBeInstanceOf(CircuitOpenError);
    expect(second).not.toHaveBeenCalled();

    release("probe");
    await expect(probe).resolves.toBe("probe");
    expect(resilience.getBreakerState("svc")).toEqual({ consecutiveFailures: 0, lastFailureAt: 0, status: "closed" });
    expect(bus.getHistory({ type: "CircuitClosedEvent" })).toHaveLength(1);
  });

  test("a failed probe re-opens the breaker for another window", async () => {
    const resilience = executor({ maxRetries: 2, failureThreshold: 1, recoveryWindowMs: 1000 });
    await expect(resilience.execute(failing(), "svc")).rejects.toBeInstanceOf(RetryExhaustedError);

    clock = 1500;
    await expect(resilience.execute(failing(), "svc")).rejects.toBeInstanceOf(RetryExhaustedError);
    expect(resilience.getBreakerState("svc").status).toBe("open");

    clock = 2000;
    const rejected = await resilience.execute(async () => "x", "svc").catch((e: unknown) => e);
    expect(rejected).toBeInstanceOf(CircuitOpenError);
    if (rejected instanceof CircuitOpenError) expect(rejected.retryAfterMs).toBe(500);
  });

  test("cancellation does not count against the target", async () => {
    const resilience = executor({ maxRetries: 3, failureThreshold: 1 });
    const controller = new AbortController();
    const op = jest.fn(async () => {
      controller.abort();
      throw new Error("cancelled mid-flight");
    });

    await expect(resilience.execute(op, "svc", { signal: controller.signal })).rejects.toThrow("cancelled mid-flight");
    expect(op).toHaveBeenCalledTimes(1);
    expect(resilience.getBreakerState("svc").status).toBe("closed");
  });

  test("runs the fallback once the primary path is exhausted", async () => {
    const resilience = executor({ maxRetries: 1 });
    const fallback = jest.fn(async (error: Error) => `fallback after ${error.name}`);

    const result = await resilience.executeWithFallback(failing(), fallback, "svc");

    expect(result).toBe("fallback after RetryExhaustedError");
    expect(fallback).toHaveBeenCalledTimes(1);
  });

  test("skips the fallback when the primary succeeds", async () => {
    const resilience = executor({ maxRetries: 1 });
    const fallback = jest.fn(async () => "fallback");

    await expect(resilience.executeWithFallback(async () => "primary", fallback, "svc")).resolves.toBe("primary");
    expect(fallback).not.toHaveBeenCalled();
  });

  test("resetBreaker closes an open breaker", async () => {
    const resilience = executor({ maxRetries: 0, failureThreshold: 1 });
    await expect(resilience.execute(failing(), "svc")).rejects.toBeInstanceOf(RetryExhaustedError);

    resilience.resetBreaker("svc");
    await expect(resilience.execute(async () => 1, "svc")).resolves.toBe(1);
  });
});
