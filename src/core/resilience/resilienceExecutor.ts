/**
 * Retry-with-backoff plus circuit breaking around any remote call.
 *
 * One `execute` call is one breaker observation: retries happen inside it, and only the final
 * verdict (success, or failure after the last retry) moves the breaker.
 */

import { CircuitOpenError, RetryExhaustedError, toError } from "../errors";
import { EventBus } from "../eventBus";
import { MeshLogger } from "../logger";
import { BackoffPolicy, computeBackoffDelay, sleep } from "./backoff";
import { CircuitBreakerConfig, CircuitBreakerRegistry, CircuitBreakerState } from "./circuitBreaker";

export interface ResilienceConfig extends BackoffPolicy, CircuitBreakerConfig {
  /** Retries after the first attempt. */
  maxRetries: number;
}

export const DEFAULT_RESILIENCE_CONFIG: ResilienceConfig = {
  maxRetries: 2,
  initialDelayMs: 100,
  maxDelayMs: 5000,
  multiplier: 2,
  jitter: true,
  failureThreshold: 5,
  recoveryWindowMs: 60000,
};

export interface ResilienceDeps {
  eventBus?: EventBus;
  logger?: MeshLogger;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export interface ExecuteOptions {
  /** Defaults to retrying everything except an abort. */
  isRetryable?: (error: Error) => boolean;
  signal?: AbortSignal;
}

export type Operation<T> = (attempt: number) => Promise<T>;

export class ResilienceExecutor {
  readonly config: ResilienceConfig;
  private readonly breakers: CircuitBreakerRegistry;
  private readonly eventBus?: EventBus;
  private readonly logger: MeshLogger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly random: () => number;

  constructor(config: Partial<ResilienceConfig> = {}, deps: ResilienceDeps = {}) {
    this.config = { ...DEFAULT_RESILIENCE_CONFIG, ...config };
    this.eventBus = deps.eventBus;
    this.logger = deps.logger ?? MeshLogger.silent();
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
    this.breakers = new CircuitBreakerRegistry(this.config, deps.now ?? Date.now, deps.eventBus);
  }

  /**
   * Runs `operation` against `targetId`. Throws CircuitOpenError without calling it while the
   * target's breaker is open, RetryExhaustedError once every attempt failed, or the operation's
   * own error when it is not retryable.
   */
  async execute<T>(operation: Operation<T>, targetId: string, options: ExecuteOptions = {}): Promise<T> {
    const admission = this.breakers.admit(targetId);
    if (!admission.allowed) {
      throw new CircuitOpenError(targetId, admission.retryAfterMs);
    }

    const isRetryable = options.isRetryable ?? ((e: Error) => !isAbort(e));
    let attempt = 0;

    for (;;) {
      try {
        const result = await operation(attempt);
        this.breakers.recordSuccess(targetId);
        return result;
      } catch (raw) {
        const error = toError(raw);

        if (options.signal?.aborted || isAbort(error)) {
          // Cancellation says nothing about the target's health.
          this.breakers.releaseProbe(targetId);
          throw error;
        }

        const retryable = isRetryable(error);
        if (!retryable || attempt >= this.config.maxRetries) {
          this.breakers.recordFailure(targetId);
          if (!retryable) throw error;
          this.logger.debug("Retries exhausted", { targetId, attempts: attempt + 1, error: error.message });
          throw new RetryExhaustedError(targetId, attempt + 1, error);
        }

        const delayMs = computeBackoffDelay(attempt, this.config, this.random);
        this.eventBus?.emit("RetryScheduledEvent", { targetId, attempt: attempt + 1, delayMs, error: error.message });
        try {
          await this.sleep(delayMs, options.signal);
        } catch (abortError) {
          this.breakers.releaseProbe(targetId);
          throw toError(abortError);
        }
        attempt += 1;
      }
    }
  }

  /**
   * Runs `fallback` only after the primary path is fully exhausted (retries spent or breaker open).
   */
  async executeWithFallback<T>(
    primary: Operation<T>,
    fallback: (error: Error) => Promise<T>,
    targetId: string,
    options: ExecuteOptions = {}
  ): Promise<T> {
    try {
      return await this.execute(primary, targetId, options);
    } catch (raw) {
      const error = toError(raw);
      if (options.signal?.aborted) throw error;
      this.logger.debug("Primary path failed, running fallback", { targetId, error: error.message });
      return fallback(error);
    }
  }

  getBreakerState(targetId: string): CircuitBreakerState {
    return this.breakers.getState(targetId);
  }

  resetBreaker(targetId?: string): void {
    this.breakers.reset(targetId);
  }
}

function isAbort(error: Error): boolean {
  return error.name === "AbortError";
}
