/**
 * Per-target circuit breakers.
 *
 * A target opens after `failureThreshold` consecutive failures and rejects calls until
 * `recoveryWindowMs` has passed since the last failure. Then exactly one probe is let through:
 * success closes the breaker, failure re-opens it for another window.
 */

import { EventBus } from "../eventBus";

export type BreakerStatus = "closed" | "open" | "half-open";

export interface CircuitBreakerState {
  consecutiveFailures: number;
  lastFailureAt: number | null;
  status: BreakerStatus;
}

export interface CircuitBreakerConfig {
  failureThreshold: number;
  recoveryWindowMs: number;
}

export type Admission = { allowed: true } | { allowed: false; retryAfterMs: number };

export class CircuitBreakerRegistry {
  private states = new Map<string, CircuitBreakerState>();
  private probing = new Set<string>();

  constructor(
    private readonly config: CircuitBreakerConfig,
    private readonly now: () => number = Date.now,
    private readonly eventBus?: EventBus
  ) {}

  /**
   * Decides whether a call to `targetId` may proceed. Taking the half-open probe slot is part of
   * the decision, so two concurrent callers never both probe.
   */
  admit(targetId: string): Admission {
    const state = this.states.get(targetId);
    if (!state || state.status === "closed") return { allowed: true };

    const elapsed = this.now() - (state.lastFailureAt ?? 0);
    if (elapsed < this.config.recoveryWindowMs) {
      return { allowed: false, retryAfterMs: this.config.recoveryWindowMs - elapsed };
    }

    if (this.probing.has(targetId)) {
      return { allowed: false, retryAfterMs: 0 };
    }
    state.status = "half-open";
    this.probing.add(targetId);
    return { allowed: true };
  }

  recordSuccess(targetId: string): void {
    this.probing.delete(targetId);
    const state = this.states.get(targetId);
    if (!state) return;
    const wasOpen = state.status !== "closed";
    state.consecutiveFailures = 0;
    state.status = "closed";
    if (wasOpen) {
      this.eventBus?.emit("CircuitClosedEvent", { targetId });
    }
  }

  recordFailure(targetId: string): void {
    const wasProbe = this.probing.delete(targetId);
    const state = this.states.get(targetId) ?? { consecutiveFailures: 0, lastFailureAt: null, status: "closed" };
    state.consecutiveFailures += 1;
    state.lastFailureAt = this.now();

    const shouldOpen = wasProbe || state.consecutiveFailures >= this.config.failureThreshold;
    if (shouldOpen) {
      const alreadyOpen = state.status === "open";
      state.status = "open";
      if (!alreadyOpen) {
        this.eventBus?.emit("CircuitOpenedEvent", { targetId, failures: state.consecutiveFailures });
      }
    }
    this.states.set(targetId, state);
  }

  /** A probe that ended without a verdict (e.g. cancelled) frees its slot. */
  releaseProbe(targetId: string): void {
    this.probing.delete(targetId);
  }

  getState(targetId: string): CircuitBreakerState {
    const state = this.states.get(targetId);
    return state ? { ...state } : { consecutiveFailures: 0, lastFailureAt: null, status: "closed" };
  }

  reset(targetId?: string): void {
    if (targetId === undefined) {
      this.states.clear();
      this.probing.clear();
      return;
    }
    this.states.delete(targetId);
    this.probing.delete(targetId);
  }
}
