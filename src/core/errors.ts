/**
 * Error taxonomy for meshwork.
 *
 * Configuration errors (unknown capability, missing executor) surface immediately and are never
 * retried. Execution errors are absorbed into failed outcomes. Only a failing model call escapes
 * a task, as TaskFailedError.
 */

export class MeshworkError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode?: number,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "MeshworkError";
    Object.setPrototypeOf(this, MeshworkError.prototype);
  }
}

export class DuplicateCapabilityError extends MeshworkError {
  constructor(name: string) {
    super(`Capability already registered: ${name}`, "DUPLICATE_CAPABILITY", 409, { capability: name });
    this.name = "DuplicateCapabilityError";
    Object.setPrototypeOf(this, DuplicateCapabilityError.prototype);
  }
}

export class CapabilityNotFoundError extends MeshworkError {
  constructor(name: string) {
    super(`Capability not found: ${name}`, "CAPABILITY_NOT_FOUND", 404, { capability: name });
    this.name = "CapabilityNotFoundError";
    Object.setPrototypeOf(this, CapabilityNotFoundError.prototype);
  }
}

export class NoExecutorForBackendError extends MeshworkError {
  constructor(backendKind: string, capability: string) {
    super(
      `No executor bound for backend "${backendKind}" (capability ${capability})`,
      "NO_EXECUTOR_FOR_BACKEND",
      500,
      { backendKind, capability }
    );
    this.name = "NoExecutorForBackendError";
    Object.setPrototypeOf(this, NoExecutorForBackendError.prototype);
  }
}

export class ExecutorAlreadyBoundError extends MeshworkError {
  constructor(backendKind: string) {
    super(`An executor is already bound for backend "${backendKind}"`, "EXECUTOR_ALREADY_BOUND", 409, {
      backendKind,
    });
    this.name = "ExecutorAlreadyBoundError";
    Object.setPrototypeOf(this, ExecutorAlreadyBoundError.prototype);
  }
}

export class InvalidBindingError extends MeshworkError {
  constructor(capability: string, reason: string) {
    super(`Invalid binding for ${capability}: ${reason}`, "INVALID_BINDING", 400, { capability, reason });
    this.name = "InvalidBindingError";
    Object.setPrototypeOf(this, InvalidBindingError.prototype);
  }
}

export class ModelCallError extends MeshworkError {
  constructor(message: string, public provider: string, public originalError?: Error) {
    super(`Model call failed (${provider}): ${message}`, "MODEL_CALL_FAILED", 502, {
      provider,
      originalError: originalError?.message,
    });
    this.name = "ModelCallError";
    Object.setPrototypeOf(this, ModelCallError.prototype);
  }
}

export interface TaskFailureDetail {
  agentId: string;
  turn: number;
  phase: "turn" | "synthesis" | "delegation_synthesis";
  lastCapability?: string;
  peerIds?: string[];
}

export class TaskFailedError extends MeshworkError {
  constructor(message: string, public readonly detail: TaskFailureDetail, public readonly cause?: Error) {
    super(`Task failed: ${message}`, "TASK_FAILED", 502, { ...detail, cause: cause?.message });
    this.name = "TaskFailedError";
    Object.setPrototypeOf(this, TaskFailedError.prototype);
  }
}

export type DelegationDenialReason = "depth_exceeded" | "cycle_detected" | "deadline_elapsed";

export class DelegationNotPermittedError extends MeshworkError {
  constructor(public readonly peerId: string, public readonly reason: DelegationDenialReason) {
    super(`Delegation to ${peerId} not permitted: ${reason}`, "DELEGATION_NOT_PERMITTED", 409, {
      peerId,
      reason,
    });
    this.name = "DelegationNotPermittedError";
    Object.setPrototypeOf(this, DelegationNotPermittedError.prototype);
  }
}

export class CircuitOpenError extends MeshworkError {
  constructor(public readonly targetId: string, public readonly retryAfterMs: number) {
    super(`Circuit open for ${targetId}`, "CIRCUIT_OPEN", 503, { targetId, retryAfterMs });
    this.name = "CircuitOpenError";
    Object.setPrototypeOf(this, CircuitOpenError.prototype);
  }
}

export class RetryExhaustedError extends MeshworkError {
  constructor(public readonly targetId: string, public readonly attempts: number, public readonly lastError: Error) {
    super(`Retries exhausted for ${targetId} after ${attempts} attempt(s): ${lastError.message}`, "RETRY_EXHAUSTED", 502, {
      targetId,
      attempts,
      lastError: lastError.message,
    });
    this.name = "RetryExhaustedError";
    Object.setPrototypeOf(this, RetryExhaustedError.prototype);
  }
}

export class PeerRequestError extends MeshworkError {
  constructor(
    public readonly peerId: string,
    message: string,
    public readonly status?: number,
    public readonly retryable: boolean = true
  ) {
    super(`Peer ${peerId}: ${message}`, "PEER_REQUEST_FAILED", 502, { peerId, status, retryable });
    this.name = "PeerRequestError";
    Object.setPrototypeOf(this, PeerRequestError.prototype);
  }
}

export class RemoteServerError extends MeshworkError {
  constructor(
    public readonly serverUrl: string,
    message: string,
    public readonly status?: number,
    public readonly retryable: boolean = true
  ) {
    super(`Remote server ${serverUrl}: ${message}`, "REMOTE_SERVER_FAILED", 502, { serverUrl, status, retryable });
    this.name = "RemoteServerError";
    Object.setPrototypeOf(this, RemoteServerError.prototype);
  }
}

export { ValidationError, TimeoutError } from "./errors/standardErrors";

/**
 * Normalizes anything thrown into an Error.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
