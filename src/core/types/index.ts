/**
 * Core type definitions for capabilities, invocations and outcomes.
 */

export type BackendKind = "in-process" | "sandboxed" | "remote-server" | "peer-agent";

export type ParameterType = "string" | "number" | "integer" | "boolean" | "object" | "array";

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export interface CapabilityParameter {
  name: string;
  type: ParameterType;
  description: string;
  required: boolean;
  default?: JsonValue;
  enum?: JsonValue[];
}

/**
 * Immutable once registered; the catalog freezes it.
 */
export interface CapabilityDefinition {
  id: string;
  name: string;
  description: string;
  backendKind: BackendKind;
  /** Order is preserved in the model-facing schema. */
  parameters: CapabilityParameter[];
  resultHint?: string;
  /** Free-form tags, e.g. the capability tags a peer-agent capability targets. */
  metadata?: Record<string, string>;
}

export interface CapabilityInvocation {
  id: string;
  capabilityName: string;
  arguments: Record<string, unknown>;
  timeoutMs?: number;
}

export interface CapabilityError {
  code: string;
  message: string;
  capability?: string;
  details?: Record<string, unknown>;
}

export type CapabilityOutcome =
  | { invocationId: string; success: true; result: unknown; elapsedMs: number }
  | { invocationId: string; success: false; error: CapabilityError; elapsedMs: number };

export type InProcessHandler = (
  args: Record<string, unknown>,
  ctx: { invocationId: string; signal: AbortSignal }
) => unknown | Promise<unknown>;

export type ExecutorBinding =
  | { kind: "in-process"; handler: InProcessHandler }
  | { kind: "sandboxed"; code: string }
  | { kind: "remote-server"; serverUrl: string; remoteName?: string }
  | { kind: "peer-agent"; peerId?: string; capabilityTag?: string };

/**
 * Model-facing description of one capability.
 */
export interface CapabilityDescription {
  name: string;
  description: string;
  parameters: Record<string, { type: ParameterType; description: string; default?: JsonValue; enum?: JsonValue[] }>;
  required: string[];
}

/**
 * An invocation as the model asked for it. `callId` is the model-facing id that its result is
 * reported back under.
 */
export interface RequestedInvocation {
  callId: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ConversationTurn =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string; invocations?: RequestedInvocation[] }
  | { role: "capability"; callId: string; name: string; outcome: CapabilityOutcome };
