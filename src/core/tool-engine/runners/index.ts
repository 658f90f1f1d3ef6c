import type { CollaborationContext } from "../../collaboration/context";
import { BackendKind, CapabilityDefinition, CapabilityInvocation, ExecutorBinding } from "../../types";

export interface ExecutionRequest {
  definition: CapabilityDefinition;
  binding: ExecutorBinding | undefined;
  /** Arguments are already validated, defaults applied. */
  invocation: CapabilityInvocation;
  signal: AbortSignal;
  collaboration?: CollaborationContext;
}

/**
 * One implementation per backend kind. Throwing is the failure signal; the catalog turns it into
 * a failed outcome.
 */
export interface BackendExecutor {
  readonly kind: BackendKind;
  execute(request: ExecutionRequest): Promise<unknown>;
}

export { InProcessExecutor } from "./inProcessRunner";
export { SandboxedExecutor, VmSandboxRunner, screenSandboxCode } from "./jsRunner";
export type { SandboxRunner, SandboxRunnerConfig } from "./jsRunner";
export { RemoteServerExecutor, discoverRemoteCapabilities } from "./remoteServerRunner";
export type { FetchLike } from "./remoteServerRunner";
export { PeerAgentExecutor } from "./peerAgentRunner";
