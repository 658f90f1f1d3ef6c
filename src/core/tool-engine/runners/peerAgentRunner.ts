/**
 * Capabilities fulfilled by another agent. The invocation travels as an assist request under a
 * child of the caller's collaboration context, so the receiving agent is bound by the same depth,
 * visited set and deadline.
 */

import { CollaborationContext } from "../../collaboration/context";
import { PeerClient, isRetryablePeerError } from "../../collaboration/peerClient";
import { createAssistRequest } from "../../collaboration/protocol";
import type { CallOutcome, DirectoryService, PeerRecord } from "../../directory/types";
import { CircuitOpenError, DelegationDenialReason, DelegationNotPermittedError, MeshworkError, toError } from "../../errors";
import { EventBus } from "../../eventBus";
import { MeshLogger } from "../../logger";
import { ResilienceExecutor } from "../../resilience";
import type { BackendExecutor, ExecutionRequest } from "./index";

export interface PeerAgentExecutorOptions {
  selfId: string;
  directory: DirectoryService;
  peerClient: PeerClient;
  resilience: ResilienceExecutor;
  /** Bounds for invocations that arrive without a collaboration context. */
  maxDepth: number;
  timeoutMs: number;
  /** Candidates considered per invocation. */
  maxCandidates?: number;
  eventBus?: EventBus;
  logger?: MeshLogger;
  now?: () => number;
}

export class PeerAgentExecutor implements BackendExecutor {
  readonly kind = "peer-agent" as const;
  private readonly now: () => number;
  private readonly logger: MeshLogger;

  constructor(private readonly options: PeerAgentExecutorOptions) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? MeshLogger.silent();
  }

  async execute({ definition, binding, invocation, signal, collaboration }: ExecutionRequest): Promise<unknown> {
    const peerBinding = binding?.kind === "peer-agent" ? binding : undefined;
    const context =
      collaboration ??
      CollaborationContext.root({
        selfId: this.options.selfId,
        maxDepth: this.options.maxDepth,
        timeoutMs: this.options.timeoutMs,
        now: this.now(),
      });

    const tag = peerBinding?.capabilityTag ?? definition.metadata?.capabilityTag ?? definition.name;
    const candidates = await this.candidates(peerBinding?.peerId, tag);
    if (candidates.length === 0) {
      throw new MeshworkError(`No peer offers "${tag}"`, "NO_PEER_AVAILABLE", 503, { capability: definition.name, tag });
    }

    let denial: { peerId: string; reason: DelegationDenialReason } | undefined;
    for (const peer of candidates) {
      const now = this.now();
      const permission = context.canDelegateTo(peer.id, now);
      if (!permission.allowed) {
        denial ??= { peerId: peer.id, reason: permission.reason };
        this.options.eventBus?.emit("DelegationSkippedEvent", {
          agentId: this.options.selfId,
          peerId: peer.id,
          reason: permission.reason,
        });
        continue;
      }
      return this.callPeer(peer, context.child(peer.id, now), tag, definition.name, invocation.arguments, signal);
    }

    // Every candidate was refused by the context.
    const refused = denial ?? { peerId: candidates[0].id, reason: "depth_exceeded" as const };
    throw new DelegationNotPermittedError(refused.peerId, refused.reason);
  }

  private async candidates(peerId: string | undefined, tag: string): Promise<PeerRecord[]> {
    if (peerId) {
      const peer = await this.options.directory.get(peerId);
      return peer && peer.status !== "unhealthy" ? [peer] : [];
    }
    return this.options.directory.selectPeers({ capability: tag, limit: this.options.maxCandidates ?? 3 });
  }

  private async callPeer(
    peer: PeerRecord,
    child: CollaborationContext,
    tag: string,
    capability: string,
    args: Record<string, unknown>,
    signal: AbortSignal
  ): Promise<unknown> {
    const request = createAssistRequest({
      senderId: this.options.selfId,
      task: `Run capability "${capability}" with arguments ${JSON.stringify(args)}`,
      context: { capability, arguments: args },
      requiredCapabilityTags: [tag],
      collaboration: child,
      now: this.now(),
    });

    const started = this.now();
    try {
      const response = await this.options.resilience.execute(
        () => this.options.peerClient.assist(peer, request, signal),
        `peer:${peer.id}`,
        { signal, isRetryable: isRetryablePeerError }
      );
      await this.recordOutcome(peer.id, { success: true, latencyMs: response.elapsedMs });
      return response.result;
    } catch (e) {
      await this.recordOutcome(peer.id, {
        success: false,
        latencyMs: e instanceof CircuitOpenError ? undefined : this.now() - started,
      });
      throw toError(e);
    }
  }

  private async recordOutcome(peerId: string, outcome: CallOutcome): Promise<void> {
    try {
      await this.options.directory.recordOutcome(peerId, outcome);
    } catch (e) {
      this.logger.warn("Could not record peer outcome", { peerId, error: toError(e).message });
    }
  }
}
