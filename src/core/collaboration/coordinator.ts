/**
 * Collaboration coordinator: decides whether a task needs other agents, delegates sub-tasks to
 * them within the bounds of a CollaborationContext, and merges what comes back.
 *
 *   idle -> evaluating_need -> (no_delegation | delegating -> synthesizing) -> done
 *
 * The caller always gets an answer: when delegation is refused or every peer fails, the task is
 * handled locally by the turn orchestrator.
 */

import { z } from "zod";
import { RunResult, TurnOrchestrator } from "../agent/turnOrchestrator";
import { ensurePromptLimit } from "../agent/promptUtils";
import type { CallOutcome, DirectoryService, PeerRecord } from "../directory/types";
import { CircuitOpenError, DelegationDenialReason, TaskFailedError, toError } from "../errors";
import { EventBus } from "../eventBus";
import { MeshLogger } from "../logger";
import { ModelAdapter } from "../models/adapter";
import { ResilienceExecutor } from "../resilience";
import { CapabilityCatalog } from "../tool-engine";
import { CollaborationContext } from "./context";
import { PeerClient, isRetryablePeerError } from "./peerClient";
import { AssistRequest, AssistResponse, createAssistRequest, wireContextOf } from "./protocol";

export type CoordinatorState =
  | "idle"
  | "evaluating_need"
  | "no_delegation"
  | "delegating"
  | "synthesizing"
  | "done";

export const DelegationPlanSchema = z.object({
  needsDelegation: z.boolean().default(false),
  targetPeers: z.array(z.string()).default([]),
  subTasks: z.array(z.string()).default([]),
  rationale: z.string().default(""),
  confidence: z.number().min(0).max(1).default(0),
});

export type DelegationPlan = z.infer<typeof DelegationPlanSchema>;

export type DelegationAttempt =
  | { peerId: string; status: "succeeded"; result: unknown; elapsedMs: number }
  | { peerId: string; status: "failed"; error: string; elapsedMs: number }
  | { peerId: string; status: "skipped"; reason: DelegationDenialReason; elapsedMs: 0 };

export interface CoordinatorResult {
  answer: string;
  /** How the answer was produced. */
  mode: "local" | "delegated" | "fallback";
  plan?: DelegationPlan;
  attempts: DelegationAttempt[];
  /** The local run, when the task was handled here. */
  run?: RunResult;
  requestId: string;
  depth: number;
}

export interface CoordinatorConfig {
  enabled: boolean;
  maxDepth: number;
  /** Wall-clock budget of a delegation tree started here. */
  timeoutMs: number;
  maxPeersPerTask: number;
  /** Peers described to the model when evaluating a task. */
  maxCandidates: number;
}

export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
  enabled: true,
  maxDepth: 3,
  timeoutMs: 120_000,
  maxPeersPerTask: 3,
  maxCandidates: 10,
};

export interface CoordinatorDeps {
  selfId: string;
  model: ModelAdapter;
  orchestrator: TurnOrchestrator;
  catalog: CapabilityCatalog;
  directory: DirectoryService;
  peerClient: PeerClient;
  resilience: ResilienceExecutor;
  eventBus?: EventBus;
  logger?: MeshLogger;
  now?: () => number;
}

export interface HandleOptions {
  context?: CollaborationContext;
  signal?: AbortSignal;
  /** Only peers carrying every one of these tags are considered. */
  requiredCapabilityTags?: string[];
  /** Considered ahead of the other candidates. */
  preferredPeerIds?: string[];
}

const EVALUATION_PROMPT = `You coordinate a team of agents. Decide whether the user's task needs help from the agents listed below.
Answer with JSON only, in this shape:
{"needsDelegation": true|false, "targetPeers": ["<agent id>"], "subTasks": ["<task for each target, same order>"], "rationale": "<why>", "confidence": 0.0-1.0}`;

const DELEGATION_SYNTHESIS_PROMPT =
  "Merge the results other agents returned for the task into one complete answer for the user.";

export class CollaborationCoordinator {
  readonly config: CoordinatorConfig;
  private readonly deps: CoordinatorDeps;
  private readonly logger: MeshLogger;
  private readonly now: () => number;

  constructor(deps: CoordinatorDeps, config: Partial<CoordinatorConfig> = {}) {
    this.config = { ...DEFAULT_COORDINATOR_CONFIG, ...config };
    this.deps = deps;
    this.logger = (deps.logger ?? MeshLogger.silent()).child({ agentId: deps.selfId });
    this.now = deps.now ?? Date.now;
  }

  get selfId(): string {
    return this.deps.selfId;
  }

  /**
   * Asks the model whether to split the task among `peers`. Never throws: a failed call or an
   * unusable answer means no delegation.
   */
  async evaluateNeedForDelegation(task: string, peers: PeerRecord[]): Promise<DelegationPlan> {
    const none = (rationale: string): DelegationPlan => ({
      needsDelegation: false,
      targetPeers: [],
      subTasks: [],
      rationale,
      confidence: 0,
    });
    if (peers.length === 0) return none("no peers available");

    const roster = peers
      .map((p) => `- ${p.id} (${p.name}): ${p.description || "no description"} [capabilities: ${p.capabilities.join(", ")}]`)
      .join("\n");
    const result = await this.deps.model.generate({
      messages: [
        { role: "system", content: `${EVALUATION_PROMPT}\n\nAvailable agents:\n${roster}` },
        { role: "user", content: ensurePromptLimit(task) },
      ],
      purpose: "delegation",
    });
    if (!result.ok) {
      this.logger.warn("Delegation evaluation failed", { error: result.error.message });
      return none(`evaluation failed: ${result.error.message}`);
    }

    const content = result.value.type === "final" ? result.value.content : result.value.content ?? "";
    const parsed = DelegationPlanSchema.safeParse(extractJson(content));
    if (!parsed.success) {
      this.logger.debug("Unusable delegation plan", { content });
      return none("malformed delegation plan");
    }

    // Targets may be named by id or by name; unknown ones are dropped along with their sub-task.
    const targets: string[] = [];
    const subTasks: string[] = [];
    parsed.data.targetPeers.forEach((ref, i) => {
      const peer = peers.find((p) => p.id === ref) ?? peers.find((p) => p.name === ref);
      if (!peer || targets.includes(peer.id)) return;
      targets.push(peer.id);
      subTasks.push(parsed.data.subTasks[i] ?? task);
    });

    if (!parsed.data.needsDelegation || targets.length === 0) {
      return { ...parsed.data, needsDelegation: false, targetPeers: [], subTasks: [] };
    }
    return {
      ...parsed.data,
      targetPeers: targets.slice(0, this.config.maxPeersPerTask),
      subTasks: subTasks.slice(0, this.config.maxPeersPerTask),
    };
  }

  /**
   * Sends each sub-task of the plan to its peer concurrently. Targets the context refuses are
   * skipped; every other target yields a success or a failure, never an exception.
   */
  async delegate(plan: DelegationPlan, parent: CollaborationContext, task: string, signal?: AbortSignal): Promise<DelegationAttempt[]> {
    return Promise.all(
      plan.targetPeers.map((peerId, i) => this.delegateOne(peerId, plan.subTasks[i] ?? task, parent, task, signal))
    );
  }

  /**
   * Resolves a task, delegating when the model asks for it and the context allows it.
   * Throws TaskFailedError only when a model call of the local path or the merge fails.
   */
  async handle(task: string, options: HandleOptions = {}): Promise<CoordinatorResult> {
    const context =
      options.context ??
      CollaborationContext.root({
        selfId: this.deps.selfId,
        maxDepth: this.config.maxDepth,
        timeoutMs: this.config.timeoutMs,
        now: this.now(),
      });
    const base = { requestId: context.requestId, depth: context.depth };
    this.setState(context, "idle");

    const local = async (mode: "local" | "fallback", plan?: DelegationPlan, attempts: DelegationAttempt[] = []) => {
      const run = await this.deps.orchestrator.run(task, { collaboration: context, signal: options.signal });
      this.setState(context, "done");
      const result: CoordinatorResult = { ...base, answer: run.answer, mode, plan, attempts, run };
      return result;
    };

    if (!this.config.enabled || context.isExhausted(this.now())) {
      this.setState(context, "no_delegation");
      return local("local");
    }

    this.setState(context, "evaluating_need");
    let candidates: PeerRecord[];
    try {
      candidates = await this.deps.directory.selectPeers({
        exclude: context.visited,
        capabilities: options.requiredCapabilityTags,
        prefer: options.preferredPeerIds,
        limit: this.config.maxCandidates,
      });
    } catch (e) {
      this.logger.warn("Peer selection failed, handling locally", { error: toError(e).message });
      this.setState(context, "no_delegation");
      return local("local");
    }
    const plan = await this.evaluateNeedForDelegation(task, candidates);
    if (!plan.needsDelegation) {
      this.setState(context, "no_delegation");
      return local("local", plan);
    }

    this.setState(context, "delegating");
    const attempts = await this.delegate(plan, context, task, options.signal);
    const succeeded = attempts.filter(
      (a): a is Extract<DelegationAttempt, { status: "succeeded" }> => a.status === "succeeded"
    );
    if (succeeded.length === 0) {
      this.logger.info("No delegation succeeded, handling locally", { attempts: attempts.length });
      return local("fallback", plan, attempts);
    }

    this.setState(context, "synthesizing");
    const answer = await this.synthesize(task, attempts);
    this.setState(context, "done");
    return { ...base, answer, mode: "delegated", plan, attempts };
  }

  /**
   * Answers an incoming assist request under the bounds it carries. A request naming a local
   * capability in its context is dispatched directly; anything else goes through `handle`.
   */
  async serveAssist(request: AssistRequest, signal?: AbortSignal): Promise<AssistResponse> {
    const started = this.now();
    const context = CollaborationContext.fromWire(wireContextOf(request, started), this.deps.selfId);
    const respond = (fields: { success: true; result: unknown } | { success: false; error: string }): AssistResponse => ({
      requestId: request.requestId,
      agentId: this.deps.selfId,
      elapsedMs: this.now() - started,
      ...fields,
    });

    try {
      const capability = request.context.capability;
      const args = request.context.arguments;
      if (typeof capability === "string" && this.deps.catalog.get(capability) && isRecord(args)) {
        const outcome = await this.deps.catalog.dispatch(
          { id: `${request.requestId}/${capability}`, capabilityName: capability, arguments: args },
          { collaboration: context, signal }
        );
        return outcome.success ? respond({ success: true, result: outcome.result }) : respond({ success: false, error: outcome.error.message });
      }

      const result = await this.handle(request.task, {
        context,
        signal,
        requiredCapabilityTags: request.requiredCapabilityTags,
        preferredPeerIds: request.preferredPeerIds,
      });
      return respond({ success: true, result: result.answer });
    } catch (e) {
      const error = toError(e);
      this.logger.warn("Assist request failed", { requestId: request.requestId, error: error.message });
      return respond({ success: false, error: error.message });
    }
  }

  private async delegateOne(
    peerId: string,
    subTask: string,
    parent: CollaborationContext,
    task: string,
    signal?: AbortSignal
  ): Promise<DelegationAttempt> {
    const { directory, eventBus } = this.deps;
    const now = this.now();
    const permission = parent.canDelegateTo(peerId, now);
    if (!permission.allowed) {
      eventBus?.emit("DelegationSkippedEvent", { agentId: this.deps.selfId, peerId, reason: permission.reason });
      this.logger.debug("Delegation skipped", { peerId, reason: permission.reason });
      return { peerId, status: "skipped", reason: permission.reason, elapsedMs: 0 };
    }

    const child = parent.child(peerId, now);
    const started = now;
    const finish = (attempt: DelegationAttempt): DelegationAttempt => {
      eventBus?.emit("DelegationResultEvent", {
        agentId: this.deps.selfId,
        peerId,
        success: attempt.status === "succeeded",
        elapsedMs: attempt.elapsedMs,
        error: attempt.status === "failed" ? attempt.error : undefined,
      });
      return attempt;
    };

    let peer: PeerRecord | undefined;
    try {
      peer = await directory.get(peerId);
    } catch (e) {
      return finish({ peerId, status: "failed", error: `directory lookup failed: ${toError(e).message}`, elapsedMs: 0 });
    }
    if (!peer) {
      return finish({ peerId, status: "failed", error: "peer is no longer registered", elapsedMs: 0 });
    }
    const target = peer;

    const request = createAssistRequest({
      senderId: this.deps.selfId,
      task: subTask,
      context: { parentTask: task },
      collaboration: child,
      now,
    });
    try {
      const response = await this.deps.resilience.execute(
        () => this.deps.peerClient.assist(target, request, signal),
        `peer:${peerId}`,
        { signal, isRetryable: isRetryablePeerError }
      );
      const elapsedMs = this.now() - started;
      await this.recordOutcome(peerId, { success: true, latencyMs: elapsedMs });
      return finish({ peerId, status: "succeeded", result: response.result, elapsedMs });
    } catch (e) {
      const elapsedMs = this.now() - started;
      // A call the breaker refused says nothing about the peer's latency.
      await this.recordOutcome(peerId, { success: false, latencyMs: e instanceof CircuitOpenError ? undefined : elapsedMs });
      return finish({ peerId, status: "failed", error: toError(e).message, elapsedMs });
    }
  }

  /** Directory bookkeeping never decides an attempt. */
  private async recordOutcome(peerId: string, outcome: CallOutcome): Promise<void> {
    try {
      await this.deps.directory.recordOutcome(peerId, outcome);
    } catch (e) {
      this.logger.warn("Could not record peer outcome", { peerId, error: toError(e).message });
    }
  }

  private async synthesize(task: string, attempts: DelegationAttempt[]): Promise<string> {
    const partials = attempts
      .map((a) => {
        if (a.status === "succeeded") return `Agent ${a.peerId}: ${stringify(a.result)}`;
        if (a.status === "failed") return `Agent ${a.peerId} failed: ${a.error}`;
        return `Agent ${a.peerId} was not asked (${a.reason})`;
      })
      .join("\n\n");

    const result = await this.deps.model.generate({
      messages: [
        { role: "system", content: DELEGATION_SYNTHESIS_PROMPT },
        { role: "user", content: `Task: ${task}\n\nResults:\n${partials}` },
      ],
      purpose: "synthesis",
    });
    if (!result.ok) {
      throw new TaskFailedError(
        result.error.message,
        {
          agentId: this.deps.selfId,
          turn: 0,
          phase: "delegation_synthesis",
          peerIds: attempts.filter((a) => a.status === "succeeded").map((a) => a.peerId),
        },
        result.error
      );
    }
    return result.value.type === "final" ? result.value.content : result.value.content ?? "";
  }

  private setState(context: CollaborationContext, state: CoordinatorState): void {
    this.deps.eventBus?.emit("DelegationStateEvent", { agentId: this.deps.selfId, taskId: context.requestId, state });
  }
}

/**
 * Pulls the first JSON object out of a model answer, tolerating prose or code fences around it.
 */
export function extractJson(content: string): unknown {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start === -1 || end <= start) return undefined;
  try {
    return JSON.parse(content.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

function stringify(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value) ?? "undefined";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
