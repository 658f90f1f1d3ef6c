/**
 * Bounded turn loop: ask the model, run what it requests, feed the outcomes back.
 *
 *   awaiting_model -> executing_capabilities -> awaiting_model ... -> done
 *
 * After `maxTurns` turns one last synthesis call, without tools, asks for a best-effort answer, so
 * a task costs at most maxTurns + 1 model calls. Only a failing model call ends a task with an
 * error; capability failures are fed back to the model as outcomes.
 */

import { ulid } from "ulid";
import type { CollaborationContext } from "../collaboration/context";
import { MeshworkError, TaskFailedError, toError } from "../errors";
import { EventBus } from "../eventBus";
import { MeshLogger } from "../logger";
import { ModelAdapter, ModelInput, ModelOutput } from "../models/adapter";
import { CapabilityCatalog, InvocationPool } from "../tool-engine";
import { CapabilityOutcome, ConversationTurn, RequestedInvocation } from "../types";
import { ConversationState } from "./conversation";
import { SYNTHESIS_PROMPT, TURN_SYSTEM_PROMPT } from "./promptUtils";

export type TurnState = "awaiting_model" | "executing_capabilities" | "done";

export interface OrchestratorConfig {
  agentId: string;
  maxTurns: number;
  /** Fan-out cap within one batch. */
  maxConcurrentInvocations: number;
  /** When false, a batch runs one invocation at a time. */
  parallel: boolean;
  invocationTimeoutMs: number;
  systemPrompt: string;
  temperature?: number;
  maxTokens?: number;
}

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  agentId: "agent",
  maxTurns: 8,
  maxConcurrentInvocations: 4,
  parallel: true,
  invocationTimeoutMs: 30_000,
  systemPrompt: TURN_SYSTEM_PROMPT,
};

export interface RunOptions {
  collaboration?: CollaborationContext;
  /** Extra context placed before the task, e.g. partial results from peers. */
  preamble?: ConversationTurn[];
  signal?: AbortSignal;
}

export interface RunResult {
  taskId: string;
  answer: string;
  turns: number;
  modelCalls: number;
  /** True when the turn limit forced a synthesis call. */
  synthesized: boolean;
  outcomes: CapabilityOutcome[];
  conversation: ConversationTurn[];
}

export interface OrchestratorDeps {
  model: ModelAdapter;
  catalog: CapabilityCatalog;
  eventBus?: EventBus;
  logger?: MeshLogger;
}

export class TurnOrchestrator {
  readonly config: OrchestratorConfig;
  private readonly model: ModelAdapter;
  private readonly catalog: CapabilityCatalog;
  private readonly eventBus?: EventBus;
  private readonly logger: MeshLogger;

  constructor(deps: OrchestratorDeps, config: Partial<OrchestratorConfig> = {}) {
    this.config = { ...DEFAULT_ORCHESTRATOR_CONFIG, ...config };
    this.model = deps.model;
    this.catalog = deps.catalog;
    this.eventBus = deps.eventBus;
    this.logger = (deps.logger ?? MeshLogger.silent()).child({ agentId: this.config.agentId });
  }

  /**
   * Resolves a task. Throws TaskFailedError when a model call fails.
   */
  async run(task: string, options: RunOptions = {}): Promise<RunResult> {
    const taskId = ulid();
    const conversation = new ConversationState([
      { role: "system", content: this.config.systemPrompt },
      ...(options.preamble ?? []),
      { role: "user", content: task },
    ]);
    const outcomes: CapabilityOutcome[] = [];
    const pool = new InvocationPool(this.config.parallel ? this.config.maxConcurrentInvocations : 1);
    let turn = 0;
    let modelCalls = 0;
    let lastCapability: string | undefined;

    this.eventBus?.emit("TaskStartEvent", {
      agentId: this.config.agentId,
      taskId,
      task,
      depth: options.collaboration?.depth ?? 0,
    });
    const finish = (answer: string, synthesized: boolean): RunResult => {
      this.setState(taskId, turn, "done");
      this.eventBus?.emit("TaskFinishEvent", { agentId: this.config.agentId, taskId, turns: turn, modelCalls, synthesized });
      return { taskId, answer, turns: turn, modelCalls, synthesized, outcomes, conversation: conversation.snapshot() };
    };

    while (turn < this.config.maxTurns) {
      turn += 1;
      this.setState(taskId, turn, "awaiting_model");
      modelCalls += 1;
      const output = await this.callModel(
        { messages: conversation.snapshot(), tools: this.catalog.describeAll(), purpose: "turn" },
        { turn, phase: "turn", lastCapability }
      );
      this.eventBus?.emit("ModelResponseEvent", {
        agentId: this.config.agentId,
        turn,
        type: output.type,
        invocationCount: output.type === "invocations" ? output.invocations.length : 0,
      });

      if (output.type === "final") {
        conversation.append({ role: "assistant", content: output.content });
        return finish(output.content, false);
      }

      this.setState(taskId, turn, "executing_capabilities");
      const requested: RequestedInvocation[] = output.invocations.map((inv, index) => ({
        callId: inv.id ?? `call_${turn}_${index}`,
        name: inv.name,
        arguments: inv.arguments,
      }));
      const scope = `${taskId}/${turn}`;
      const batch = await pool.all(requested.map((inv) => () => this.invoke(scope, inv, options)));

      // The request first, then every outcome in invocation order.
      conversation.appendRequest(output.content ?? "", requested);
      requested.forEach((inv, i) => conversation.appendOutcome(inv, batch[i]));
      outcomes.push(...batch);
      lastCapability = requested[requested.length - 1]?.name;
    }

    this.setState(taskId, turn, "awaiting_model");
    this.logger.info("Turn limit reached, synthesizing", { taskId, turns: turn });
    conversation.append({ role: "user", content: SYNTHESIS_PROMPT });
    modelCalls += 1;
    const final = await this.callModel(
      { messages: conversation.snapshot(), purpose: "synthesis" },
      { turn, phase: "synthesis", lastCapability }
    );
    const answer = final.type === "final" ? final.content : final.content ?? "";
    conversation.append({ role: "assistant", content: answer });
    return finish(answer, true);
  }

  private async callModel(
    input: ModelInput,
    detail: { turn: number; phase: "turn" | "synthesis"; lastCapability?: string }
  ): Promise<ModelOutput> {
    const result = await this.model.generate({
      ...input,
      options: { temperature: this.config.temperature, maxTokens: this.config.maxTokens },
    });
    if (!result.ok) {
      this.logger.error(result.error, { turn: detail.turn, phase: detail.phase });
      throw new TaskFailedError(result.error.message, { agentId: this.config.agentId, ...detail }, result.error);
    }
    return result.value;
  }

  /**
   * Runs one requested invocation. A configuration error (e.g. an unknown capability name the
   * model made up) becomes a failed outcome so the model can correct itself.
   */
  private async invoke(scope: string, inv: RequestedInvocation, options: RunOptions): Promise<CapabilityOutcome> {
    const invocationId = `${scope}/${inv.callId}`;
    try {
      return await this.catalog.dispatch(
        {
          id: invocationId,
          capabilityName: inv.name,
          arguments: inv.arguments,
          timeoutMs: this.config.invocationTimeoutMs,
        },
        { collaboration: options.collaboration, signal: options.signal }
      );
    } catch (e) {
      const error = toError(e);
      return {
        invocationId,
        success: false,
        error: {
          code: error instanceof MeshworkError ? error.code : "DISPATCH_FAILED",
          message: error.message,
          capability: inv.name,
        },
        elapsedMs: 0,
      };
    }
  }

  private setState(taskId: string, turn: number, state: TurnState): void {
    this.eventBus?.emit("TurnStateEvent", { agentId: this.config.agentId, taskId, turn, state });
  }
}
