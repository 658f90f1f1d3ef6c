/**
 * Model adapter API. A model sees the conversation and the capability catalog and answers with
 * either a final answer or a batch of invocations.
 */

import { z } from "zod";
import { ModelCallError, toError } from "../errors";
import { EventBus } from "../eventBus";
import { MeshLogger } from "../logger";
import { ResilienceExecutor } from "../resilience";
import { CapabilityDescription, ConversationTurn } from "../types";
import { Result, err, ok } from "../utils/result";

/** Why the model is consulted; adapters may tune the request per purpose. */
export type ModelPurpose = "turn" | "synthesis" | "delegation";

export interface ModelInput {
  messages: ConversationTurn[];
  /** Omitted when the model must answer without invoking anything. */
  tools?: CapabilityDescription[];
  purpose?: ModelPurpose;
  options?: {
    temperature?: number;
    maxTokens?: number;
  };
}

export interface ModelUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface ModelInvocationRequest {
  /** Provider call id, when the provider assigns one. */
  id?: string;
  name: string;
  arguments: Record<string, unknown>;
}

export type ModelOutput =
  | { type: "final"; content: string; usage?: ModelUsage }
  | { type: "invocations"; content?: string; invocations: ModelInvocationRequest[]; usage?: ModelUsage };

const UsageSchema = z
  .object({
    promptTokens: z.number().optional(),
    completionTokens: z.number().optional(),
    totalTokens: z.number().optional(),
  })
  .optional();

export const ModelOutputSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("final"), content: z.string(), usage: UsageSchema }),
  z.object({
    type: z.literal("invocations"),
    content: z.string().optional(),
    invocations: z
      .array(z.object({ id: z.string().optional(), name: z.string().min(1), arguments: z.record(z.unknown()) }))
      .min(1),
    usage: UsageSchema,
  }),
]);

export interface ModelAdapter {
  readonly id: string;
  generate(input: ModelInput): Promise<Result<ModelOutput, ModelCallError>>;
}

export interface ModelAdapterDeps {
  eventBus?: EventBus;
  logger?: MeshLogger;
  /** Model calls share breaker state under the target `model:<id>`. */
  resilience?: ResilienceExecutor;
}

/**
 * Retries transient failures through the resilience executor and validates what the provider
 * returned. Subclasses implement one attempt.
 */
export abstract class BaseModelAdapter implements ModelAdapter {
  abstract readonly id: string;
  protected readonly eventBus?: EventBus;
  protected readonly logger: MeshLogger;
  protected readonly resilience: ResilienceExecutor;

  constructor(deps: ModelAdapterDeps = {}) {
    this.eventBus = deps.eventBus;
    this.logger = deps.logger ?? MeshLogger.silent();
    this.resilience = deps.resilience ?? new ResilienceExecutor({ maxRetries: 0 });
  }

  async generate(input: ModelInput): Promise<Result<ModelOutput, ModelCallError>> {
    const done = this.logger.startTimer("model call", { provider: this.id, purpose: input.purpose ?? "turn" });
    try {
      const raw = await this.resilience.execute(() => this.generateOnce(input), `model:${this.id}`, {
        isRetryable: (e) => this.shouldRetry(e),
      });
      done();
      const parsed = ModelOutputSchema.safeParse(raw);
      if (!parsed.success) {
        return err(this.fail(new Error(`malformed model output: ${parsed.error.issues[0]?.message ?? "invalid"}`)));
      }
      return ok(parsed.data);
    } catch (e) {
      done();
      return err(this.fail(toError(e)));
    }
  }

  protected abstract generateOnce(input: ModelInput): Promise<ModelOutput>;

  /** Transient errors only; defaults to none. */
  protected shouldRetry(_error: Error): boolean {
    return false;
  }

  private fail(error: Error): ModelCallError {
    const callError = error instanceof ModelCallError ? error : new ModelCallError(error.message, this.id, error);
    this.eventBus?.emit("ModelErrorEvent", { provider: this.id, error: callError.message });
    return callError;
  }
}
