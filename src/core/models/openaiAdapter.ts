/**
 * OpenAI chat-completions adapter with parallel tool calls. Capability results go back as `tool`
 * messages under the call id the model issued.
 */

import OpenAI from "openai";
import { ModelCallError } from "../errors";
import { toFunctionTool } from "../tool-engine/toolSchema";
import { CapabilityDescription, ConversationTurn } from "../types";
import { BaseModelAdapter, ModelAdapterDeps, ModelInput, ModelInvocationRequest, ModelOutput } from "./adapter";

type ChatMessage = OpenAI.Chat.Completions.ChatCompletionMessageParam;

export interface OpenAIAdapterConfig {
  apiKey: string;
  model?: string;
  baseURL?: string;
  timeoutMs?: number;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAIAdapter extends BaseModelAdapter {
  readonly id = "openai";
  private client: OpenAI;
  private readonly model: string;

  constructor(private readonly config: OpenAIAdapterConfig, deps: ModelAdapterDeps = {}) {
    super(deps);
    if (!config.apiKey) {
      throw new ModelCallError("API key is required", "openai");
    }
    this.client = new OpenAI({ apiKey: config.apiKey, baseURL: config.baseURL, maxRetries: 0 });
    this.model = config.model ?? "gpt-4o-mini";
  }

  protected async generateOnce(input: ModelInput): Promise<ModelOutput> {
    const tools = input.tools?.length ? input.tools.map(toOpenAITool) : undefined;

    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: toMessages(input.messages),
        tools,
        tool_choice: tools ? "auto" : undefined,
        response_format: input.purpose === "delegation" ? { type: "json_object" } : undefined,
        temperature: input.options?.temperature ?? this.config.temperature ?? 0,
        max_tokens: input.options?.maxTokens ?? this.config.maxTokens ?? 2048,
      },
      { timeout: this.config.timeoutMs ?? 60_000 }
    );

    const choice = response.choices[0];
    if (!choice) {
      throw new ModelCallError("response carried no choices", this.id);
    }
    const usage = response.usage
      ? {
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens,
          totalTokens: response.usage.total_tokens,
        }
      : undefined;

    const calls = choice.message.tool_calls ?? [];
    if (calls.length > 0) {
      const invocations: ModelInvocationRequest[] = calls.map((call) => ({
        id: call.id,
        name: call.function.name,
        arguments: parseArguments(call.function.arguments),
      }));
      return { type: "invocations", content: choice.message.content ?? undefined, invocations, usage };
    }

    return { type: "final", content: choice.message.content ?? "", usage };
  }

  protected shouldRetry(error: Error): boolean {
    return (
      error instanceof OpenAI.RateLimitError ||
      error instanceof OpenAI.InternalServerError ||
      error instanceof OpenAI.APIConnectionError ||
      error instanceof OpenAI.ConflictError
    );
  }
}

function toOpenAITool(desc: CapabilityDescription): OpenAI.Chat.Completions.ChatCompletionTool {
  const tool = toFunctionTool(desc);
  return {
    type: "function",
    function: { name: tool.function.name, description: tool.function.description, parameters: tool.function.parameters },
  };
}

function toMessages(turns: ConversationTurn[]): ChatMessage[] {
  return turns.map((turn): ChatMessage => {
    switch (turn.role) {
      case "system":
        return { role: "system", content: turn.content };
      case "user":
        return { role: "user", content: turn.content };
      case "assistant":
        return turn.invocations?.length
          ? {
              role: "assistant",
              content: turn.content || null,
              tool_calls: turn.invocations.map((inv) => ({
                id: inv.callId,
                type: "function" as const,
                function: { name: inv.name, arguments: JSON.stringify(inv.arguments) },
              })),
            }
          : { role: "assistant", content: turn.content };
      case "capability":
        return {
          role: "tool",
          tool_call_id: turn.callId,
          content: JSON.stringify(
            turn.outcome.success ? { ok: true, result: turn.outcome.result } : { ok: false, error: turn.outcome.error }
          ),
        };
    }
  });
}

/**
 * Malformed JSON from the model becomes an empty argument map, which argument validation then
 * reports back to the model.
 */
function parseArguments(raw: string): Record<string, unknown> {
  try {
    const value: unknown = JSON.parse(raw || "{}");
    return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
  } catch {
    return {};
  }
}
