/**
 * Mock model adapter for local dev and tests.
 *
 * Replays a script of replies first. Once the script runs out it falls back to simple heuristics:
 * - a user message containing `CALL: <name> {json}` requests that capability
 * - after capability results, answers with a summary of them
 * - a delegation decision is always "no delegation"
 */

import { ConversationTurn } from "../types";
import { BaseModelAdapter, ModelAdapterDeps, ModelInput, ModelOutput } from "./adapter";

export type ScriptedReply = ModelOutput | Error | ((input: ModelInput) => ModelOutput | Promise<ModelOutput>);

const CALL_PATTERN = /CALL:\s*([A-Za-z0-9_-]+)\s*(\{.*\})?/;

export class MockAdapter extends BaseModelAdapter {
  readonly id: string;
  /** Every input the adapter was called with, in order. */
  readonly calls: ModelInput[] = [];
  private readonly script: ScriptedReply[];

  constructor(script: ScriptedReply[] = [], deps: ModelAdapterDeps & { id?: string } = {}) {
    super(deps);
    this.id = deps.id ?? "mock";
    this.script = [...script];
  }

  /** Appends replies to the script. */
  enqueue(...replies: ScriptedReply[]): void {
    this.script.push(...replies);
  }

  get remaining(): number {
    return this.script.length;
  }

  protected async generateOnce(input: ModelInput): Promise<ModelOutput> {
    this.calls.push(input);
    const next = this.script.shift();
    if (next instanceof Error) throw next;
    if (typeof next === "function") return next(input);
    if (next) return next;
    return respond(input);
  }
}

function respond(input: ModelInput): ModelOutput {
  if (input.purpose === "delegation") {
    return {
      type: "final",
      content: JSON.stringify({ needsDelegation: false, targetPeers: [], subTasks: [], rationale: "handled locally" }),
    };
  }

  const last = input.messages[input.messages.length - 1];
  if (last?.role === "capability") {
    return { type: "final", content: `Results: ${summarizeOutcomes(trailingOutcomes(input.messages))}` };
  }

  const task = lastUserMessage(input.messages);
  const match = CALL_PATTERN.exec(task);
  if (match && input.tools?.some((t) => t.name === match[1])) {
    return { type: "invocations", invocations: [{ name: match[1], arguments: parseArgs(match[2]) }] };
  }
  return { type: "final", content: `Mock response: ${task}` };
}

function trailingOutcomes(messages: ConversationTurn[]): Extract<ConversationTurn, { role: "capability" }>[] {
  const out: Extract<ConversationTurn, { role: "capability" }>[] = [];
  for (let i = messages.length - 1; i >= 0; i--) {
    const turn = messages[i];
    if (turn.role !== "capability") break;
    out.unshift(turn);
  }
  return out;
}

function summarizeOutcomes(turns: Extract<ConversationTurn, { role: "capability" }>[]): string {
  return turns
    .map(({ name, outcome }) =>
      outcome.success ? `${name} = ${JSON.stringify(outcome.result)}` : `${name} failed: ${outcome.error.message}`
    )
    .join("; ");
}

function lastUserMessage(messages: ConversationTurn[]): string {
  for (let i = messages.length - 1; i >= 0; i--) {
    const turn = messages[i];
    if (turn.role === "user") return turn.content;
  }
  return "";
}

function parseArgs(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  try {
    const value: unknown = JSON.parse(raw);
    return typeof value === "object" && value !== null && !Array.isArray(value) ? { ...value } : {};
  } catch {
    return {};
  }
}
