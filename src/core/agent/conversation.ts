/**
 * Append-only record of one task's turns. Nothing is ever evicted or rewritten; readers get copies.
 */

import { CapabilityOutcome, ConversationTurn, RequestedInvocation } from "../types";

export class ConversationState {
  private turns: ConversationTurn[] = [];

  constructor(initial: ConversationTurn[] = []) {
    for (const turn of initial) this.append(turn);
  }

  append(turn: ConversationTurn): void {
    this.turns.push(Object.freeze({ ...turn }));
  }

  appendRequest(content: string, invocations: RequestedInvocation[]): void {
    this.append({ role: "assistant", content, invocations: invocations.map((i) => ({ ...i })) });
  }

  appendOutcome(invocation: RequestedInvocation, outcome: CapabilityOutcome): void {
    this.append({ role: "capability", callId: invocation.callId, name: invocation.name, outcome });
  }

  get length(): number {
    return this.turns.length;
  }

  snapshot(): ConversationTurn[] {
    return [...this.turns];
  }
}
