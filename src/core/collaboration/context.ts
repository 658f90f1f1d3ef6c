/**
 * Bounds for one delegation tree.
 *
 * A context is never mutated: every hop derives a child with depth + 1 and the target added to the
 * visited set, sharing the root's deadline. Since the visited set only grows and travels by value,
 * a peer already on the path can never be reached again, whatever the peers decide independently.
 */

import { ulid } from "ulid";
import { DelegationDenialReason, DelegationNotPermittedError } from "../errors";

export type DelegationPermission = { allowed: true } | { allowed: false; reason: DelegationDenialReason };

export interface CollaborationContextInit {
  requestId?: string;
  selfId: string;
  maxDepth: number;
  timeoutMs: number;
  now?: number;
}

export interface WireContext {
  requestId: string;
  currentDepth: number;
  maxDepth: number;
  visitedPeerIds: string[];
  startedAt: number;
  deadlineAt: number;
}

export class CollaborationContext {
  readonly visited: ReadonlySet<string>;

  private constructor(
    readonly requestId: string,
    readonly depth: number,
    readonly maxDepth: number,
    visited: Iterable<string>,
    readonly startedAt: number,
    readonly deadlineAt: number
  ) {
    this.visited = new Set(visited);
    Object.freeze(this);
  }

  /**
   * Context for a task that starts here. The originating agent counts as visited.
   */
  static root(init: CollaborationContextInit): CollaborationContext {
    const now = init.now ?? Date.now();
    return new CollaborationContext(init.requestId ?? ulid(), 0, init.maxDepth, [init.selfId], now, now + init.timeoutMs);
  }

  /**
   * Rebuilds a context received over the wire, adding the receiving agent to the visited set.
   * A receiver never extends the bounds it was given.
   */
  static fromWire(wire: WireContext, selfId: string): CollaborationContext {
    return new CollaborationContext(
      wire.requestId,
      wire.currentDepth,
      wire.maxDepth,
      [...wire.visitedPeerIds, selfId],
      wire.startedAt,
      wire.deadlineAt
    );
  }

  canDelegateTo(peerId: string, now: number = Date.now()): DelegationPermission {
    if (this.depth >= this.maxDepth) return { allowed: false, reason: "depth_exceeded" };
    if (this.visited.has(peerId)) return { allowed: false, reason: "cycle_detected" };
    if (now >= this.deadlineAt) return { allowed: false, reason: "deadline_elapsed" };
    return { allowed: true };
  }

  /**
   * Derives the context a delegated peer runs under. Throws DelegationNotPermittedError when the
   * hop is not allowed.
   */
  child(peerId: string, now: number = Date.now()): CollaborationContext {
    const permission = this.canDelegateTo(peerId, now);
    if (!permission.allowed) {
      throw new DelegationNotPermittedError(peerId, permission.reason);
    }
    return new CollaborationContext(
      this.requestId,
      this.depth + 1,
      this.maxDepth,
      [...this.visited, peerId],
      this.startedAt,
      this.deadlineAt
    );
  }

  /** True when no further hop could be permitted, whoever the target. */
  isExhausted(now: number = Date.now()): boolean {
    return this.depth >= this.maxDepth || now >= this.deadlineAt;
  }

  remainingMs(now: number = Date.now()): number {
    return Math.max(0, this.deadlineAt - now);
  }

  toWire(): WireContext {
    return {
      requestId: this.requestId,
      currentDepth: this.depth,
      maxDepth: this.maxDepth,
      visitedPeerIds: [...this.visited],
      startedAt: this.startedAt,
      deadlineAt: this.deadlineAt,
    };
  }
}
