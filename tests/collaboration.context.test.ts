/**
 * Collaboration context bounds and their wire form
 */

import { CollaborationContext } from "../src/core/collaboration/context";
import { AssistRequestSchema, createAssistRequest, wireContextOf } from "../src/core/collaboration/protocol";
import { DelegationNotPermittedError } from "../src/core/errors";

const T0 = 1_700_000_000_000;

function rootOf(selfId: string, maxDepth = 3, timeoutMs = 60_000) {
  return CollaborationContext.root({ requestId: "req-1", selfId, maxDepth, timeoutMs, now: T0 });
}

describe("CollaborationContext", () => {
  test("a root context has visited the originating agent only", () => {
    const root = rootOf("A");

    expect(root.depth).toBe(0);
    expect([...root.visited]).toEqual(["A"]);
    expect(root.deadlineAt).toBe(T0 + 60_000);
    expect(Object.isFrozen(root)).toBe(true);
  });

  test("child adds the peer, increments depth and keeps the deadline", () => {
    const root = rootOf("A");
    const child = root.child("B", T0 + 5);

    expect(child.depth).toBe(1);
    expect([...child.visited]).toEqual(["A", "B"]);
    expect(child.deadlineAt).toBe(root.deadlineAt);
    expect(child.requestId).toBe("req-1");
    // the parent is untouched
    expect(root.depth).toBe(0);
    expect([...root.visited]).toEqual(["A"]);
  });

  test("a cycle A -> B -> C -> A is refused", () => {
    const atC = rootOf("A").child("B", T0).child("C", T0);

    expect(atC.canDelegateTo("A", T0)).toEqual({ allowed: false, reason: "cycle_detected" });
    expect(() => atC.child("A", T0)).toThrow(DelegationNotPermittedError);
  });

  test("depth is bounded by maxDepth", () => {
    const atMax = rootOf("A", 2).child("B", T0).child("C", T0);

    expect(atMax.depth).toBe(2);
    expect(atMax.canDelegateTo("D", T0)).toEqual({ allowed: false, reason: "depth_exceeded" });
    expect(atMax.isExhausted(T0)).toBe(true);
  });

  test("depth is checked before the visited set", () => {
    const atMax = rootOf("A", 1).child("B", T0);
    expect(atMax.canDelegateTo("A", T0)).toEqual({ allowed: false, reason: "depth_exceeded" });
  });

  test("the shared deadline refuses late hops", () => {
    const root = rootOf("A", 3, 1000);

    expect(root.canDelegateTo("B", T0 + 999)).toEqual({ allowed: true });
    expect(root.canDelegateTo("B", T0 + 1000)).toEqual({ allowed: false, reason: "deadline_elapsed" });
    expect(root.remainingMs(T0 + 400)).toBe(600);
    expect(root.remainingMs(T0 + 5000)).toBe(0);
  });

  test("the refusal carries the peer and the reason", () => {
    const error = (() => {
      try {
        rootOf("A", 0).child("B", T0);
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(DelegationNotPermittedError);
    if (error instanceof DelegationNotPermittedError) {
      expect(error.peerId).toBe("B");
      expect(error.reason).toBe("depth_exceeded");
      expect(error.code).toBe("DELEGATION_NOT_PERMITTED");
    }
  });
});

describe("Assist request wire form", () => {
  test("a receiver rebuilds the sender's context and adds itself", () => {
    const child = rootOf("A").child("B", T0);
    const request = createAssistRequest({ senderId: "A", task: "sum numbers", collaboration: child, now: T0 + 100 });

    expect(request).toEqual(
      expect.objectContaining({
        senderId: "A",
        task: "sum numbers",
        context: {},
        currentDepth: 1,
        maxDepth: 3,
        visitedPeerIds: ["A", "B"],
        timeoutMs: 59_900,
        startedAt: T0,
        deadlineAt: T0 + 60_000,
      })
    );

    const parsed = AssistRequestSchema.parse(JSON.parse(JSON.stringify(request)));
    const atB = CollaborationContext.fromWire(wireContextOf(parsed, T0 + 200), "B");

    expect(atB.depth).toBe(1);
    expect(atB.deadlineAt).toBe(T0 + 60_000);
    expect(atB.canDelegateTo("A", T0 + 200)).toEqual({ allowed: false, reason: "cycle_detected" });
    expect(atB.canDelegateTo("C", T0 + 200)).toEqual({ allowed: true });
  });

  test("a request without a deadline gets one from its timeout", () => {
    const request = AssistRequestSchema.parse({
      requestId: "r",
      senderId: "X",
      task: "t",
      timeoutMs: 5000,
      maxDepth: 2,
      currentDepth: 0,
    });

    const wire = wireContextOf(request, T0);
    expect(wire).toEqual({
      requestId: "r",
      currentDepth: 0,
      maxDepth: 2,
      visitedPeerIds: ["X"],
      startedAt: T0,
      deadlineAt: T0 + 5000,
    });
  });

  test("a receiver never extends the sender's deadline", () => {
    const request = AssistRequestSchema.parse({
      requestId: "r",
      task: "t",
      timeoutMs: 60_000,
      maxDepth: 2,
      currentDepth: 1,
      deadlineAt: T0 + 1000,
    });

    expect(wireContextOf(request, T0).deadlineAt).toBe(T0 + 1000);
  });

  test("unknown fields are stripped and bad shapes rejected", () => {
    const parsed = AssistRequestSchema.parse({
      requestId: "r",
      task: "t",
      timeoutMs: 1,
      maxDepth: 1,
      currentDepth: 0,
      extra: "ignored",
    });
    expect("extra" in parsed).toBe(false);
    expect(AssistRequestSchema.safeParse({ requestId: "r", task: "t" }).success).toBe(false);
  });
});
