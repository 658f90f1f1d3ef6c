/**
 * Remote-server and peer-agent backends against in-process fakes
 */

import { EventBus } from "../src/core/eventBus";
import { ResilienceExecutor } from "../src/core/resilience";
import {
  CapabilityCatalog,
  PeerAgentExecutor,
  RemoteServerExecutor,
  discoverRemoteCapabilities,
} from "../src/core/tool-engine";
import { AgentDirectory } from "../src/core/directory";
import { CollaborationContext } from "../src/core/collaboration/context";
import { PeerClient } from "../src/core/collaboration/peerClient";
import { AssistRequest, AssistResponse } from "../src/core/collaboration/protocol";
import { PeerRequestError } from "../src/core/errors";
import { FetchLike } from "../src/core/utils/http";
import { PeerRecord } from "../src/core/directory";

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function fakeFetch(...replies: Response[]) {
  const calls: { url: string; init?: RequestInit }[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    calls.push({ url, init });
    const next = replies.shift();
    if (!next) throw new Error("no reply scripted");
    return next;
  };
  return { fetchImpl, calls };
}

function bodyOf(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

const noSleep = async () => {};

describe("RemoteServerExecutor", () => {
  function remoteCatalog(fetchImpl: FetchLike, maxRetries = 2) {
    const resilience = new ResilienceExecutor({ maxRetries, jitter: false, initialDelayMs: 1 }, { sleep: noSleep });
    const catalog = new CapabilityCatalog();
    catalog.registerBackend("remote-server", new RemoteServerExecutor({ resilience, fetch: fetchImpl }));
    catalog.register(
      {
        name: "remote_add",
        description: "adds remotely",
        backendKind: "remote-server",
        parameters: [{ name: "a", type: "number", required: true }],
      },
      { kind: "remote-server", serverUrl: "http://tools.test/", remoteName: "add" }
    );
    return { catalog, resilience };
  }

  test("posts the invocation and returns the result", async () => {
    const { fetchImpl, calls } = fakeFetch(jsonResponse(200, { ok: true, result: 7 }));
    const { catalog } = remoteCatalog(fetchImpl);

    const outcome = await catalog.dispatch({ id: "r1", capabilityName: "remote_add", arguments: { a: 1 } });

    expect(outcome.success && outcome.result).toBe(7);
    expect(calls[0].url).toBe("http://tools.test/tools/invoke");
    expect(bodyOf(calls[0].init)).toEqual({ name: "add", arguments: { a: 1 }, invocationId: "r1" });
  });

  test("retries transient server failures", async () => {
    const { fetchImpl, calls } = fakeFetch(
      jsonResponse(503, {}),
      jsonResponse(502, {}),
      jsonResponse(200, { ok: true, result: "third time" })
    );
    const { catalog, resilience } = remoteCatalog(fetchImpl);

    const outcome = await catalog.dispatch({ id: "r2", capabilityName: "remote_add", arguments: { a: 1 } });

    expect(outcome.success && outcome.result).toBe("third time");
    expect(calls).toHaveLength(3);
    expect(resilience.getBreakerState("server:http://tools.test/").consecutiveFailures).toBe(0);
  });

  test("does not retry a failure the server reported", async () => {
    const { fetchImpl, calls } = fakeFetch(jsonResponse(200, { ok: false, error: { message: "no such tool" } }));
    const { catalog } = remoteCatalog(fetchImpl);

    const outcome = await catalog.dispatch({ id: "r3", capabilityName: "remote_add", arguments: { a: 1 } });

    expect(calls).toHaveLength(1);
    expect(outcome.success ? null : outcome.error).toEqual(
      expect.objectContaining({ code: "REMOTE_SERVER_FAILED", message: "Remote server http://tools.test/: no such tool" })
    );
  });

  test("reports exhausted retries", async () => {
    const { fetchImpl, calls } = fakeFetch(jsonResponse(500, {}), jsonResponse(500, {}));
    const { catalog } = remoteCatalog(fetchImpl, 1);

    const outcome = await catalog.dispatch({ id: "r4", capabilityName: "remote_add", arguments: { a: 1 } });

    expect(calls).toHaveLength(2);
    expect(outcome.success ? null : outcome.error.code).toBe("RETRY_EXHAUSTED");
  });
});

describe("discoverRemoteCapabilities", () => {
  const listing = {
    tools: [
      {
        name: "upper",
        description: "Uppercases text",
        parameters: { text: { type: "string", description: "input" } },
        required: ["text"],
      },
    ],
  };

  test("imports a server catalog as remote-server capabilities", async () => {
    const { fetchImpl, calls } = fakeFetch(jsonResponse(200, listing), jsonResponse(200, { ok: true, result: "HI" }));
    const catalog = new CapabilityCatalog();
    const resilience = new ResilienceExecutor({ maxRetries: 0 });
    catalog.registerBackend("remote-server", new RemoteServerExecutor({ resilience, fetch: fetchImpl }));

    const result = await discoverRemoteCapabilities(catalog, "http://tools.test", { fetch: fetchImpl, prefix: "srv_" });

    expect(result).toEqual({ registered: ["srv_upper"], skipped: [] });
    expect(calls[0].url).toBe("http://tools.test/tools");
    const def = catalog.get("srv_upper");
    expect(def?.backendKind).toBe("remote-server");
    expect(def?.parameters).toEqual([{ name: "text", type: "string", description: "input", required: true }]);

    const outcome = await catalog.dispatch({ id: "u1", capabilityName: "srv_upper", arguments: { text: "hi" } });
    expect(outcome.success && outcome.result).toBe("HI");
    expect(bodyOf(calls[1].init)).toEqual({ name: "upper", arguments: { text: "hi" }, invocationId: "u1" });
  });

  test("skips names already in the catalog", async () => {
    const { fetchImpl } = fakeFetch(jsonResponse(200, listing), jsonResponse(200, listing));
    const catalog = new CapabilityCatalog();

    await discoverRemoteCapabilities(catalog, "http://tools.test", { fetch: fetchImpl });
    const again = await discoverRemoteCapabilities(catalog, "http://tools.test", { fetch: fetchImpl });

    expect(again).toEqual({ registered: [], skipped: ["upper"] });
  });

  test("fails on a non-ok listing", async () => {
    const { fetchImpl } = fakeFetch(jsonResponse(404, { error: "nope" }));
    await expect(discoverRemoteCapabilities(new CapabilityCatalog(), "http://tools.test", { fetch: fetchImpl })).rejects.toThrow(
      "Remote server http://tools.test: tool listing failed with HTTP 404"
    );
  });
});

describe("PeerAgentExecutor", () => {
  const now = 1_000_000;

  function answering(result: unknown): { client: PeerClient; requests: AssistRequest[] } {
    const requests: AssistRequest[] = [];
    const client: PeerClient = {
      assist: async (peer: PeerRecord, request: AssistRequest): Promise<AssistResponse> => {
        requests.push(request);
        return { requestId: request.requestId, success: true, result, elapsedMs: 12, agentId: peer.id };
      },
    };
    return { client, requests };
  }

  async function setup(client: PeerClient, eventBus?: EventBus) {
    const directory = new AgentDirectory({}, { now: () => now });
    await directory.register({ id: "agent-b", name: "B", capabilities: ["translate"], url: "http://b.test" });
    const resilience = new ResilienceExecutor({ maxRetries: 1, jitter: false }, { sleep: noSleep, now: () => now });
    const catalog = new CapabilityCatalog({ eventBus });
    catalog.registerBackend(
      "peer-agent",
      new PeerAgentExecutor({
        selfId: "agent-a",
        directory,
        peerClient: client,
        resilience,
        maxDepth: 3,
        timeoutMs: 60_000,
        eventBus,
        now: () => now,
      })
    );
    catalog.register({
      name: "translate",
      description: "Translates text",
      backendKind: "peer-agent",
      parameters: [{ name: "text", type: "string", required: true }],
    });
    return { directory, catalog };
  }

  test("delegates the invocation as an assist request", async () => {
    const { client, requests } = answering("hola");
    const { catalog, directory } = await setup(client);

    const outcome = await catalog.dispatch({ id: "p1", capabilityName: "translate", arguments: { text: "hello" } });

    expect(outcome.success && outcome.result).toBe("hola");
    expect(requests).toHaveLength(1);
    expect(requests[0]).toEqual(
      expect.objectContaining({
        senderId: "agent-a",
        context: { capability: "translate", arguments: { text: "hello" } },
        requiredCapabilityTags: ["translate"],
        currentDepth: 1,
        maxDepth: 3,
        visitedPeerIds: ["agent-a", "agent-b"],
        deadlineAt: now + 60_000,
        timeoutMs: 60_000,
      })
    );
    const peer = await directory.get("agent-b");
    expect(peer?.latencyMs).toBeCloseTo(2.4);
  });

  test("honors the caller's context and refuses a cycle", async () => {
    const bus = new EventBus();
    const { client, requests } = answering("unused");
    const { catalog } = await setup(client, bus);
    const context = CollaborationContext.root({ selfId: "agent-a", maxDepth: 3, timeoutMs: 60_000, now })
      .child("agent-b", now)
      .child("agent-c", now);

    const outcome = await catalog.dispatch(
      { id: "p2", capabilityName: "translate", arguments: { text: "hello" } },
      { collaboration: context }
    );

    expect(requests).toHaveLength(0);
    expect(outcome.success ? null : outcome.error.code).toBe("DELEGATION_NOT_PERMITTED");
    expect(bus.getHistory({ type: "DelegationSkippedEvent" })[0].payload).toEqual({
      agentId: "agent-a",
      peerId: "agent-b",
      reason: "cycle_detected",
    });
  });

  test("fails with NO_PEER_AVAILABLE when nobody offers the tag", async () => {
    const { client } = answering("x");
    const { catalog, directory } = await setup(client);
    await directory.deregister("agent-b");

    const outcome = await catalog.dispatch({ id: "p3", capabilityName: "translate", arguments: { text: "hi" } });
    expect(outcome.success ? null : outcome.error.code).toBe("NO_PEER_AVAILABLE");
  });

  test("a peer-reported failure is not retried and lowers its success rate", async () => {
    const assist = jest.fn(async (peer: PeerRecord): Promise<AssistResponse> => {
      throw new PeerRequestError(peer.id, "cannot translate", 200, false);
    });
    const { catalog, directory } = await setup({ assist });

    const outcome = await catalog.dispatch({ id: "p4", capabilityName: "translate", arguments: { text: "hi" } });

    expect(assist).toHaveBeenCalledTimes(1);
    expect(outcome.success ? null : outcome.error.message).toBe("Peer agent-b: cannot translate");
    expect((await directory.get("agent-b"))?.successRate).toBeCloseTo(0.8);
  });
});
