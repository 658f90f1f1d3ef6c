/**
 * HTTP surface of one node, served on an ephemeral local port
 */

import http from "http";
import { AddressInfo } from "net";
import { parseConfig } from "../src/core/config";
import { MockAdapter } from "../src/core/models/mockAdapter";
import { createAgentNode } from "../src/runtime";
import { createHttpServer, HttpServerOptions } from "../src/server/http";

interface Reply {
  status: number;
  body: unknown;
  headers: Headers;
}

async function listen(options: HttpServerOptions = {}) {
  const node = createAgentNode(parseConfig({ logger: { level: "silent" } }), { model: new MockAdapter() });
  const app = createHttpServer(node, { rateLimit: { windowMs: 60_000, max: 1000 }, ...options });
  const server = await new Promise<http.Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  const address: AddressInfo | string | null = server.address();
  const port = typeof address === "object" && address !== null ? address.port : 0;

  const call = async (method: string, path: string, body?: unknown, headers: Record<string, string> = {}): Promise<Reply> => {
    const res = await fetch(`http://127.0.0.1:${port}${path}`, {
      method,
      headers: body === undefined ? headers : { "Content-Type": "application/json", ...headers },
      body: body === undefined ? undefined : typeof body === "string" ? body : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json(), headers: res.headers };
  };

  const close = () => new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  return { node, call, close };
}

describe("HTTP server", () => {
  let ctx: Awaited<ReturnType<typeof listen>>;

  beforeAll(async () => {
    ctx = await listen();
  });

  afterAll(async () => {
    await ctx.close();
  });

  test("GET /health reports the node", async () => {
    const { status, body } = await ctx.call("GET", "/health");

    expect(status).toBe(200);
    expect(body).toEqual({ status: "ok", agentId: "agent-local", capabilities: 3, timestamp: expect.any(String) });
  });

  test("GET /tools lists the catalog", async () => {
    const { body } = await ctx.call("GET", "/tools");

    expect(body).toEqual({
      tools: expect.arrayContaining([expect.objectContaining({ name: "add" }), expect.objectContaining({ name: "echo" })]),
    });
  });

  describe("POST /tools/invoke", () => {
    test("returns the result", async () => {
      const { status, body } = await ctx.call("POST", "/tools/invoke", { name: "add", arguments: { a: 1, b: 2 } });

      expect(status).toBe(200);
      expect(body).toEqual({ ok: true, result: 3, elapsedMs: expect.any(Number) });
    });

    test("reports invalid arguments in the body", async () => {
      const { status, body } = await ctx.call("POST", "/tools/invoke", { name: "add", arguments: { a: 1 } });

      expect(status).toBe(200);
      expect(body).toEqual({
        ok: false,
        error: { code: "INVALID_ARGUMENTS", message: "Invalid arguments for add: (root) must have required property 'b'" },
      });
    });

    test("answers 404 for an unknown capability", async () => {
      const { status, body } = await ctx.call("POST", "/tools/invoke", { name: "nothing" });

      expect(status).toBe(404);
      expect(body).toEqual({
        ok: false,
        error: { code: "CAPABILITY_NOT_FOUND", message: "Capability not found: nothing", details: { capability: "nothing" } },
      });
    });
  });

  describe("POST /agent/run", () => {
    test("runs the task locally", async () => {
      const { status, body } = await ctx.call("POST", "/agent/run", { input: 'CALL: add {"a":2,"b":3}' });

      expect(status).toBe(200);
      expect(body).toEqual({
        ok: true,
        requestId: expect.any(String),
        answer: "Results: add = 5",
        mode: "local",
        attempts: [],
        turns: 2,
        modelCalls: 2,
      });
    });

    test("rejects a body without input", async () => {
      const { status, body } = await ctx.call("POST", "/agent/run", {});

      expect(status).toBe(400);
      expect(body).toEqual({
        ok: false,
        error: {
          code: "validation_error",
          message: "Request validation failed",
          details: [{ path: "input", message: "Required", code: "invalid_type" }],
        },
      });
    });

    test("rejects malformed JSON", async () => {
      const { status, body } = await ctx.call("POST", "/agent/run", "{ not json");

      expect(status).toBe(400);
      expect(body).toEqual({ ok: false, error: { code: "invalid_json", message: "Malformed JSON body" } });
    });
  });

  test("POST /a2a/assist serves a capability request", async () => {
    const { status, body } = await ctx.call("POST", "/a2a/assist", {
      requestId: "r1",
      senderId: "agent-x",
      task: "add two numbers",
      context: { capability: "add", arguments: { a: 2, b: 2 } },
      timeoutMs: 5000,
      maxDepth: 2,
      currentDepth: 1,
    });

    expect(status).toBe(200);
    expect(body).toEqual({ requestId: "r1", agentId: "agent-local", elapsedMs: expect.any(Number), success: true, result: 4 });
  });

  test("the directory routes manage peers", async () => {
    const registration = { id: "peer-b", name: "B", capabilities: ["search"], url: "http://b.test" };

    expect((await ctx.call("POST", "/directory/register", registration)).body).toEqual({ result: true });
    expect((await ctx.call("POST", "/directory/register", registration)).body).toEqual({ result: false });

    const listed = await ctx.call("GET", "/directory/peers?capabilities=search");
    expect(listed.body).toEqual({ peers: [expect.objectContaining({ id: "peer-b", status: "active" })] });

    expect((await ctx.call("POST", "/directory/peers/peer-b/heartbeat", { status: "busy" })).body).toEqual({ result: true });
    expect((await ctx.call("POST", "/a2a/heartbeat", { senderId: "peer-b", latencyMs: 10 })).body).toEqual({ result: true });
    expect((await ctx.call("POST", "/directory/peers/peer-b/outcome", { success: true, latencyMs: 20 })).body).toEqual({
      ok: true,
    });
    expect((await ctx.call("GET", "/directory/peers/peer-b")).body).toEqual({
      peer: expect.objectContaining({ id: "peer-b", status: "active" }),
    });

    const discovered = await ctx.call("GET", "/directory/discover?capability=search&exclude=peer-c");
    expect(discovered.body).toEqual({ peers: [expect.objectContaining({ id: "peer-b" })] });
    expect((await ctx.call("POST", "/a2a/discover", { capability: "translate" })).body).toEqual({ peers: [] });

    expect((await ctx.call("DELETE", "/directory/peers/peer-b")).body).toEqual({ result: true });
    const gone = await ctx.call("DELETE", "/directory/peers/peer-b");
    expect(gone.status).toBe(404);
    expect(gone.body).toEqual({ ok: false, error: { code: "PEER_NOT_FOUND", message: "Peer not found: peer-b" } });
  });

  test("GET /events filters by type", async () => {
    const { body } = await ctx.call("GET", "/events?type=TaskFinishEvent&limit=1");
    expect(body).toEqual({ events: [expect.objectContaining({ type: "TaskFinishEvent" })] });

    const rejected = await ctx.call("GET", "/events?type=NoSuchEvent");
    expect(rejected.status).toBe(400);
    expect(rejected.body).toEqual({
      ok: false,
      error: { code: "validation_error", message: "Unknown event type: NoSuchEvent", details: { type: "NoSuchEvent" } },
    });
  });

  test("unknown routes answer 404", async () => {
    const { status, body } = await ctx.call("GET", "/nowhere");

    expect(status).toBe(404);
    expect(body).toEqual({ ok: false, error: { code: "not_found", message: "Route GET /nowhere not found" } });
  });
});

describe("HTTP rate limiting", () => {
  test("answers 429 once a client exhausts its window", async () => {
    const { call, close } = await listen({ rateLimit: { windowMs: 60_000, max: 2 } });
    try {
      const first = await call("GET", "/health");
      await call("GET", "/health");
      const third = await call("GET", "/health");

      expect(first.headers.get("x-ratelimit-limit")).toBe("2");
      expect(first.headers.get("x-ratelimit-remaining")).toBe("1");
      expect(third.status).toBe(429);
      expect(third.body).toEqual({
        ok: false,
        error: { code: "rate_limited", message: "Rate limit exceeded", details: { resetTime: expect.any(Number) } },
      });
    } finally {
      await close();
    }
  });
});
