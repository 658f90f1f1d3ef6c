/**
 * Capabilities served by a remote tool server.
 *
 * Protocol: `GET {url}/tools` lists capability descriptions, `POST {url}/tools/invoke` with
 * `{ name, arguments, invocationId }` answers `{ ok: true, result }` or `{ ok: false, error }`.
 */

import { z } from "zod";
import { InvalidBindingError, RemoteServerError, toError } from "../../errors";
import { MeshLogger } from "../../logger";
import { ResilienceExecutor } from "../../resilience";
import { FetchLike, joinUrl, requestJson } from "../../utils/http";
import type { CapabilityCatalog } from "../index";
import { CapabilityDescriptionSchema, parametersFromDescription } from "../toolSchema";
import type { BackendExecutor, ExecutionRequest } from "./index";

export type { FetchLike };

const InvokeReplySchema = z.union([
  z.object({ ok: z.literal(true), result: z.unknown() }),
  z.object({ ok: z.literal(false), error: z.object({ code: z.string().optional(), message: z.string() }) }),
]);

const ToolListSchema = z.object({ tools: z.array(CapabilityDescriptionSchema) });

export interface RemoteServerExecutorOptions {
  resilience: ResilienceExecutor;
  fetch?: FetchLike;
  requestTimeoutMs?: number;
}

export class RemoteServerExecutor implements BackendExecutor {
  readonly kind = "remote-server" as const;
  private readonly fetchImpl: FetchLike;
  private readonly requestTimeoutMs: number;

  constructor(private readonly options: RemoteServerExecutorOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
  }

  async execute({ definition, binding, invocation, signal }: ExecutionRequest): Promise<unknown> {
    if (binding?.kind !== "remote-server") {
      throw new InvalidBindingError(definition.name, "remote-server capability has no server url");
    }
    const { serverUrl } = binding;
    const name = binding.remoteName ?? definition.name;

    return this.options.resilience.execute(
      async () => {
        const res = await requestJson(this.fetchImpl, joinUrl(serverUrl, "/tools/invoke"), {
          method: "POST",
          body: { name, arguments: invocation.arguments, invocationId: invocation.id },
          timeoutMs: this.requestTimeoutMs,
          signal,
        });
        const reply = InvokeReplySchema.safeParse(res.body);
        if (!reply.success) {
          throw new RemoteServerError(serverUrl, `HTTP ${res.status} with malformed reply`, res.status, res.status >= 500);
        }
        if (!reply.data.ok) {
          // The server ran the call and it failed; repeating it would not change that.
          throw new RemoteServerError(serverUrl, reply.data.error.message, res.status, false);
        }
        return reply.data.result;
      },
      `server:${serverUrl}`,
      { signal, isRetryable: (e) => !(e instanceof RemoteServerError) || e.retryable }
    );
  }
}

export interface DiscoveryResult {
  registered: string[];
  skipped: string[];
}

/**
 * Imports a tool server's catalog as remote-server capabilities. Names already in the catalog
 * are skipped.
 */
export async function discoverRemoteCapabilities(
  catalog: CapabilityCatalog,
  serverUrl: string,
  options: { fetch?: FetchLike; timeoutMs?: number; prefix?: string; logger?: MeshLogger } = {}
): Promise<DiscoveryResult> {
  const logger = options.logger ?? MeshLogger.silent();
  const res = await requestJson(options.fetch ?? fetch, joinUrl(serverUrl, "/tools"), {
    method: "GET",
    timeoutMs: options.timeoutMs ?? 10_000,
  });
  if (!res.ok) {
    throw new RemoteServerError(serverUrl, `tool listing failed with HTTP ${res.status}`, res.status);
  }
  const listing = ToolListSchema.parse(res.body);

  const result: DiscoveryResult = { registered: [], skipped: [] };
  for (const desc of listing.tools) {
    const localName = `${options.prefix ?? ""}${desc.name}`;
    if (catalog.get(localName)) {
      result.skipped.push(localName);
      continue;
    }
    try {
      catalog.register(
        {
          name: localName,
          description: desc.description || desc.name,
          backendKind: "remote-server",
          parameters: parametersFromDescription(desc),
          metadata: { serverUrl },
        },
        { kind: "remote-server", serverUrl, remoteName: desc.name }
      );
      result.registered.push(localName);
    } catch (e) {
      logger.warn("Skipping remote capability", { capability: localName, serverUrl, error: toError(e).message });
      result.skipped.push(localName);
    }
  }
  return result;
}
