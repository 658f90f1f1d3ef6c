import { PeerRequestError } from "../errors";
import type { PeerRecord } from "../directory/types";
import { FetchLike, joinUrl, requestJson } from "../utils/http";
import { AssistRequest, AssistResponse, AssistResponseSchema } from "./protocol";

/**
 * Transport to other agents. Throws on failure; a PeerRequestError says whether retrying can help.
 */
export interface PeerClient {
  assist(peer: PeerRecord, request: AssistRequest, signal?: AbortSignal): Promise<AssistResponse>;
}

export interface HttpPeerClientOptions {
  requestTimeoutMs?: number;
  fetch?: FetchLike;
}

export class HttpPeerClient implements PeerClient {
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpPeerClientOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30_000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * POSTs to `{peer.url}/a2a/assist`. Transport errors and 5xx answers are retryable; a 4xx answer,
   * a malformed body or `success: false` are not.
   */
  async assist(peer: PeerRecord, request: AssistRequest, signal?: AbortSignal): Promise<AssistResponse> {
    const res = await requestJson(this.fetchImpl, joinUrl(peer.url, "/a2a/assist"), {
      method: "POST",
      body: request,
      timeoutMs: Math.min(this.requestTimeoutMs, request.timeoutMs),
      signal,
    });

    if (!res.ok) {
      throw new PeerRequestError(peer.id, `HTTP ${res.status}`, res.status, res.status >= 500);
    }
    const parsed = AssistResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new PeerRequestError(peer.id, "malformed assist response", res.status, false);
    }
    if (!parsed.data.success) {
      throw new PeerRequestError(peer.id, parsed.data.error ?? "peer reported failure", res.status, false);
    }
    return parsed.data;
  }
}

export function isRetryablePeerError(error: Error): boolean {
  if (error instanceof PeerRequestError) return error.retryable;
  return error.name !== "AbortError";
}
