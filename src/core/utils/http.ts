/**
 * Thin JSON-over-fetch helpers shared by the HTTP clients.
 */

import { TimeoutError } from "../errors";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface JsonResponse {
  status: number;
  ok: boolean;
  body: unknown;
}

export interface JsonRequest {
  method?: "GET" | "POST" | "DELETE";
  body?: unknown;
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Sends a JSON request and reads the body as JSON (null when empty or not JSON). Network errors
 * propagate; an elapsed timeout throws TimeoutError.
 */
export async function requestJson(fetchImpl: FetchLike, url: string, req: JsonRequest): Promise<JsonResponse> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), req.timeoutMs);
  const onAbort = () => controller.abort();
  req.signal?.addEventListener("abort", onAbort, { once: true });

  try {
    const res = await fetchImpl(url, {
      method: req.method ?? (req.body === undefined ? "GET" : "POST"),
      headers: req.body === undefined ? undefined : { "Content-Type": "application/json" },
      body: req.body === undefined ? undefined : JSON.stringify(req.body),
      signal: controller.signal,
    });
    const text = await res.text();
    return { status: res.status, ok: res.ok, body: parseJson(text) };
  } catch (e) {
    if (controller.signal.aborted && !req.signal?.aborted) {
      throw new TimeoutError(`Request to ${url} timed out after ${req.timeoutMs}ms`, req.timeoutMs);
    }
    throw e;
  } finally {
    clearTimeout(timer);
    req.signal?.removeEventListener("abort", onAbort);
  }
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, "")}${path}`;
}

function parseJson(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}
