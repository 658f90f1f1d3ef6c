/**
 * DirectoryService over HTTP, against another node's `/directory` routes. Lets several processes
 * share one directory.
 */

import { z } from "zod";
import { PeerStatusSchema } from "../collaboration/protocol";
import { MeshworkError } from "../errors";
import { FetchLike, JsonRequest, joinUrl, requestJson } from "../utils/http";
import {
  CallOutcome,
  DirectoryService,
  HeartbeatReport,
  PeerListFilter,
  PeerRecord,
  PeerRegistration,
  PeerSelection,
} from "./types";

const PeerRecordSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: z.string(),
  capabilities: z.array(z.string()),
  url: z.string(),
  status: PeerStatusSchema,
  lastHeartbeat: z.number(),
  registeredAt: z.number(),
  latencyMs: z.number(),
  successRate: z.number(),
  metadata: z.record(z.string()),
});

const PeersBody = z.object({ peers: z.array(PeerRecordSchema) });
const PeerBody = z.object({ peer: PeerRecordSchema });
const FlagBody = z.object({ result: z.boolean() });

export interface RemoteDirectoryClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class RemoteDirectoryClient implements DirectoryService {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: RemoteDirectoryClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs ?? 5000;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async register(registration: PeerRegistration): Promise<boolean> {
    return this.flag("/directory/register", { method: "POST", body: registration });
  }

  async deregister(id: string): Promise<boolean> {
    return this.flag(`/directory/peers/${encodeURIComponent(id)}`, { method: "DELETE" });
  }

  async get(id: string): Promise<PeerRecord | undefined> {
    const res = await this.call(`/directory/peers/${encodeURIComponent(id)}`, { method: "GET" }, [404]);
    if (res.status === 404) return undefined;
    return PeerBody.parse(res.body).peer;
  }

  async list(filter: PeerListFilter = {}): Promise<PeerRecord[]> {
    const query = new URLSearchParams();
    if (filter.status) query.set("status", filter.status);
    if (filter.capabilities?.length) query.set("capabilities", filter.capabilities.join(","));
    return this.peers(`/directory/peers${suffix(query)}`);
  }

  async updateHeartbeat(id: string, report: HeartbeatReport = {}): Promise<boolean> {
    return this.flag(`/directory/peers/${encodeURIComponent(id)}/heartbeat`, { method: "POST", body: report });
  }

  async discoverByCapability(tag: string, limit?: number): Promise<PeerRecord[]> {
    return this.selectPeers({ capability: tag, limit });
  }

  async selectPeers(selection: PeerSelection = {}): Promise<PeerRecord[]> {
    const query = new URLSearchParams();
    if (selection.capability) query.set("capability", selection.capability);
    if (selection.capabilities?.length) query.set("capabilities", selection.capabilities.join(","));
    if (selection.prefer?.length) query.set("prefer", selection.prefer.join(","));
    if (selection.limit !== undefined) query.set("limit", String(selection.limit));
    const exclude = [...(selection.exclude ?? [])];
    if (exclude.length) query.set("exclude", exclude.join(","));
    return this.peers(`/directory/discover${suffix(query)}`);
  }

  async recordOutcome(id: string, outcome: CallOutcome): Promise<void> {
    await this.call(`/directory/peers/${encodeURIComponent(id)}/outcome`, { method: "POST", body: outcome }, [404]);
  }

  private async peers(path: string): Promise<PeerRecord[]> {
    const res = await this.call(path, { method: "GET" });
    return PeersBody.parse(res.body).peers;
  }

  private async flag(path: string, req: Omit<JsonRequest, "timeoutMs">): Promise<boolean> {
    const res = await this.call(path, req, [404]);
    if (res.status === 404) return false;
    return FlagBody.parse(res.body).result;
  }

  private async call(path: string, req: Omit<JsonRequest, "timeoutMs">, accepted: number[] = []) {
    const url = joinUrl(this.baseUrl, path);
    const res = await requestJson(this.fetchImpl, url, { ...req, timeoutMs: this.timeoutMs });
    if (!res.ok && !accepted.includes(res.status)) {
      throw new MeshworkError(`Directory request ${req.method ?? "GET"} ${url} failed`, "DIRECTORY_REQUEST_FAILED", res.status, {
        body: res.body,
      });
    }
    return res;
  }
}

function suffix(query: URLSearchParams): string {
  const s = query.toString();
  return s ? `?${s}` : "";
}
