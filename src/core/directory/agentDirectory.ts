/**
 * In-memory agent directory.
 *
 * Every operation completes synchronously inside its promise, so the map is never observed
 * half-updated by concurrent tasks or by the sweep.
 */

import { EventBus } from "../eventBus";
import { MeshLogger } from "../logger";
import {
  CallOutcome,
  DEFAULT_DIRECTORY_CONFIG,
  DirectoryConfig,
  DirectoryService,
  HeartbeatReport,
  PeerListFilter,
  PeerRecord,
  PeerRegistration,
  PeerRegistrationSchema,
  PeerSelection,
  PeerStatus,
} from "./types";

interface Entry {
  record: PeerRecord;
  /** Registration order, used to break score ties. */
  seq: number;
}

const LIVENESS: Record<PeerStatus, number> = { active: 1, busy: 1 / 3, unhealthy: 0 };

export interface AgentDirectoryDeps {
  eventBus?: EventBus;
  logger?: MeshLogger;
  now?: () => number;
}

export class AgentDirectory implements DirectoryService {
  readonly config: DirectoryConfig;
  private entries = new Map<string, Entry>();
  private nextSeq = 0;
  private timer: NodeJS.Timeout | null = null;
  private readonly eventBus?: EventBus;
  private readonly logger: MeshLogger;
  private readonly now: () => number;

  constructor(config: Partial<DirectoryConfig> = {}, deps: AgentDirectoryDeps = {}) {
    this.config = {
      ...DEFAULT_DIRECTORY_CONFIG,
      ...config,
      weights: { ...DEFAULT_DIRECTORY_CONFIG.weights, ...config.weights },
    };
    this.eventBus = deps.eventBus;
    this.logger = deps.logger ?? MeshLogger.silent();
    this.now = deps.now ?? Date.now;
  }

  async register(registration: PeerRegistration): Promise<boolean> {
    const parsed = PeerRegistrationSchema.parse(registration);
    if (this.entries.has(parsed.id)) return false;

    const now = this.now();
    const record: PeerRecord = {
      ...parsed,
      lastHeartbeat: now,
      registeredAt: now,
      latencyMs: 0,
      successRate: 1,
    };
    this.entries.set(parsed.id, { record, seq: this.nextSeq++ });
    this.logger.debug("Peer registered", { peerId: parsed.id, url: parsed.url });
    this.eventBus?.emit("PeerRegisteredEvent", { agentId: parsed.id, url: parsed.url, capabilities: parsed.capabilities });
    return true;
  }

  async deregister(id: string): Promise<boolean> {
    if (!this.entries.delete(id)) return false;
    this.eventBus?.emit("PeerDeregisteredEvent", { agentId: id, reason: "deregistered" });
    return true;
  }

  async get(id: string): Promise<PeerRecord | undefined> {
    const entry = this.entries.get(id);
    return entry ? copyRecord(entry.record) : undefined;
  }

  async list(filter: PeerListFilter = {}): Promise<PeerRecord[]> {
    return this.ordered()
      .filter((e) => matches(e.record, filter))
      .map((e) => copyRecord(e.record));
  }

  async updateHeartbeat(id: string, report: HeartbeatReport = {}): Promise<boolean> {
    const entry = this.entries.get(id);
    if (!entry) return false;

    const record = entry.record;
    const previous = record.status;
    record.lastHeartbeat = this.now();
    record.status = report.status ?? "active";
    if (report.latencyMs !== undefined) record.latencyMs = report.latencyMs;
    if (report.successRate !== undefined) record.successRate = report.successRate;

    if (previous === "unhealthy" && record.status !== "unhealthy") {
      this.eventBus?.emit("PeerHealthEvent", { agentId: id, status: "active" });
    }
    return true;
  }

  async recordOutcome(id: string, outcome: CallOutcome): Promise<void> {
    const entry = this.entries.get(id);
    if (!entry) return;
    const a = this.config.ewmaAlpha;
    const record = entry.record;
    if (outcome.latencyMs !== undefined) {
      record.latencyMs = record.latencyMs * (1 - a) + outcome.latencyMs * a;
    }
    record.successRate = record.successRate * (1 - a) + (outcome.success ? 1 : 0) * a;
  }

  async discoverByCapability(tag: string, limit?: number): Promise<PeerRecord[]> {
    return this.selectPeers({ capability: tag, limit });
  }

  /**
   * Healthy candidates ranked by score, best first. Preferred ids come before everyone else;
   * equal scores keep registration order.
   */
  async selectPeers(selection: PeerSelection = {}): Promise<PeerRecord[]> {
    const exclude = new Set(selection.exclude ?? []);
    const required = [...(selection.capabilities ?? []), ...(selection.capability ? [selection.capability] : [])];
    const prefer = selection.prefer ?? [];
    const rank = (id: string) => (prefer.includes(id) ? prefer.indexOf(id) : prefer.length);
    const ranked = this.ordered()
      .filter((e) => e.record.status !== "unhealthy")
      .filter((e) => !exclude.has(e.record.id))
      .filter((e) => required.every((tag) => e.record.capabilities.includes(tag)))
      .map((e) => ({ e, score: this.score(e.record) }))
      .sort((x, y) => rank(x.e.record.id) - rank(y.e.record.id) || y.score - x.score || x.e.seq - y.e.seq)
      .map(({ e }) => copyRecord(e.record));
    return selection.limit === undefined ? ranked : ranked.slice(0, selection.limit);
  }

  score(record: PeerRecord): number {
    const w = this.config.weights;
    const latencyScore = 1 / (1 + record.latencyMs / this.config.latencyReferenceMs);
    return w.liveness * LIVENESS[record.status] + w.latency * latencyScore + w.successRate * record.successRate;
  }

  /**
   * Marks silent peers unhealthy and evicts the long-silent ones. Returns the affected ids.
   */
  sweep(): { markedUnhealthy: string[]; evicted: string[] } {
    const now = this.now();
    const markedUnhealthy: string[] = [];
    const evicted: string[] = [];

    for (const [id, { record }] of this.entries) {
      const silence = now - record.lastHeartbeat;
      if (silence >= this.config.evictAfterMs) {
        this.entries.delete(id);
        evicted.push(id);
        this.eventBus?.emit("PeerDeregisteredEvent", { agentId: id, reason: "evicted" });
      } else if (silence >= this.config.heartbeatTimeoutMs && record.status !== "unhealthy") {
        record.status = "unhealthy";
        markedUnhealthy.push(id);
        this.eventBus?.emit("PeerHealthEvent", { agentId: id, status: "unhealthy" });
      }
    }

    if (markedUnhealthy.length > 0 || evicted.length > 0) {
      this.logger.info("Directory sweep", { markedUnhealthy, evicted });
    }
    return { markedUnhealthy, evicted };
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sweep(), this.config.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  get size(): number {
    return this.entries.size;
  }

  private ordered(): Entry[] {
    return [...this.entries.values()].sort((a, b) => a.seq - b.seq);
  }
}

function matches(record: PeerRecord, filter: PeerListFilter): boolean {
  if (filter.status && record.status !== filter.status) return false;
  if (filter.capabilities && !filter.capabilities.every((c) => record.capabilities.includes(c))) return false;
  return true;
}

function copyRecord(record: PeerRecord): PeerRecord {
  return { ...record, capabilities: [...record.capabilities], metadata: { ...record.metadata } };
}
