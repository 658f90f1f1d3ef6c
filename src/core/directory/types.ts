import { z } from "zod";
import { PeerStatus, PeerStatusSchema } from "../collaboration/protocol";

export type { PeerStatus };

export interface PeerRecord {
  id: string;
  name: string;
  description: string;
  capabilities: string[];
  url: string;
  status: PeerStatus;
  lastHeartbeat: number;
  registeredAt: number;
  /** Rolling average, ms. */
  latencyMs: number;
  /** Rolling average in [0, 1]. */
  successRate: number;
  metadata: Record<string, string>;
}

export const PeerRegistrationSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string().default(""),
  capabilities: z.array(z.string().min(1)).default([]),
  url: z.string().url(),
  status: PeerStatusSchema.default("active"),
  metadata: z.record(z.string()).default({}),
});

export type PeerRegistration = z.input<typeof PeerRegistrationSchema>;

export interface PeerListFilter {
  status?: PeerStatus;
  /** A record matches when it carries every listed tag. */
  capabilities?: string[];
}

export interface HeartbeatReport {
  status?: PeerStatus;
  latencyMs?: number;
  successRate?: number;
}

export interface PeerSelection {
  capability?: string;
  /** A candidate must carry every listed tag. */
  capabilities?: string[];
  /** Ranked ahead of the others, in this order. */
  prefer?: string[];
  limit?: number;
  exclude?: Iterable<string>;
}

export interface CallOutcome {
  success: boolean;
  /** Omitted when the call never reached the peer. */
  latencyMs?: number;
}

/**
 * The directory surface shared by the in-memory directory and its HTTP client.
 */
export interface DirectoryService {
  /** False when the id is already registered. */
  register(registration: PeerRegistration): Promise<boolean>;
  deregister(id: string): Promise<boolean>;
  get(id: string): Promise<PeerRecord | undefined>;
  list(filter?: PeerListFilter): Promise<PeerRecord[]>;
  /** False when the id is unknown. */
  updateHeartbeat(id: string, report?: HeartbeatReport): Promise<boolean>;
  discoverByCapability(tag: string, limit?: number): Promise<PeerRecord[]>;
  selectPeers(selection?: PeerSelection): Promise<PeerRecord[]>;
  recordOutcome(id: string, outcome: CallOutcome): Promise<void>;
}

export interface ScoreWeights {
  liveness: number;
  latency: number;
  successRate: number;
}

export interface DirectoryConfig {
  heartbeatTimeoutMs: number;
  sweepIntervalMs: number;
  evictAfterMs: number;
  latencyReferenceMs: number;
  /** Weight of the newest sample in the rolling averages. */
  ewmaAlpha: number;
  weights: ScoreWeights;
}

export const DEFAULT_DIRECTORY_CONFIG: DirectoryConfig = {
  heartbeatTimeoutMs: 30_000,
  sweepIntervalMs: 10_000,
  evictAfterMs: 300_000,
  latencyReferenceMs: 500,
  ewmaAlpha: 0.2,
  weights: { liveness: 0.3, latency: 0.3, successRate: 0.4 },
};
