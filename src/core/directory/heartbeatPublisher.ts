import { MeshLogger } from "../logger";
import type { CallOutcome, DirectoryService, PeerRegistration, PeerStatus } from "./types";

export interface HeartbeatPublisherOptions {
  self: PeerRegistration;
  directory: DirectoryService;
  intervalMs: number;
  /** Weight of the newest sample in the reported averages. */
  ewmaAlpha?: number;
  logger?: MeshLogger;
}

/**
 * Announces this node to a directory and keeps its entry fresh. A heartbeat the directory rejects
 * (the entry was evicted) triggers a new registration.
 */
export class HeartbeatPublisher {
  private timer: NodeJS.Timeout | null = null;
  private status: PeerStatus = "active";
  private latencyMs = 0;
  private successRate = 1;
  private samples = 0;
  private readonly alpha: number;
  private readonly logger: MeshLogger;

  constructor(private readonly options: HeartbeatPublisherOptions) {
    this.alpha = options.ewmaAlpha ?? 0.2;
    this.logger = options.logger ?? MeshLogger.silent();
  }

  get id(): string {
    return this.options.self.id;
  }

  setStatus(status: PeerStatus): void {
    this.status = status;
  }

  /** Folds one served request into the reported latency and success rate. */
  recordServed(outcome: Required<CallOutcome>): void {
    const success = outcome.success ? 1 : 0;
    if (this.samples === 0) {
      this.latencyMs = outcome.latencyMs;
      this.successRate = success;
    } else {
      this.latencyMs = this.alpha * outcome.latencyMs + (1 - this.alpha) * this.latencyMs;
      this.successRate = this.alpha * success + (1 - this.alpha) * this.successRate;
    }
    this.samples++;
  }

  report(): { status: PeerStatus; latencyMs?: number; successRate?: number } {
    if (this.samples === 0) return { status: this.status };
    return { status: this.status, latencyMs: this.latencyMs, successRate: this.successRate };
  }

  /**
   * Sends one heartbeat. Returns true when the directory already knew this node.
   */
  async publish(): Promise<boolean> {
    const { directory, self } = this.options;
    const known = await directory.updateHeartbeat(self.id, this.report());
    if (known) return true;

    const registered = await directory.register({ ...self, status: this.status });
    this.logger.info("Registered with directory", { agentId: self.id, registered });
    if (registered && this.samples > 0) {
      await directory.updateHeartbeat(self.id, this.report());
    }
    return false;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.publish().catch((error: unknown) => {
        this.logger.warn("Heartbeat failed", {
          agentId: this.id,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }, this.options.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
