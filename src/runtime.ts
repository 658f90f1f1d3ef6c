/**
 * Wires one agent node: bus, logger, catalog with its four backends, directory, model, orchestrator
 * and coordinator.
 */

import { MeshworkConfig } from "./core/config";
import { EventBus } from "./core/eventBus";
import { MeshLogger } from "./core/logger";
import { ResilienceExecutor } from "./core/resilience";
import {
  CapabilityCatalog,
  InProcessExecutor,
  PeerAgentExecutor,
  RemoteServerExecutor,
  SandboxedExecutor,
  VmSandboxRunner,
  discoverRemoteCapabilities,
} from "./core/tool-engine";
import { registerBuiltinTools } from "./core/tools/builtinTools";
import { AgentDirectory, DirectoryService, HeartbeatPublisher, RemoteDirectoryClient } from "./core/directory";
import { ModelAdapter } from "./core/models/adapter";
import { MockAdapter } from "./core/models/mockAdapter";
import { OpenAIAdapter } from "./core/models/openaiAdapter";
import { TurnOrchestrator } from "./core/agent/turnOrchestrator";
import { CollaborationCoordinator } from "./core/collaboration/coordinator";
import { HttpPeerClient, PeerClient } from "./core/collaboration/peerClient";
import { FetchLike } from "./core/utils/http";
import { ValidationError } from "./core/errors";

export interface AgentNodeOverrides {
  /** Replaces the configured provider. */
  model?: ModelAdapter;
  /** Used for remote tool servers, the remote directory and peers. */
  fetch?: FetchLike;
  peerClient?: PeerClient;
  logger?: MeshLogger;
  eventBus?: EventBus;
  now?: () => number;
}

export class AgentNode {
  readonly eventBus: EventBus;
  readonly logger: MeshLogger;
  readonly resilience: ResilienceExecutor;
  readonly catalog: CapabilityCatalog;
  readonly directory: DirectoryService;
  /** Set when this node keeps the directory in memory rather than using a remote one. */
  readonly localDirectory?: AgentDirectory;
  readonly model: ModelAdapter;
  readonly orchestrator: TurnOrchestrator;
  readonly coordinator: CollaborationCoordinator;
  readonly heartbeat?: HeartbeatPublisher;
  private readonly fetchImpl?: FetchLike;
  private started = false;

  constructor(readonly config: MeshworkConfig, overrides: AgentNodeOverrides = {}) {
    const now = overrides.now ?? Date.now;
    this.fetchImpl = overrides.fetch;
    this.eventBus = overrides.eventBus ?? new EventBus();
    this.logger =
      overrides.logger ??
      new MeshLogger(
        {
          level: config.logger.level,
          format: config.logger.format,
          file: config.logger.file ? { enabled: true, path: config.logger.file } : undefined,
          source: config.agent.id,
        },
        { eventBus: this.eventBus }
      );
    const log = this.logger.child({ agentId: config.agent.id });

    this.resilience = new ResilienceExecutor(config.resilience, { eventBus: this.eventBus, logger: log, now });

    if (config.directory.remoteUrl) {
      this.directory = new RemoteDirectoryClient({ baseUrl: config.directory.remoteUrl, fetch: overrides.fetch });
    } else {
      this.localDirectory = new AgentDirectory(
        {
          heartbeatTimeoutMs: config.directory.heartbeatTimeoutMs,
          sweepIntervalMs: config.directory.sweepIntervalMs,
          evictAfterMs: config.directory.evictAfterMs,
          weights: config.directory.weights,
        },
        { eventBus: this.eventBus, logger: log, now }
      );
      this.directory = this.localDirectory;
    }

    const peerClient =
      overrides.peerClient ??
      new HttpPeerClient({ requestTimeoutMs: config.collaboration.requestTimeoutMs, fetch: overrides.fetch });

    this.catalog = new CapabilityCatalog({
      eventBus: this.eventBus,
      logger: log,
      defaultTimeoutMs: config.orchestrator.invocationTimeoutMs,
    });
    this.catalog.registerBackend("in-process", new InProcessExecutor());
    this.catalog.registerBackend("sandboxed", new SandboxedExecutor(new VmSandboxRunner()));
    this.catalog.registerBackend(
      "remote-server",
      new RemoteServerExecutor({
        resilience: this.resilience,
        fetch: overrides.fetch,
        requestTimeoutMs: config.collaboration.requestTimeoutMs,
      })
    );
    this.catalog.registerBackend(
      "peer-agent",
      new PeerAgentExecutor({
        selfId: config.agent.id,
        directory: this.directory,
        peerClient,
        resilience: this.resilience,
        maxDepth: config.collaboration.maxDepth,
        timeoutMs: config.collaboration.timeoutMs,
        eventBus: this.eventBus,
        logger: log,
        now,
      })
    );
    registerBuiltinTools(this.catalog, now);

    this.model = overrides.model ?? this.createModel(log);

    this.orchestrator = new TurnOrchestrator(
      { model: this.model, catalog: this.catalog, eventBus: this.eventBus, logger: log },
      {
        agentId: config.agent.id,
        maxTurns: config.orchestrator.maxTurns,
        maxConcurrentInvocations: config.orchestrator.maxConcurrentInvocations,
        parallel: config.orchestrator.parallel,
        invocationTimeoutMs: config.orchestrator.invocationTimeoutMs,
        temperature: config.orchestrator.temperature,
        maxTokens: config.orchestrator.maxTokens,
      }
    );

    this.coordinator = new CollaborationCoordinator(
      {
        selfId: config.agent.id,
        model: this.model,
        orchestrator: this.orchestrator,
        catalog: this.catalog,
        directory: this.directory,
        peerClient,
        resilience: this.resilience,
        eventBus: this.eventBus,
        logger: log,
        now,
      },
      {
        enabled: config.collaboration.enabled,
        maxDepth: config.collaboration.maxDepth,
        timeoutMs: config.collaboration.timeoutMs,
        maxPeersPerTask: config.collaboration.maxPeersPerTask,
      }
    );

    if (config.directory.remoteUrl && config.agent.endpoint) {
      this.heartbeat = new HeartbeatPublisher({
        self: {
          id: config.agent.id,
          name: config.agent.name,
          description: config.agent.description,
          capabilities: config.agent.capabilities,
          url: config.agent.endpoint,
        },
        directory: this.directory,
        intervalMs: config.directory.heartbeatIntervalMs,
        logger: log,
      });
    }
  }

  /**
   * Imports remote tool catalogs, then starts the directory sweep or the heartbeat. An unreachable
   * tool server or directory is logged and retried by the next heartbeat; it does not stop the node.
   */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    for (const server of this.config.remoteServers) {
      try {
        const result = await discoverRemoteCapabilities(this.catalog, server.url, {
          fetch: this.fetchImpl,
          prefix: server.prefix,
          logger: this.logger,
        });
        this.logger.info("Imported remote capabilities", { serverUrl: server.url, ...result });
      } catch (error: unknown) {
        this.logger.warn("Remote tool server unavailable", {
          serverUrl: server.url,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    this.localDirectory?.start();
    if (this.heartbeat) {
      try {
        await this.heartbeat.publish();
      } catch (error: unknown) {
        this.logger.warn("Directory unreachable", {
          directory: this.config.directory.remoteUrl,
          error: error instanceof Error ? error.message : String(error),
        });
      }
      this.heartbeat.start();
    }
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.localDirectory?.stop();
    if (this.heartbeat) {
      this.heartbeat.stop();
      try {
        await this.directory.deregister(this.heartbeat.id);
      } catch (error: unknown) {
        this.logger.warn("Deregistration failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  private createModel(log: MeshLogger): ModelAdapter {
    const deps = { eventBus: this.eventBus, logger: log, resilience: this.resilience };
    const { model } = this.config;
    if (model.provider === "openai") {
      if (!model.apiKey) {
        throw new ValidationError("model.apiKey (OPENAI_API_KEY) is required for the openai provider");
      }
      return new OpenAIAdapter(
        {
          apiKey: model.apiKey,
          model: model.model,
          baseURL: model.baseURL,
          timeoutMs: model.timeoutMs,
          temperature: this.config.orchestrator.temperature,
          maxTokens: this.config.orchestrator.maxTokens,
        },
        deps
      );
    }
    return new MockAdapter([], { ...deps, id: model.model ?? "mock" });
  }
}

export function createAgentNode(config: MeshworkConfig, overrides: AgentNodeOverrides = {}): AgentNode {
  return new AgentNode(config, overrides);
}
