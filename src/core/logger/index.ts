/**
 * Pino-based structured logging.
 *
 * - JSON or pretty output, optional file target
 * - child loggers carrying agent/peer/capability context
 * - mirrors domain events from the EventBus at mapped levels
 */

import pino from "pino";
import type { DestinationStream, Logger as PinoLogger } from "pino";
import { EventBus, EventEnvelope, EventType } from "../eventBus";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createFormatter, redactArguments } from "./formatters";
import { createTransportTargets } from "./transports";

export interface LoggerContext {
  agentId?: string;
  peerId?: string;
  capability?: string;
  requestId?: string;
  correlationId?: string;
  [key: string]: unknown;
}

type MirrorLevel = "debug" | "info" | "warn";

const EVENT_MIRROR: Partial<Record<EventType, { level: MirrorLevel; message: string }>> = {
  TaskStartEvent: { level: "info", message: "Task started" },
  TaskFinishEvent: { level: "info", message: "Task finished" },
  TurnStateEvent: { level: "debug", message: "Turn state" },
  ModelResponseEvent: { level: "debug", message: "Model responded" },
  ModelErrorEvent: { level: "warn", message: "Model error" },
  CapabilityInvocationEvent: { level: "debug", message: "Capability invoked" },
  CapabilityResultEvent: { level: "debug", message: "Capability completed" },
  CapabilityErrorEvent: { level: "warn", message: "Capability failed" },
  RetryScheduledEvent: { level: "debug", message: "Retry scheduled" },
  CircuitOpenedEvent: { level: "warn", message: "Circuit opened" },
  CircuitClosedEvent: { level: "info", message: "Circuit closed" },
  PeerRegisteredEvent: { level: "info", message: "Peer registered" },
  PeerDeregisteredEvent: { level: "info", message: "Peer removed" },
  PeerHealthEvent: { level: "warn", message: "Peer health changed" },
  DelegationSkippedEvent: { level: "debug", message: "Delegation skipped" },
  DelegationResultEvent: { level: "debug", message: "Delegation finished" },
  ListenerErrorEvent: { level: "warn", message: "Event listener failed" },
};

export interface MeshLoggerOptions {
  eventBus?: EventBus;
  /** Write to this stream instead of the configured transports. */
  destination?: DestinationStream;
}

export class MeshLogger {
  private pinoLogger: PinoLogger;
  private readonly config: LoggerConfig;
  private readonly eventBus?: EventBus;
  private readonly mirror = (evt: EventEnvelope) => this.mirrorEvent(evt);

  constructor(config: Partial<LoggerConfig> = {}, options: MeshLoggerOptions = {}) {
    this.config = createLoggerConfig(config);
    this.eventBus = options.eventBus;

    const pinoOptions: pino.LoggerOptions = {
      level: this.config.level,
      formatters: createFormatter(this.config),
      serializers: { err: pino.stdSerializers.err },
    };

    if (options.destination) {
      this.pinoLogger = pino(pinoOptions, options.destination);
    } else if (this.config.level === "silent") {
      this.pinoLogger = pino(pinoOptions);
    } else {
      this.pinoLogger = pino(pinoOptions, pino.transport({ targets: createTransportTargets(this.config) }));
    }

    this.eventBus?.onAny(this.mirror);
  }

  /**
   * A logger that drops everything. Engine objects default to it.
   */
  static silent(): MeshLogger {
    return new MeshLogger({ level: "silent" });
  }

  child(context: LoggerContext): MeshLogger {
    // Children share the parent's bus subscription; they never subscribe themselves.
    const childLogger = new MeshLogger({ ...this.config, level: "silent" });
    childLogger.pinoLogger = this.pinoLogger.child(context);
    return childLogger;
  }

  trace(message: string, context?: LoggerContext): void {
    this.pinoLogger.trace(context ?? {}, message);
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  startTimer(name: string, context?: LoggerContext): () => number {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.debug(`Timer: ${name}`, { ...context, duration, timer: name });
      return duration;
    };
  }

  traceRequest(method: string, url: string, statusCode: number, duration: number, context?: LoggerContext): void {
    const level = statusCode >= 400 ? "warn" : "info";
    this.pinoLogger[level](
      { ...context, method, url, statusCode, duration, type: "request" },
      `${method} ${url} ${statusCode} (${duration}ms)`
    );
  }

  traceCapability(
    capability: string,
    args: Record<string, unknown>,
    duration: number,
    success: boolean,
    error?: string,
    context?: LoggerContext
  ): void {
    const level = success ? "debug" : "warn";
    this.pinoLogger[level](
      {
        ...context,
        capability,
        args: redactArguments(args),
        duration,
        success,
        error,
        type: "capability",
      },
      `Capability ${capability} ${success ? "succeeded" : "failed"} (${duration}ms)`
    );
  }

  isLevelEnabled(level: Exclude<LoggerConfig["level"], "silent">): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  flush(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.pinoLogger.flush((err) => (err ? reject(err) : resolve()));
    });
  }

  /** Stops mirroring bus events. */
  detach(): void {
    this.eventBus?.offAny(this.mirror);
  }

  private mirrorEvent(evt: EventEnvelope): void {
    const mapping = EVENT_MIRROR[evt.type];
    if (!mapping) return;
    this.pinoLogger[mapping.level](
      { event: evt.type, payload: evt.payload, type: "eventbus", correlationId: evt.id },
      mapping.message
    );
  }
}

let globalLogger: MeshLogger | null = null;

export function initializeLogger(config: Partial<LoggerConfig> = {}, options: MeshLoggerOptions = {}): MeshLogger {
  globalLogger?.detach();
  globalLogger = new MeshLogger(config, options);
  return globalLogger;
}

export function getLogger(): MeshLogger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return globalLogger;
}

export function createContextualLogger(context: LoggerContext): MeshLogger {
  return getLogger().child(context);
}

export type { LoggerConfig, LogLevel, LogFormat } from "./config";
