/**
 * Typed event bus with a bounded append-only history.
 * - emits events in-process (sync)
 * - a throwing listener never breaks the emitter; it is reported as ListenerErrorEvent
 */

import { ulid } from "ulid";

export interface MeshEventMap {
  TaskStartEvent: { agentId: string; taskId: string; task: string; depth: number };
  TaskFinishEvent: { agentId: string; taskId: string; turns: number; modelCalls: number; synthesized: boolean };
  TurnStateEvent: { agentId: string; taskId: string; turn: number; state: string };
  ModelResponseEvent: { agentId: string; turn: number; type: "final" | "invocations"; invocationCount: number };
  ModelErrorEvent: { agentId?: string; provider: string; error: string };
  CapabilityInvocationEvent: { invocationId: string; capability: string; backendKind: string };
  CapabilityResultEvent: { invocationId: string; capability: string; elapsedMs: number; cached: boolean };
  CapabilityErrorEvent: { invocationId: string; capability: string; code: string; message: string };
  RetryScheduledEvent: { targetId: string; attempt: number; delayMs: number; error: string };
  CircuitOpenedEvent: { targetId: string; failures: number };
  CircuitClosedEvent: { targetId: string };
  PeerRegisteredEvent: { agentId: string; url: string; capabilities: string[] };
  PeerDeregisteredEvent: { agentId: string; reason: "deregistered" | "evicted" };
  PeerHealthEvent: { agentId: string; status: "active" | "unhealthy" };
  DelegationStateEvent: { agentId: string; taskId: string; state: string };
  DelegationSkippedEvent: { agentId: string; peerId: string; reason: string };
  DelegationResultEvent: { agentId: string; peerId: string; success: boolean; elapsedMs: number; error?: string };
  ListenerErrorEvent: { type: string; error: string; listener: string };
}

export type EventType = keyof MeshEventMap;

const KNOWN_TYPES: Record<EventType, true> = {
  TaskStartEvent: true,
  TaskFinishEvent: true,
  TurnStateEvent: true,
  ModelResponseEvent: true,
  ModelErrorEvent: true,
  CapabilityInvocationEvent: true,
  CapabilityResultEvent: true,
  CapabilityErrorEvent: true,
  RetryScheduledEvent: true,
  CircuitOpenedEvent: true,
  CircuitClosedEvent: true,
  PeerRegisteredEvent: true,
  PeerDeregisteredEvent: true,
  PeerHealthEvent: true,
  DelegationStateEvent: true,
  DelegationSkippedEvent: true,
  DelegationResultEvent: true,
  ListenerErrorEvent: true,
};

export function isEventType(value: string): value is EventType {
  return Object.prototype.hasOwnProperty.call(KNOWN_TYPES, value);
}

export interface EventEnvelope<K extends EventType = EventType> {
  id: string;
  type: K;
  timestamp: number;
  payload: MeshEventMap[K];
  meta?: Record<string, unknown>;
}

type Listener<K extends EventType> = (evt: EventEnvelope<K>) => void;
type AnyListener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number;
  historyRetentionPolicy?: "truncate" | "circular";
}

export class EventBus {
  private listeners: { [K in EventType]?: Set<Listener<K>> } = {};
  private anyListeners = new Set<AnyListener>();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 10000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on<K extends EventType>(type: K, listener: Listener<K>): void {
    this.listenersFor(type).add(listener);
  }

  off<K extends EventType>(type: K, listener: Listener<K>): void {
    this.listenersFor(type).delete(listener);
  }

  onAny(listener: AnyListener): void {
    this.anyListeners.add(listener);
  }

  offAny(listener: AnyListener): void {
    this.anyListeners.delete(listener);
  }

  emit<K extends EventType>(type: K, payload: MeshEventMap[K], meta?: Record<string, unknown>): EventEnvelope<K> {
    const envelope: EventEnvelope<K> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };

    this.record(envelope);

    for (const l of this.listenersFor(type)) {
      try {
        l(envelope);
      } catch (e) {
        this.reportListenerError(type, e, l.name);
      }
    }

    for (const l of this.anyListeners) {
      try {
        l(envelope);
      } catch (e) {
        this.reportListenerError(type, e, l.name);
      }
    }

    return envelope;
  }

  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;

    const since = options?.since;
    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    if (options?.type) {
      const type = options.type;
      filtered = filtered.filter((e) => e.type === type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }

  private listenersFor<K extends EventType>(type: K): Set<Listener<K>> {
    const existing: { [P in K]?: Set<Listener<P>> } = this.listeners;
    let set = existing[type];
    if (!set) {
      set = new Set<Listener<K>>();
      existing[type] = set;
    }
    return set;
  }

  private record<K extends EventType>(envelope: EventEnvelope<K>): void {
    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      if (this.config.historyRetentionPolicy === "truncate") {
        const excess = this.history.length - this.config.maxHistorySize;
        this.history.splice(0, excess);
      } else {
        this.history.shift();
      }
    }
  }

  private reportListenerError(type: EventType, e: unknown, listenerName: string): void {
    // A failing ListenerErrorEvent listener would recurse forever.
    if (type === "ListenerErrorEvent") return;
    this.emit("ListenerErrorEvent", {
      type,
      error: e instanceof Error ? e.message : String(e),
      listener: listenerName || "anonymous",
    });
  }
}
