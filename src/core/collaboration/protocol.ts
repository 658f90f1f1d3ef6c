/**
 * Peer wire protocol. Every shape is validated on receipt; unknown fields are stripped.
 */

import { ulid } from "ulid";
import { z } from "zod";
import { CollaborationContext, WireContext } from "./context";

export const PeerStatusSchema = z.enum(["active", "busy", "unhealthy"]);
export type PeerStatus = z.infer<typeof PeerStatusSchema>;

export const AssistRequestSchema = z.object({
  requestId: z.string().min(1),
  senderId: z.string().min(1).optional(),
  task: z.string().min(1),
  context: z.record(z.unknown()).default({}),
  requiredCapabilityTags: z.array(z.string()).optional(),
  preferredPeerIds: z.array(z.string()).optional(),
  timeoutMs: z.number().int().positive(),
  maxDepth: z.number().int().min(0),
  currentDepth: z.number().int().min(0),
  visitedPeerIds: z.array(z.string()).default([]),
  startedAt: z.number().optional(),
  deadlineAt: z.number().optional(),
});

export type AssistRequest = z.infer<typeof AssistRequestSchema>;

export const AssistResponseSchema = z.object({
  requestId: z.string(),
  success: z.boolean(),
  result: z.unknown().optional(),
  error: z.string().optional(),
  elapsedMs: z.number().min(0),
  agentId: z.string(),
});

export type AssistResponse = z.infer<typeof AssistResponseSchema>;

export const HeartbeatSchema = z.object({
  senderId: z.string().min(1),
  status: PeerStatusSchema.default("active"),
  latencyMs: z.number().min(0).optional(),
  successRate: z.number().min(0).max(1).optional(),
});

export type Heartbeat = z.infer<typeof HeartbeatSchema>;

export const DiscoveryRequestSchema = z.object({
  capability: z.string().min(1).optional(),
  limit: z.number().int().positive().optional(),
});

export interface AssistRequestInit {
  senderId: string;
  task: string;
  context?: Record<string, unknown>;
  requiredCapabilityTags?: string[];
  preferredPeerIds?: string[];
  /** Already derived for the target peer. */
  collaboration: CollaborationContext;
  now?: number;
}

export function createAssistRequest(init: AssistRequestInit): AssistRequest {
  const wire = init.collaboration.toWire();
  return {
    requestId: ulid(),
    senderId: init.senderId,
    task: init.task,
    context: init.context ?? {},
    requiredCapabilityTags: init.requiredCapabilityTags,
    preferredPeerIds: init.preferredPeerIds,
    timeoutMs: Math.max(1, init.collaboration.remainingMs(init.now)),
    maxDepth: wire.maxDepth,
    currentDepth: wire.currentDepth,
    visitedPeerIds: wire.visitedPeerIds,
    startedAt: wire.startedAt,
    deadlineAt: wire.deadlineAt,
  };
}

/**
 * The collaboration bounds carried by a request. A request without `deadlineAt` gets one from
 * `timeoutMs`, measured from receipt.
 */
export function wireContextOf(request: AssistRequest, now: number = Date.now()): WireContext {
  const visited = new Set(request.visitedPeerIds);
  if (request.senderId) visited.add(request.senderId);
  return {
    requestId: request.requestId,
    currentDepth: request.currentDepth,
    maxDepth: request.maxDepth,
    visitedPeerIds: [...visited],
    startedAt: request.startedAt ?? now,
    deadlineAt: Math.min(request.deadlineAt ?? Number.POSITIVE_INFINITY, now + request.timeoutMs),
  };
}
