/**
 * Request schemas for the HTTP routes. Peer wire shapes live in core/collaboration/protocol.
 */

import { z } from "zod";
import { PeerStatusSchema } from "../../core/collaboration/protocol";

const commaList = z
  .string()
  .transform((v) => v.split(",").map((s) => s.trim()).filter(Boolean));

export const AgentRunSchema = z
  .object({
    input: z.string().min(1).max(10000),
  })
  .strict();

export const ToolInvokeSchema = z
  .object({
    name: z.string().min(1).max(100),
    arguments: z.record(z.unknown()).default({}),
    invocationId: z.string().min(1).max(200).optional(),
  })
  .strict();

export const PeerListQuerySchema = z.object({
  status: PeerStatusSchema.optional(),
  capabilities: commaList.optional(),
});

export const DiscoverQuerySchema = z.object({
  capability: z.string().min(1).optional(),
  capabilities: commaList.optional(),
  prefer: commaList.optional(),
  limit: z.coerce.number().int().positive().optional(),
  exclude: commaList.optional(),
});

export const HeartbeatReportSchema = z
  .object({
    status: PeerStatusSchema.optional(),
    latencyMs: z.number().min(0).optional(),
    successRate: z.number().min(0).max(1).optional(),
  })
  .strict();

export const CallOutcomeSchema = z
  .object({
    success: z.boolean(),
    latencyMs: z.number().min(0).optional(),
  })
  .strict();

export const EventsQuerySchema = z.object({
  type: z.string().optional(),
  since: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().positive().max(1000).default(100),
});
