import { Router } from "express";
import { CollaborationCoordinator } from "../../core/collaboration/coordinator";
import { AssistRequestSchema, DiscoveryRequestSchema, HeartbeatSchema } from "../../core/collaboration/protocol";
import { DirectoryService, HeartbeatPublisher } from "../../core/directory";
import { validateBody } from "../middleware/validation";

export interface A2ADeps {
  coordinator: CollaborationCoordinator;
  directory: DirectoryService;
  /** Served requests feed the stats this node reports in its heartbeats. */
  heartbeat?: HeartbeatPublisher;
}

/**
 * Agent-to-agent endpoints. An assist request always answers 200 with an AssistResponse; failure is
 * carried in `success`.
 */
export function a2aRoutes({ coordinator, directory, heartbeat }: A2ADeps) {
  const r = Router();

  r.post(
    "/assist",
    validateBody(AssistRequestSchema, async (request, req, res) => {
      const response = await coordinator.serveAssist(request);
      heartbeat?.recordServed({ success: response.success, latencyMs: response.elapsedMs });
      res.json(response);
    })
  );

  r.post(
    "/heartbeat",
    validateBody(HeartbeatSchema, async ({ senderId, ...report }, req, res) => {
      const known = await directory.updateHeartbeat(senderId, report);
      res.json({ result: known });
    })
  );

  r.post(
    "/discover",
    validateBody(DiscoveryRequestSchema, async ({ capability, limit }, req, res) => {
      res.json({ peers: await directory.selectPeers({ capability, limit }) });
    })
  );

  return r;
}
