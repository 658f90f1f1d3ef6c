import { Router } from "express";
import { DirectoryService, PeerRegistrationSchema } from "../../core/directory";
import { CallOutcomeSchema, DiscoverQuerySchema, HeartbeatReportSchema, PeerListQuerySchema } from "./schemas";
import { handle, validateBody, validateQuery } from "../middleware/validation";

const notFound = (id: string) => ({ ok: false, error: { code: "PEER_NOT_FOUND", message: `Peer not found: ${id}` } });

/**
 * Serves a directory to other processes. The routes mirror what RemoteDirectoryClient calls.
 */
export function directoryRoutes(directory: DirectoryService) {
  const r = Router();

  r.post(
    "/register",
    validateBody(PeerRegistrationSchema, async (registration, req, res) => {
      res.json({ result: await directory.register(registration) });
    })
  );

  r.get(
    "/peers",
    validateQuery(PeerListQuerySchema, async (filter, req, res) => {
      res.json({ peers: await directory.list(filter) });
    })
  );

  r.get(
    "/peers/:id",
    handle(async (req, res) => {
      const peer = await directory.get(req.params.id);
      if (!peer) {
        res.status(404).json(notFound(req.params.id));
        return;
      }
      res.json({ peer });
    })
  );

  r.delete(
    "/peers/:id",
    handle(async (req, res) => {
      const removed = await directory.deregister(req.params.id);
      if (!removed) {
        res.status(404).json(notFound(req.params.id));
        return;
      }
      res.json({ result: true });
    })
  );

  r.post(
    "/peers/:id/heartbeat",
    validateBody(HeartbeatReportSchema, async (report, req, res) => {
      res.json({ result: await directory.updateHeartbeat(req.params.id, report) });
    })
  );

  r.post(
    "/peers/:id/outcome",
    validateBody(CallOutcomeSchema, async (outcome, req, res) => {
      if (!(await directory.get(req.params.id))) {
        res.status(404).json(notFound(req.params.id));
        return;
      }
      await directory.recordOutcome(req.params.id, outcome);
      res.json({ ok: true });
    })
  );

  r.get(
    "/discover",
    validateQuery(DiscoverQuerySchema, async (selection, req, res) => {
      res.json({ peers: await directory.selectPeers(selection) });
    })
  );

  return r;
}
