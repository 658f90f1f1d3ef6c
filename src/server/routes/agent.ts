import { Router } from "express";
import { CollaborationCoordinator } from "../../core/collaboration/coordinator";
import { AgentRunSchema } from "./schemas";
import { validateBody } from "../middleware/validation";

export function agentRoutes(coordinator: CollaborationCoordinator) {
  const r = Router();

  // runs a task through the coordinator; delegation happens when peers can help
  r.post(
    "/run",
    validateBody(AgentRunSchema, async ({ input }, req, res) => {
      const result = await coordinator.handle(input);
      res.json({
        ok: true,
        requestId: result.requestId,
        answer: result.answer,
        mode: result.mode,
        attempts: result.attempts,
        turns: result.run?.turns,
        modelCalls: result.run?.modelCalls,
      });
    })
  );

  return r;
}
